import { z } from 'zod';
import type { Result, CourseCodeKey } from '../../../../shared/types/index';
import { Ok, flatMap, StudentIdSchema, CourseCodeKeySchema } from '../../../../shared/types/index';
import { NameSchema, fullName } from '../value-objects/name';
import {
  GradeLetterSchema,
  gradePointOf,
  isPassingGrade,
  type GradeLetter
} from '../value-objects/grade';
import {
  personIdentitySchema,
  EmailSchema,
  DepartmentSchema,
  validateDateOfBirth,
  withActive
} from './person';
import { parseWithSchema, validationFailure, type RecordsError } from '../errors/errors';
import { formatTimestamp } from '../services/formatting';

/**
 * 学生エンティティ
 *
 * 不変レコードとして扱い、状態変更は新しいレコードを返す関数で表す。
 * 履修集合は挿入順を保ち重複を持たない。成績は履修集合にある科目にのみ記録できる
 */

// === スキーマ ===

export const AuditEntrySchema = z.object({
  timestamp: z.date(),
  message: z.string().min(1)
}).readonly();

export const CurrentSemesterSchema = z.number({ invalid_type_error: 'Semester must be an integer' })
  .int('Semester must be an integer')
  .min(1, 'Semester must be between 1 and 8')
  .max(8, 'Semester must be between 1 and 8');

export const StudentSchema = z.object({
  kind: z.literal('STUDENT'),
  identity: personIdentitySchema(StudentIdSchema),
  registrationNumber: z.string().trim().min(1, 'Registration number is required'),
  department: DepartmentSchema,
  currentSemester: CurrentSemesterSchema,
  enrolledCourses: z.array(CourseCodeKeySchema).readonly(),
  courseGrades: z.record(z.string(), GradeLetterSchema).readonly(),
  enrollmentDate: z.date(),
  auditTrail: z.array(AuditEntrySchema).readonly(),
  createdAt: z.date(),
  lastModifiedAt: z.date()
});

export const StudentDraftSchema = z.object({
  id: StudentIdSchema,
  registrationNumber: z.string().trim().min(1, 'Registration number is required'),
  name: NameSchema,
  email: EmailSchema,
  dateOfBirth: z.date(),
  department: DepartmentSchema,
  currentSemester: CurrentSemesterSchema.default(1)
});

export const StudentUpdateSchema = z.object({
  name: NameSchema.optional(),
  email: EmailSchema.optional(),
  department: DepartmentSchema.optional(),
  currentSemester: CurrentSemesterSchema.optional(),
  dateOfBirth: z.date().optional()
});

export type AuditEntry = z.infer<typeof AuditEntrySchema>;
export type Student = z.infer<typeof StudentSchema>;
export type StudentDraft = z.input<typeof StudentDraftSchema>;
export type StudentUpdate = z.input<typeof StudentUpdateSchema>;

// === 生成 ===

/**
 * 学生の生成（作成の監査記録を1件持った状態で返す）
 */
export const createStudent = (
  draft: StudentDraft,
  now: Date = new Date()
): Result<Student, RecordsError> =>
  flatMap(
    parseWithSchema(StudentDraftSchema, draft, 'INVALID_STUDENT'),
    valid => flatMap(validateDateOfBirth(valid.dateOfBirth, now), dateOfBirth => {
      const student: Student = {
        kind: 'STUDENT',
        identity: {
          id: valid.id,
          name: valid.name,
          email: valid.email,
          dateOfBirth,
          registrationDate: now,
          active: true
        },
        registrationNumber: valid.registrationNumber,
        department: valid.department,
        currentSemester: valid.currentSemester,
        enrolledCourses: [],
        courseGrades: {},
        enrollmentDate: now,
        auditTrail: [],
        createdAt: now,
        lastModifiedAt: now
      };
      return Ok(addAuditEntry(student, `Student created: ${fullName(valid.name)}`, now));
    })
  );

// === 監査記録 ===

/**
 * 監査記録の追加（空文字は無視）。最終更新日時もここで更新する
 */
export const addAuditEntry = (student: Student, message: string, now: Date = new Date()): Student => {
  if (message.trim() === '') {
    return student;
  }
  return {
    ...student,
    auditTrail: [...student.auditTrail, { timestamp: now, message }],
    lastModifiedAt: now
  };
};

/** 例: "[2024-09-01 10:15:00] Student activated" */
export const formatAuditEntry = (entry: AuditEntry): string =>
  `[${formatTimestamp(entry.timestamp)}] ${entry.message}`;

export const getAuditTrail = (student: Student): string[] =>
  student.auditTrail.map(formatAuditEntry);

export const getLastModified = (student: Student): Date => student.lastModifiedAt;

// === 状態遷移 ===

export const activateStudent = (student: Student, now: Date = new Date(), message = 'Student activated'): Student =>
  addAuditEntry({ ...student, identity: withActive(student.identity, true) }, message, now);

export const deactivateStudent = (student: Student, now: Date = new Date(), message = 'Student deactivated'): Student =>
  addAuditEntry({ ...student, identity: withActive(student.identity, false) }, message, now);

export const isEnrolledIn = (student: Student, courseCode: CourseCodeKey): boolean =>
  student.enrolledCourses.includes(courseCode);

/**
 * 履修集合への追加。既に含まれていれば added=false で変更なし
 */
export const enrollInCourse = (
  student: Student,
  courseCode: CourseCodeKey,
  now: Date = new Date()
): { student: Student; added: boolean } => {
  if (isEnrolledIn(student, courseCode)) {
    return { student, added: false };
  }
  const enrolled: Student = { ...student, enrolledCourses: [...student.enrolledCourses, courseCode] };
  return { student: addAuditEntry(enrolled, `Enrolled in course: ${courseCode}`, now), added: true };
};

/**
 * 履修集合からの削除（記録済みの成績も消える）
 */
export const unenrollFromCourse = (
  student: Student,
  courseCode: CourseCodeKey,
  now: Date = new Date()
): { student: Student; removed: boolean } => {
  if (!isEnrolledIn(student, courseCode)) {
    return { student, removed: false };
  }
  const courseGrades = Object.fromEntries(
    Object.entries(student.courseGrades).filter(([code]) => code !== courseCode)
  );
  const unenrolled: Student = {
    ...student,
    enrolledCourses: student.enrolledCourses.filter(code => code !== courseCode),
    courseGrades
  };
  return { student: addAuditEntry(unenrolled, `Unenrolled from course: ${courseCode}`, now), removed: true };
};

/**
 * 成績の記録。履修していない科目には記録できない
 */
export const recordGrade = (
  student: Student,
  courseCode: CourseCodeKey,
  grade: GradeLetter,
  now: Date = new Date()
): Result<Student, RecordsError> => {
  if (!isEnrolledIn(student, courseCode)) {
    return validationFailure(
      `Student is not enrolled in course: ${courseCode}`,
      'NOT_ENROLLED_IN_COURSE',
      'courseCode',
      courseCode
    );
  }
  const graded: Student = { ...student, courseGrades: { ...student.courseGrades, [courseCode]: grade } };
  return Ok(addAuditEntry(graded, `Grade recorded for ${courseCode}: ${grade}`, now));
};

/**
 * 氏名・連絡先・所属などの更新
 */
export const updateStudentDetails = (
  student: Student,
  update: StudentUpdate,
  now: Date = new Date()
): Result<Student, RecordsError> =>
  flatMap(
    parseWithSchema(StudentUpdateSchema, update, 'INVALID_STUDENT'),
    valid => {
      const birthCheck = valid.dateOfBirth
        ? validateDateOfBirth(valid.dateOfBirth, now)
        : Ok(student.identity.dateOfBirth);
      return flatMap(birthCheck, dateOfBirth => Ok<Student>({
        ...student,
        identity: {
          ...student.identity,
          name: valid.name ?? student.identity.name,
          email: valid.email ?? student.identity.email,
          dateOfBirth
        },
        department: valid.department ?? student.department,
        currentSemester: valid.currentSemester ?? student.currentSemester,
        lastModifiedAt: now
      }));
    }
  );

// === 導出値 ===

export const gradeFor = (student: Student, courseCode: string): GradeLetter | undefined =>
  Object.prototype.hasOwnProperty.call(student.courseGrades, courseCode)
    ? student.courseGrades[courseCode]
    : undefined;

export const gradedCourses = (student: Student): Array<[string, GradeLetter]> =>
  Object.entries(student.courseGrades);

/**
 * GPA = Σ(GP × 単位) / (科目数 × 単位)
 *
 * 単位は全科目一律（既定3）なので、結果はGPの単純平均に等しい。成績が無ければ0
 */
export const calculateGpa = (student: Student, creditWeight: number = 3): number => {
  const grades = Object.values(student.courseGrades);
  if (grades.length === 0) {
    return 0;
  }
  const totalGradePoints = grades.reduce((sum, grade) => sum + gradePointOf(grade) * creditWeight, 0);
  return totalGradePoints / (grades.length * creditWeight);
};

/**
 * 記録された成績がすべて合格なら true（成績が無い場合も true）
 */
export const isInGoodStanding = (student: Student): boolean =>
  Object.values(student.courseGrades).every(isPassingGrade);

export const getCompletedCourses = (student: Student): CourseCodeKey[] =>
  student.enrolledCourses.filter(code => gradeFor(student, code) !== undefined);

export const getPendingCourses = (student: Student): CourseCodeKey[] =>
  student.enrolledCourses.filter(code => gradeFor(student, code) === undefined);

export const getStudentDisplayInfo = (student: Student): string =>
  `Reg No: ${student.registrationNumber} | Dept: ${student.department} | Sem: ${student.currentSemester} | GPA: ${calculateGpa(student).toFixed(2)} | Courses: ${student.enrolledCourses.length}`;
