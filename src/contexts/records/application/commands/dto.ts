import { z } from 'zod';
import type { Result, StudentId, InstructorId, CourseCodeKey } from '../../../../shared/types/index';
import { flatMap, map, StudentIdSchema, InstructorIdSchema } from '../../../../shared/types/index';
import { fullName } from '../../domain/value-objects/name';
import { fullCode, normalizeCourseCodeKey } from '../../domain/value-objects/course-code';
import { formatIsoDate } from '../../domain/services/formatting';
import { parseWithSchema, type RecordsError } from '../../domain/errors/errors';
import { type Student, StudentUpdateSchema, calculateGpa, isInGoodStanding } from '../../domain/entities/student';
import { type Instructor, InstructorUpdateSchema, teachingLoad } from '../../domain/entities/instructor';
import {
  type Course,
  CourseUpdateSchema,
  currentEnrollment,
  availableSpots
} from '../../domain/entities/course';
import type { Enrollment } from '../../domain/entities/enrollment';
import { enrollmentPercentage, enrollmentStatusSummary } from '../../domain/services/course-statistics';

/**
 * コマンドDTOとレスポンスDTO
 *
 * コマンドは外部入力（文字列・数値）のまま受け取り、ハンドラー内で検証する。
 * 登録系コマンドだけはドメインで組み立て済みのエンティティを運ぶ
 */

// === Command DTOs (入力用) ===

export const EnrollStudentCommandSchema = z.object({
  studentId: z.string().min(1, 'Student ID is required'),
  courseCode: z.string().min(1, 'Course code is required'),
  // 省略時は設定の creditsPerCourse
  courseCredits: z.number().int().positive().optional()
});

export const EnrollInCourseCommandSchema = z.object({
  studentId: z.string().min(1, 'Student ID is required'),
  courseCode: z.string().min(1, 'Course code is required')
});

export const UnenrollStudentCommandSchema = EnrollInCourseCommandSchema;

export const RecordGradeCommandSchema = z.object({
  studentId: z.string().min(1, 'Student ID is required'),
  courseCode: z.string().min(1, 'Course code is required'),
  marks: z.number().finite('Marks must be a finite number')
});

export const ChangeStudentStatusCommandSchema = z.object({
  studentId: z.string().min(1, 'Student ID is required'),
  active: z.boolean()
});

export const BulkUpdateStudentStatusCommandSchema = z.object({
  department: z.string().trim().min(1, 'Department is required'),
  active: z.boolean()
});

export const AssignInstructorCommandSchema = z.object({
  courseCode: z.string().min(1, 'Course code is required'),
  instructorId: z.string().min(1, 'Instructor ID is required')
});

export const ChangeCourseStatusCommandSchema = z.object({
  courseCode: z.string().min(1, 'Course code is required'),
  active: z.boolean()
});

export const UpdateStudentCommandSchema = z.object({
  studentId: z.string().min(1, 'Student ID is required'),
  changes: StudentUpdateSchema
});

export const UpdateCourseCommandSchema = z.object({
  courseCode: z.string().min(1, 'Course code is required'),
  changes: CourseUpdateSchema
});

export const UpdateInstructorCommandSchema = z.object({
  instructorId: z.string().min(1, 'Instructor ID is required'),
  changes: InstructorUpdateSchema
});

export type EnrollStudentCommand = z.input<typeof EnrollStudentCommandSchema>;
export type EnrollInCourseCommand = z.input<typeof EnrollInCourseCommandSchema>;
export type UnenrollStudentCommand = z.input<typeof UnenrollStudentCommandSchema>;
export type RecordGradeCommand = z.input<typeof RecordGradeCommandSchema>;
export type ChangeStudentStatusCommand = z.input<typeof ChangeStudentStatusCommandSchema>;
export type BulkUpdateStudentStatusCommand = z.input<typeof BulkUpdateStudentStatusCommandSchema>;
export type AssignInstructorCommand = z.input<typeof AssignInstructorCommandSchema>;
export type ChangeCourseStatusCommand = z.input<typeof ChangeCourseStatusCommandSchema>;
export type UpdateStudentCommand = z.input<typeof UpdateStudentCommandSchema>;
export type UpdateCourseCommand = z.input<typeof UpdateCourseCommandSchema>;
export type UpdateInstructorCommand = z.input<typeof UpdateInstructorCommandSchema>;

export interface RegisterStudentCommand {
  readonly student: Student;
}

export interface RegisterCourseCommand {
  readonly course: Course;
}

export interface RegisterInstructorCommand {
  readonly instructor: Instructor;
}

// === Response DTOs (出力用) ===

export interface StudentResponse {
  readonly id: string;
  readonly registrationNumber: string;
  readonly fullName: string;
  readonly email: string;
  readonly department: string;
  readonly currentSemester: number;
  readonly active: boolean;
  readonly enrolledCourses: string[];
  readonly grades: Record<string, string>;
  readonly gpa: number;
  readonly inGoodStanding: boolean;
  readonly enrollmentDate: string;
  readonly lastModifiedAt: string;
}

export interface CourseResponse {
  readonly code: string;
  readonly title: string;
  readonly credits: number;
  readonly instructorId: string | null;
  readonly semester: string;
  readonly department: string;
  readonly description: string;
  readonly prerequisites: string[];
  readonly maxCapacity: number;
  readonly currentEnrollment: number;
  readonly availableSpots: number;
  readonly enrollmentPercentage: number;
  readonly enrollmentStatus: string;
  readonly active: boolean;
}

export interface InstructorResponse {
  readonly id: string;
  readonly employeeId: string;
  readonly fullName: string;
  readonly email: string;
  readonly department: string;
  readonly designation: string;
  readonly assignedCourses: string[];
  readonly teachingLoad: number;
  readonly active: boolean;
}

export interface EnrollmentResponse {
  readonly id: string;
  readonly studentId: string;
  readonly courseCode: string;
  readonly status: string;
  readonly marks: number | null;
  readonly grade: string | null;
  readonly active: boolean;
  readonly enrollmentDate: string;
  readonly completionDate: string | null;
}

export interface EnrollStudentResponse {
  readonly student: StudentResponse;
  readonly enrollment: EnrollmentResponse;
  readonly totalCredits: number;
}

export interface EnrollInCourseResponse extends EnrollStudentResponse {
  readonly course: CourseResponse;
}

export interface UnenrollStudentResponse {
  readonly student: StudentResponse;
  readonly removedFromRoster: boolean;
}

export interface RecordGradeResponse {
  readonly student: StudentResponse;
  readonly courseCode: string;
  readonly marks: number;
  readonly grade: string;
}

// === DTO Mappers ===

export const mapStudentToResponse = (student: Student): StudentResponse => ({
  id: student.identity.id,
  registrationNumber: student.registrationNumber,
  fullName: fullName(student.identity.name),
  email: student.identity.email,
  department: student.department,
  currentSemester: student.currentSemester,
  active: student.identity.active,
  enrolledCourses: [...student.enrolledCourses],
  grades: { ...student.courseGrades },
  gpa: calculateGpa(student),
  inGoodStanding: isInGoodStanding(student),
  enrollmentDate: formatIsoDate(student.enrollmentDate),
  lastModifiedAt: student.lastModifiedAt.toISOString()
});

export const mapCourseToResponse = (course: Course): CourseResponse => ({
  code: fullCode(course.code),
  title: course.title,
  credits: course.credits,
  instructorId: course.instructorId,
  semester: course.semester,
  department: course.department,
  description: course.description,
  prerequisites: [...course.prerequisites],
  maxCapacity: course.maxCapacity,
  currentEnrollment: currentEnrollment(course),
  availableSpots: availableSpots(course),
  enrollmentPercentage: enrollmentPercentage(course),
  enrollmentStatus: enrollmentStatusSummary(course),
  active: course.active
});

export const mapInstructorToResponse = (instructor: Instructor): InstructorResponse => ({
  id: instructor.identity.id,
  employeeId: instructor.employeeId,
  fullName: fullName(instructor.identity.name),
  email: instructor.identity.email,
  department: instructor.department,
  designation: instructor.designation,
  assignedCourses: [...instructor.assignedCourses],
  teachingLoad: teachingLoad(instructor),
  active: instructor.identity.active
});

export const mapEnrollmentToResponse = (enrollment: Enrollment): EnrollmentResponse => ({
  id: enrollment.id,
  studentId: enrollment.studentId,
  courseCode: enrollment.courseCode,
  status: enrollment.status,
  marks: enrollment.marks >= 0 ? enrollment.marks : null,
  grade: enrollment.grade,
  active: enrollment.active,
  enrollmentDate: enrollment.enrollmentDate.toISOString(),
  completionDate: enrollment.completionDate ? enrollment.completionDate.toISOString() : null
});

// === 識別子の変換 ===

/**
 * 学生IDと科目コードを型安全な識別子に変換
 */
export const parseStudentCourse = (input: {
  studentId: string;
  courseCode: string;
}): Result<{ studentId: StudentId; courseCode: CourseCodeKey }, RecordsError> =>
  flatMap(parseWithSchema(StudentIdSchema, input.studentId, 'INVALID_STUDENT_ID'), studentId =>
    map(normalizeCourseCodeKey(input.courseCode), courseCode => ({ studentId, courseCode }))
  );

export const parseStudentId = (raw: string): Result<StudentId, RecordsError> =>
  parseWithSchema(StudentIdSchema, raw, 'INVALID_STUDENT_ID');

export const parseInstructorId = (raw: string): Result<InstructorId, RecordsError> =>
  parseWithSchema(InstructorIdSchema, raw, 'INVALID_INSTRUCTOR_ID');

/**
 * コマンド入力の検証（失敗は INVALID_COMMAND_FORMAT の検証エラー）
 */
export const validateCommand = <T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  command: unknown
): Result<T, RecordsError> => parseWithSchema(schema, command, 'INVALID_COMMAND_FORMAT');
