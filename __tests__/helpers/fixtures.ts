import type { Result, CourseCodeKey, StudentId, InstructorId } from '../../src/shared/types/index';
import { CourseCodeKeySchema, StudentIdSchema, InstructorIdSchema } from '../../src/shared/types/index';
import type { RecordsError } from '../../src/contexts/records/domain/errors/errors';
import {
  type Student,
  type StudentDraft,
  createStudent,
  enrollInCourse,
  recordGrade
} from '../../src/contexts/records/domain/entities/student';
import {
  type Course,
  type CourseDraft,
  buildCourse,
  enrollStudent
} from '../../src/contexts/records/domain/entities/course';
import {
  type Instructor,
  type InstructorDraft,
  createInstructor
} from '../../src/contexts/records/domain/entities/instructor';
import { parseCourseCode } from '../../src/contexts/records/domain/value-objects/course-code';
import type { GradeLetter } from '../../src/contexts/records/domain/value-objects/grade';

/**
 * テストデータ生成ヘルパー
 */

/** 2024-09-01 10:15:00（ローカル時刻） */
export const NOW = new Date(2024, 8, 1, 10, 15, 0);

export const fixedClock = (): Date => new Date(NOW.getTime());

export const unwrap = <T>(result: Result<T, RecordsError>): T => {
  if (!result.success) {
    throw new Error(`${result.error.type}: ${result.error.message}`);
  }
  return result.data;
};

export const expectError = <T>(result: Result<T, RecordsError>): RecordsError => {
  if (result.success) {
    throw new Error('Expected a failure but got success');
  }
  return result.error;
};

export const key = (raw: string): CourseCodeKey => CourseCodeKeySchema.parse(raw);
export const sid = (raw: string): StudentId => StudentIdSchema.parse(raw);
export const iid = (raw: string): InstructorId => InstructorIdSchema.parse(raw);

export const studentDraft = (overrides: Partial<StudentDraft> = {}): StudentDraft => ({
  id: 'S001',
  registrationNumber: 'REG001',
  name: { firstName: 'Jane', lastName: 'Doe' },
  email: 'jane@example.edu',
  dateOfBirth: new Date(2003, 4, 10),
  department: 'Computer Science',
  currentSemester: 3,
  ...overrides
});

export const aStudent = (overrides: Partial<StudentDraft> = {}): Student =>
  unwrap(createStudent(studentDraft(overrides), NOW));

export const courseDraft = (code = 'CS101-A', overrides: Partial<CourseDraft> = {}): CourseDraft => ({
  code: unwrap(parseCourseCode(code)),
  title: 'Intro to Programming',
  credits: 3,
  semester: 'FALL',
  department: 'Computer Science',
  ...overrides
});

export const aCourse = (code = 'CS101-A', overrides: Partial<CourseDraft> = {}): Course =>
  unwrap(buildCourse(courseDraft(code, overrides), { now: NOW }));

export const instructorDraft = (overrides: Partial<InstructorDraft> = {}): InstructorDraft => ({
  id: 'I001',
  employeeId: 'EMP001',
  name: { firstName: 'Maria', lastName: 'Lopez' },
  email: 'maria@example.edu',
  dateOfBirth: new Date(1975, 2, 15),
  department: 'Computer Science',
  designation: 'Professor',
  salary: 55000,
  experienceYears: 8,
  joiningDate: new Date(2015, 0, 10),
  qualifications: ['PhD Computer Science'],
  ...overrides
});

export const anInstructor = (overrides: Partial<InstructorDraft> = {}): Instructor =>
  unwrap(createInstructor(instructorDraft(overrides), NOW));

export const daysAfter = (date: Date, days: number): Date => {
  const result = new Date(date.getTime());
  result.setDate(result.getDate() + days);
  return result;
};

/** 名簿に S1〜S{count} を追加した科目 */
export const withEnrollment = (course: Course, count: number): Course => {
  let current = course;
  for (let i = 1; i <= count; i++) {
    current = unwrap(enrollStudent(current, sid(`S${i}`))).course;
  }
  return current;
};

/** 科目コード → 評語 の成績を記録済みの学生 */
export const graded = (grades: Record<string, GradeLetter>, overrides: Partial<StudentDraft> = {}): Student => {
  let student = aStudent(overrides);
  for (const [code, grade] of Object.entries(grades)) {
    student = enrollInCourse(student, key(code), NOW).student;
    student = unwrap(recordGrade(student, key(code), grade, NOW));
  }
  return student;
};
