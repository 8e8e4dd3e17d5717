import { z } from 'zod';
import type { Result, CourseCodeKey, StudentId, InstructorId } from '../../../../shared/types/index';
import { Ok, flatMap, InstructorIdSchema, StudentIdSchema, CourseCodeKeySchema } from '../../../../shared/types/index';
import { CourseCodeSchema, courseCodeKey, fullCode } from '../value-objects/course-code';
import { SemesterSchema } from '../value-objects/semester';
import { DepartmentSchema } from './person';
import {
  parseWithSchema,
  validationFailure,
  capacityExceededFailure,
  type RecordsError
} from '../errors/errors';

/**
 * 科目エンティティ
 *
 * 科目コードが識別子。受講者数は定員を超えない
 */

export const DEFAULT_COURSE_CAPACITY = 30;

const CreditsSchema = z.number()
  .int('Credits must be an integer')
  .min(1, 'Credits must be between 1 and 6')
  .max(6, 'Credits must be between 1 and 6');

const MaxCapacitySchema = z.number().int('Max capacity must be an integer').positive('Max capacity must be positive');

const TitleSchema = z.string().trim().min(1, 'Title is required');

export const CourseSchema = z.object({
  code: CourseCodeSchema,
  title: TitleSchema,
  credits: CreditsSchema,
  instructorId: InstructorIdSchema.nullable(),
  semester: SemesterSchema,
  department: DepartmentSchema,
  description: z.string(),
  prerequisites: z.array(CourseCodeKeySchema).readonly(),
  enrolledStudents: z.array(StudentIdSchema).readonly(),
  maxCapacity: z.number().int().nonnegative(),
  active: z.boolean(),
  creationDate: z.date()
});

/**
 * 科目の組み立て入力。検証は buildCourse で一度だけ行う
 */
export const CourseDraftSchema = z.object({
  code: CourseCodeSchema,
  title: TitleSchema,
  credits: CreditsSchema,
  semester: SemesterSchema,
  department: DepartmentSchema,
  instructorId: InstructorIdSchema.nullish(),
  description: z.string().nullish(),
  maxCapacity: MaxCapacitySchema.optional(),
  prerequisites: z.array(z.string()).optional()
});

export const CourseUpdateSchema = z.object({
  title: TitleSchema.optional(),
  credits: CreditsSchema.optional(),
  semester: SemesterSchema.optional(),
  department: DepartmentSchema.optional(),
  description: z.string().optional(),
  maxCapacity: MaxCapacitySchema.optional()
});

export type Course = z.infer<typeof CourseSchema>;
export type CourseDraft = z.input<typeof CourseDraftSchema>;
export type CourseUpdate = z.input<typeof CourseUpdateSchema>;

/**
 * 前提科目コードの正規化（空白除去・大文字化・空要素除去・重複除去）
 */
const normalizePrerequisites = (codes: readonly string[]): CourseCodeKey[] => {
  const keys: CourseCodeKey[] = [];
  for (const raw of codes) {
    const parsed = CourseCodeKeySchema.safeParse(raw);
    if (parsed.success && !keys.includes(parsed.data)) {
      keys.push(parsed.data);
    }
  }
  return keys;
};

export const buildCourse = (
  draft: CourseDraft,
  options: { now?: Date; defaultCapacity?: number } = {}
): Result<Course, RecordsError> =>
  flatMap(parseWithSchema(CourseDraftSchema, draft, 'INVALID_COURSE'), valid => Ok<Course>({
    code: valid.code,
    title: valid.title,
    credits: valid.credits,
    instructorId: valid.instructorId ?? null,
    semester: valid.semester,
    department: valid.department,
    description: valid.description ?? '',
    prerequisites: normalizePrerequisites(valid.prerequisites ?? []),
    enrolledStudents: [],
    maxCapacity: valid.maxCapacity ?? options.defaultCapacity ?? DEFAULT_COURSE_CAPACITY,
    active: true,
    creationDate: options.now ?? new Date()
  }));

export const courseKeyOf = (course: Course): CourseCodeKey => courseCodeKey(course.code);

// === 受講者名簿 ===

export const currentEnrollment = (course: Course): number => course.enrolledStudents.length;

export const isStudentEnrolled = (course: Course, studentId: StudentId): boolean =>
  course.enrolledStudents.includes(studentId);

export const isFull = (course: Course): boolean => currentEnrollment(course) >= course.maxCapacity;

export const availableSpots = (course: Course): number =>
  Math.max(0, course.maxCapacity - currentEnrollment(course));

/**
 * 名簿への追加
 *
 * 既に名簿にいれば added=false（エラーにしない）。満員なら定員超過エラーで名簿は変わらない
 */
export const enrollStudent = (
  course: Course,
  studentId: StudentId
): Result<{ course: Course; added: boolean }, RecordsError> => {
  if (isStudentEnrolled(course, studentId)) {
    return Ok({ course, added: false });
  }
  if (isFull(course)) {
    return capacityExceededFailure(fullCode(course.code), course.maxCapacity, currentEnrollment(course));
  }
  return Ok({
    course: { ...course, enrolledStudents: [...course.enrolledStudents, studentId] },
    added: true
  });
};

export const unenrollStudent = (
  course: Course,
  studentId: StudentId
): { course: Course; removed: boolean } =>
  isStudentEnrolled(course, studentId)
    ? { course: { ...course, enrolledStudents: course.enrolledStudents.filter(id => id !== studentId) }, removed: true }
    : { course, removed: false };

// === 前提科目 ===

export const hasPrerequisites = (course: Course): boolean => course.prerequisites.length > 0;

export const addPrerequisite = (course: Course, rawCode: string): Result<Course, RecordsError> => {
  const parsed = CourseCodeKeySchema.safeParse(rawCode);
  if (!parsed.success) {
    return validationFailure('Prerequisite course code required', 'INVALID_PREREQUISITE', 'prerequisite', rawCode);
  }
  return Ok(course.prerequisites.includes(parsed.data)
    ? course
    : { ...course, prerequisites: [...course.prerequisites, parsed.data] });
};

export const removePrerequisite = (course: Course, rawCode: string): Course => {
  const normalized = rawCode.trim().toUpperCase();
  return { ...course, prerequisites: course.prerequisites.filter(code => code !== normalized) };
};

// === 属性変更 ===

export const assignInstructorToCourse = (course: Course, instructorId: InstructorId | null): Course => ({
  ...course,
  instructorId
});

export const setCourseActive = (course: Course, active: boolean): Course => ({ ...course, active });

/**
 * 科目属性の更新。定員は現在の受講者数未満にできない
 */
export const updateCourseDetails = (course: Course, update: CourseUpdate): Result<Course, RecordsError> =>
  flatMap(parseWithSchema(CourseUpdateSchema, update, 'INVALID_COURSE'), (valid): Result<Course, RecordsError> => {
    const maxCapacity = valid.maxCapacity ?? course.maxCapacity;
    if (maxCapacity < currentEnrollment(course)) {
      return validationFailure(
        `Max capacity ${maxCapacity} is below current enrollment ${currentEnrollment(course)}`,
        'CAPACITY_BELOW_ENROLLMENT',
        'maxCapacity',
        maxCapacity
      );
    }
    return Ok<Course>({
      ...course,
      title: valid.title ?? course.title,
      credits: valid.credits ?? course.credits,
      semester: valid.semester ?? course.semester,
      department: valid.department ?? course.department,
      description: valid.description ?? course.description,
      maxCapacity
    });
  });

/** 例: "Course{code=CS101-A, title='Intro', credits=3, instructor='I001', enrolled=2/30}" */
export const describeCourse = (course: Course): string =>
  `Course{code=${fullCode(course.code)}, title='${course.title}', credits=${course.credits}, instructor='${course.instructorId ?? 'null'}', enrolled=${currentEnrollment(course)}/${course.maxCapacity}}`;
