import { z } from 'zod';
import type { Result, EnrollmentId } from '../../../../shared/types/index';
import { Ok, flatMap, EnrollmentIdSchema, StudentIdSchema, CourseCodeKeySchema } from '../../../../shared/types/index';
import {
  GradeLetterSchema,
  gradeFromMarks,
  isPassingGrade,
  calculateGradePoints as gradePointsFor
} from '../value-objects/grade';
import {
  parseWithSchema,
  validationFailure,
  businessRuleFailure,
  type RecordsError
} from '../errors/errors';
import { daysBetween } from '../services/formatting';

/**
 * 履修記録（学生と科目の関係の履歴）
 *
 * 状態遷移:
 *   ENROLLED → COMPLETED / FAILED（素点の記録。再記録すると状態を再判定）
 *   ENROLLED / COMPLETED / FAILED → WITHDRAWN（取り消し。以後は変更不可）
 */

/** 素点未記録を表す値 */
export const UNGRADED_MARKS = -1;

export const EnrollmentStatusSchema = z.enum(['ENROLLED', 'COMPLETED', 'WITHDRAWN', 'FAILED']);

export const EnrollmentSchema = z.object({
  id: EnrollmentIdSchema,
  studentId: StudentIdSchema,
  courseCode: CourseCodeKeySchema,
  enrollmentDate: z.date(),
  completionDate: z.date().nullable(),
  grade: GradeLetterSchema.nullable(),
  marks: z.number(),
  active: z.boolean(),
  status: EnrollmentStatusSchema
});

const MarksSchema = z.number()
  .min(0, 'Marks must be between 0 and 100')
  .max(100, 'Marks must be between 0 and 100');

export type EnrollmentStatus = z.infer<typeof EnrollmentStatusSchema>;
export type Enrollment = z.infer<typeof EnrollmentSchema>;

export const createEnrollment = (
  input: { id: string; studentId: string; courseCode: string },
  now: Date = new Date()
): Result<Enrollment, RecordsError> =>
  flatMap(
    parseWithSchema(EnrollmentSchema.pick({ id: true, studentId: true, courseCode: true }), input, 'INVALID_ENROLLMENT'),
    valid => Ok<Enrollment>({
      ...valid,
      enrollmentDate: now,
      completionDate: null,
      grade: null,
      marks: UNGRADED_MARKS,
      active: true,
      status: 'ENROLLED'
    })
  );

/**
 * 素点の記録。評語と状態（合格ならCOMPLETED、不合格ならFAILED）を導出する
 */
export const recordMarks = (
  enrollment: Enrollment,
  marks: number,
  now: Date = new Date()
): Result<Enrollment, RecordsError> => {
  const parsed = MarksSchema.safeParse(marks);
  if (!parsed.success) {
    return validationFailure('Marks must be between 0 and 100', 'INVALID_MARKS', 'marks', marks);
  }
  if (enrollment.status === 'WITHDRAWN') {
    return businessRuleFailure(
      'WITHDRAWN_ENROLLMENT_IS_FINAL',
      `Cannot record marks for withdrawn enrollment ${enrollment.id}`,
      'ENROLLMENT_WITHDRAWN',
      { enrollmentId: enrollment.id, status: enrollment.status }
    );
  }
  const grade = gradeFromMarks(parsed.data);
  return Ok({
    ...enrollment,
    marks: parsed.data,
    grade,
    status: isPassingGrade(grade) ? 'COMPLETED' : 'FAILED',
    completionDate: now
  });
};

/**
 * 取り消し。採点状態に関係なく WITHDRAWN・非アクティブにする
 */
export const withdraw = (enrollment: Enrollment, now: Date = new Date()): Enrollment => ({
  ...enrollment,
  active: false,
  status: 'WITHDRAWN',
  completionDate: now
});

export const createCompletedEnrollment = (
  input: { id: string; studentId: string; courseCode: string },
  marks: number,
  now: Date = new Date()
): Result<Enrollment, RecordsError> =>
  flatMap(createEnrollment(input, now), enrollment => recordMarks(enrollment, marks, now));

// === 導出値 ===

export const isGraded = (enrollment: Enrollment): boolean => enrollment.marks >= 0;

export const isCompleted = (enrollment: Enrollment): boolean =>
  enrollment.status === 'COMPLETED' || enrollment.status === 'FAILED';

export const isPassed = (enrollment: Enrollment): boolean =>
  enrollment.grade !== null && isPassingGrade(enrollment.grade);

export const enrollmentDurationDays = (enrollment: Enrollment, now: Date = new Date()): number =>
  daysBetween(enrollment.enrollmentDate, enrollment.completionDate ?? now);

export const enrollmentGradePoints = (enrollment: Enrollment, courseCredits: number): number =>
  enrollment.grade === null ? 0 : gradePointsFor(enrollment.grade, courseCredits);

export type { EnrollmentId };
