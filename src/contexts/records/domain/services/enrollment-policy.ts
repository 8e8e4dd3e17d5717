import type { Result, CourseCodeKey } from '../../../../shared/types/index';
import { Ok } from '../../../../shared/types/index';
import { type Student, isEnrolledIn } from '../entities/student';
import {
  duplicateEnrollmentFailure,
  creditLimitFailure,
  type RecordsError
} from '../errors/errors';

/**
 * 履修可否の判定（学生側）
 *
 * 現在の単位数は「履修科目数 × 一律の単位数」で数える。
 * 上限は「最大履修科目数 × 一律の単位数」
 */

export interface CreditRules {
  readonly maxCoursesPerStudent: number;
  readonly creditsPerCourse: number;
}

export interface CreditStanding {
  readonly currentCredits: number;
  readonly maxCredits: number;
  readonly attemptedCredits: number;
}

export const currentCredits = (student: Student, rules: CreditRules): number =>
  student.enrolledCourses.length * rules.creditsPerCourse;

export const maxCredits = (rules: CreditRules): number =>
  rules.maxCoursesPerStudent * rules.creditsPerCourse;

/**
 * 重複履修 → 単位上限の順に確認する
 */
export const checkEnrollmentEligibility = (
  student: Student,
  courseCode: CourseCodeKey,
  attemptedCredits: number,
  rules: CreditRules
): Result<CreditStanding, RecordsError> => {
  if (isEnrolledIn(student, courseCode)) {
    return duplicateEnrollmentFailure(student.identity.id, courseCode);
  }

  const standing: CreditStanding = {
    currentCredits: currentCredits(student, rules),
    maxCredits: maxCredits(rules),
    attemptedCredits
  };
  if (standing.currentCredits + attemptedCredits > standing.maxCredits) {
    return creditLimitFailure(student.identity.id, standing.currentCredits, standing.maxCredits, attemptedCredits);
  }
  return Ok(standing);
};
