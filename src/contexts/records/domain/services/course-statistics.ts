import type { InstructorId } from '../../../../shared/types/index';
import { type Course, currentEnrollment, availableSpots } from '../entities/course';

/**
 * 科目の統計
 *
 * すべて純粋関数。呼び出しのたびに現在の状態から計算する
 */

export const POPULAR_THRESHOLD = 80;
export const UNDERENROLLED_THRESHOLD = 30;

export type EnrollmentStatusSummary =
  | 'FULL/WAITLIST'
  | 'HIGH_DEMAND'
  | 'MODERATE_ENROLLMENT'
  | 'LOW_ENROLLMENT'
  | 'UNDERENROLLED';

export interface CourseThresholds {
  readonly popularThreshold: number;
  readonly underenrolledThreshold: number;
}

const DEFAULT_THRESHOLDS: CourseThresholds = {
  popularThreshold: POPULAR_THRESHOLD,
  underenrolledThreshold: UNDERENROLLED_THRESHOLD
};

/**
 * 受講率（%）。定員0なら0
 */
export const enrollmentPercentage = (course: Course): number =>
  course.maxCapacity === 0 ? 0 : (currentEnrollment(course) / course.maxCapacity) * 100;

export const isPopular = (course: Course, thresholds: CourseThresholds = DEFAULT_THRESHOLDS): boolean =>
  enrollmentPercentage(course) > thresholds.popularThreshold;

export const isUnderenrolled = (course: Course, thresholds: CourseThresholds = DEFAULT_THRESHOLDS): boolean =>
  enrollmentPercentage(course) < thresholds.underenrolledThreshold;

export const enrollmentStatusSummary = (course: Course): EnrollmentStatusSummary => {
  const percentage = enrollmentPercentage(course);
  if (percentage >= 90) return 'FULL/WAITLIST';
  if (percentage >= 80) return 'HIGH_DEMAND';
  if (percentage >= 50) return 'MODERATE_ENROLLMENT';
  if (percentage >= 30) return 'LOW_ENROLLMENT';
  return 'UNDERENROLLED';
};

// === 集計（アクティブな科目のみ。キーは最初に現れた順） ===

const countBy = <K>(courses: readonly Course[], keyOf: (course: Course) => K | null): Map<K, number> => {
  const counts = new Map<K, number>();
  for (const course of courses) {
    if (!course.active) continue;
    const key = keyOf(course);
    if (key === null) continue;
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return counts;
};

export const departmentWiseCourseCount = (courses: readonly Course[]): Map<string, number> =>
  countBy(courses, course => course.department);

export const instructorWiseCourseCount = (courses: readonly Course[]): Map<InstructorId, number> =>
  countBy(courses, course => course.instructorId);

export const creditDistribution = (courses: readonly Course[]): Map<number, number> =>
  countBy(courses, course => course.credits);

export const coursesByEnrollmentStatus = (
  courses: readonly Course[]
): Map<EnrollmentStatusSummary, Course[]> => {
  const groups = new Map<EnrollmentStatusSummary, Course[]>();
  for (const course of courses) {
    if (!course.active) continue;
    const status = enrollmentStatusSummary(course);
    groups.set(status, [...(groups.get(status) ?? []), course]);
  }
  return groups;
};

export const averageEnrollmentPercentage = (courses: readonly Course[]): number => {
  const active = courses.filter(course => course.active);
  return active.length === 0
    ? 0
    : active.reduce((sum, course) => sum + enrollmentPercentage(course), 0) / active.length;
};

// === 並び替え（安定ソート） ===

export const sortByEnrollmentDesc = (courses: readonly Course[]): Course[] =>
  courses
    .filter(course => course.active)
    .sort((a, b) => currentEnrollment(b) - currentEnrollment(a));

export const sortByAvailabilityAsc = (courses: readonly Course[]): Course[] =>
  courses
    .filter(course => course.active)
    .sort((a, b) => availableSpots(a) - availableSpots(b));
