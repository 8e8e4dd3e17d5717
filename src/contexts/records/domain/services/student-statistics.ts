import type { CourseCodeKey } from '../../../../shared/types/index';
import { gradePointOf } from '../value-objects/grade';
import {
  type Student,
  calculateGpa,
  getCompletedCourses,
  gradeFor,
  isInGoodStanding
} from '../entities/student';

/**
 * 学生の統計・進捗
 */

// === 卒業に向けた進捗 ===

export interface StudentProgress {
  readonly completedCourses: number;
  readonly completionPercentage: number;
  readonly coursesNeeded: number;
  readonly eligibleForGraduation: boolean;
}

/**
 * 必要科目数が0以下なら達成率は0
 */
export const completionPercentage = (student: Student, totalCoursesRequired: number): number =>
  totalCoursesRequired <= 0
    ? 0
    : (getCompletedCourses(student).length / totalCoursesRequired) * 100;

export const coursesNeeded = (student: Student, totalCoursesRequired: number): number =>
  Math.max(0, totalCoursesRequired - getCompletedCourses(student).length);

export const isEligibleForGraduation = (
  student: Student,
  totalCoursesRequired: number,
  minimumGpa: number
): boolean =>
  getCompletedCourses(student).length >= totalCoursesRequired &&
  calculateGpa(student) >= minimumGpa &&
  isInGoodStanding(student);

export const studentProgress = (
  student: Student,
  totalCoursesRequired: number,
  minimumGpa: number
): StudentProgress => ({
  completedCourses: getCompletedCourses(student).length,
  completionPercentage: completionPercentage(student, totalCoursesRequired),
  coursesNeeded: coursesNeeded(student, totalCoursesRequired),
  eligibleForGraduation: isEligibleForGraduation(student, totalCoursesRequired, minimumGpa)
});

// === 単位数で重み付けしたGPA ===

/**
 * 科目ごとの実際の単位数で重み付けしたGPA
 *
 * 単位数が分からない科目は fallbackCredits で数える。成績が無ければ0
 */
export const calculateCreditWeightedGpa = (
  student: Student,
  creditsOf: (courseCode: CourseCodeKey) => number | undefined,
  fallbackCredits: number = 3
): number => {
  let totalPoints = 0;
  let totalCredits = 0;
  for (const code of student.enrolledCourses) {
    const grade = gradeFor(student, code);
    if (grade === undefined) continue;
    const credits = creditsOf(code) ?? fallbackCredits;
    totalPoints += gradePointOf(grade) * credits;
    totalCredits += credits;
  }
  return totalCredits === 0 ? 0 : totalPoints / totalCredits;
};

// === 集計（アクティブな学生のみ。キーは最初に現れた順） ===

export type GpaBucket =
  | 'Outstanding (9.0+)'
  | 'Excellent (8.0-8.9)'
  | 'Very Good (7.0-7.9)'
  | 'Good (6.0-6.9)'
  | 'Satisfactory (5.0-5.9)'
  | 'Below Average (<5.0)';

export const gpaBucketOf = (gpa: number): GpaBucket => {
  if (gpa >= 9.0) return 'Outstanding (9.0+)';
  if (gpa >= 8.0) return 'Excellent (8.0-8.9)';
  if (gpa >= 7.0) return 'Very Good (7.0-7.9)';
  if (gpa >= 6.0) return 'Good (6.0-6.9)';
  if (gpa >= 5.0) return 'Satisfactory (5.0-5.9)';
  return 'Below Average (<5.0)';
};

const activeOnly = (students: readonly Student[]): Student[] =>
  students.filter(student => student.identity.active);

const countBy = <K>(students: readonly Student[], keyOf: (student: Student) => K): Map<K, number> => {
  const counts = new Map<K, number>();
  for (const student of activeOnly(students)) {
    const key = keyOf(student);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return counts;
};

export const departmentWiseStudentCount = (students: readonly Student[]): Map<string, number> =>
  countBy(students, student => student.department);

export const gpaDistribution = (students: readonly Student[]): Map<GpaBucket, number> =>
  countBy(students, student => gpaBucketOf(calculateGpa(student)));

export const averageGpa = (students: readonly Student[]): number => {
  const active = activeOnly(students);
  return active.length === 0
    ? 0
    : active.reduce((sum, student) => sum + calculateGpa(student), 0) / active.length;
};

/**
 * GPA上位N名（アクティブのみ。同点は元の順序を保つ）
 */
export const topStudentsByGpa = (students: readonly Student[], limit: number): Student[] =>
  activeOnly(students)
    .sort((a, b) => calculateGpa(b) - calculateGpa(a))
    .slice(0, Math.max(0, limit));
