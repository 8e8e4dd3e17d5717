import { describe, test, expect } from 'vitest';
import {
  enrollmentPercentage,
  enrollmentStatusSummary,
  isPopular,
  isUnderenrolled,
  departmentWiseCourseCount,
  instructorWiseCourseCount,
  coursesByEnrollmentStatus,
  averageEnrollmentPercentage,
  sortByEnrollmentDesc,
  sortByAvailabilityAsc
} from '../../src/contexts/records/domain/services/course-statistics';
import {
  studentProgress,
  calculateCreditWeightedGpa,
  gpaBucketOf,
  departmentWiseStudentCount,
  averageGpa,
  topStudentsByGpa
} from '../../src/contexts/records/domain/services/student-statistics';
import { setCourseActive } from '../../src/contexts/records/domain/entities/course';
import { deactivateStudent } from '../../src/contexts/records/domain/entities/student';
import { NOW, aCourse, iid, withEnrollment, graded } from '../helpers/fixtures';

describe('科目の統計', () => {
  test('定員0なら受講率は0', () => {
    expect(enrollmentPercentage({ ...aCourse(), maxCapacity: 0 })).toBe(0);
  });

  test.each([
    [9, 'FULL/WAITLIST'],
    [8, 'HIGH_DEMAND'],
    [5, 'MODERATE_ENROLLMENT'],
    [3, 'LOW_ENROLLMENT'],
    [2, 'UNDERENROLLED']
  ] as const)('定員10に%i名なら %s', (count, expected) => {
    expect(enrollmentStatusSummary(withEnrollment(aCourse('CS101-A', { maxCapacity: 10 }), count))).toBe(expected);
  });

  test('人気・定員割れの判定は閾値を含まない', () => {
    const course = aCourse('CS101-A', { maxCapacity: 10 });

    expect(isPopular(withEnrollment(course, 8))).toBe(false);
    expect(isPopular(withEnrollment(course, 9))).toBe(true);
    expect(isUnderenrolled(withEnrollment(course, 3))).toBe(false);
    expect(isUnderenrolled(withEnrollment(course, 2))).toBe(true);
    expect(isPopular(withEnrollment(course, 8), { popularThreshold: 70, underenrolledThreshold: 30 })).toBe(true);
  });

  test('集計はアクティブな科目のみ、最初に現れた順', () => {
    const courses = [
      aCourse('MA101-A', { department: 'Mathematics', instructorId: 'I002' }),
      withEnrollment(aCourse('CS101-A', { maxCapacity: 10, instructorId: 'I001' }), 5),
      withEnrollment(aCourse('CS102-A', { maxCapacity: 10, instructorId: 'I001' }), 10),
      setCourseActive(aCourse('CS103-A'), false)
    ];

    expect([...departmentWiseCourseCount(courses)]).toEqual([['Mathematics', 1], ['Computer Science', 2]]);
    expect(instructorWiseCourseCount(courses).get(iid('I001'))).toBe(2);
    expect([...coursesByEnrollmentStatus(courses).keys()]).toEqual(['UNDERENROLLED', 'MODERATE_ENROLLMENT', 'FULL/WAITLIST']);
    expect(averageEnrollmentPercentage(courses)).toBe(50);
    expect(sortByEnrollmentDesc(courses).map(course => course.enrolledStudents.length)).toEqual([10, 5, 0]);
    expect(sortByAvailabilityAsc(courses).map(course => course.code.number)).toEqual([102, 101, 101]);
  });
});

describe('学生の統計', () => {
  test('卒業に向けた進捗', () => {
    const student = graded({ 'CS101-A': 'A', 'CS102-A': 'B' });

    expect(studentProgress(student, 4, 2.0)).toEqual({
      completedCourses: 2,
      completionPercentage: 50,
      coursesNeeded: 2,
      eligibleForGraduation: false
    });
    expect(studentProgress(student, 2, 2.0).eligibleForGraduation).toBe(true);
    expect(studentProgress(student, 0, 2.0).completionPercentage).toBe(0);
  });

  test('不合格があると必要科目数を満たしても卒業できない', () => {
    const student = graded({ 'CS101-A': 'S', 'CS102-A': 'F' });

    expect(studentProgress(student, 2, 2.0).eligibleForGraduation).toBe(false);
  });

  test('単位数で重み付けした GPA', () => {
    const student = graded({ 'CS101-A': 'A', 'CS102-A': 'B', 'CS103-A': 'C' });
    const credits = new Map([['CS101-A', 4], ['CS102-A', 2]]);

    const gpa = calculateCreditWeightedGpa(student, code => credits.get(code), 3);

    // (9×4 + 8×2 + 7×3) / 9
    expect(gpa).toBeCloseTo(73 / 9, 10);
  });

  test('GPA の区分', () => {
    expect(gpaBucketOf(9)).toBe('Outstanding (9.0+)');
    expect(gpaBucketOf(8.99)).toBe('Excellent (8.0-8.9)');
    expect(gpaBucketOf(4.99)).toBe('Below Average (<5.0)');
  });

  test('集計と上位抽出はアクティブな学生のみ', () => {
    const students = [
      graded({ 'CS101-A': 'B' }, { id: 'S001' }),
      graded({ 'CS101-A': 'S' }, { id: 'S002', department: 'Mathematics' }),
      deactivateStudent(graded({ 'CS101-A': 'S' }, { id: 'S003' }), NOW),
      graded({ 'CS101-A': 'S' }, { id: 'S004' })
    ];

    expect([...departmentWiseStudentCount(students)]).toEqual([['Computer Science', 2], ['Mathematics', 1]]);
    expect(averageGpa(students)).toBeCloseTo(28 / 3, 10);
    expect(topStudentsByGpa(students, 2).map(student => student.identity.id)).toEqual(['S002', 'S004']);
    expect(topStudentsByGpa(students, -1)).toEqual([]);
  });
});
