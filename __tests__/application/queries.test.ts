import { describe, test, expect, beforeEach } from 'vitest';
import { StudentQueries, CourseQueries, ReportQueries } from '../../src/contexts/records/application/queries/index';
import { setCourseActive } from '../../src/contexts/records/domain/entities/course';
import { MINIMAL_CONFIG } from '../../src/shared/config/index';
import { createTestEnvironment, type TestEnvironment } from '../helpers/test-context';
import { aStudent, aCourse, graded, withEnrollment, unwrap, expectError, fixedClock } from '../helpers/fixtures';

const seed = (env: TestEnvironment): void => {
  env.studentRepository.save(graded({ 'CS101-A': 'A', 'MA201-B': 'B' }));
  env.studentRepository.save(graded({ 'CS101-A': 'F' }, {
    id: 'S002',
    registrationNumber: 'REG002',
    name: { firstName: 'Sam', lastName: 'Park' },
    email: 'sam@example.edu'
  }));
  env.studentRepository.save(aStudent({
    id: 'S003',
    registrationNumber: 'REG003',
    name: { firstName: 'Lee', lastName: 'Chen' },
    email: 'lee@example.edu',
    department: 'Mathematics'
  }));

  env.courseRepository.save(aCourse('CS101-A'));
  env.courseRepository.save(aCourse('CS102-A'));
  env.courseRepository.save(withEnrollment(aCourse('MA201-B', {
    title: 'Linear Algebra',
    credits: 4,
    semester: 'SPRING',
    department: 'Mathematics',
    maxCapacity: 2
  }), 2));
  env.courseRepository.save(setCourseActive(aCourse('PH100-A', { title: 'Physics', department: 'Physics' }), false));
};

const ids = (responses: ReadonlyArray<{ id: string }>): string[] => responses.map(response => response.id);
const codes = (responses: ReadonlyArray<{ code: string }>): string[] => responses.map(response => response.code);

describe('StudentQueries', () => {
  let queries: StudentQueries;

  beforeEach(() => {
    const env = createTestEnvironment();
    seed(env);
    queries = new StudentQueries(env.studentRepository, MINIMAL_CONFIG.businessRules.academics);
  });

  test('IDで検索し、見つからなければ null', () => {
    expect(unwrap(queries.findById('S002'))?.fullName).toBe('Sam Park');
    expect(unwrap(queries.findById('S999'))).toBeNull();
  });

  test('キーワードは氏名・メール・IDに部分一致する', () => {
    expect(ids(unwrap(queries.searchByKeyword('PARK')))).toEqual(['S002']);
    expect(ids(unwrap(queries.searchByKeyword('s003')))).toEqual(['S003']);
    expect(ids(unwrap(queries.searchByKeyword('example.edu')))).toEqual(['S001', 'S002', 'S003']);
  });

  test('学籍番号のパターンは大文字小文字を区別する', () => {
    expect(ids(unwrap(queries.findByRegistrationPattern('REG00')))).toEqual(['S001', 'S002', 'S003']);
    expect(unwrap(queries.findByRegistrationPattern('reg'))).toEqual([]);
  });

  test('学科で絞り込む', () => {
    expect(ids(unwrap(queries.findByDepartment({ department: 'mathematics' })))).toEqual(['S003']);
    expect(expectError(queries.findByDepartment({ department: '  ' })).message).toBe('Department is required');
  });

  test('GPAの範囲と成績良好な学生', () => {
    expect(ids(unwrap(queries.findByGpaRange({ minGpa: 8, maxGpa: 9 })))).toEqual(['S001']);
    expect(ids(unwrap(queries.findInGoodStanding()))).toEqual(['S001', 'S003']);
  });

  test('GPA上位は同点なら登録順', () => {
    expect(ids(unwrap(queries.findTopByGpa({ limit: 2 })))).toEqual(['S001', 'S002']);
    expect(expectError(queries.findTopByGpa({ limit: -1 })).code).toBe('INVALID_COMMAND_FORMAT');
  });

  test('科目を履修中の学生', () => {
    expect(ids(unwrap(queries.findInCourse('cs101-a')))).toEqual(['S001', 'S002']);
  });

  test('件数と卒業要件への進捗', () => {
    expect(unwrap(queries.totals())).toEqual({ total: 3, active: 3, inactive: 0 });
    expect(unwrap(queries.progress({ studentId: 'S001', totalCoursesRequired: 4 }))).toEqual({
      studentId: 'S001',
      gpa: 8.5,
      completedCourses: 2,
      completionPercentage: 50,
      coursesNeeded: 2,
      eligibleForGraduation: false
    });
  });
});

describe('CourseQueries', () => {
  let queries: CourseQueries;

  beforeEach(() => {
    const env = createTestEnvironment();
    seed(env);
    queries = new CourseQueries(env.courseRepository, MINIMAL_CONFIG.businessRules.academics);
  });

  test('キーワードは科目コード・科目名・学科に部分一致する', () => {
    expect(codes(unwrap(queries.searchByKeyword('math')))).toEqual(['MA201-B']);
    expect(codes(unwrap(queries.searchByKeyword('intro')))).toEqual(['CS101-A', 'CS102-A']);
  });

  test('学期は大文字小文字を区別しない', () => {
    expect(codes(unwrap(queries.findBySemester({ semester: 'spring' })))).toEqual(['MA201-B']);
    expect(expectError(queries.findBySemester({ semester: 'autumn' })).code).toBe('INVALID_COMMAND_FORMAT');
  });

  test('単位数の範囲は両端を含む', () => {
    expect(codes(unwrap(queries.findByCreditRange({ minCredits: 4, maxCredits: 5 })))).toEqual(['MA201-B']);
    expect(codes(unwrap(queries.findByCreditRange({ minCredits: 3, maxCredits: 3 }))))
      .toEqual(['CS101-A', 'CS102-A', 'PH100-A']);
  });

  test('空きのある開講中の科目', () => {
    expect(codes(unwrap(queries.findAvailable()))).toEqual(['CS101-A', 'CS102-A']);
    expect(codes(unwrap(queries.findWithAvailableSpots({ requiredSpots: 30 })))).toEqual(['CS101-A', 'CS102-A']);
  });

  test('人気・定員割れの判定は設定の閾値を使う', () => {
    expect(codes(unwrap(queries.findPopular()))).toEqual(['MA201-B']);
    expect(codes(unwrap(queries.findUnderenrolled()))).toEqual(['CS101-A', 'CS102-A', 'PH100-A']);
  });

  test('件数と存在確認', () => {
    expect(unwrap(queries.totals())).toEqual({ total: 4, active: 3, inactive: 1 });
    expect(unwrap(queries.exists('ph100-a'))).toBe(true);
    expect(unwrap(queries.exists('PH200-A'))).toBe(false);
  });

  test('平均受講率は開講中の科目で計算する', () => {
    expect(unwrap(queries.aggregates()).averageEnrollmentPercentage).toBeCloseTo(100 / 3);
  });
});

describe('ReportQueries', () => {
  let queries: ReportQueries;

  beforeEach(() => {
    const env = createTestEnvironment();
    seed(env);
    queries = new ReportQueries({
      studentRepository: env.studentRepository,
      courseRepository: env.courseRepository,
      instructorRepository: env.instructorRepository,
      enrollmentRepository: env.enrollmentRepository,
      fallbackCredits: 3,
      clock: fixedClock
    });
  });

  test('単位数で重み付けしたGPA', () => {
    expect(unwrap(queries.creditWeightedGpa('S001'))).toBeCloseTo(59 / 7);
    expect(unwrap(queries.creditWeightedGpa('S003'))).toBe(0);
  });

  test('存在しない対象は NotFoundError', () => {
    expect(expectError(queries.transcript('S999')).message).toBe('Student not found: S999');
    expect(expectError(queries.instructorProfile('I999')).message).toBe('Instructor not found: I999');
    expect(expectError(queries.enrollmentReport('ENR-9999')).message).toBe('Enrollment not found: ENR-9999');
    expect(expectError(queries.enrollmentHistory('S999')).type).toBe('NotFoundError');
  });

  test('履修記録が無ければ履歴は空', () => {
    expect(unwrap(queries.enrollmentHistory('S001'))).toEqual([]);
  });
});
