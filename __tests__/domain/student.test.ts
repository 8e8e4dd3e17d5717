import { describe, test, expect } from 'vitest';
import {
  createStudent,
  enrollInCourse,
  unenrollFromCourse,
  recordGrade,
  calculateGpa,
  isInGoodStanding,
  getAuditTrail,
  getCompletedCourses,
  getPendingCourses,
  getStudentDisplayInfo,
  deactivateStudent,
  updateStudentDetails
} from '../../src/contexts/records/domain/entities/student';
import { NOW, aStudent, studentDraft, key, unwrap, expectError, daysAfter } from '../helpers/fixtures';

describe('学生エンティティ', () => {
  describe('生成', () => {
    test('作成の監査記録を1件持つ', () => {
      const student = aStudent();

      expect(student.identity.active).toBe(true);
      expect(student.enrolledCourses).toEqual([]);
      expect(getAuditTrail(student)).toEqual(['[2024-09-01 10:15:00] Student created: Jane Doe']);
    });

    test('学期を省略すると1', () => {
      expect(aStudent({ currentSemester: undefined }).currentSemester).toBe(1);
    });

    test('生年月日が未来なら検証エラー', () => {
      const error = expectError(createStudent(studentDraft({ dateOfBirth: daysAfter(NOW, 1) }), NOW));

      expect(error.code).toBe('INVALID_DATE_OF_BIRTH');
    });

    test('メールアドレスに @ が無ければ検証エラー', () => {
      const error = expectError(createStudent(studentDraft({ email: 'jane.example.edu' }), NOW));

      expect(error.code).toBe('INVALID_STUDENT');
      expect(error.message).toBe('Valid email required');
    });

    test('学期は1〜8', () => {
      expect(expectError(createStudent(studentDraft({ currentSemester: 9 }), NOW)).message)
        .toBe('Semester must be between 1 and 8');
    });
  });

  describe('履修集合', () => {
    test('同じ科目の二重追加は変更なし', () => {
      const first = enrollInCourse(aStudent(), key('CS101-A'), NOW);
      const second = enrollInCourse(first.student, key('CS101-A'), NOW);

      expect(first.added).toBe(true);
      expect(second.added).toBe(false);
      expect(second.student.enrolledCourses).toEqual(['CS101-A']);
    });

    test('削除すると記録済みの成績も消える', () => {
      const enrolled = enrollInCourse(aStudent(), key('CS101-A'), NOW).student;
      const graded = unwrap(recordGrade(enrolled, key('CS101-A'), 'A', NOW));

      const { student, removed } = unenrollFromCourse(graded, key('CS101-A'), NOW);

      expect(removed).toBe(true);
      expect(student.enrolledCourses).toEqual([]);
      expect(student.courseGrades).toEqual({});
    });

    test('履修していない科目の削除は removed=false', () => {
      expect(unenrollFromCourse(aStudent(), key('CS101-A'), NOW).removed).toBe(false);
    });
  });

  describe('成績とGPA', () => {
    const withGrades = () => {
      let student = aStudent();
      student = enrollInCourse(student, key('CS101-A'), NOW).student;
      student = enrollInCourse(student, key('CS102-A'), NOW).student;
      student = enrollInCourse(student, key('CS103-A'), NOW).student;
      student = unwrap(recordGrade(student, key('CS101-A'), 'A', NOW));
      return unwrap(recordGrade(student, key('CS102-A'), 'B', NOW));
    };

    test('履修していない科目には成績を記録できない', () => {
      const error = expectError(recordGrade(aStudent(), key('CS101-A'), 'A', NOW));

      expect(error.code).toBe('NOT_ENROLLED_IN_COURSE');
      expect(error.message).toBe('Student is not enrolled in course: CS101-A');
    });

    test('A と B の GPA は 8.5', () => {
      expect(calculateGpa(withGrades())).toBe(8.5);
    });

    test('成績が無ければ GPA は 0', () => {
      expect(calculateGpa(aStudent())).toBe(0);
    });

    test('F があると成績不良', () => {
      const student = unwrap(recordGrade(withGrades(), key('CS103-A'), 'F', NOW));

      expect(isInGoodStanding(student)).toBe(false);
      expect(calculateGpa(student)).toBeCloseTo(17 / 3, 10);
    });

    test('完了・未完了の科目と表示用の要約', () => {
      const student = withGrades();

      expect(getCompletedCourses(student)).toEqual(['CS101-A', 'CS102-A']);
      expect(getPendingCourses(student)).toEqual(['CS103-A']);
      expect(getStudentDisplayInfo(student))
        .toBe('Reg No: REG001 | Dept: Computer Science | Sem: 3 | GPA: 8.50 | Courses: 3');
    });

    test('成績の記録は監査記録に残る', () => {
      const trail = getAuditTrail(withGrades());

      expect(trail.slice(-2)).toEqual([
        '[2024-09-01 10:15:00] Grade recorded for CS101-A: A',
        '[2024-09-01 10:15:00] Grade recorded for CS102-A: B'
      ]);
    });
  });

  describe('更新と状態変更', () => {
    test('指定した項目だけ更新する', () => {
      const later = daysAfter(NOW, 3);
      const updated = unwrap(updateStudentDetails(aStudent(), { department: 'Mathematics', currentSemester: 4 }, later));

      expect(updated.department).toBe('Mathematics');
      expect(updated.currentSemester).toBe(4);
      expect(updated.identity.email).toBe('jane@example.edu');
      expect(updated.lastModifiedAt).toEqual(later);
    });

    test('無効化すると監査記録に理由が残る', () => {
      const student = deactivateStudent(aStudent(), NOW, 'Bulk deactivated');

      expect(student.identity.active).toBe(false);
      expect(getAuditTrail(student)).toHaveLength(2);
      expect(getAuditTrail(student)[1]).toBe('[2024-09-01 10:15:00] Bulk deactivated');
    });
  });
});
