import { describe, test, expect } from 'vitest';
import {
  type GradeLetter,
  gradeFromMarks,
  formatGrade,
  calculateGradePoints,
  isPassingGrade
} from '../../src/contexts/records/domain/value-objects/grade';
import {
  parseSemester,
  semesterFromCode,
  formatSemester
} from '../../src/contexts/records/domain/value-objects/semester';
import {
  parseCourseCode,
  fullCode,
  withSection,
  normalizeCourseCodeKey,
  courseCodesEqual
} from '../../src/contexts/records/domain/value-objects/course-code';
import { createName, fullName, initials } from '../../src/contexts/records/domain/value-objects/name';
import { unwrap, expectError } from '../helpers/fixtures';

describe('値オブジェクト', () => {
  describe('成績評価', () => {
    test.each<[number, GradeLetter]>([
      [100, 'S'],
      [90, 'S'],
      [89.99, 'A'],
      [80, 'A'],
      [70, 'B'],
      [60, 'C'],
      [50, 'D'],
      [40, 'E'],
      [39.99, 'F'],
      [-5, 'F'],
      [Number.NaN, 'F']
    ])('素点 %s は %s', (marks, expected) => {
      expect(gradeFromMarks(marks)).toBe(expected);
    });

    test('表示とGP計算', () => {
      expect(formatGrade('A')).toBe('A (9.0) - Excellent');
      expect(formatGrade('F')).toBe('F (0.0) - Fail');
      expect(calculateGradePoints('B', 4)).toBe(32);
      expect(isPassingGrade('E')).toBe(true);
      expect(isPassingGrade('F')).toBe(false);
    });
  });

  describe('学期', () => {
    test('大文字小文字と前後の空白を無視して解析する', () => {
      expect(parseSemester(' fall ')).toEqual({ success: true, data: 'FALL' });
    });

    test('未知の学期名は検証エラー', () => {
      const error = expectError(parseSemester('autumn'));

      expect(error.code).toBe('INVALID_SEMESTER');
      expect(error.message).toBe('Invalid semester: autumn');
    });

    test('コードからの変換と表示', () => {
      expect(unwrap(semesterFromCode(4))).toBe('WINTER');
      expect(expectError(semesterFromCode(9)).message).toBe('Invalid semester code: 9');
      expect(formatSemester('FALL')).toBe('Fall (September - December)');
    });
  });

  describe('科目コード', () => {
    test('"CS101-A" 形式を解析し、学科コードとクラスを大文字にする', () => {
      const code = unwrap(parseCourseCode('cs101-a'));

      expect(code).toEqual({ department: 'CS', number: 101, section: 'A' });
      expect(fullCode(code)).toBe('CS101-A');
    });

    test('形式が違えば検証エラー', () => {
      const error = expectError(parseCourseCode('CS-101'));

      expect(error.code).toBe('INVALID_COURSE_CODE');
      expect(error.message).toBe('Invalid course code format: CS-101');
    });

    test('科目番号は正の整数', () => {
      expect(expectError(parseCourseCode('CS0-A')).message).toBe('Course number must be positive');
    });

    test('クラスだけを変えたコードを作れる', () => {
      const code = unwrap(parseCourseCode('CS101-A'));
      const other = unwrap(withSection(code, 'b'));

      expect(fullCode(other)).toBe('CS101-B');
      expect(courseCodesEqual(code, other)).toBe(false);
      expect(courseCodesEqual(code, unwrap(parseCourseCode('cs101-A')))).toBe(true);
    });

    test('キーへの正規化は前後空白除去と大文字化', () => {
      expect(unwrap(normalizeCourseCodeKey(' cs101-a '))).toBe('CS101-A');
      expect(expectError(normalizeCourseCodeKey('   ')).message).toBe('Course code is required');
    });
  });

  describe('氏名', () => {
    test('前後の空白を除き、ミドルネームは省略可', () => {
      const name = unwrap(createName('  Jane ', 'Doe'));

      expect(name).toEqual({ firstName: 'Jane', middleName: '', lastName: 'Doe' });
      expect(fullName(name)).toBe('Jane Doe');
      expect(initials(name)).toBe('J.D.');
    });

    test('ミドルネームがあれば表示とイニシャルに含める', () => {
      const name = unwrap(createName('John', 'Doe', 'Adam'));

      expect(fullName(name)).toBe('John Adam Doe');
      expect(initials(name)).toBe('J.A.D.');
    });

    test('名が空なら検証エラー', () => {
      const error = expectError(createName(' ', 'Doe'));

      expect(error.code).toBe('INVALID_NAME');
      expect(error.message).toBe('First name is required');
      expect(error.type === 'ValidationError' && error.field).toBe('firstName');
    });
  });
});
