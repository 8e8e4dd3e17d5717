import * as XLSX from 'xlsx';
import type { Result } from '../../../../../shared/types/index';
import { flatMap } from '../../../../../shared/types/index';
import type { Logger } from '../../../../../shared/logging/logger';
import { silentLogger } from '../../../../../shared/logging/logger';
import { parseCourseCode, fullCode } from '../../../domain/value-objects/course-code';
import { parseSemester } from '../../../domain/value-objects/semester';
import { formatIsoDate, subtractYears } from '../../../domain/services/formatting';
import type { RecordsError } from '../../../domain/errors/errors';
import { type Student, createStudent, calculateGpa } from '../../../domain/entities/student';
import { type Course, buildCourse, currentEnrollment } from '../../../domain/entities/course';

/**
 * 学生・科目のCSV入出力
 *
 * 1行目はヘッダー。不正な行は読み飛ばし、行番号（ファイル上の行、ヘッダーが1）と理由を返す
 */

export const STUDENT_CSV_HEADERS = [
  'student_id', 'reg_no', 'first_name', 'last_name', 'email', 'department',
  'semester', 'gpa', 'status', 'enrollment_date'
] as const;

export const COURSE_CSV_HEADERS = [
  'course_code', 'title', 'credits', 'department', 'semester',
  'instructor_id', 'max_capacity', 'current_enrollment', 'status'
] as const;

/** 取り込み時に最低限必要な列数（学生・科目とも先頭6列） */
const REQUIRED_COLUMNS = 6;

/** 取り込んだ学生の生年月日は取り込み日の20年前とする */
const DEFAULT_STUDENT_AGE = 20;

export interface SkippedRow {
  readonly row: number;
  readonly reason: string;
}

export interface CsvImportResult<T> {
  readonly records: T[];
  readonly skipped: SkippedRow[];
}

export interface CsvImportOptions {
  readonly now?: Date;
  readonly logger?: Logger;
  /** max_capacity 列が空のときの定員 */
  readonly defaultCapacity?: number;
}

type Cells = readonly string[];

// === 読み込み ===

const readRows = (csv: string): string[][] => {
  const workbook = XLSX.read(csv, { type: 'string', raw: true });
  const firstSheetName = workbook.SheetNames[0];
  if (!firstSheetName) {
    return [];
  }
  return XLSX.utils.sheet_to_json<string[]>(workbook.Sheets[firstSheetName], {
    header: 1,
    raw: false,
    defval: '',
    blankrows: true
  });
};

const cell = (cells: Cells, index: number): string => (cells[index] ?? '').trim();

const isBlank = (cells: Cells): boolean => cells.every(value => value.trim() === '');

const filledColumns = (cells: Cells): number => {
  let last = 0;
  cells.forEach((value, index) => {
    if (value.trim() !== '') last = index + 1;
  });
  return last;
};

/**
 * 空欄は undefined（既定値を使う）。数値でなければ NaN のまま渡して検証で落とす
 */
const optionalNumber = (value: string): number | undefined => (value === '' ? undefined : Number(value));

const parseRecords = <T>(
  csv: string,
  kind: string,
  parseRow: (cells: Cells) => Result<T, RecordsError>,
  logger: Logger
): CsvImportResult<T> => {
  const records: T[] = [];
  const skipped: SkippedRow[] = [];

  readRows(csv).forEach((cells, index) => {
    // ヘッダー行と空行は対象外
    if (index === 0 || isBlank(cells)) return;
    const row = index + 1;

    if (filledColumns(cells) < REQUIRED_COLUMNS) {
      skipped.push({ row, reason: 'Insufficient fields' });
      logger.warn(`Invalid ${kind} CSV line (insufficient fields)`, { row });
      return;
    }

    const parsed = parseRow(cells);
    if (parsed.success) {
      records.push(parsed.data);
    } else {
      skipped.push({ row, reason: parsed.error.message });
      logger.warn(`Error parsing ${kind} CSV line`, { row, code: parsed.error.code, reason: parsed.error.message });
    }
  });

  logger.info(`Successfully imported ${records.length} ${kind}s`, { skipped: skipped.length });
  return { records, skipped };
};

export const parseStudentsCsv = (csv: string, options: CsvImportOptions = {}): CsvImportResult<Student> => {
  const now = options.now ?? new Date();
  return parseRecords(
    csv,
    'student',
    cells => createStudent({
      id: cell(cells, 0),
      registrationNumber: cell(cells, 1),
      name: { firstName: cell(cells, 2), lastName: cell(cells, 3) },
      email: cell(cells, 4),
      dateOfBirth: subtractYears(now, DEFAULT_STUDENT_AGE),
      department: cell(cells, 5),
      currentSemester: optionalNumber(cell(cells, 6))
    }, now),
    options.logger ?? silentLogger
  );
};

export const parseCoursesCsv = (csv: string, options: CsvImportOptions = {}): CsvImportResult<Course> => {
  const now = options.now ?? new Date();
  return parseRecords(
    csv,
    'course',
    cells => flatMap(parseCourseCode(cell(cells, 0)), code =>
      flatMap(parseSemester(cell(cells, 4)), semester =>
        buildCourse({
          code,
          title: cell(cells, 1),
          credits: Number(cell(cells, 2)),
          department: cell(cells, 3),
          semester,
          instructorId: cell(cells, 5) === '' ? null : cell(cells, 5),
          maxCapacity: optionalNumber(cell(cells, 6))
        }, { now, defaultCapacity: options.defaultCapacity })
      )
    ),
    options.logger ?? silentLogger
  );
};

// === 書き出し ===

const toCsv = (rows: string[][]): string => {
  const sheet = XLSX.utils.aoa_to_sheet(rows);
  return `${XLSX.utils.sheet_to_csv(sheet)}\n`;
};

const statusOf = (active: boolean): string => (active ? 'ACTIVE' : 'INACTIVE');

export const studentToCsvRow = (student: Student): string[] => [
  student.identity.id,
  student.registrationNumber,
  student.identity.name.firstName,
  student.identity.name.lastName,
  student.identity.email,
  student.department,
  String(student.currentSemester),
  calculateGpa(student).toFixed(2),
  statusOf(student.identity.active),
  formatIsoDate(student.enrollmentDate)
];

export const courseToCsvRow = (course: Course): string[] => [
  fullCode(course.code),
  course.title,
  String(course.credits),
  course.department,
  course.semester,
  course.instructorId ?? '',
  String(course.maxCapacity),
  String(currentEnrollment(course)),
  statusOf(course.active)
];

export const formatStudentsCsv = (students: readonly Student[]): string =>
  toCsv([[...STUDENT_CSV_HEADERS], ...students.map(studentToCsvRow)]);

export const formatCoursesCsv = (courses: readonly Course[]): string =>
  toCsv([[...COURSE_CSV_HEADERS], ...courses.map(courseToCsvRow)]);

/**
 * ヘッダー行が期待どおりか（前後の空白と末尾の空欄は無視）
 */
export const hasExpectedHeaders = (csv: string, expected: readonly string[]): boolean => {
  const [header] = readRows(csv);
  if (!header) {
    return false;
  }
  const actual = header.slice(0, filledColumns(header)).map(value => value.trim());
  return actual.length === expected.length && actual.every((value, index) => value === expected[index]);
};
