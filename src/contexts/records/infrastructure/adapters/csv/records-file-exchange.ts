import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import type { Result } from '../../../../../shared/types/index';
import { Ok, fromAsync, mapError } from '../../../../../shared/types/index';
import type { DirectoriesConfig } from '../../../../../shared/config/index';
import type { Logger } from '../../../../../shared/logging/logger';
import { createValidationError, type RecordsError } from '../../../domain/errors/errors';
import { formatIsoDate, formatTime } from '../../../domain/services/formatting';
import type { Student } from '../../../domain/entities/student';
import type { Course } from '../../../domain/entities/course';
import {
  type CsvImportResult,
  parseStudentsCsv,
  parseCoursesCsv,
  formatStudentsCsv,
  formatCoursesCsv
} from './records-csv';

export const STUDENTS_FILE = 'students.csv';
export const COURSES_FILE = 'courses.csv';
export const SUMMARY_FILE = 'export_summary.txt';

export interface RecordsFileExchangeOptions {
  readonly directories: DirectoriesConfig;
  readonly logger: Logger;
  readonly clock?: () => Date;
  /** 取り込んだ科目で max_capacity が空のときの定員 */
  readonly defaultCapacity?: number;
}

const ioFailure = (action: string, filePath: string) => (error: Error): RecordsError =>
  createValidationError(`Failed to ${action} ${filePath}: ${error.message}`, 'IO_ERROR', 'filePath', filePath);

/**
 * CSVファイルの読み書きとスナップショットの書き出し
 *
 * 読み書きの失敗は例外ではなく IO_ERROR の検証エラーとして返す
 */
export class RecordsFileExchange {
  private readonly clock: () => Date;

  constructor(private readonly options: RecordsFileExchangeOptions) {
    this.clock = options.clock ?? (() => new Date());
  }

  /** 相対パスは取り込みディレクトリからの位置として扱う */
  resolveImportPath(fileName: string): string {
    return resolve(this.options.directories.importDir, fileName);
  }

  async importStudents(filePath: string): Promise<Result<CsvImportResult<Student>, RecordsError>> {
    this.options.logger.info(`Importing students from: ${filePath}`);
    const content = await this.read(filePath);
    if (!content.success) {
      return content;
    }
    return Ok(parseStudentsCsv(content.data, { now: this.clock(), logger: this.options.logger }));
  }

  async importCourses(filePath: string): Promise<Result<CsvImportResult<Course>, RecordsError>> {
    this.options.logger.info(`Importing courses from: ${filePath}`);
    const content = await this.read(filePath);
    if (!content.success) {
      return content;
    }
    return Ok(parseCoursesCsv(content.data, {
      now: this.clock(),
      logger: this.options.logger,
      defaultCapacity: this.options.defaultCapacity
    }));
  }

  async exportStudents(students: readonly Student[], filePath: string): Promise<Result<void, RecordsError>> {
    this.options.logger.info(`Exporting ${students.length} students to: ${filePath}`);
    return this.write(filePath, formatStudentsCsv(students));
  }

  async exportCourses(courses: readonly Course[], filePath: string): Promise<Result<void, RecordsError>> {
    this.options.logger.info(`Exporting ${courses.length} courses to: ${filePath}`);
    return this.write(filePath, formatCoursesCsv(courses));
  }

  /**
   * exportDir/export_yyyy-MM-dd に students.csv・courses.csv・export_summary.txt を書き出す
   *
   * 同じ日の書き出しは上書きする。書き出したディレクトリのパスを返す
   */
  async exportSnapshot(
    students: readonly Student[],
    courses: readonly Course[]
  ): Promise<Result<string, RecordsError>> {
    const now = this.clock();
    const exportDir = join(this.options.directories.exportDir, `export_${formatIsoDate(now)}`);
    this.options.logger.info(`Exporting system data to: ${exportDir}`);

    const studentsWritten = await this.exportStudents(students, join(exportDir, STUDENTS_FILE));
    if (!studentsWritten.success) {
      return studentsWritten;
    }
    const coursesWritten = await this.exportCourses(courses, join(exportDir, COURSES_FILE));
    if (!coursesWritten.success) {
      return coursesWritten;
    }
    const summaryWritten = await this.write(
      join(exportDir, SUMMARY_FILE),
      exportSummary(now, students.length, courses.length)
    );
    if (!summaryWritten.success) {
      return summaryWritten;
    }

    this.options.logger.info('System data export completed', { students: students.length, courses: courses.length });
    return Ok(exportDir);
  }

  private async read(filePath: string): Promise<Result<string, RecordsError>> {
    const result = await fromAsync(() => readFile(filePath, 'utf8'));
    if (!result.success) {
      this.options.logger.error(`Error reading file: ${filePath}`, { reason: result.error.message });
    }
    return mapError(result, ioFailure('read', filePath));
  }

  private async write(filePath: string, content: string): Promise<Result<void, RecordsError>> {
    const result = await fromAsync(async () => {
      await mkdir(dirname(filePath), { recursive: true });
      await writeFile(filePath, content, 'utf8');
    });
    if (!result.success) {
      this.options.logger.error(`Error writing file: ${filePath}`, { reason: result.error.message });
    }
    return mapError(result, ioFailure('write', filePath));
  }
}

export const exportSummary = (exportedAt: Date, studentCount: number, courseCount: number): string =>
  [
    'Records Export Summary',
    '======================',
    `Export Date: ${formatIsoDate(exportedAt)}`,
    `Export Time: ${formatTime(exportedAt)}`,
    '',
    'Exported Data:',
    `- Students: ${studentCount}`,
    `- Courses: ${courseCount}`,
    '',
    'Files Created:',
    `- ${STUDENTS_FILE}`,
    `- ${COURSES_FILE}`,
    `- ${SUMMARY_FILE} (this file)`,
    ''
  ].join('\n');
