/**
 * Infrastructure - 統合エクスポート
 *
 * - インメモリのリポジトリとイベント発行者
 * - CSV の取り込み・書き出し
 */

// === リポジトリ ===
export {
  InMemoryStudentRepository,
  InMemoryCourseRepository,
  InMemoryInstructorRepository,
  InMemoryEnrollmentRepository
} from './repositories/in-memory-repositories';

// === イベント発行 ===
export {
  type PublishedBatch,
  InMemoryEventPublisher
} from './services/in-memory-event-publisher';

// === CSV ===
export {
  type SkippedRow,
  type CsvImportResult,
  type CsvImportOptions,
  STUDENT_CSV_HEADERS,
  COURSE_CSV_HEADERS,
  parseStudentsCsv,
  parseCoursesCsv,
  studentToCsvRow,
  courseToCsvRow,
  formatStudentsCsv,
  formatCoursesCsv,
  hasExpectedHeaders
} from './adapters/csv/records-csv';

export {
  type RecordsFileExchangeOptions,
  STUDENTS_FILE,
  COURSES_FILE,
  SUMMARY_FILE,
  RecordsFileExchange,
  exportSummary
} from './adapters/csv/records-file-exchange';
