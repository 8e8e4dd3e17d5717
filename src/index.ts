/**
 * 学務記録マネージャー - 公開API
 */

// === アプリケーション ===
export {
  type RecordsApplicationDependencies,
  type ImportSummary,
  type RejectedRecord,
  RecordsApplication,
  createRecordsApplication
} from './contexts/records/records-application';

export * from './contexts/records/application/index';
export * from './contexts/records/infrastructure/index';

// === 共通 ===
export * from './shared/types/index';
export * from './shared/config/index';
export {
  type Logger,
  type LogContext,
  type LogEntry,
  ConsoleLogger,
  MemoryLogger,
  silentLogger,
  createLogger
} from './shared/logging/logger';

// === ドメイン ===
export {
  type RecordsError,
  type RecordsEntity,
  isValidationError,
  isBusinessRuleError,
  isNotFoundError,
  isAlreadyExistsError,
  isDuplicateEnrollmentError,
  isCreditLimitExceededError,
  isCapacityExceededError,
  formatCreditLimitReport
} from './contexts/records/domain/errors/errors';

export type { RecordsDomainEvent, RecordsEventType } from './contexts/records/domain/events/domain-events';
export type { Student, StudentDraft, StudentUpdate } from './contexts/records/domain/entities/student';
export type { Course, CourseDraft, CourseUpdate } from './contexts/records/domain/entities/course';
export type { Instructor, InstructorDraft, InstructorUpdate } from './contexts/records/domain/entities/instructor';
export type { Enrollment, EnrollmentStatus } from './contexts/records/domain/entities/enrollment';
export type { Person } from './contexts/records/domain/entities/people';
export { type GradeLetter, gradeFromMarks, gradePointOf } from './contexts/records/domain/value-objects/grade';
export { type Semester, parseSemester } from './contexts/records/domain/value-objects/semester';
export { type CourseCode, parseCourseCode, fullCode } from './contexts/records/domain/value-objects/course-code';
export type { Name } from './contexts/records/domain/value-objects/name';
