import type {
  Result,
  StudentId,
  InstructorId,
  EnrollmentId,
  CourseCodeKey
} from '../../../../shared/types/index';
import type { RecordsError } from '../../domain/errors/errors';
import type { Student } from '../../domain/entities/student';
import type { Course } from '../../domain/entities/course';
import type { Instructor } from '../../domain/entities/instructor';
import type { Enrollment } from '../../domain/entities/enrollment';
import type { RecordsDomainEvent } from '../../domain/events/domain-events';

export type { Logger, LogContext } from '../../../../shared/logging/logger';

/**
 * アプリケーション層のポート（依存性逆転）
 *
 * 記録はすべてプロセス内で完結するため、ポートは同期的に Result を返す。
 * 実装は infrastructure 層が提供する
 */

// === リポジトリ ===

export interface IStudentRepository {
  findById(studentId: StudentId): Result<Student | null, RecordsError>;
  findAll(): Result<Student[], RecordsError>;
  exists(studentId: StudentId): Result<boolean, RecordsError>;
  save(student: Student): Result<void, RecordsError>;
}

export interface ICourseRepository {
  findByCode(courseCode: CourseCodeKey): Result<Course | null, RecordsError>;
  findAll(): Result<Course[], RecordsError>;
  exists(courseCode: CourseCodeKey): Result<boolean, RecordsError>;
  save(course: Course): Result<void, RecordsError>;
}

export interface IInstructorRepository {
  findById(instructorId: InstructorId): Result<Instructor | null, RecordsError>;
  findAll(): Result<Instructor[], RecordsError>;
  exists(instructorId: InstructorId): Result<boolean, RecordsError>;
  save(instructor: Instructor): Result<void, RecordsError>;
}

/**
 * 履修記録（履歴）のリポジトリ
 */
export interface IEnrollmentRepository {
  nextId(): EnrollmentId;
  findById(enrollmentId: EnrollmentId): Result<Enrollment | null, RecordsError>;
  findByStudent(studentId: StudentId): Result<Enrollment[], RecordsError>;
  /** 学生と科目の組で、取り消されていない最新の記録 */
  findCurrent(studentId: StudentId, courseCode: CourseCodeKey): Result<Enrollment | null, RecordsError>;
  findAll(): Result<Enrollment[], RecordsError>;
  save(enrollment: Enrollment): Result<void, RecordsError>;
}

// === 外部サービス ===

export interface IEventPublisher {
  publish(events: readonly RecordsDomainEvent[]): void;
}
