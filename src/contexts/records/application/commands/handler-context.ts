import type { Result, StudentId, CourseCodeKey, InstructorId } from '../../../../shared/types/index';
import { Ok, flatMap } from '../../../../shared/types/index';
import type { BusinessRulesConfig } from '../../../../shared/config/index';
import { notFoundFailure, type RecordsError } from '../../domain/errors/errors';
import type { Student } from '../../domain/entities/student';
import type { Course } from '../../domain/entities/course';
import type { Instructor } from '../../domain/entities/instructor';
import type { RecordsDomainEvent } from '../../domain/events/domain-events';
import type {
  IStudentRepository,
  ICourseRepository,
  IInstructorRepository,
  IEventPublisher,
  Logger
} from '../ports/ports';

/**
 * コマンドハンドラー共通の実行環境
 *
 * 設定・ロガー・イベント発行・時計をまとめて注入する
 */
export interface HandlerContext {
  readonly rules: BusinessRulesConfig;
  readonly logger: Logger;
  readonly eventPublisher: IEventPublisher;
  /** true のとき監査記録の追加をログにも出す */
  readonly auditLog: boolean;
  readonly clock: () => Date;
}

/**
 * 変更成功後の共通処理: イベント発行と監査ログ
 */
export const publishAndAudit = (
  context: HandlerContext,
  events: readonly RecordsDomainEvent[],
  auditMessage?: string
): void => {
  if (events.length > 0) {
    context.eventPublisher.publish(events);
  }
  if (auditMessage && context.auditLog) {
    context.logger.info(`AUDIT ${auditMessage}`);
  }
};

// === 存在確認付きの読み込み ===

export const requireStudent = (
  repository: IStudentRepository,
  studentId: StudentId
): Result<Student, RecordsError> =>
  flatMap(repository.findById(studentId), (student): Result<Student, RecordsError> =>
    student ? Ok(student) : notFoundFailure<Student>('Student', studentId)
  );

export const requireCourse = (
  repository: ICourseRepository,
  courseCode: CourseCodeKey
): Result<Course, RecordsError> =>
  flatMap(repository.findByCode(courseCode), (course): Result<Course, RecordsError> =>
    course ? Ok(course) : notFoundFailure<Course>('Course', courseCode)
  );

export const requireInstructor = (
  repository: IInstructorRepository,
  instructorId: InstructorId
): Result<Instructor, RecordsError> =>
  flatMap(repository.findById(instructorId), (instructor): Result<Instructor, RecordsError> =>
    instructor ? Ok(instructor) : notFoundFailure<Instructor>('Instructor', instructorId)
  );
