import type { Result, InstructorId, CourseCodeKey } from '../../../../shared/types/index';
import { Ok } from '../../../../shared/types/index';
import { normalizeCourseCodeKey } from '../../domain/value-objects/course-code';
import type { RecordsError } from '../../domain/errors/errors';
import { assignInstructorToCourse, setCourseActive } from '../../domain/entities/course';
import { assignCourse, unassignCourse } from '../../domain/entities/instructor';
import { createInstructorAssignedEvent } from '../../domain/events/domain-events';
import type { ICourseRepository, IInstructorRepository } from '../ports/ports';
import { type HandlerContext, publishAndAudit } from './handler-context';
import {
  AssignInstructorCommandSchema,
  ChangeCourseStatusCommandSchema,
  type AssignInstructorCommand,
  type ChangeCourseStatusCommand,
  parseInstructorId,
  validateCommand
} from './dto';

/**
 * 担当教員の割り当てコマンドハンドラー
 *
 * 科目が無ければ false。教員の存在は必須ではないが、
 * 登録済みの教員なら担当科目の集合も合わせて更新する（前任者からは外す）
 */
export class AssignInstructorCommandHandler {
  constructor(
    private readonly courseRepository: ICourseRepository,
    private readonly instructorRepository: IInstructorRepository,
    private readonly context: HandlerContext
  ) {}

  handle(command: AssignInstructorCommand): Result<boolean, RecordsError> {
    const validated = validateCommand(AssignInstructorCommandSchema, command);
    if (!validated.success) {
      return validated;
    }
    const courseCode = normalizeCourseCodeKey(validated.data.courseCode);
    if (!courseCode.success) {
      return courseCode;
    }
    const instructorId = parseInstructorId(validated.data.instructorId);
    if (!instructorId.success) {
      return instructorId;
    }

    const found = this.courseRepository.findByCode(courseCode.data);
    if (!found.success) {
      return found;
    }
    if (!found.data) {
      this.context.logger.warn('Instructor assignment skipped: course not found', { courseCode: courseCode.data });
      return Ok(false);
    }

    const previous = found.data.instructorId;
    const saved = this.courseRepository.save(assignInstructorToCourse(found.data, instructorId.data));
    if (!saved.success) {
      return saved;
    }

    if (previous && previous !== instructorId.data) {
      const released = this.syncInstructor(previous, courseCode.data, false);
      if (!released.success) {
        return released;
      }
    }
    const synced = this.syncInstructor(instructorId.data, courseCode.data, true);
    if (!synced.success) {
      return synced;
    }

    publishAndAudit(
      this.context,
      [createInstructorAssignedEvent(courseCode.data, instructorId.data, this.context.clock())],
      `Instructor ${instructorId.data} assigned to ${courseCode.data}`
    );
    this.context.logger.info(`Instructor ${instructorId.data} assigned to course ${courseCode.data}`);
    return Ok(true);
  }

  private syncInstructor(
    instructorId: InstructorId,
    courseCode: CourseCodeKey,
    assigned: boolean
  ): Result<void, RecordsError> {
    const found = this.instructorRepository.findById(instructorId);
    if (!found.success) {
      return found;
    }
    if (!found.data) {
      return Ok(undefined);
    }
    const instructor = assigned
      ? assignCourse(found.data, courseCode).instructor
      : unassignCourse(found.data, courseCode).instructor;
    return this.instructorRepository.save(instructor);
  }
}

/**
 * 科目の開講状態変更コマンドハンドラー（科目が無ければ false）
 */
export class ChangeCourseStatusCommandHandler {
  constructor(
    private readonly courseRepository: ICourseRepository,
    private readonly context: HandlerContext
  ) {}

  handle(command: ChangeCourseStatusCommand): Result<boolean, RecordsError> {
    const validated = validateCommand(ChangeCourseStatusCommandSchema, command);
    if (!validated.success) {
      return validated;
    }
    const courseCode = normalizeCourseCodeKey(validated.data.courseCode);
    if (!courseCode.success) {
      return courseCode;
    }

    const found = this.courseRepository.findByCode(courseCode.data);
    if (!found.success) {
      return found;
    }
    if (!found.data) {
      return Ok(false);
    }

    const saved = this.courseRepository.save(setCourseActive(found.data, validated.data.active));
    if (!saved.success) {
      return saved;
    }

    publishAndAudit(
      this.context,
      [],
      `Course ${courseCode.data} ${validated.data.active ? 'activated' : 'deactivated'}`
    );
    return Ok(true);
  }
}
