import type { Result } from '../../../../shared/types/index';
import { Ok } from '../../../../shared/types/index';
import { fullName } from '../../domain/value-objects/name';
import { normalizeCourseCodeKey } from '../../domain/value-objects/course-code';
import type { RecordsError } from '../../domain/errors/errors';
import { updateStudentDetails, addAuditEntry } from '../../domain/entities/student';
import { updateCourseDetails } from '../../domain/entities/course';
import { updateInstructorDetails } from '../../domain/entities/instructor';
import type {
  IStudentRepository,
  ICourseRepository,
  IInstructorRepository
} from '../ports/ports';
import {
  type HandlerContext,
  publishAndAudit,
  requireStudent,
  requireCourse,
  requireInstructor
} from './handler-context';
import {
  UpdateStudentCommandSchema,
  UpdateCourseCommandSchema,
  UpdateInstructorCommandSchema,
  type UpdateStudentCommand,
  type UpdateCourseCommand,
  type UpdateInstructorCommand,
  type StudentResponse,
  type CourseResponse,
  type InstructorResponse,
  mapStudentToResponse,
  mapCourseToResponse,
  mapInstructorToResponse,
  parseStudentId,
  parseInstructorId,
  validateCommand
} from './dto';

/**
 * 学生情報更新コマンドハンドラー（監査記録を1件追加する）
 */
export class UpdateStudentCommandHandler {
  constructor(
    private readonly studentRepository: IStudentRepository,
    private readonly context: HandlerContext
  ) {}

  handle(command: UpdateStudentCommand): Result<StudentResponse, RecordsError> {
    const validated = validateCommand(UpdateStudentCommandSchema, command);
    if (!validated.success) {
      return validated;
    }

    const studentId = parseStudentId(validated.data.studentId);
    if (!studentId.success) {
      return studentId;
    }

    const studentResult = requireStudent(this.studentRepository, studentId.data);
    if (!studentResult.success) {
      return studentResult;
    }

    const now = this.context.clock();
    const updated = updateStudentDetails(studentResult.data, validated.data.changes, now);
    if (!updated.success) {
      this.context.logger.warn('Student update rejected', { studentId: studentId.data, code: updated.error.code });
      return updated;
    }

    const student = addAuditEntry(updated.data, 'Student information updated', now);
    const saveResult = this.studentRepository.save(student);
    if (!saveResult.success) {
      return saveResult;
    }

    publishAndAudit(this.context, [], `Student ${student.identity.id} updated`);
    this.context.logger.info(`Student updated successfully: ${fullName(student.identity.name)}`);
    return Ok(mapStudentToResponse(student));
  }
}

/**
 * 科目情報更新コマンドハンドラー
 */
export class UpdateCourseCommandHandler {
  constructor(
    private readonly courseRepository: ICourseRepository,
    private readonly context: HandlerContext
  ) {}

  handle(command: UpdateCourseCommand): Result<CourseResponse, RecordsError> {
    const validated = validateCommand(UpdateCourseCommandSchema, command);
    if (!validated.success) {
      return validated;
    }

    const courseCode = normalizeCourseCodeKey(validated.data.courseCode);
    if (!courseCode.success) {
      return courseCode;
    }

    const courseResult = requireCourse(this.courseRepository, courseCode.data);
    if (!courseResult.success) {
      return courseResult;
    }

    const updated = updateCourseDetails(courseResult.data, validated.data.changes);
    if (!updated.success) {
      this.context.logger.warn('Course update rejected', { courseCode: courseCode.data, code: updated.error.code });
      return updated;
    }

    const saveResult = this.courseRepository.save(updated.data);
    if (!saveResult.success) {
      return saveResult;
    }

    publishAndAudit(this.context, [], `Course ${courseCode.data} updated`);
    this.context.logger.info(`Course updated successfully: ${updated.data.title}`);
    return Ok(mapCourseToResponse(updated.data));
  }
}

export class UpdateInstructorCommandHandler {
  constructor(
    private readonly instructorRepository: IInstructorRepository,
    private readonly context: HandlerContext
  ) {}

  handle(command: UpdateInstructorCommand): Result<InstructorResponse, RecordsError> {
    const validated = validateCommand(UpdateInstructorCommandSchema, command);
    if (!validated.success) {
      return validated;
    }

    const instructorId = parseInstructorId(validated.data.instructorId);
    if (!instructorId.success) {
      return instructorId;
    }

    const instructorResult = requireInstructor(this.instructorRepository, instructorId.data);
    if (!instructorResult.success) {
      return instructorResult;
    }

    const updated = updateInstructorDetails(instructorResult.data, validated.data.changes, this.context.clock());
    if (!updated.success) {
      this.context.logger.warn('Instructor update rejected', { instructorId: instructorId.data, code: updated.error.code });
      return updated;
    }

    const saveResult = this.instructorRepository.save(updated.data);
    if (!saveResult.success) {
      return saveResult;
    }

    publishAndAudit(this.context, [], `Instructor ${instructorId.data} updated`);
    return Ok(mapInstructorToResponse(updated.data));
  }
}
