import type { Result } from '../../../../shared/types/index';
import { Ok, Err } from '../../../../shared/types/index';
import { fullName } from '../../domain/value-objects/name';
import { alreadyExistsFailure, type RecordsError } from '../../domain/errors/errors';
import { courseKeyOf } from '../../domain/entities/course';
import { assignCourse } from '../../domain/entities/instructor';
import {
  createStudentRegisteredEvent,
  createCourseRegisteredEvent,
  createInstructorRegisteredEvent
} from '../../domain/events/domain-events';
import type {
  IStudentRepository,
  ICourseRepository,
  IInstructorRepository
} from '../ports/ports';
import { type HandlerContext, publishAndAudit } from './handler-context';
import {
  type RegisterStudentCommand,
  type RegisterCourseCommand,
  type RegisterInstructorCommand,
  type StudentResponse,
  type CourseResponse,
  type InstructorResponse,
  mapStudentToResponse,
  mapCourseToResponse,
  mapInstructorToResponse
} from './dto';

/**
 * 学生登録コマンドハンドラー
 *
 * 組み立て済みの学生を登録する。同じIDがあれば AlreadyExists
 */
export class RegisterStudentCommandHandler {
  constructor(
    private readonly studentRepository: IStudentRepository,
    private readonly context: HandlerContext
  ) {}

  handle(command: RegisterStudentCommand): Result<StudentResponse, RecordsError> {
    const { student } = command;

    // Step 1: 重複チェック
    const existsResult = this.studentRepository.exists(student.identity.id);
    if (!existsResult.success) {
      return existsResult;
    }
    if (existsResult.data) {
      this.context.logger.warn('Student registration rejected', { studentId: student.identity.id });
      return alreadyExistsFailure('Student', student.identity.id);
    }

    // Step 2: 永続化
    const saveResult = this.studentRepository.save(student);
    if (!saveResult.success) {
      return Err(saveResult.error);
    }

    // Step 3: イベント発行
    publishAndAudit(
      this.context,
      [createStudentRegisteredEvent(student.identity.id, student.registrationNumber, student.department, this.context.clock())],
      `Student ${student.identity.id} registered`
    );
    this.context.logger.info(`Student added successfully: ${fullName(student.identity.name)}`);

    return Ok(mapStudentToResponse(student));
  }
}

/**
 * 科目登録コマンドハンドラー
 *
 * 担当教員が登録済みなら、教員側の担当科目にも加える
 */
export class RegisterCourseCommandHandler {
  constructor(
    private readonly courseRepository: ICourseRepository,
    private readonly instructorRepository: IInstructorRepository,
    private readonly context: HandlerContext
  ) {}

  handle(command: RegisterCourseCommand): Result<CourseResponse, RecordsError> {
    const { course } = command;
    const courseCode = courseKeyOf(course);

    const existsResult = this.courseRepository.exists(courseCode);
    if (!existsResult.success) {
      return existsResult;
    }
    if (existsResult.data) {
      this.context.logger.warn('Course registration rejected', { courseCode });
      return alreadyExistsFailure('Course', courseCode);
    }

    const saveResult = this.courseRepository.save(course);
    if (!saveResult.success) {
      return Err(saveResult.error);
    }

    if (course.instructorId) {
      const instructorResult = this.instructorRepository.findById(course.instructorId);
      if (instructorResult.success && instructorResult.data) {
        const synced = this.instructorRepository.save(assignCourse(instructorResult.data, courseCode).instructor);
        if (!synced.success) {
          return Err(synced.error);
        }
      }
    }

    publishAndAudit(
      this.context,
      [createCourseRegisteredEvent(courseCode, course.credits, course.maxCapacity, this.context.clock())],
      `Course ${courseCode} registered`
    );
    this.context.logger.info(`Course added successfully: ${course.title}`);

    return Ok(mapCourseToResponse(course));
  }
}

export class RegisterInstructorCommandHandler {
  constructor(
    private readonly instructorRepository: IInstructorRepository,
    private readonly context: HandlerContext
  ) {}

  handle(command: RegisterInstructorCommand): Result<InstructorResponse, RecordsError> {
    const { instructor } = command;

    const existsResult = this.instructorRepository.exists(instructor.identity.id);
    if (!existsResult.success) {
      return existsResult;
    }
    if (existsResult.data) {
      this.context.logger.warn('Instructor registration rejected', { instructorId: instructor.identity.id });
      return alreadyExistsFailure('Instructor', instructor.identity.id);
    }

    const saveResult = this.instructorRepository.save(instructor);
    if (!saveResult.success) {
      return Err(saveResult.error);
    }

    publishAndAudit(
      this.context,
      [createInstructorRegisteredEvent(instructor.identity.id, instructor.department, this.context.clock())],
      `Instructor ${instructor.identity.id} registered`
    );
    this.context.logger.info(`Instructor added successfully: ${fullName(instructor.identity.name)}`);

    return Ok(mapInstructorToResponse(instructor));
  }
}
