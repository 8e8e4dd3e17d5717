import type { Result } from '../../../../shared/types/index';
import { Ok } from '../../../../shared/types/index';
import { validationFailure, type RecordsError } from '../../domain/errors/errors';
import { unenrollFromCourse } from '../../domain/entities/student';
import { unenrollStudent, currentEnrollment } from '../../domain/entities/course';
import { withdraw } from '../../domain/entities/enrollment';
import {
  createStudentUnenrolledEvent,
  createCourseRosterChangedEvent,
  type RecordsDomainEvent
} from '../../domain/events/domain-events';
import type {
  IStudentRepository,
  ICourseRepository,
  IEnrollmentRepository
} from '../ports/ports';
import { type HandlerContext, publishAndAudit, requireStudent } from './handler-context';
import {
  UnenrollStudentCommandSchema,
  type UnenrollStudentCommand,
  type UnenrollStudentResponse,
  mapStudentToResponse,
  parseStudentCourse,
  validateCommand
} from './dto';

/**
 * 履修取り消しコマンドハンドラー
 *
 * 学生の履修集合（と成績）から外し、科目があれば名簿からも外す。
 * 取り消されていない履修記録があれば WITHDRAWN にする
 */
export class UnenrollStudentCommandHandler {
  constructor(
    private readonly studentRepository: IStudentRepository,
    private readonly courseRepository: ICourseRepository,
    private readonly enrollmentRepository: IEnrollmentRepository,
    private readonly context: HandlerContext
  ) {}

  handle(command: UnenrollStudentCommand): Result<UnenrollStudentResponse, RecordsError> {
    // Step 1: 入力検証
    const validated = validateCommand(UnenrollStudentCommandSchema, command);
    if (!validated.success) {
      return validated;
    }
    const identifiers = parseStudentCourse(validated.data);
    if (!identifiers.success) {
      return identifiers;
    }
    const { studentId, courseCode } = identifiers.data;

    // Step 2: 学生側の取り消し
    const studentResult = requireStudent(this.studentRepository, studentId);
    if (!studentResult.success) {
      return studentResult;
    }
    const now = this.context.clock();
    const unenrolled = unenrollFromCourse(studentResult.data, courseCode, now);
    if (!unenrolled.removed) {
      return validationFailure(
        `Student is not enrolled in course: ${courseCode}`,
        'NOT_ENROLLED_IN_COURSE',
        'courseCode',
        courseCode
      );
    }
    const studentSaved = this.studentRepository.save(unenrolled.student);
    if (!studentSaved.success) {
      return studentSaved;
    }

    const events: RecordsDomainEvent[] = [createStudentUnenrolledEvent(studentId, courseCode, now)];

    // Step 3: 科目側の名簿から外す（科目が無ければ何もしない）
    let removedFromRoster = false;
    const courseResult = this.courseRepository.findByCode(courseCode);
    if (!courseResult.success) {
      return courseResult;
    }
    if (courseResult.data) {
      const { course, removed } = unenrollStudent(courseResult.data, studentId);
      if (removed) {
        const courseSaved = this.courseRepository.save(course);
        if (!courseSaved.success) {
          return courseSaved;
        }
        removedFromRoster = true;
        events.push(createCourseRosterChangedEvent(courseCode, studentId, 'REMOVED', currentEnrollment(course), now));
      }
    }

    // Step 4: 履修記録を取り消し済みにする
    const enrollmentResult = this.enrollmentRepository.findCurrent(studentId, courseCode);
    if (!enrollmentResult.success) {
      return enrollmentResult;
    }
    if (enrollmentResult.data) {
      const withdrawn = this.enrollmentRepository.save(withdraw(enrollmentResult.data, now));
      if (!withdrawn.success) {
        return withdrawn;
      }
    }

    // Step 5: イベント発行
    publishAndAudit(this.context, events, `Student ${studentId} unenrolled from ${courseCode}`);
    this.context.logger.info(`Student ${studentId} unenrolled from course ${courseCode}`);

    return Ok({ student: mapStudentToResponse(unenrolled.student), removedFromRoster });
  }
}
