import type { Result, StudentId, CourseCodeKey } from '../../../../shared/types/index';
import { Ok } from '../../../../shared/types/index';
import { fullName } from '../../domain/value-objects/name';
import type { RecordsError } from '../../domain/errors/errors';
import { type Student, enrollInCourse } from '../../domain/entities/student';
import { type Course, enrollStudent, courseKeyOf, currentEnrollment } from '../../domain/entities/course';
import { type Enrollment, createEnrollment } from '../../domain/entities/enrollment';
import { checkEnrollmentEligibility, type CreditStanding } from '../../domain/services/enrollment-policy';
import {
  createStudentEnrolledEvent,
  createCourseRosterChangedEvent,
  type RecordsDomainEvent
} from '../../domain/events/domain-events';
import type {
  IStudentRepository,
  ICourseRepository,
  IEnrollmentRepository
} from '../ports/ports';
import {
  type HandlerContext,
  publishAndAudit,
  requireStudent,
  requireCourse
} from './handler-context';
import {
  EnrollStudentCommandSchema,
  EnrollInCourseCommandSchema,
  type EnrollStudentCommand,
  type EnrollInCourseCommand,
  type EnrollStudentResponse,
  type EnrollInCourseResponse,
  mapStudentToResponse,
  mapCourseToResponse,
  mapEnrollmentToResponse,
  parseStudentCourse,
  validateCommand
} from './dto';

interface StudentSideEnrollment {
  readonly student: Student;
  readonly enrollment: Enrollment;
  readonly standing: CreditStanding;
}

/**
 * 学生側の履修処理（検証 → 履修集合への追加 → 履修記録の作成）
 *
 * 保存はしない。呼び出し側が科目側の処理と合わせて保存する
 */
const enrollOnStudentSide = (
  student: Student,
  courseCode: CourseCodeKey,
  attemptedCredits: number,
  enrollmentRepository: IEnrollmentRepository,
  context: HandlerContext
): Result<StudentSideEnrollment, RecordsError> => {
  const eligibility = checkEnrollmentEligibility(student, courseCode, attemptedCredits, context.rules.enrollment);
  if (!eligibility.success) {
    context.logger.warn('Enrollment rejected', {
      studentId: student.identity.id,
      courseCode,
      code: eligibility.error.code
    });
    return eligibility;
  }

  const now = context.clock();
  const enrollment = createEnrollment(
    { id: enrollmentRepository.nextId(), studentId: student.identity.id, courseCode },
    now
  );
  if (!enrollment.success) {
    return enrollment;
  }

  return Ok({
    student: enrollInCourse(student, courseCode, now).student,
    enrollment: enrollment.data,
    standing: eligibility.data
  });
};

/**
 * 履修登録コマンドハンドラー（学生側のみ）
 *
 * フロー:
 * 1. 入力検証
 * 2. 学生の存在確認
 * 3. 重複履修・単位上限の確認
 * 4. 学生と履修記録の保存
 * 5. イベント発行
 *
 * 科目の名簿は変更しない。名簿も合わせて更新するときは EnrollInCourseCommandHandler を使う
 */
export class EnrollStudentCommandHandler {
  constructor(
    private readonly studentRepository: IStudentRepository,
    private readonly enrollmentRepository: IEnrollmentRepository,
    private readonly context: HandlerContext
  ) {}

  handle(command: EnrollStudentCommand): Result<EnrollStudentResponse, RecordsError> {
    // Step 1: 入力検証
    const validated = validateCommand(EnrollStudentCommandSchema, command);
    if (!validated.success) {
      return validated;
    }
    const identifiers = parseStudentCourse(validated.data);
    if (!identifiers.success) {
      return identifiers;
    }
    const { studentId, courseCode } = identifiers.data;

    // Step 2: 学生の存在確認
    const studentResult = requireStudent(this.studentRepository, studentId);
    if (!studentResult.success) {
      return studentResult;
    }

    // Step 3: 重複履修・単位上限の確認
    const attemptedCredits = validated.data.courseCredits ?? this.context.rules.enrollment.creditsPerCourse;
    const enrolled = enrollOnStudentSide(
      studentResult.data,
      courseCode,
      attemptedCredits,
      this.enrollmentRepository,
      this.context
    );
    if (!enrolled.success) {
      return enrolled;
    }

    // Step 4: 永続化
    const saved = saveStudentSide(this.studentRepository, this.enrollmentRepository, enrolled.data);
    if (!saved.success) {
      return saved;
    }

    // Step 5: イベント発行
    const totalCredits = enrolled.data.standing.currentCredits + attemptedCredits;
    publishAndAudit(
      this.context,
      [createStudentEnrolledEvent(studentId, courseCode, totalCredits, this.context.clock())],
      `Student ${studentId} enrolled in ${courseCode}`
    );
    this.context.logger.info(
      `Student ${fullName(enrolled.data.student.identity.name)} enrolled in course ${courseCode}`
    );

    return Ok({
      student: mapStudentToResponse(enrolled.data.student),
      enrollment: mapEnrollmentToResponse(enrolled.data.enrollment),
      totalCredits
    });
  }
}

/**
 * 学生側と科目側をまとめて行う履修登録コマンドハンドラー
 *
 * 科目側で定員超過になった場合は学生側の変更も保存しない
 */
export class EnrollInCourseCommandHandler {
  constructor(
    private readonly studentRepository: IStudentRepository,
    private readonly courseRepository: ICourseRepository,
    private readonly enrollmentRepository: IEnrollmentRepository,
    private readonly context: HandlerContext
  ) {}

  handle(command: EnrollInCourseCommand): Result<EnrollInCourseResponse, RecordsError> {
    // Step 1: 入力検証
    const validated = validateCommand(EnrollInCourseCommandSchema, command);
    if (!validated.success) {
      return validated;
    }
    const identifiers = parseStudentCourse(validated.data);
    if (!identifiers.success) {
      return identifiers;
    }
    const { studentId, courseCode } = identifiers.data;

    // Step 2: 学生・科目の存在確認
    const studentResult = requireStudent(this.studentRepository, studentId);
    if (!studentResult.success) {
      return studentResult;
    }
    const courseResult = requireCourse(this.courseRepository, courseCode);
    if (!courseResult.success) {
      return courseResult;
    }

    // Step 3: 学生側の検証（科目の実単位数で上限を確認）
    const enrolled = enrollOnStudentSide(
      studentResult.data,
      courseCode,
      courseResult.data.credits,
      this.enrollmentRepository,
      this.context
    );
    if (!enrolled.success) {
      return enrolled;
    }

    // Step 4: 科目側の定員確認（失敗時は何も保存しない）
    const rostered = enrollStudent(courseResult.data, studentId);
    if (!rostered.success) {
      this.context.logger.warn('Enrollment rejected', { studentId, courseCode, code: rostered.error.code });
      return rostered;
    }

    // Step 5: 両側を保存
    const saved = saveStudentSide(this.studentRepository, this.enrollmentRepository, enrolled.data);
    if (!saved.success) {
      return saved;
    }
    const courseSaved = this.courseRepository.save(rostered.data.course);
    if (!courseSaved.success) {
      return courseSaved;
    }

    // Step 6: イベント発行
    const totalCredits = enrolled.data.standing.currentCredits + courseResult.data.credits;
    publishAndAudit(
      this.context,
      enrollmentEvents(studentId, rostered.data.course, rostered.data.added, totalCredits, this.context.clock()),
      `Student ${studentId} enrolled in ${courseCode}`
    );
    this.context.logger.info(
      `Student ${fullName(enrolled.data.student.identity.name)} enrolled in course ${courseCode}`
    );

    return Ok({
      student: mapStudentToResponse(enrolled.data.student),
      enrollment: mapEnrollmentToResponse(enrolled.data.enrollment),
      course: mapCourseToResponse(rostered.data.course),
      totalCredits
    });
  }
}

// === プライベートヘルパー ===

const saveStudentSide = (
  studentRepository: IStudentRepository,
  enrollmentRepository: IEnrollmentRepository,
  enrolled: StudentSideEnrollment
): Result<void, RecordsError> => {
  const studentSaved = studentRepository.save(enrolled.student);
  if (!studentSaved.success) {
    return studentSaved;
  }
  return enrollmentRepository.save(enrolled.enrollment);
};

const enrollmentEvents = (
  studentId: StudentId,
  course: Course,
  addedToRoster: boolean,
  totalCredits: number,
  now: Date
): RecordsDomainEvent[] => {
  const courseCode = courseKeyOf(course);
  const events: RecordsDomainEvent[] = [createStudentEnrolledEvent(studentId, courseCode, totalCredits, now)];
  if (addedToRoster) {
    events.push(createCourseRosterChangedEvent(courseCode, studentId, 'ADDED', currentEnrollment(course), now));
  }
  return events;
};
