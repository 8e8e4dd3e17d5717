import type { Result, StudentId, CourseCodeKey } from '../../../../shared/types/index';
import { Ok } from '../../../../shared/types/index';
import { fullName } from '../../domain/value-objects/name';
import { gradeFromMarks } from '../../domain/value-objects/grade';
import type { RecordsError } from '../../domain/errors/errors';
import { recordGrade } from '../../domain/entities/student';
import { recordMarks } from '../../domain/entities/enrollment';
import { createGradeRecordedEvent } from '../../domain/events/domain-events';
import type { IStudentRepository, IEnrollmentRepository } from '../ports/ports';
import { type HandlerContext, publishAndAudit, requireStudent } from './handler-context';
import {
  RecordGradeCommandSchema,
  type RecordGradeCommand,
  type RecordGradeResponse,
  mapStudentToResponse,
  parseStudentCourse,
  validateCommand
} from './dto';

/**
 * 成績記録コマンドハンドラー
 *
 * フロー:
 * 1. 入力検証（素点は有限の数値であること）
 * 2. 学生の存在確認
 * 3. 素点から評語を求め、学生に記録（履修していない科目は拒否）
 * 4. 対応する履修記録があれば素点を反映
 * 5. イベント発行
 */
export class RecordGradeCommandHandler {
  constructor(
    private readonly studentRepository: IStudentRepository,
    private readonly enrollmentRepository: IEnrollmentRepository,
    private readonly context: HandlerContext
  ) {}

  handle(command: RecordGradeCommand): Result<RecordGradeResponse, RecordsError> {
    // Step 1: 入力検証
    const validated = validateCommand(RecordGradeCommandSchema, command);
    if (!validated.success) {
      return validated;
    }
    const identifiers = parseStudentCourse(validated.data);
    if (!identifiers.success) {
      return identifiers;
    }
    const { studentId, courseCode } = identifiers.data;
    const { marks } = validated.data;

    // Step 2: 学生の存在確認
    const studentResult = requireStudent(this.studentRepository, studentId);
    if (!studentResult.success) {
      return studentResult;
    }

    // Step 3: 成績の記録
    const now = this.context.clock();
    const grade = gradeFromMarks(marks);
    const graded = recordGrade(studentResult.data, courseCode, grade, now);
    if (!graded.success) {
      this.context.logger.warn('Grade recording rejected', { studentId, courseCode, code: graded.error.code });
      return graded;
    }
    const saved = this.studentRepository.save(graded.data);
    if (!saved.success) {
      return saved;
    }

    // Step 4: 履修記録への反映
    const synced = this.syncEnrollmentRecord(studentId, courseCode, marks, now);
    if (!synced.success) {
      return synced;
    }

    // Step 5: イベント発行
    publishAndAudit(
      this.context,
      [createGradeRecordedEvent(studentId, courseCode, marks, grade, now)],
      `Grade ${grade} recorded for ${studentId} in ${courseCode}`
    );
    this.context.logger.info(
      `Grade recorded: ${fullName(graded.data.identity.name)} - ${courseCode}: ${marks.toFixed(2)} (${grade})`
    );

    return Ok({ student: mapStudentToResponse(graded.data), courseCode, marks, grade });
  }

  /**
   * 履修記録は素点0〜100のみ受け付ける。範囲外の素点は学生側にだけ記録する
   */
  private syncEnrollmentRecord(
    studentId: StudentId,
    courseCode: CourseCodeKey,
    marks: number,
    now: Date
  ): Result<void, RecordsError> {
    const current = this.enrollmentRepository.findCurrent(studentId, courseCode);
    if (!current.success) {
      return current;
    }
    if (!current.data) {
      return Ok(undefined);
    }

    const updated = recordMarks(current.data, marks, now);
    if (!updated.success) {
      this.context.logger.warn('Enrollment record left unchanged', {
        enrollmentId: current.data.id,
        code: updated.error.code
      });
      return Ok(undefined);
    }
    return this.enrollmentRepository.save(updated.data);
  }
}
