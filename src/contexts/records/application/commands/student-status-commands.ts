import type { Result } from '../../../../shared/types/index';
import { Ok } from '../../../../shared/types/index';
import type { RecordsError } from '../../domain/errors/errors';
import { activateStudent, deactivateStudent } from '../../domain/entities/student';
import { createStudentStatusEvent, type RecordsDomainEvent } from '../../domain/events/domain-events';
import type { IStudentRepository } from '../ports/ports';
import { type HandlerContext, publishAndAudit } from './handler-context';
import {
  ChangeStudentStatusCommandSchema,
  BulkUpdateStudentStatusCommandSchema,
  type ChangeStudentStatusCommand,
  type BulkUpdateStudentStatusCommand,
  parseStudentId,
  validateCommand
} from './dto';

/**
 * 学生の在籍状態変更コマンドハンドラー
 *
 * 学生がいなければ何もせず false を返す
 */
export class ChangeStudentStatusCommandHandler {
  constructor(
    private readonly studentRepository: IStudentRepository,
    private readonly context: HandlerContext
  ) {}

  handle(command: ChangeStudentStatusCommand): Result<boolean, RecordsError> {
    const validated = validateCommand(ChangeStudentStatusCommandSchema, command);
    if (!validated.success) {
      return validated;
    }
    const studentId = parseStudentId(validated.data.studentId);
    if (!studentId.success) {
      return studentId;
    }

    const found = this.studentRepository.findById(studentId.data);
    if (!found.success) {
      return found;
    }
    if (!found.data) {
      this.context.logger.warn('Student status change skipped: student not found', { studentId: studentId.data });
      return Ok(false);
    }

    const now = this.context.clock();
    const { active } = validated.data;
    const student = active ? activateStudent(found.data, now) : deactivateStudent(found.data, now);
    const saved = this.studentRepository.save(student);
    if (!saved.success) {
      return saved;
    }

    publishAndAudit(
      this.context,
      [createStudentStatusEvent(studentId.data, active, now)],
      `Student ${studentId.data} ${active ? 'activated' : 'deactivated'}`
    );
    return Ok(true);
  }
}

/**
 * 学科単位の一括在籍状態変更（学科名は大文字小文字を区別しない）
 *
 * 変更した学生数を返す
 */
export class BulkUpdateStudentStatusCommandHandler {
  constructor(
    private readonly studentRepository: IStudentRepository,
    private readonly context: HandlerContext
  ) {}

  handle(command: BulkUpdateStudentStatusCommand): Result<number, RecordsError> {
    const validated = validateCommand(BulkUpdateStudentStatusCommandSchema, command);
    if (!validated.success) {
      return validated;
    }
    const { department, active } = validated.data;

    const all = this.studentRepository.findAll();
    if (!all.success) {
      return all;
    }

    const now = this.context.clock();
    const message = active ? 'Bulk activated' : 'Bulk deactivated';
    const targets = all.data.filter(student => student.department.toLowerCase() === department.toLowerCase());
    const events: RecordsDomainEvent[] = [];

    for (const target of targets) {
      const student = active ? activateStudent(target, now, message) : deactivateStudent(target, now, message);
      const saved = this.studentRepository.save(student);
      if (!saved.success) {
        return saved;
      }
      events.push(createStudentStatusEvent(student.identity.id, active, now));
    }

    publishAndAudit(this.context, events, `${message} ${targets.length} students in ${department}`);
    this.context.logger.info(`${message} ${targets.length} students`, { department });
    return Ok(targets.length);
  }
}
