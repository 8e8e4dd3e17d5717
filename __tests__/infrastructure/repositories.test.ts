import { describe, test, expect, beforeEach } from 'vitest';
import {
  InMemoryStudentRepository,
  InMemoryEnrollmentRepository
} from '../../src/contexts/records/infrastructure/repositories/in-memory-repositories';
import { InMemoryEventPublisher } from '../../src/contexts/records/infrastructure/services/in-memory-event-publisher';
import { createEnrollment, withdraw } from '../../src/contexts/records/domain/entities/enrollment';
import { updateStudentDetails } from '../../src/contexts/records/domain/entities/student';
import {
  createStudentEnrolledEvent,
  createStudentStatusEvent
} from '../../src/contexts/records/domain/events/domain-events';
import { aStudent, unwrap, sid, key, NOW, fixedClock } from '../helpers/fixtures';

describe('InMemoryStudentRepository', () => {
  test('上書き保存しても一覧の順序は登録順のまま', () => {
    const repository = new InMemoryStudentRepository();
    const first = aStudent();
    repository.save(first);
    repository.save(aStudent({ id: 'S002', registrationNumber: 'REG002', email: 'sam@example.edu' }));

    repository.save(unwrap(updateStudentDetails(first, { currentSemester: 4 }, NOW)));

    const all = unwrap(repository.findAll());
    expect(all.map(student => student.identity.id)).toEqual(['S001', 'S002']);
    expect(all[0]?.currentSemester).toBe(4);
    expect(unwrap(repository.exists(sid('S002')))).toBe(true);
    expect(unwrap(repository.findById(sid('S404')))).toBeNull();
  });
});

describe('InMemoryEnrollmentRepository', () => {
  let repository: InMemoryEnrollmentRepository;

  const newEnrollment = (courseCode = 'CS101-A') =>
    unwrap(createEnrollment({ id: repository.nextId(), studentId: 'S001', courseCode }, NOW));

  beforeEach(() => {
    repository = new InMemoryEnrollmentRepository();
  });

  test('IDは ENR-0001 から連番', () => {
    expect(repository.nextId()).toBe('ENR-0001');
    expect(repository.nextId()).toBe('ENR-0002');
  });

  test('clear で連番も戻る', () => {
    repository.nextId();
    repository.clear();

    expect(repository.nextId()).toBe('ENR-0001');
  });

  test('findCurrent は取り消されていない最新の記録を返す', () => {
    const first = newEnrollment();
    repository.save(withdraw(first, NOW));
    const second = newEnrollment();
    repository.save(second);

    expect(unwrap(repository.findCurrent(sid('S001'), key('CS101-A')))?.id).toBe('ENR-0002');
    expect(unwrap(repository.findByStudent(sid('S001'))).map(record => record.status)).toEqual([
      'WITHDRAWN',
      'ENROLLED'
    ]);
  });

  test('取り消し済みしか無ければ null', () => {
    repository.save(withdraw(newEnrollment(), NOW));

    expect(unwrap(repository.findCurrent(sid('S001'), key('CS101-A')))).toBeNull();
  });
});

describe('InMemoryEventPublisher', () => {
  test('発行したイベントをバッチ単位で保持する', () => {
    const publisher = new InMemoryEventPublisher(fixedClock);
    publisher.publish([createStudentEnrolledEvent(sid('S001'), key('CS101-A'), 3, NOW)]);
    publisher.publish([
      createStudentStatusEvent(sid('S001'), false, NOW),
      createStudentStatusEvent(sid('S002'), false, NOW)
    ]);

    expect(publisher.getPublishedEvents()).toHaveLength(2);
    expect(publisher.getLastEventBatch()?.publishedAt).toEqual(NOW);
    expect(publisher.getEventsByType('StudentDeactivated').map(event => event.studentId)).toEqual(['S001', 'S002']);
    expect(publisher.getAllEvents()).toHaveLength(3);
  });

  test('返した配列を変更しても内部状態は変わらない', () => {
    const publisher = new InMemoryEventPublisher(fixedClock);
    publisher.publish([createStudentStatusEvent(sid('S001'), true, NOW)]);

    publisher.getPublishedEvents().pop();

    expect(publisher.getPublishedEvents()).toHaveLength(1);
    publisher.clear();
    expect(publisher.getLastEventBatch()).toBeNull();
  });
});
