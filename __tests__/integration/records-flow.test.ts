import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createRecordsApplication, type RecordsApplication } from '../../src/contexts/records/records-application';
import { MINIMAL_CONFIG, type RecordsConfig } from '../../src/shared/config/index';
import { MemoryLogger } from '../../src/shared/logging/logger';
import { InMemoryEventPublisher } from '../../src/contexts/records/infrastructure/services/in-memory-event-publisher';
import {
  studentDraft,
  courseDraft,
  instructorDraft,
  unwrap,
  expectError,
  fixedClock
} from '../helpers/fixtures';

const configFor = (workDir: string): RecordsConfig => ({
  ...MINIMAL_CONFIG,
  directories: {
    dataDir: workDir,
    backupDir: join(workDir, 'backups'),
    exportDir: join(workDir, 'exports'),
    importDir: join(workDir, 'imports')
  },
  businessRules: {
    ...MINIMAL_CONFIG.businessRules,
    enrollment: { ...MINIMAL_CONFIG.businessRules.enrollment, defaultCourseCapacity: 25 }
  }
});

describe('学務記録の一連の流れ', () => {
  let workDir: string;
  let app: RecordsApplication;
  let logger: MemoryLogger;
  let eventPublisher: InMemoryEventPublisher;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'records-flow-'));
    logger = new MemoryLogger();
    eventPublisher = new InMemoryEventPublisher(fixedClock);
    app = createRecordsApplication(configFor(workDir), { logger, eventPublisher, clock: fixedClock });

    unwrap(app.registerStudent(studentDraft()));
    unwrap(app.registerInstructor(instructorDraft()));
    unwrap(app.registerCourse(courseDraft('CS101-A', { credits: 4 })));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  test('定員を省略した科目は設定の既定定員になる', () => {
    expect(unwrap(app.queries.courses.findByCode('cs101-a'))?.maxCapacity).toBe(25);
  });

  test('割り当て → 履修 → 成績 → 履歴まで反映される', () => {
    expect(unwrap(app.commands.assignInstructor.handle({ courseCode: 'CS101-A', instructorId: 'I001' }))).toBe(true);
    const enrolled = unwrap(app.commands.enrollInCourse.handle({ studentId: 'S001', courseCode: 'CS101-A' }));
    unwrap(app.commands.recordGrade.handle({ studentId: 'S001', courseCode: 'CS101-A', marks: 92 }));

    expect(enrolled.totalCredits).toBe(4);
    expect(unwrap(app.queries.reports.enrollmentHistory('S001'))).toMatchObject([
      { id: 'ENR-0001', courseCode: 'CS101-A', status: 'COMPLETED', marks: 92, grade: 'S' }
    ]);
    expect(unwrap(app.queries.reports.creditWeightedGpa('S001'))).toBe(10);
    expect(unwrap(app.queries.students.findById('S001'))?.gpa).toBe(10);
    expect(eventPublisher.getAllEvents().map(event => event.eventType)).toEqual([
      'StudentRegistered',
      'InstructorRegistered',
      'CourseRegistered',
      'InstructorAssigned',
      'StudentEnrolled',
      'CourseRosterChanged',
      'GradeRecorded'
    ]);
  });

  test('監査ログが無効な設定では AUDIT 行を出さない', () => {
    expect(logger.getMessages('info').filter(message => message.startsWith('AUDIT'))).toEqual([]);
  });

  test('CSV取り込みでは登録済みのIDを rejected に入れる', () => {
    const summary = app.importStudentsCsv([
      'student_id,reg_no,first_name,last_name,email,department,semester',
      'S001,REG900,Jane,Doe,jane@example.edu,Computer Science,1',
      'S002,REG002,Sam,Park,sam@example.edu,Mathematics,2',
      'S003,REG003'
    ].join('\n'));

    expect(summary).toEqual({
      imported: 1,
      skipped: [{ row: 4, reason: 'Insufficient fields' }],
      rejected: [{ id: 'S001', reason: 'Student with ID S001 already exists' }]
    });
    expect(unwrap(app.queries.students.totals())).toEqual({ total: 2, active: 2, inactive: 0 });
  });

  test('取り込みディレクトリの科目ファイルを登録する', async () => {
    await mkdir(join(workDir, 'imports'), { recursive: true });
    await writeFile(
      join(workDir, 'imports', 'courses.csv'),
      'course_code,title,credits,department,semester,instructor_id,max_capacity\n' +
      'MA201-B,Linear Algebra,4,Mathematics,SPRING,I001,\n'
    );

    const summary = unwrap(await app.importCoursesFromFile('courses.csv'));

    expect(summary.imported).toBe(1);
    expect(unwrap(app.queries.courses.findByCode('MA201-B'))?.maxCapacity).toBe(25);
  });

  test('存在しないファイルの取り込みは IO_ERROR', async () => {
    const error = expectError(await app.importStudentsFromFile('nothing.csv'));

    expect(error.code).toBe('IO_ERROR');
  });

  test('スナップショットを書き出し、メモリ上の記録は変えない', async () => {
    const exportDir = unwrap(await app.exportSnapshot());

    expect(exportDir).toBe(join(workDir, 'exports', 'export_2024-09-01'));
    expect(unwrap(app.exportCoursesCsv()).split('\n')[1]).toBe(
      'CS101-A,Intro to Programming,4,Computer Science,FALL,,25,0,ACTIVE'
    );
    expect(unwrap(app.snapshot()).students).toHaveLength(1);
  });
});
