import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  RecordsFileExchange,
  exportSummary
} from '../../src/contexts/records/infrastructure/adapters/csv/records-file-exchange';
import { formatStudentsCsv } from '../../src/contexts/records/infrastructure/adapters/csv/records-csv';
import { MemoryLogger } from '../../src/shared/logging/logger';
import { aStudent, aCourse, unwrap, expectError, fixedClock, NOW } from '../helpers/fixtures';

describe('RecordsFileExchange', () => {
  let workDir: string;
  let logger: MemoryLogger;
  let exchange: RecordsFileExchange;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'records-'));
    logger = new MemoryLogger();
    exchange = new RecordsFileExchange({
      directories: {
        dataDir: workDir,
        backupDir: join(workDir, 'backups'),
        exportDir: join(workDir, 'exports'),
        importDir: join(workDir, 'imports')
      },
      logger,
      clock: fixedClock,
      defaultCapacity: 40
    });
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  test('スナップショットは日付付きディレクトリに3ファイルを書き出す', async () => {
    const exportDir = unwrap(await exchange.exportSnapshot([aStudent()], [aCourse()]));

    expect(exportDir).toBe(join(workDir, 'exports', 'export_2024-09-01'));
    expect(await readFile(join(exportDir, 'students.csv'), 'utf8')).toBe(formatStudentsCsv([aStudent()]));
    expect(await readFile(join(exportDir, 'export_summary.txt'), 'utf8')).toBe(exportSummary(NOW, 1, 1));
    expect(logger.getMessages('info')).toContain('System data export completed');
  });

  test('取り込みディレクトリのファイルを読み込む', async () => {
    await mkdir(join(workDir, 'imports'), { recursive: true });
    await writeFile(
      join(workDir, 'imports', 'courses.csv'),
      'course_code,title,credits,department,semester,instructor_id,max_capacity\nCS200-A,Databases,3,Computer Science,FALL,I001,\n'
    );

    const result = unwrap(await exchange.importCourses(exchange.resolveImportPath('courses.csv')));

    expect(result.records.map(course => course.maxCapacity)).toEqual([40]);
    expect(result.skipped).toEqual([]);
  });

  test('読めないファイルは IO_ERROR を返しエラーログを出す', async () => {
    const missing = join(workDir, 'missing.csv');

    const error = expectError(await exchange.importStudents(missing));

    expect(error.type).toBe('ValidationError');
    expect(error.code).toBe('IO_ERROR');
    expect(error.message.startsWith(`Failed to read ${missing}: `)).toBe(true);
    expect(logger.getMessages('error')).toEqual([`Error reading file: ${missing}`]);
  });
});

describe('exportSummary', () => {
  test('日付・時刻・件数・作成ファイルを並べる', () => {
    expect(exportSummary(NOW, 3, 2).split('\n')).toEqual([
      'Records Export Summary',
      '======================',
      'Export Date: 2024-09-01',
      'Export Time: 10:15:00',
      '',
      'Exported Data:',
      '- Students: 3',
      '- Courses: 2',
      '',
      'Files Created:',
      '- students.csv',
      '- courses.csv',
      '- export_summary.txt (this file)',
      ''
    ]);
  });
});
