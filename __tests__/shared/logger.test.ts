import { describe, test, expect, vi, afterEach } from 'vitest';
import {
  ConsoleLogger,
  MemoryLogger,
  createLogger,
  isLevelEnabled,
  silentLogger
} from '../../src/shared/logging/logger';

describe('ロガー', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('閾値以上のレベルだけが有効になる', () => {
    expect(isLevelEnabled('warn', 'error')).toBe(true);
    expect(isLevelEnabled('warn', 'warn')).toBe(true);
    expect(isLevelEnabled('warn', 'info')).toBe(false);
    expect(isLevelEnabled('silent', 'error')).toBe(false);
  });

  test('ConsoleLogger はスコープとレベルを前置し、空のコンテキストは渡さない', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const logger = new ConsoleLogger('info', 'test');

    logger.info('Student registered', { studentId: 'S001' });
    logger.info('No context', {});
    logger.debug('hidden');

    expect(info).toHaveBeenNthCalledWith(1, '[test] INFO Student registered', { studentId: 'S001' });
    expect(info).toHaveBeenNthCalledWith(2, '[test] INFO No context');
    expect(debug).not.toHaveBeenCalled();
  });

  test('MemoryLogger はレベル別に記録を取り出せる', () => {
    const logger = new MemoryLogger('info');

    logger.debug('ignored');
    logger.info('first');
    logger.warn('second', { row: 3 });

    expect(logger.getMessages()).toEqual(['first', 'second']);
    expect(logger.getEntries('warn')).toEqual([{ level: 'warn', message: 'second', context: { row: 3 } }]);

    logger.clear();
    expect(logger.getEntries()).toEqual([]);
  });

  test('silent レベルでは何も出力しないロガーを返す', () => {
    expect(createLogger('silent')).toBe(silentLogger);
    expect(createLogger('debug')).toBeInstanceOf(ConsoleLogger);
  });
});
