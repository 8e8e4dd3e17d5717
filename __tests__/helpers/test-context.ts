import { MINIMAL_CONFIG } from '../../src/shared/config/index';
import { MemoryLogger } from '../../src/shared/logging/logger';
import type { HandlerContext } from '../../src/contexts/records/application/commands/handler-context';
import {
  InMemoryStudentRepository,
  InMemoryCourseRepository,
  InMemoryInstructorRepository,
  InMemoryEnrollmentRepository
} from '../../src/contexts/records/infrastructure/repositories/in-memory-repositories';
import { InMemoryEventPublisher } from '../../src/contexts/records/infrastructure/services/in-memory-event-publisher';
import { fixedClock } from './fixtures';

/**
 * ハンドラーテスト用の実行環境（インメモリ実装 + 固定時計）
 */
export const createTestEnvironment = () => {
  const logger = new MemoryLogger();
  const eventPublisher = new InMemoryEventPublisher(fixedClock);
  const context: HandlerContext = {
    rules: MINIMAL_CONFIG.businessRules,
    logger,
    eventPublisher,
    auditLog: true,
    clock: fixedClock
  };

  return {
    context,
    logger,
    eventPublisher,
    studentRepository: new InMemoryStudentRepository(),
    courseRepository: new InMemoryCourseRepository(),
    instructorRepository: new InMemoryInstructorRepository(),
    enrollmentRepository: new InMemoryEnrollmentRepository()
  };
};

export type TestEnvironment = ReturnType<typeof createTestEnvironment>;
