/**
 * Application Layer Index - CQRS パターンのエクスポート
 *
 * 状態変更は Command Handler、読み取りは Query サービスから行う
 */

// === Command Side (状態変更) ===
export * from './commands/index';

// === Query Side (読み取り専用) ===
export * from './queries/index';

// === Ports (依存性逆転) ===
export type {
  IStudentRepository,
  ICourseRepository,
  IInstructorRepository,
  IEnrollmentRepository,
  IEventPublisher
} from './ports/ports';
