/**
 * 共有型の再エクスポート
 */

// === Result型とその基本操作 ===
export {
  type Result,
  Ok,
  Err,
  map,
  flatMap,
  mapError,
  match,
  parseWith,
  fromAsync
} from './result';

// === パイプライン処理 ===
export {
  type ResultPipe,
  resultPipe
} from './pipeline';

// === ドメイン固有のブランド型 ===
export {
  type StudentId,
  type InstructorId,
  type EnrollmentId,
  type CourseCodeKey,
  StudentIdSchema,
  InstructorIdSchema,
  EnrollmentIdSchema,
  CourseCodeKeySchema
} from './brand-types';
