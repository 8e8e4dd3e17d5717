import { z } from 'zod';
import type { Result } from '../../../../shared/types/index';
import { Err, parseWith } from '../../../../shared/types/index';

/**
 * 学務記録ドメインのエラー定義
 *
 * 例外ではなくResult型の値としてエラーを返す。
 * どのエラーも呼び出し元に同期的に返り、呼び出し元が再入力などで回復できる。
 */

// === 基底エラースキーマ ===
export const DomainErrorBaseSchema = z.object({
  type: z.string(),
  message: z.string(),
  code: z.string(),
  timestamp: z.date().default(() => new Date()),
  details: z.record(z.unknown()).optional()
});

// === 検証エラー（入力値・不変条件違反） ===
export const ValidationErrorSchema = DomainErrorBaseSchema.extend({
  type: z.literal('ValidationError'),
  field: z.string().optional(),
  value: z.unknown().optional()
});

// === ビジネスルールエラー（状態遷移の違反など） ===
export const BusinessRuleErrorSchema = DomainErrorBaseSchema.extend({
  type: z.literal('BusinessRuleError'),
  rule: z.string(),
  context: z.record(z.unknown()).optional()
});

// === 存在しないエンティティエラー ===
export const NotFoundErrorSchema = DomainErrorBaseSchema.extend({
  type: z.literal('NotFoundError'),
  entity: z.string(),
  id: z.string()
});

// === 登録済みエンティティエラー ===
export const AlreadyExistsErrorSchema = DomainErrorBaseSchema.extend({
  type: z.literal('AlreadyExistsError'),
  entity: z.string(),
  id: z.string()
});

// === 重複履修エラー ===
export const DuplicateEnrollmentErrorSchema = DomainErrorBaseSchema.extend({
  type: z.literal('DuplicateEnrollmentError'),
  studentId: z.string(),
  courseCode: z.string()
});

// === 単位上限超過エラー ===
export const CreditLimitExceededErrorSchema = DomainErrorBaseSchema.extend({
  type: z.literal('CreditLimitExceededError'),
  studentId: z.string(),
  currentCredits: z.number().int(),
  maxCredits: z.number().int(),
  attemptedCredits: z.number().int(),
  excessCredits: z.number().int(),
  availableCredits: z.number().int().nonnegative(),
  suggestedAction: z.string()
});

// === 定員超過エラー ===
export const CapacityExceededErrorSchema = DomainErrorBaseSchema.extend({
  type: z.literal('CapacityExceededError'),
  courseCode: z.string(),
  maxCapacity: z.number().int(),
  currentEnrollment: z.number().int()
});

// === 統合エラー型（Discriminated Union） ===
export const RecordsErrorSchema = z.discriminatedUnion('type', [
  ValidationErrorSchema,
  BusinessRuleErrorSchema,
  NotFoundErrorSchema,
  AlreadyExistsErrorSchema,
  DuplicateEnrollmentErrorSchema,
  CreditLimitExceededErrorSchema,
  CapacityExceededErrorSchema
]);

export type ValidationError = z.infer<typeof ValidationErrorSchema>;
export type BusinessRuleError = z.infer<typeof BusinessRuleErrorSchema>;
export type NotFoundError = z.infer<typeof NotFoundErrorSchema>;
export type AlreadyExistsError = z.infer<typeof AlreadyExistsErrorSchema>;
export type DuplicateEnrollmentError = z.infer<typeof DuplicateEnrollmentErrorSchema>;
export type CreditLimitExceededError = z.infer<typeof CreditLimitExceededErrorSchema>;
export type CapacityExceededError = z.infer<typeof CapacityExceededErrorSchema>;
export type RecordsError = z.infer<typeof RecordsErrorSchema>;

export type RecordsEntity = 'Student' | 'Course' | 'Instructor' | 'Enrollment';

// === エラーファクトリ関数 ===
export const createValidationError = (
  message: string,
  code: string = 'VALIDATION_FAILED',
  field?: string,
  value?: unknown
): ValidationError => ({
  type: 'ValidationError',
  message,
  code,
  timestamp: new Date(),
  field,
  value
});

export const createBusinessRuleError = (
  rule: string,
  message: string,
  code: string,
  context?: Record<string, unknown>
): BusinessRuleError => ({
  type: 'BusinessRuleError',
  message,
  code,
  rule,
  context,
  timestamp: new Date()
});

export const createNotFoundError = (
  entity: RecordsEntity,
  id: string
): NotFoundError => ({
  type: 'NotFoundError',
  message: `${entity} not found: ${id}`,
  code: `${entity.toUpperCase()}_NOT_FOUND`,
  entity,
  id,
  timestamp: new Date()
});

export const createAlreadyExistsError = (
  entity: RecordsEntity,
  id: string
): AlreadyExistsError => ({
  type: 'AlreadyExistsError',
  message: `${entity} with ID ${id} already exists`,
  code: `${entity.toUpperCase()}_ALREADY_EXISTS`,
  entity,
  id,
  timestamp: new Date()
});

export const createDuplicateEnrollmentError = (
  studentId: string,
  courseCode: string,
  reason: string = 'Student is already enrolled in this course'
): DuplicateEnrollmentError => ({
  type: 'DuplicateEnrollmentError',
  message: `Duplicate enrollment for student ${studentId} in course ${courseCode}: ${reason}`,
  code: 'DUPLICATE_ENROLLMENT',
  studentId,
  courseCode,
  timestamp: new Date()
});

/**
 * 単位上限の超過量と残り枠を算出してエラーを組み立てる
 */
export const createCreditLimitExceededError = (
  studentId: string,
  currentCredits: number,
  maxCredits: number,
  attemptedCredits: number
): CreditLimitExceededError => {
  const excessCredits = currentCredits + attemptedCredits - maxCredits;
  const availableCredits = Math.max(0, maxCredits - currentCredits);
  const suggestedAction = availableCredits > 0
    ? `You can enroll in up to ${availableCredits} more credits this semester.`
    : 'You are already at your maximum credit limit. Consider dropping a course before enrolling in new ones.';

  return {
    type: 'CreditLimitExceededError',
    message: `Credit limit exceeded for student ${studentId}: Current=${currentCredits}, Max=${maxCredits}, Attempted=${attemptedCredits}, Total would be=${currentCredits + attemptedCredits}`,
    code: 'CREDIT_LIMIT_EXCEEDED',
    studentId,
    currentCredits,
    maxCredits,
    attemptedCredits,
    excessCredits,
    availableCredits,
    suggestedAction,
    timestamp: new Date()
  };
};

export const createCapacityExceededError = (
  courseCode: string,
  maxCapacity: number,
  currentEnrollment: number
): CapacityExceededError => ({
  type: 'CapacityExceededError',
  message: `Course capacity exceeded: ${courseCode} (${currentEnrollment}/${maxCapacity})`,
  code: 'COURSE_CAPACITY_EXCEEDED',
  courseCode,
  maxCapacity,
  currentEnrollment,
  timestamp: new Date()
});

// === エラー分析ヘルパー ===
export const isValidationError = (error: RecordsError): error is ValidationError =>
  error.type === 'ValidationError';

export const isBusinessRuleError = (error: RecordsError): error is BusinessRuleError =>
  error.type === 'BusinessRuleError';

export const isNotFoundError = (error: RecordsError): error is NotFoundError =>
  error.type === 'NotFoundError';

export const isAlreadyExistsError = (error: RecordsError): error is AlreadyExistsError =>
  error.type === 'AlreadyExistsError';

export const isDuplicateEnrollmentError = (error: RecordsError): error is DuplicateEnrollmentError =>
  error.type === 'DuplicateEnrollmentError';

export const isCreditLimitExceededError = (error: RecordsError): error is CreditLimitExceededError =>
  error.type === 'CreditLimitExceededError';

export const isCapacityExceededError = (error: RecordsError): error is CapacityExceededError =>
  error.type === 'CapacityExceededError';

/**
 * 単位上限超過の説明レポート（利用者向け）
 */
export const formatCreditLimitReport = (error: CreditLimitExceededError): string => {
  const rule = '-'.repeat(30);
  return [
    'Credit Limit Violation Report',
    rule,
    `Student ID: ${error.studentId}`,
    `Current Credits: ${error.currentCredits}`,
    `Maximum Allowed: ${error.maxCredits}`,
    `Attempted to Add: ${error.attemptedCredits}`,
    `Would Total: ${error.currentCredits + error.attemptedCredits}`,
    `Excess Credits: ${error.excessCredits}`,
    `Available Credits: ${error.availableCredits}`,
    rule,
    `Suggested Action: ${error.suggestedAction}`,
    ''
  ].join('\n');
};

/**
 * ZodErrorの最初の問題を検証エラーに変換
 */
export const fromZodError = (zodError: z.ZodError, code: string = 'VALIDATION_FAILED'): ValidationError => {
  const issue = zodError.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join('.') : undefined;
  return {
    ...createValidationError(issue ? issue.message : 'Invalid input', code, field),
    details: { issues: zodError.issues }
  };
};

/**
 * Zodスキーマで検証し、失敗を検証エラーとして返す
 */
export const parseWithSchema = <T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  code: string = 'VALIDATION_FAILED'
): Result<T, RecordsError> =>
  parseWith(schema, data, (zodError): RecordsError => fromZodError(zodError, code));

// === Result型用のエラーファクトリ関数 ===

export const validationFailure = <T>(
  message: string,
  code: string = 'VALIDATION_FAILED',
  field?: string,
  value?: unknown
): Result<T, RecordsError> => Err(createValidationError(message, code, field, value));

export const businessRuleFailure = <T>(
  rule: string,
  message: string,
  code: string,
  context?: Record<string, unknown>
): Result<T, RecordsError> => Err(createBusinessRuleError(rule, message, code, context));

export const notFoundFailure = <T>(
  entity: RecordsEntity,
  id: string
): Result<T, RecordsError> => Err(createNotFoundError(entity, id));

export const alreadyExistsFailure = <T>(
  entity: RecordsEntity,
  id: string
): Result<T, RecordsError> => Err(createAlreadyExistsError(entity, id));

export const duplicateEnrollmentFailure = <T>(
  studentId: string,
  courseCode: string
): Result<T, RecordsError> => Err(createDuplicateEnrollmentError(studentId, courseCode));

export const creditLimitFailure = <T>(
  studentId: string,
  currentCredits: number,
  maxCredits: number,
  attemptedCredits: number
): Result<T, RecordsError> =>
  Err(createCreditLimitExceededError(studentId, currentCredits, maxCredits, attemptedCredits));

export const capacityExceededFailure = <T>(
  courseCode: string,
  maxCapacity: number,
  currentEnrollment: number
): Result<T, RecordsError> => Err(createCapacityExceededError(courseCode, maxCapacity, currentEnrollment));
