import { z } from 'zod';
import type { Result } from '../../../../shared/types/index';
import { Ok } from '../../../../shared/types/index';
import { NameSchema, type Name } from '../value-objects/name';
import { validationFailure, type RecordsError } from '../errors/errors';
import { calendarYearsBetween } from '../services/formatting';

/**
 * 人物の共通識別情報
 *
 * 学生と教員はそれぞれこのレコードを identity として埋め込む。
 * 種別ごとの振る舞いは people.ts の記述子で提供する
 */

export const EmailSchema = z.string()
  .trim()
  .min(1, 'Email is required')
  .refine(value => value.includes('@'), 'Valid email required');

export const DepartmentSchema = z.string().trim().min(1, 'Department cannot be empty');

/**
 * 識別子スキーマを差し替えて identity スキーマを組み立てる
 */
export const personIdentitySchema = <Id extends z.ZodTypeAny>(idSchema: Id) => z.object({
  id: idSchema,
  name: NameSchema,
  email: EmailSchema,
  dateOfBirth: z.date(),
  registrationDate: z.date(),
  active: z.boolean()
});

export interface PersonIdentity<Id extends string = string> {
  readonly id: Id;
  readonly name: Name;
  readonly email: string;
  readonly dateOfBirth: Date;
  readonly registrationDate: Date;
  readonly active: boolean;
}

export type PersonType = 'STUDENT' | 'INSTRUCTOR';

/**
 * 生年月日は現在より前であること
 */
export const validateDateOfBirth = (dateOfBirth: Date, now: Date): Result<Date, RecordsError> =>
  Number.isNaN(dateOfBirth.getTime()) || dateOfBirth.getTime() >= now.getTime()
    ? validationFailure('Valid birth date required', 'INVALID_DATE_OF_BIRTH', 'dateOfBirth', dateOfBirth)
    : Ok(dateOfBirth);

/**
 * 年齢（暦年の差）
 */
export const getAge = (identity: PersonIdentity, now: Date = new Date()): number =>
  calendarYearsBetween(identity.dateOfBirth, now);

export const withActive = <Id extends string>(
  identity: PersonIdentity<Id>,
  active: boolean
): PersonIdentity<Id> => ({ ...identity, active });
