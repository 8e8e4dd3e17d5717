import { z } from 'zod';
import type { Result } from '../../../../shared/types/index';
import { parseWithSchema, type RecordsError } from '../errors/errors';

/**
 * 氏名（不変の値オブジェクト）
 *
 * 名と姓は前後の空白を除いて空でないこと。ミドルネームは任意で、無い場合は空文字
 */
export const NameSchema = z.object({
  firstName: z.string().trim().min(1, 'First name is required'),
  middleName: z.string().trim().default(''),
  lastName: z.string().trim().min(1, 'Last name is required')
}).readonly();

export type Name = z.infer<typeof NameSchema>;

export const createName = (
  firstName: string,
  lastName: string,
  middleName?: string
): Result<Name, RecordsError> =>
  parseWithSchema(NameSchema, { firstName, middleName, lastName }, 'INVALID_NAME');

export const fullName = (name: Name): string =>
  name.middleName === ''
    ? `${name.firstName} ${name.lastName}`
    : `${name.firstName} ${name.middleName} ${name.lastName}`;

/** 例: "J.D." / "J.A.D." */
export const initials = (name: Name): string =>
  [name.firstName, name.middleName, name.lastName]
    .filter(part => part !== '')
    .map(part => `${part.charAt(0)}.`)
    .join('');

export const compareNames = (a: Name, b: Name): number =>
  fullName(a).localeCompare(fullName(b), undefined, { sensitivity: 'accent' });
