import { z } from 'zod';
import type { Result, CourseCodeKey } from '../../../../shared/types/index';
import { map, CourseCodeKeySchema } from '../../../../shared/types/index';
import { parseWithSchema, validationFailure, type RecordsError } from '../errors/errors';

/**
 * 科目コード（学科コード・科目番号・クラス）
 *
 * 学科コードとクラスは大文字に正規化する。表記は "CS101-A"
 */
export const CourseCodeSchema = z.object({
  department: z.string().trim().min(1, 'Department cannot be empty').transform(value => value.toUpperCase()),
  number: z.number().int('Course number must be an integer').positive('Course number must be positive'),
  section: z.string().trim().min(1, 'Section cannot be empty').transform(value => value.toUpperCase())
}).readonly();

export type CourseCode = z.infer<typeof CourseCodeSchema>;

export const createCourseCode = (
  department: string,
  number: number,
  section: string
): Result<CourseCode, RecordsError> =>
  parseWithSchema(CourseCodeSchema, { department, number, section }, 'INVALID_COURSE_CODE');

export const fullCode = (code: CourseCode): string =>
  `${code.department}${code.number}-${code.section}`;

/**
 * 学生の履修集合や成績のキーとして使う文字列表現
 */
export const courseCodeKey = (code: CourseCode): CourseCodeKey =>
  CourseCodeKeySchema.parse(fullCode(code));

export const courseCodesEqual = (a: CourseCode, b: CourseCode): boolean =>
  a.department === b.department && a.number === b.number && a.section === b.section;

export const withSection = (code: CourseCode, section: string): Result<CourseCode, RecordsError> =>
  createCourseCode(code.department, code.number, section);

/**
 * "CS101-A" 形式の文字列を解析する
 */
const FULL_CODE_PATTERN = /^([^\d-]+)(\d+)-([^-]+)$/;

export const parseCourseCode = (raw: string): Result<CourseCode, RecordsError> => {
  const match = FULL_CODE_PATTERN.exec(raw.trim());
  if (!match) {
    return validationFailure(`Invalid course code format: ${raw}`, 'INVALID_COURSE_CODE', 'courseCode', raw);
  }
  const [, department = '', digits = '', section = ''] = match;
  return createCourseCode(department, Number(digits), section);
};

/**
 * 利用者が入力したコード文字列をキーへ正規化する（前後空白除去・大文字化）
 */
export const normalizeCourseCodeKey = (raw: string): Result<CourseCodeKey, RecordsError> =>
  parseWithSchema(CourseCodeKeySchema, raw, 'INVALID_COURSE_CODE');

/**
 * "CS101-A" 形式の文字列を検証してキーを返す
 */
export const parseCourseCodeKey = (raw: string): Result<CourseCodeKey, RecordsError> =>
  map(parseCourseCode(raw), courseCodeKey);
