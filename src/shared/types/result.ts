import type { z } from 'zod';

/**
 * 成功値かエラーのどちらかを持つ値
 *
 * ドメイン・アプリケーション層の失敗はすべてこの型で返し、throw しない
 */

export type Result<T, E = Error> =
  | { readonly success: true; readonly data: T }
  | { readonly success: false; readonly error: E };

// === ファクトリ関数 ===

export const Ok = <T, E = never>(data: T): Result<T, E> => ({
  success: true,
  data
});

export const Err = <T = never, E = Error>(error: E): Result<T, E> => ({
  success: false,
  error
});

// === 基本的なResult型操作 ===

/**
 * 成功値を変換する（Functor）
 */
export const map = <T, U, E>(
  result: Result<T, E>,
  fn: (data: T) => U
): Result<U, E> => {
  return result.success ? Ok(fn(result.data)) : result;
};

/**
 * Result型を返す関数でチェーン（Monad）
 */
export const flatMap = <T, U, E>(
  result: Result<T, E>,
  fn: (data: T) => Result<U, E>
): Result<U, E> => {
  return result.success ? fn(result.data) : result;
};

/**
 * エラーを変換する
 */
export const mapError = <T, E, F>(
  result: Result<T, E>,
  fn: (error: E) => F
): Result<T, F> => {
  return result.success ? result : Err(fn(result.error));
};

/** 成功・失敗それぞれの分岐を呼び、その戻り値を返す */
export const match = <T, E, U>(
  result: Result<T, E>,
  matcher: {
    success: (data: T) => U;
    error: (error: E) => U;
  }
): U => {
  return result.success
    ? matcher.success(result.data)
    : matcher.error(result.error);
};

/**
 * zod スキーマで検証し、違反は mapError でドメインのエラーに写す
 */
export const parseWith = <T, E>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  mapError: (zodError: z.ZodError) => E
): Result<T, E> => {
  const parseResult = schema.safeParse(data);
  if (parseResult.success) {
    return Ok(parseResult.data);
  }
  return Err(mapError(parseResult.error));
};

/**
 * ファイル入出力など reject しうる処理を Result に包む。Error 以外の reject 値は Error に変換する
 */
export const fromAsync = async <T>(fn: () => Promise<T>): Promise<Result<T, Error>> => {
  try {
    const data = await fn();
    return Ok(data);
  } catch (error) {
    return Err(error instanceof Error ? error : new Error(String(error)));
  }
};
