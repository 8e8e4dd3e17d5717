import { describe, test, expect } from 'vitest';
import { z } from 'zod';
import {
  type Result,
  Ok,
  Err,
  map,
  flatMap,
  mapError,
  match,
  parseWith,
  fromAsync,
  resultPipe
} from '../../src/shared/types/index';

describe('Result型', () => {
  describe('基本操作', () => {
    test('map は成功値だけを変換する', () => {
      expect(map(Ok(2), n => n * 10)).toEqual({ success: true, data: 20 });
      expect(map(Err<number, string>('boom'), n => n * 10)).toEqual({ success: false, error: 'boom' });
    });

    test('flatMap は失敗で連鎖を止める', () => {
      const half = (n: number): Result<number, string> =>
        n % 2 === 0 ? Ok(n / 2) : Err('odd');

      expect(flatMap(Ok<number, string>(8), half)).toEqual({ success: true, data: 4 });
      expect(flatMap(flatMap(Ok<number, string>(6), half), half)).toEqual({ success: false, error: 'odd' });
    });

    test('mapError はエラーだけを変換する', () => {
      expect(mapError(Err<number, string>('e'), e => e.toUpperCase())).toEqual({ success: false, error: 'E' });
      expect(mapError(Ok<number, string>(1), e => e.toUpperCase())).toEqual({ success: true, data: 1 });
    });

    test('match は成功・失敗のどちらかを呼ぶ', () => {
      const describeResult = (result: Result<number, string>): string =>
        match(result, { success: n => `ok:${n}`, error: e => `ng:${e}` });

      expect(describeResult(Ok(3))).toBe('ok:3');
      expect(describeResult(Err('x'))).toBe('ng:x');
    });
  });

  describe('変換', () => {
    test('parseWith はスキーマ違反をエラーに写す', () => {
      const schema = z.number().int();
      const result = parseWith(schema, 1.5, error => error.issues.length);

      expect(result).toEqual({ success: false, error: 1 });
      expect(parseWith(schema, 7, () => 0)).toEqual({ success: true, data: 7 });
    });

    test('fromAsync は Error 以外の値も Error に包む', async () => {
      const result = await fromAsync(() => Promise.reject('plain'));

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(Error);
        expect(result.error.message).toBe('plain');
      }
    });
  });

  describe('resultPipe', () => {
    test('filter が偽ならエラーに切り替わり、以降は実行されない', () => {
      const result = resultPipe(Ok<number, string>(15))
        .map(n => n + 5)
        .filter(n => n < 10, n => `too large: ${n}`)
        .map(n => n * 100)
        .value();

      expect(result).toEqual({ success: false, error: 'too large: 20' });
    });

    test('すべて成功すれば最後の値を返す', () => {
      const result = resultPipe(Ok<string, string>(' cs101 '))
        .map(code => code.trim())
        .flatMap((code): Result<string, string> => (code.length > 0 ? Ok(code.toUpperCase()) : Err('empty')))
        .value();

      expect(result).toEqual({ success: true, data: 'CS101' });
    });
  });
});
