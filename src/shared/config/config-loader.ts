import type { z } from 'zod';
import type { ConfigOverrides, RecordsConfig } from './records-config';
import {
  validateConfig,
  DEVELOPMENT_CONFIG,
  TEST_CONFIG,
  PRODUCTION_CONFIG
} from './records-config';
import { DEFAULT_RECORDS_CONFIG } from './default-config';
import { type Result, Ok, Err } from '../types/result';

/**
 * 設定読み込みクラス
 *
 * 設計思想:
 * - 環境変数からの設定読み込み
 * - デフォルト値との合成
 * - 型安全性の保証
 * - プロセス全体で共有するインスタンスは持たない（呼び出し側が注入する）
 */

/**
 * 環境変数プレフィックス
 */
export const ENV_PREFIX = 'RECORDS_';

export type Environment = Readonly<Record<string, string | undefined>>;

type PlainObject = Record<string, unknown>;

const isPlainObject = (value: unknown): value is PlainObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * 数値の環境変数を読む。数値でなければ文字列のまま残し、検証で弾く
 */
const numeric = (raw: string): number | string => {
  const parsed = Number(raw);
  return raw.trim() !== '' && Number.isFinite(parsed) ? parsed : raw;
};

const bool = (raw: string): boolean | string => {
  const normalized = raw.trim().toLowerCase();
  if (normalized === 'true') return true;
  if (normalized === 'false') return false;
  return raw;
};

/**
 * 環境変数名と設定パスの対応表
 */
const ENV_BINDINGS: ReadonlyArray<{
  name: string;
  path: readonly string[];
  convert: (raw: string) => unknown;
}> = [
  { name: 'ENVIRONMENT', path: ['environment'], convert: raw => raw },
  { name: 'DATA_DIR', path: ['directories', 'dataDir'], convert: raw => raw },
  { name: 'BACKUP_DIR', path: ['directories', 'backupDir'], convert: raw => raw },
  { name: 'EXPORT_DIR', path: ['directories', 'exportDir'], convert: raw => raw },
  { name: 'IMPORT_DIR', path: ['directories', 'importDir'], convert: raw => raw },
  { name: 'MAX_COURSES_PER_STUDENT', path: ['businessRules', 'enrollment', 'maxCoursesPerStudent'], convert: numeric },
  { name: 'CREDITS_PER_COURSE', path: ['businessRules', 'enrollment', 'creditsPerCourse'], convert: numeric },
  { name: 'DEFAULT_COURSE_CAPACITY', path: ['businessRules', 'enrollment', 'defaultCourseCapacity'], convert: numeric },
  { name: 'MINIMUM_GPA', path: ['businessRules', 'academics', 'minimumGpa'], convert: numeric },
  { name: 'DEFAULT_SEMESTER', path: ['businessRules', 'academics', 'defaultSemester'], convert: raw => raw.toUpperCase() },
  { name: 'LOG_LEVEL', path: ['observability', 'logging', 'level'], convert: raw => raw.toLowerCase() },
  { name: 'ENABLE_AUDIT_LOG', path: ['observability', 'logging', 'enableAuditLog'], convert: bool }
];

const setPath = (target: PlainObject, path: readonly string[], value: unknown): void => {
  const [head, ...rest] = path;
  if (head === undefined) return;
  if (rest.length === 0) {
    target[head] = value;
    return;
  }
  const child = target[head];
  const next: PlainObject = isPlainObject(child) ? child : {};
  target[head] = next;
  setPath(next, rest, value);
};

/**
 * 環境変数から設定を読み込む
 */
export function loadFromEnvironment(env: Environment): PlainObject {
  const config: PlainObject = {};

  for (const binding of ENV_BINDINGS) {
    const raw = env[`${ENV_PREFIX}${binding.name}`];
    if (raw !== undefined && raw !== '') {
      setPath(config, binding.path, binding.convert(raw));
    }
  }

  return config;
}

/**
 * 環境別プリセット設定を取得
 */
function getEnvironmentPreset(environment: unknown): ConfigOverrides {
  switch (environment) {
    case 'development':
      return DEVELOPMENT_CONFIG;
    case 'test':
      return TEST_CONFIG;
    case 'production':
      return PRODUCTION_CONFIG;
    default:
      return {};
  }
}

/**
 * 深いマージ（オブジェクトの入れ子をマージ）
 */
export function deepMerge(target: PlainObject, source: object): PlainObject {
  const result: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) continue;

    const targetValue = result[key];
    result[key] = isPlainObject(sourceValue) && isPlainObject(targetValue)
      ? deepMerge(targetValue, sourceValue)
      : sourceValue;
  }

  return result;
}

export interface ConfigLoadFailure {
  readonly error: z.ZodError;
  readonly partialConfig: unknown;
}

/**
 * 設定ローダークラス
 */
export class ConfigLoader {
  constructor(private readonly env: Environment = process.env) {}

  /**
   * 設定を読み込み・検証
   *
   * 適用順（後勝ち）:
   * 1. デフォルト設定
   * 2. 環境別プリセット
   * 3. 環境変数
   * 4. オーバーライド
   */
  load(overrides?: ConfigOverrides): Result<RecordsConfig, ConfigLoadFailure> {
    const envConfig = loadFromEnvironment(this.env);

    // 1. デフォルト設定から開始
    let config: PlainObject = { ...DEFAULT_RECORDS_CONFIG };

    // 2. 環境別プリセットを適用（オーバーライド、環境変数、デフォルトの順で環境を決める）
    const environment = overrides?.environment ?? envConfig['environment'] ?? config['environment'];
    config = deepMerge(config, getEnvironmentPreset(environment));

    // 3. 環境変数を適用
    config = deepMerge(config, envConfig);

    // 4. オーバーライド設定を適用
    if (overrides) {
      config = deepMerge(config, overrides);
    }

    // 5. 設定の検証
    const validationResult = validateConfig(config);
    if (!validationResult.success) {
      return Err({ error: validationResult.error, partialConfig: config });
    }

    return Ok(validationResult.data);
  }
}

/**
 * 設定を読み込む便利関数
 */
export function loadConfig(
  overrides?: ConfigOverrides,
  env: Environment = process.env
): Result<RecordsConfig, ConfigLoadFailure> {
  return new ConfigLoader(env).load(overrides);
}

/**
 * 設定を読み込む。失敗時は警告を出してデフォルト設定を返す
 */
export function loadConfigOrDefault(
  overrides?: ConfigOverrides,
  env: Environment = process.env
): RecordsConfig {
  const result = loadConfig(overrides, env);
  if (result.success) {
    return result.data;
  }

  console.warn('Failed to load configuration, using defaults:', result.error.error.message);
  return DEFAULT_RECORDS_CONFIG;
}
