import { z } from 'zod';
import { type Result, parseWith } from '../types/result';

/**
 * 学務記録の設定スキーマ
 *
 * 読み込んだ設定はアプリケーション生成時に引数で渡す。モジュール変数には置かない
 */

// === ディレクトリ設定 ===
export const DirectoriesConfigSchema = z.object({
  dataDir: z.string().min(1).default('data'),
  backupDir: z.string().min(1).default('data/backups'),
  exportDir: z.string().min(1).default('data/exports'),
  importDir: z.string().min(1).default('data/imports')
});

// === ビジネスルール設定 ===
export const BusinessRulesConfigSchema = z.object({
  /** 履修制限 */
  enrollment: z.object({
    maxCoursesPerStudent: z.number().int().min(1).max(50).default(6),
    /** GPA計算と単位上限計算に使う一律の単位数 */
    creditsPerCourse: z.number().int().min(1).max(6).default(3),
    defaultCourseCapacity: z.number().int().min(1).max(1000).default(30)
  }).default({}),

  /** 成績・統計 */
  academics: z.object({
    minimumGpa: z.number().min(0).max(10).default(2.0),
    defaultSemester: z.enum(['SPRING', 'SUMMER', 'FALL', 'WINTER']).default('FALL'),
    popularThreshold: z.number().min(0).max(100).default(80),
    underenrolledThreshold: z.number().min(0).max(100).default(30)
  }).default({})
});

// === ログ設定 ===
export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const ObservabilityConfigSchema = z.object({
  logging: z.object({
    level: LogLevelSchema.default('info'),
    enableAuditLog: z.boolean().default(true)
  }).default({})
});

// === 統合設定スキーマ ===
export const RecordsConfigSchema = z.object({
  /** 設定環境 */
  environment: z.enum(['development', 'test', 'production']).default('development'),

  /** 各種設定 */
  directories: DirectoriesConfigSchema.default({}),
  businessRules: BusinessRulesConfigSchema.default({}),
  observability: ObservabilityConfigSchema.default({})
});

// === 型定義 ===
export type DirectoriesConfig = z.infer<typeof DirectoriesConfigSchema>;
export type BusinessRulesConfig = z.infer<typeof BusinessRulesConfigSchema>;
export type ObservabilityConfig = z.infer<typeof ObservabilityConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type RecordsConfig = z.infer<typeof RecordsConfigSchema>;

/**
 * 入れ子のオブジェクトを部分的に指定できる設定型
 */
export type ConfigOverrides<T = RecordsConfig> = {
  [K in keyof T]?: T[K] extends object ? ConfigOverrides<T[K]> : T[K];
};

/** 欠けている項目はスキーマのデフォルトで埋める */
export const validateConfig = (input: unknown): Result<RecordsConfig, z.ZodError> =>
  parseWith(RecordsConfigSchema, input, error => error);

// === 環境別設定プリセット ===
export const DEVELOPMENT_CONFIG: ConfigOverrides = {
  environment: 'development',
  observability: {
    logging: {
      level: 'debug',
      enableAuditLog: true
    }
  }
};

export const TEST_CONFIG: ConfigOverrides = {
  environment: 'test',
  observability: {
    logging: {
      level: 'warn',
      enableAuditLog: false
    }
  }
};

export const PRODUCTION_CONFIG: ConfigOverrides = {
  environment: 'production',
  observability: {
    logging: {
      level: 'info',
      enableAuditLog: true
    }
  }
};
