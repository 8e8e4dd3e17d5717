/**
 * 設定管理モジュール
 *
 * - 型安全な設定定義
 * - 環境変数からの読み込み
 * - デフォルト値管理
 * - 環境別プリセット
 */

// 設定スキーマとバリデーション
export {
  type RecordsConfig,
  type DirectoriesConfig,
  type BusinessRulesConfig,
  type ObservabilityConfig,
  type LogLevel,
  type ConfigOverrides,
  RecordsConfigSchema,
  DirectoriesConfigSchema,
  BusinessRulesConfigSchema,
  ObservabilityConfigSchema,
  LogLevelSchema,
  validateConfig,
  DEVELOPMENT_CONFIG,
  TEST_CONFIG,
  PRODUCTION_CONFIG
} from './records-config';

// デフォルト設定値
export {
  DEFAULT_RECORDS_CONFIG,
  MINIMAL_CONFIG
} from './default-config';

// 設定ローダー
export {
  type Environment,
  type ConfigLoadFailure,
  ENV_PREFIX,
  ConfigLoader,
  loadConfig,
  loadConfigOrDefault,
  loadFromEnvironment,
  deepMerge
} from './config-loader';
