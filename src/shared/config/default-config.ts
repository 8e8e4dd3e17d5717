import type { RecordsConfig } from './records-config';

/**
 * 設定ファイルも環境変数も無いときの値。RecordsConfigSchema のデフォルトと一致させる
 */
export const DEFAULT_RECORDS_CONFIG: RecordsConfig = {
  environment: 'development',

  directories: {
    dataDir: 'data',
    backupDir: 'data/backups',
    exportDir: 'data/exports',
    importDir: 'data/imports'
  },

  businessRules: {
    enrollment: {
      maxCoursesPerStudent: 6,
      creditsPerCourse: 3,
      defaultCourseCapacity: 30
    },
    academics: {
      minimumGpa: 2.0,
      defaultSemester: 'FALL',
      popularThreshold: 80,
      underenrolledThreshold: 30
    }
  },

  observability: {
    logging: {
      level: 'info',
      enableAuditLog: true
    }
  }
};

/**
 * 最小限の設定（テスト用）
 */
export const MINIMAL_CONFIG: RecordsConfig = {
  ...DEFAULT_RECORDS_CONFIG,
  environment: 'test',
  observability: {
    logging: {
      level: 'silent',
      enableAuditLog: false
    }
  }
};
