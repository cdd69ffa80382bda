/**
 * Configuration type definitions for stowage
 */

export interface S3Config {
  bucket: string;
  /** Key prefix shared by every archive, without a trailing slash */
  prefix: string;
  region?: string;
  endpoint?: string;
  accessKeyId?: string;
  secretAccessKey?: string;
}

/**
 * One backed-up service: named root paths plus optional include filters
 */
export interface ServiceConfig {
  /** path-name -> absolute root directory */
  paths: Record<string, string>;
  /** path-name -> subfolder prefixes to keep; other entries are skipped */
  includeFolders?: Record<string, string[]>;
}

export interface NotificationConfig {
  discordWebhook?: string;
  onSuccess: boolean;
  onError: boolean;
  onWarning: boolean;
}

export interface BackupSettings {
  /** Scratch directory for archives in flight (default: OS temp dir) */
  tempDir?: string;
  preserveAcls: boolean;
  compression: boolean;
  /** Archives smaller than this many bytes are rejected before upload */
  minSize: number;
}

export interface StowageConfig {
  s3: S3Config;
  services: Record<string, ServiceConfig>;
  /** Retention window in days */
  retention: number;
  /** Run a single-service cleanup after each successful backup */
  autoCleanup: boolean;
  notifications: NotificationConfig;
  backup: BackupSettings;
}
