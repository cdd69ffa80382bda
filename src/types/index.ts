/**
 * Centralized type exports for stowage
 */

// Record and result types
export type {
  ArchiveStats,
  BackupPathResult,
  BackupRecord,
  CleanupResult,
  CleanupServiceResult,
  RestoreItemResult,
  RetentionPolicy,
  RunSummary,
  ServiceBackupResult,
} from "./backup";
// Config types
export type {
  BackupSettings,
  NotificationConfig,
  S3Config,
  ServiceConfig,
  StowageConfig,
} from "./config";
// Notification types
export type { Notification, NotificationKind, NotificationSink } from "./notifications";
// Storage types
export type {
  DeleteFailure,
  DeleteManyResult,
  ObjectStore,
  PutOptions,
  StoreCallOptions,
} from "./storage";
