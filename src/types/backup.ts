/**
 * Archive record and run result type definitions
 */

/**
 * One uploaded archive generation. Identity is the object key.
 */
export interface BackupRecord {
  service: string;
  path: string;
  /** Canonical YYYYMMDD-HHMMSS timestamp (UTC) */
  timestamp: string;
  date: Date;
  key: string;
  /** Whether the key carries the .tar.gz suffix */
  compressed: boolean;
  sizeBytes: number;
  etag: string;
}

export interface RetentionPolicy {
  maxAgeDays: number;
  keepLatest: number;
}

export interface ArchiveStats {
  filesProcessed: number;
  totalBytes: number;
  /** Entries dropped because they could not be read or written */
  skipped: number;
}

export interface BackupPathResult {
  service: string;
  path: string;
  sourcePath: string;
  record?: BackupRecord;
  archiveSize: number;
  filesCount: number;
  durationMs: number;
  error?: string;
}

export interface ServiceBackupResult {
  service: string;
  results: BackupPathResult[];
  /** Structural failure that prevented any path from being attempted */
  error?: string;
}

export interface RestoreItemResult {
  service: string;
  path: string;
  restorePath: string;
  record?: BackupRecord;
  filesCount: number;
  durationMs: number;
  error?: string;
}

export interface CleanupServiceResult {
  service: string;
  checked: number;
  selected: BackupRecord[];
  /** Selected records actually removed (or that would be, on a dry run) */
  deleted: BackupRecord[];
  freedBytes: number;
  error?: string;
}

export interface CleanupResult {
  dryRun: boolean;
  deleted: BackupRecord[];
  totalBytes: number;
  services: CleanupServiceResult[];
}

export interface RunSummary {
  succeeded: number;
  failed: number;
}
