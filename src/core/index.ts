/**
 * Core module exports
 */

// Archive
export {
  ACL_PAX_KEY,
  ArchiveError,
  createArchive,
  createPermissionCapability,
  extractArchive,
  type PermissionCapability,
  shouldInclude,
} from "./archive";

// Backup
export { BackupEngine, type BackupOptions, summarizeBackup } from "./backup";

// Catalog
export { type ListOptions, listBackups } from "./catalog";

// Cleanup
export {
  CleanupEngine,
  type CleanupOptions,
  selectForDeletion,
  summarizeCleanup,
  validateRetentionPolicy,
} from "./cleanup";

// Engine plumbing
export { type EngineOptions, hasFailures } from "./engine";

// Restore
export {
  parseDateFilter,
  RestoreEngine,
  type RestoreOptions,
  RestoreSelectionError,
  selectForRestore,
  summarizeRestore,
} from "./restore";
