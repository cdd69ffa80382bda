/**
 * Backup module exports
 */

export { BackupEngine, type BackupOptions, summarizeBackup } from "./orchestrator";
export { withScratchFile } from "./scratch";
