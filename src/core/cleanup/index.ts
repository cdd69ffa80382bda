/**
 * Cleanup module exports
 */

export { CleanupEngine, type CleanupOptions, summarizeCleanup } from "./orchestrator";
export {
  compareNewestFirst,
  compareOldestFirst,
  selectForDeletion,
  validateRetentionPolicy,
} from "./retention";
