/**
 * Restore module exports
 */

export { RestoreEngine, type RestoreOptions, summarizeRestore } from "./orchestrator";
export {
  type DateFilter,
  parseDateFilter,
  type RestoreCriteria,
  RestoreSelectionError,
  selectForRestore,
} from "./selector";
