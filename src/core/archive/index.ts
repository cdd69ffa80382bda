/**
 * Archive module exports
 */

export {
  ACL_PAX_KEY,
  ArchiveError,
  type ArchiveOptions,
  type CreateArchiveOptions,
  createArchive,
  extractArchive,
} from "./archiver";
export { normalizeIncludeTerm, shouldEmit, shouldInclude } from "./include-filter";
export {
  createPermissionCapability,
  noopPermissions,
  type PermissionCapability,
} from "./permissions";
