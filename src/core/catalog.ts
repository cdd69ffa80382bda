/**
 * Archive listing for the `list` command
 */

import type { BackupRecord, ObjectStore } from "../types";
import { rootPrefix, servicePrefix } from "../utils/naming";

export interface ListOptions {
  service?: string;
  signal?: AbortSignal;
}

/**
 * Every archive in the store (or one service), newest first
 */
export async function listBackups(
  store: ObjectStore,
  options: ListOptions = {},
): Promise<BackupRecord[]> {
  const prefix = options.service
    ? servicePrefix(store.prefix, options.service)
    : rootPrefix(store.prefix);

  const records = await store.list(prefix, { signal: options.signal });

  return records.sort(
    (a, b) =>
      b.date.getTime() - a.date.getTime() ||
      a.service.localeCompare(b.service) ||
      a.path.localeCompare(b.path),
  );
}
