/**
 * Retention policy logic
 */

import { ConfigError } from "../../config/validator";
import type { BackupRecord, RetentionPolicy } from "../../types";

const DAY_MS = 24 * 60 * 60 * 1000;

export function validateRetentionPolicy(policy: RetentionPolicy): void {
  if (!Number.isFinite(policy.maxAgeDays) || policy.maxAgeDays <= 0) {
    throw new ConfigError(`Retention must be greater than 0 days (got ${policy.maxAgeDays})`);
  }
  if (!Number.isInteger(policy.keepLatest) || policy.keepLatest < 0) {
    throw new ConfigError(
      `keepLatest must be a non-negative integer (got ${policy.keepLatest})`,
    );
  }
}

function groupKey(record: Pick<BackupRecord, "service" | "path">): string {
  return `${record.service}\u0000${record.path}`;
}

/**
 * Oldest first; ties by service, path, then key
 */
export function compareOldestFirst(a: BackupRecord, b: BackupRecord): number {
  return (
    a.date.getTime() - b.date.getTime() ||
    a.service.localeCompare(b.service) ||
    a.path.localeCompare(b.path) ||
    a.key.localeCompare(b.key)
  );
}

export function compareNewestFirst(a: BackupRecord, b: BackupRecord): number {
  return b.date.getTime() - a.date.getTime() || a.key.localeCompare(b.key);
}

export function groupByServicePath(records: readonly BackupRecord[]): Map<string, BackupRecord[]> {
  const groups = new Map<string, BackupRecord[]>();
  for (const record of records) {
    const key = groupKey(record);
    const group = groups.get(key);
    if (group) {
      group.push(record);
    } else {
      groups.set(key, [record]);
    }
  }
  return groups;
}

/**
 * Records to delete under `policy`. Within each (service, path) group the
 * newest `keepLatest` survive regardless of age; the rest go once they are
 * strictly older than `now - maxAgeDays`.
 */
export function selectForDeletion(
  records: readonly BackupRecord[],
  policy: RetentionPolicy,
  now: Date = new Date(),
): BackupRecord[] {
  validateRetentionPolicy(policy);

  const cutoff = now.getTime() - policy.maxAgeDays * DAY_MS;
  const selected: BackupRecord[] = [];

  for (const group of groupByServicePath(records).values()) {
    const sorted = [...group].sort(compareNewestFirst);
    for (const record of sorted.slice(policy.keepLatest)) {
      if (record.date.getTime() < cutoff) {
        selected.push(record);
      }
    }
  }

  return selected.sort(compareOldestFirst);
}
