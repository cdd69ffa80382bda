/**
 * Restore point selection
 */

import type { BackupRecord } from "../../types";
import { parseCalendarDate, parseTimestamp } from "../../utils/naming";
import { compareNewestFirst } from "../cleanup/retention";

export class RestoreSelectionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RestoreSelectionError";
  }
}

export interface DateFilter {
  /** "day" matches a whole UTC calendar day, "exact" one timestamp */
  kind: "day" | "exact";
  token: string;
  date: Date;
}

export interface RestoreCriteria {
  /** YYYYMMDD or YYYYMMDD-HHMMSS */
  date?: string;
  /** With a day filter, keep only the newest match per path */
  latest?: boolean;
}

export function parseDateFilter(token: string): DateFilter {
  if (token.length === 8) {
    const date = parseCalendarDate(token);
    if (date) return { kind: "day", token, date };
  } else if (token.length === 15) {
    const date = parseTimestamp(token);
    if (date) return { kind: "exact", token, date };
  }

  throw new RestoreSelectionError(
    `Invalid date format: ${token} (expected YYYYMMDD or YYYYMMDD-HHMMSS)`,
  );
}

function matchesFilter(record: BackupRecord, filter: DateFilter): boolean {
  return filter.kind === "exact"
    ? record.timestamp === filter.token
    : record.timestamp.startsWith(`${filter.token}-`);
}

/**
 * Pick the records to restore, ordered by path name.
 * Without a date filter (or with `latest`) each path contributes its newest
 * record. Otherwise every match is kept oldest first, so restoring in order
 * leaves the newest archive's files in place.
 */
export function selectForRestore(
  records: readonly BackupRecord[],
  criteria: RestoreCriteria = {},
): BackupRecord[] {
  const filter = criteria.date ? parseDateFilter(criteria.date) : null;

  const byPath = new Map<string, BackupRecord[]>();
  for (const record of records) {
    if (filter && !matchesFilter(record, filter)) continue;
    const group = byPath.get(record.path);
    if (group) {
      group.push(record);
    } else {
      byPath.set(record.path, [record]);
    }
  }

  const onePerPath = !filter || criteria.latest === true;
  const selected: BackupRecord[] = [];

  for (const pathName of [...byPath.keys()].sort()) {
    const group = (byPath.get(pathName) ?? []).sort(compareNewestFirst);
    selected.push(...(onePerPath ? group.slice(0, 1) : group.reverse()));
  }

  return selected;
}
