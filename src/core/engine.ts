/**
 * Collaborators shared by the backup, restore and cleanup engines
 */

import type { NotificationSink, RunSummary } from "../types";
import type { PermissionCapability } from "./archive/permissions";

export interface EngineOptions {
  notifier?: NotificationSink;
  /** Source of "now" for key timestamps and retention cutoffs */
  clock?: () => Date;
  permissions?: PermissionCapability;
}

export const systemClock = (): Date => new Date();

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function summarize(items: readonly { error?: string }[]): RunSummary {
  const failed = items.filter((item) => item.error !== undefined).length;
  return { succeeded: items.length - failed, failed };
}

export function hasFailures(summary: RunSummary): boolean {
  return summary.failed > 0;
}
