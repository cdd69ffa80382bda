/**
 * Cleanup orchestration
 */

import { getServiceConfig, getServiceNames } from "../../config/resolver";
import type {
  BackupRecord,
  CleanupResult,
  CleanupServiceResult,
  DeleteFailure,
  ObjectStore,
  RetentionPolicy,
  RunSummary,
  StowageConfig,
} from "../../types";
import { formatBytes, formatDateTime } from "../../utils/format";
import { scoped } from "../../utils/logger";
import { servicePrefix } from "../../utils/naming";
import { type EngineOptions, errorMessage, summarize, systemClock } from "../engine";
import { selectForDeletion, validateRetentionPolicy } from "./retention";

const log = scoped("cleanup");

export interface CleanupOptions {
  /** One service, or "all"/undefined for every configured service */
  service?: string;
  /** Defaults to the configured retention */
  olderThanDays?: number;
  keepLatest?: number;
  dryRun?: boolean;
  signal?: AbortSignal;
}

function totalSize(records: readonly BackupRecord[]): number {
  return records.reduce((sum, record) => sum + record.sizeBytes, 0);
}

function describeFailures(failures: readonly DeleteFailure[]): string {
  const details = failures
    .slice(0, 3)
    .map((failure) => `${failure.key}: ${failure.message}`)
    .join("; ");
  return `Failed to delete ${failures.length} object(s): ${details}`;
}

export function summarizeCleanup(result: CleanupResult): RunSummary {
  return summarize(result.services);
}

export class CleanupEngine {
  private readonly clock: () => Date;

  constructor(
    private readonly config: StowageConfig,
    private readonly store: ObjectStore,
    private readonly options: EngineOptions = {},
  ) {
    this.clock = options.clock ?? systemClock;
  }

  private resolveServices(service: string | undefined): string[] {
    if (!service || service === "all") {
      return getServiceNames(this.config);
    }
    getServiceConfig(this.config, service);
    return [service];
  }

  async run(options: CleanupOptions = {}): Promise<CleanupResult> {
    const policy: RetentionPolicy = {
      maxAgeDays: options.olderThanDays ?? this.config.retention,
      keepLatest: options.keepLatest ?? 0,
    };
    validateRetentionPolicy(policy);

    const services = this.resolveServices(options.service);
    const dryRun = options.dryRun ?? false;
    const now = this.clock();

    log.info(
      `Cleaning up backups older than ${policy.maxAgeDays} days` +
        (policy.keepLatest > 0 ? `, keeping latest ${policy.keepLatest} per path` : ""),
    );

    const result: CleanupResult = { dryRun, deleted: [], totalBytes: 0, services: [] };

    for (const service of services) {
      options.signal?.throwIfAborted();

      const entry = await this.cleanService(service, policy, now, dryRun, options.signal);
      result.services.push(entry);

      result.deleted.push(...entry.deleted);
      result.totalBytes += entry.freedBytes;
    }

    if (!dryRun) {
      this.notify(options.service, result);
    }
    return result;
  }

  private async cleanService(
    service: string,
    policy: RetentionPolicy,
    now: Date,
    dryRun: boolean,
    signal: AbortSignal | undefined,
  ): Promise<CleanupServiceResult> {
    const entry: CleanupServiceResult = {
      service,
      checked: 0,
      selected: [],
      deleted: [],
      freedBytes: 0,
    };

    try {
      const records = await this.store.list(servicePrefix(this.store.prefix, service), { signal });
      entry.checked = records.length;
      entry.selected = selectForDeletion(records, policy, now);

      if (entry.selected.length === 0) {
        log.info(`No backups to delete for service ${service}`);
        return entry;
      }

      log.info(`Found ${entry.selected.length} backups to delete for service ${service}`);

      if (dryRun) {
        for (const record of entry.selected) {
          log.info(
            `[DRY RUN] Would delete ${record.key} (${formatDateTime(record.date)}, ${formatBytes(record.sizeBytes)})`,
          );
        }
        entry.deleted = entry.selected;
        entry.freedBytes = totalSize(entry.selected);
        return entry;
      }

      const outcome = await this.store.deleteMany(
        entry.selected.map((record) => record.key),
        { signal },
      );
      const removed = new Set(outcome.deleted);
      entry.deleted = entry.selected.filter((record) => removed.has(record.key));
      entry.freedBytes = totalSize(entry.deleted);

      if (entry.deleted.length > 0) {
        log.info(
          `Deleted ${entry.deleted.length} backups for service ${service} (${formatBytes(entry.freedBytes)} freed)`,
        );
      }
      if (outcome.failures.length > 0) {
        entry.error = describeFailures(outcome.failures);
        log.error(`Cleanup failed for service ${service}: ${entry.error}`);
      }
    } catch (error) {
      entry.error = errorMessage(error);
      log.error(`Cleanup failed for service ${service}: ${entry.error}`);
    }

    return entry;
  }

  private notify(service: string | undefined, result: CleanupResult): void {
    const notifier = this.options.notifier;
    if (!notifier) return;

    const failures = result.services.filter((entry) => entry.error !== undefined);
    if (failures.length === 0 && result.deleted.length === 0) return;

    const kind = failures.length === 0 ? "success" : result.deleted.length > 0 ? "warning" : "error";

    notifier.send({
      kind,
      subject: service && service !== "all" ? service : "all services",
      operation: "cleanup",
      details: {
        "Deleted Backups": String(result.deleted.length),
        "Space Freed": formatBytes(result.totalBytes),
        Services: result.services.map((entry) => entry.service).join(", "),
      },
      error:
        failures.length > 0
          ? failures.map((entry) => `${entry.service}: ${entry.error}`).join("; ")
          : undefined,
    });
  }
}
