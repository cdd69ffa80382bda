/**
 * Restore orchestration
 */

import { createReadStream } from "node:fs";
import { access } from "node:fs/promises";
import * as path from "node:path";
import type { Readable } from "node:stream";
import { ConfigError } from "../../config/validator";
import { getServiceConfig, ownEntry } from "../../config/resolver";
import type {
  ArchiveStats,
  BackupRecord,
  ObjectStore,
  RestoreItemResult,
  RunSummary,
  StowageConfig,
} from "../../types";
import { formatDateTime, formatDuration } from "../../utils/format";
import { scoped } from "../../utils/logger";
import { servicePrefix } from "../../utils/naming";
import { extractArchive } from "../archive/archiver";
import { type EngineOptions, errorMessage, summarize } from "../engine";
import { parseDateFilter, selectForRestore } from "./selector";

const log = scoped("restore");

export interface RestoreOptions {
  service: string;
  /** YYYYMMDD or YYYYMMDD-HHMMSS */
  date?: string;
  latest?: boolean;
  /** Restore each path to `{dest}/{path}` instead of its configured location */
  dest?: string;
  force?: boolean;
  dryRun?: boolean;
  /** Extract this local archive into `dest` instead of reading the store */
  fromLocal?: string;
  /**
   * Asked before writing into an existing destination when `force` is off;
   * without it an existing destination is an error.
   */
  confirmOverwrite?: (destination: string) => Promise<boolean>;
  signal?: AbortSignal;
}

export function summarizeRestore(results: readonly RestoreItemResult[]): RunSummary {
  return summarize(results);
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await access(target);
    return true;
  } catch {
    return false;
  }
}

export class RestoreEngine {
  constructor(
    private readonly config: StowageConfig,
    private readonly store: ObjectStore,
    private readonly options: EngineOptions = {},
  ) {}

  async runService(options: RestoreOptions): Promise<RestoreItemResult[]> {
    if (options.date) {
      parseDateFilter(options.date);
    }

    const service = getServiceConfig(this.config, options.service);

    if (options.fromLocal) {
      return [await this.restoreFromLocal(options.fromLocal, options)];
    }

    const records = await this.store.list(servicePrefix(this.store.prefix, options.service), {
      signal: options.signal,
    });
    if (records.length === 0) {
      throw new Error(`No backups found for service ${options.service}`);
    }

    const selected = selectForRestore(records, { date: options.date, latest: options.latest });
    if (selected.length === 0) {
      throw new Error("No backups match the specified criteria");
    }

    log.info(`Found ${selected.length} backups to restore for service: ${options.service}`);

    const results: RestoreItemResult[] = [];
    for (const record of selected) {
      options.signal?.throwIfAborted();

      const configuredPath = ownEntry(service.paths, record.path);
      if (configuredPath === undefined) {
        log.warn(`Path ${record.path} not found in current service configuration, skipping`);
        continue;
      }

      const destination = options.dest ? path.join(options.dest, record.path) : configuredPath;
      const result = await this.restoreRecord(record, destination, options);
      results.push(result);

      if (!options.dryRun) {
        this.notify(result);
      }
    }

    return results;
  }

  private async checkDestination(
    destination: string,
    options: RestoreOptions,
  ): Promise<string | undefined> {
    if (options.force || !(await pathExists(destination))) return undefined;

    if (options.confirmOverwrite && (await options.confirmOverwrite(destination))) {
      return undefined;
    }
    return `Destination path ${destination} already exists, use --force to overwrite`;
  }

  private async extractInto(
    result: RestoreItemResult,
    open: () => Promise<Readable>,
    compressed: boolean,
    options: RestoreOptions,
  ): Promise<void> {
    const { signal } = options;
    const startTime = Date.now();
    try {
      const refusal = await this.checkDestination(result.restorePath, options);
      if (refusal) {
        result.error = refusal;
        return;
      }

      const stats: ArchiveStats = await extractArchive(await open(), result.restorePath, {
        compression: compressed,
        preservePermissions: this.config.backup.preserveAcls,
        permissions: this.options.permissions,
        signal,
      });
      result.filesCount = stats.filesProcessed;

      log.info(
        `Restore completed for ${result.service}:${result.path} in ${formatDuration(Date.now() - startTime)}`,
      );
    } catch (error) {
      if (signal?.aborted) throw error;
      result.error = errorMessage(error);
      log.error(`Restore failed for ${result.service}:${result.path}: ${result.error}`);
    } finally {
      result.durationMs = Date.now() - startTime;
    }
  }

  private async restoreRecord(
    record: BackupRecord,
    destination: string,
    options: RestoreOptions,
  ): Promise<RestoreItemResult> {
    const result: RestoreItemResult = {
      service: record.service,
      path: record.path,
      restorePath: destination,
      record,
      filesCount: 0,
      durationMs: 0,
    };

    log.info(`Restoring ${record.service}:${record.path} to ${destination}`);

    if (options.dryRun) {
      log.info(`[DRY RUN] Would restore backup ${record.key} to ${destination}`);
      return result;
    }

    await this.extractInto(
      result,
      () => this.store.get(record.key, { signal: options.signal }),
      record.compressed,
      options,
    );
    return result;
  }

  private async restoreFromLocal(
    archivePath: string,
    options: RestoreOptions,
  ): Promise<RestoreItemResult> {
    if (!options.dest) {
      throw new ConfigError("Destination path is required when restoring from a local file");
    }

    const source = path.resolve(archivePath);
    if (!(await pathExists(source))) {
      throw new Error(`Local archive not found: ${source}`);
    }

    const result: RestoreItemResult = {
      service: options.service,
      path: "local",
      restorePath: options.dest,
      filesCount: 0,
      durationMs: 0,
    };

    if (options.dryRun) {
      log.info(`[DRY RUN] Would restore local file ${source} to ${options.dest}`);
      return result;
    }

    // The gzip header is sniffed, so plain and compressed archives both work here
    await this.extractInto(
      result,
      async () => createReadStream(source),
      true,
      options,
    );
    this.notify(result);
    return result;
  }

  private notify(result: RestoreItemResult): void {
    const notifier = this.options.notifier;
    if (!notifier) return;

    const details: Record<string, string> = {
      Service: result.service,
      Path: result.path,
      "Restore Path": result.restorePath,
      Duration: formatDuration(result.durationMs),
    };
    if (result.record) {
      details["Backup Date"] = formatDateTime(result.record.date);
      details["S3 Key"] = result.record.key;
    }

    notifier.send({
      kind: result.error === undefined ? "success" : "error",
      subject: result.service,
      operation: "restore",
      details,
      error: result.error,
    });
  }
}
