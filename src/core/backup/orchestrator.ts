/**
 * Backup orchestration
 */

import { createReadStream, createWriteStream } from "node:fs";
import { stat } from "node:fs/promises";
import { getServiceNames, type ResolvedPath, resolveServicePaths } from "../../config/resolver";
import type {
  BackupPathResult,
  ObjectStore,
  RunSummary,
  ServiceBackupResult,
  StowageConfig,
} from "../../types";
import { computeFileChecksum } from "../../utils/crypto";
import { formatBytes, formatDateTime, formatDuration } from "../../utils/format";
import { scoped } from "../../utils/logger";
import { encodeKey, formatTimestamp } from "../../utils/naming";
import { createArchive } from "../archive/archiver";
import { CleanupEngine } from "../cleanup/orchestrator";
import { type EngineOptions, errorMessage, summarize, systemClock } from "../engine";
import { withScratchFile } from "./scratch";

const log = scoped("backup");

export interface BackupOptions {
  /** Back up only these path names; unknown names are skipped with a warning */
  paths?: string[];
  signal?: AbortSignal;
}

export function summarizeBackup(results: readonly ServiceBackupResult[]): RunSummary {
  const items = results.flatMap<{ error?: string }>((service) =>
    service.error !== undefined ? [{ error: service.error }] : service.results,
  );
  return summarize(items);
}

export class BackupEngine {
  private readonly clock: () => Date;

  constructor(
    private readonly config: StowageConfig,
    private readonly store: ObjectStore,
    private readonly options: EngineOptions = {},
  ) {
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Back up every configured service. A service that cannot be resolved is
   * reported in its own entry and the rest still run.
   */
  async runAll(options: BackupOptions = {}): Promise<ServiceBackupResult[]> {
    const results: ServiceBackupResult[] = [];

    for (const service of getServiceNames(this.config)) {
      options.signal?.throwIfAborted();
      try {
        results.push(await this.runService(service, options));
      } catch (error) {
        if (options.signal?.aborted) throw error;
        const message = errorMessage(error);
        log.error(`Backup failed for service ${service}: ${message}`);
        results.push({ service, results: [], error: message });
      }
    }

    return results;
  }

  async runService(service: string, options: BackupOptions = {}): Promise<ServiceBackupResult> {
    const targets = resolveServicePaths(this.config, service, options.paths);

    log.info(`Starting backup for service: ${service}`);

    const results: BackupPathResult[] = [];
    for (const target of targets) {
      options.signal?.throwIfAborted();

      const result = await this.backupPath(service, target, options.signal);
      results.push(result);
      this.notify(service, result);
    }

    if (this.config.autoCleanup) {
      await this.autoCleanup(service, results, options.signal);
    }

    return { service, results };
  }

  private async backupPath(
    service: string,
    target: ResolvedPath,
    signal: AbortSignal | undefined,
  ): Promise<BackupPathResult> {
    const startTime = Date.now();
    const { compression, preserveAcls, minSize, tempDir } = this.config.backup;
    const result: BackupPathResult = {
      service,
      path: target.pathName,
      sourcePath: target.root,
      archiveSize: 0,
      filesCount: 0,
      durationMs: 0,
    };

    log.info(`Backing up ${service}:${target.pathName} from ${target.root}`);

    try {
      result.record = await withScratchFile(
        tempDir,
        `${service}-${target.pathName}`,
        async (scratchPath) => {
          const stats = await createArchive(createWriteStream(scratchPath), target.root, {
            includeFolders: target.includeFolders,
            compression,
            preservePermissions: preserveAcls,
            permissions: this.options.permissions,
            signal,
          });

          const { size } = await stat(scratchPath);
          result.filesCount = stats.filesProcessed;
          result.archiveSize = size;

          if (minSize > 0 && size < minSize) {
            throw new Error(
              `Archive size (${size} bytes) is below minimum threshold (${minSize} bytes)`,
            );
          }

          const checksum = await computeFileChecksum(scratchPath);
          const key = encodeKey(
            this.store.prefix,
            service,
            target.pathName,
            formatTimestamp(this.clock()),
            compression,
          );

          const body = createReadStream(scratchPath);
          try {
            return await this.store.put(key, body, {
              contentLength: size,
              contentType: compression ? "application/gzip" : "application/x-tar",
              metadata: { sha256: checksum },
              signal,
            });
          } finally {
            body.destroy();
          }
        },
      );

      result.durationMs = Date.now() - startTime;
      log.info(
        `Backup completed for ${service}:${target.pathName} - ${result.filesCount} files, ${formatBytes(result.archiveSize)}, ${formatDuration(result.durationMs)}`,
      );
    } catch (error) {
      if (signal?.aborted) throw error;
      result.durationMs = Date.now() - startTime;
      result.error = errorMessage(error);
      log.error(`Backup failed for ${service}:${target.pathName}: ${result.error}`);
    }

    return result;
  }

  private async autoCleanup(
    service: string,
    results: readonly BackupPathResult[],
    signal: AbortSignal | undefined,
  ): Promise<void> {
    if (!results.some((result) => result.error === undefined)) {
      log.debug(`Skipping auto-cleanup for service ${service} - no successful backups`);
      return;
    }

    log.info(`Auto-cleanup enabled, cleaning up old backups for service: ${service}`);

    const cleanup = new CleanupEngine(this.config, this.store, this.options);
    try {
      const outcome = await cleanup.run({ service, keepLatest: 1, signal });
      const failed = outcome.services.find((entry) => entry.error !== undefined);
      if (failed) {
        log.warn(`Auto-cleanup failed for service ${service}: ${failed.error}`);
      } else if (outcome.deleted.length > 0) {
        log.info(`Auto-cleanup deleted ${outcome.deleted.length} old backups`);
      }
    } catch (error) {
      if (signal?.aborted) throw error;
      log.warn(`Auto-cleanup failed for service ${service}: ${errorMessage(error)}`);
    }
  }

  private notify(service: string, result: BackupPathResult): void {
    const notifier = this.options.notifier;
    if (!notifier) return;

    const details: Record<string, string> = {
      Service: service,
      Path: result.path,
      Duration: formatDuration(result.durationMs),
    };
    if (result.archiveSize > 0) {
      details["Archive Size"] = formatBytes(result.archiveSize);
    }
    if (result.record) {
      details["S3 Key"] = result.record.key;
      details["Backup Time"] = formatDateTime(result.record.date);
    }

    notifier.send({
      kind: result.error === undefined ? "success" : "error",
      subject: service,
      operation: "backup",
      details,
      error: result.error,
    });
  }
}
