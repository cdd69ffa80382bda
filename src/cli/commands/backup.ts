import { parseArgs } from "node:util";
import { getServiceNames } from "../../config";
import { BackupEngine, hasFailures, summarizeBackup } from "../../core";
import type { ServiceBackupResult } from "../../types";
import { formatBytes, formatDuration } from "../../utils/format";
import {
  applyGlobalFlags,
  type CommandContext,
  closeContext,
  GLOBAL_HELP,
  GLOBAL_OPTIONS,
  interruptSignal,
  openContext,
  reportFailure,
  splitList,
} from "../context";
import { color, formatStatus, formatSummary, ui } from "../ui";

export async function backupCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ...GLOBAL_OPTIONS,
      paths: { type: "string", short: "p", multiple: true },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  applyGlobalFlags(values);

  let ctx: CommandContext | null = null;
  try {
    ctx = await openContext(values);

    ui.banner("backup");

    let service = positionals[0];
    if (!service) {
      if (!process.stdin.isTTY) {
        service = "all";
      } else {
        const selected = await ui.select<{ value: string; label: string; hint?: string }[], string>({
          message: "Select a service to back up",
          options: [
            { value: "all", label: "all", hint: "Every configured service" },
            ...getServiceNames(ctx.config).map((name) => ({ value: name, label: name })),
          ],
        });

        if (ui.isCancel(selected)) {
          ui.cancel("Backup cancelled");
          return 1;
        }
        service = selected;
      }
    }

    const engine = new BackupEngine(ctx.config, ctx.store, {
      notifier: ctx.notifier ?? undefined,
    });
    const paths = splitList(values.paths);
    const signal = interruptSignal();

    const s = ui.spinner();
    s.start(service === "all" ? "Backing up all services..." : `Backing up ${service}...`);

    const results =
      service === "all"
        ? await engine.runAll({ paths, signal })
        : [await engine.runService(service, { paths, signal })];

    s.stop("Backup finished");

    printResults(results);

    const summary = summarizeBackup(results);
    const uploaded = results
      .flatMap((r) => r.results)
      .reduce((sum, r) => sum + (r.record ? r.archiveSize : 0), 0);

    ui.note(
      formatSummary([
        { label: "Succeeded", value: summary.succeeded },
        { label: "Failed", value: summary.failed },
        { label: "Uploaded", value: formatBytes(uploaded) },
        { label: "Bucket", value: `s3://${ctx.store.bucket}` },
      ]),
      "Backup Summary",
    );

    if (hasFailures(summary)) {
      ui.outro("Backup finished with errors");
      return 1;
    }

    ui.outro("Backup complete!");
    return 0;
  } catch (error) {
    return reportFailure("Backup failed", error, values.verbose);
  } finally {
    await closeContext(ctx);
  }
}

function printResults(results: ServiceBackupResult[]): void {
  for (const service of results) {
    if (service.error !== undefined) {
      ui.message(`[${formatStatus(service.error)}] ${service.service}`);
      ui.error(`         ${service.error}`);
      continue;
    }

    for (const result of service.results) {
      const detail = result.record
        ? color.dim(
            `(${formatBytes(result.archiveSize)}, ${result.filesCount} files, ${formatDuration(result.durationMs)})`,
          )
        : "";
      ui.message(`[${formatStatus(result.error)}] ${result.service}:${result.path} ${detail}`);
      if (result.error !== undefined) {
        ui.error(`         ${result.error}`);
      }
    }
  }
}

function printHelp(): void {
  console.log(`
${color.bold("stowage backup")} - Archive service paths and upload them to S3

${color.dim("USAGE:")}
  stowage backup [service|all] [OPTIONS]

${color.dim("OPTIONS:")}
  -p, --paths <names>     Back up only these path names (comma-separated, repeatable)
${GLOBAL_HELP}

${color.dim("EXAMPLES:")}
  stowage backup                           # Interactive service selection
  stowage backup all                       # Every configured service
  stowage backup app                       # One service
  stowage backup app --paths data,uploads  # Selected paths of a service
`);
}
