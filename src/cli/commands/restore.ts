import { parseArgs } from "node:util";
import { hasFailures, RestoreEngine, summarizeRestore } from "../../core";
import type { RestoreItemResult } from "../../types";
import { formatDateTime, formatDuration } from "../../utils/format";
import {
  applyGlobalFlags,
  type CommandContext,
  closeContext,
  GLOBAL_HELP,
  GLOBAL_OPTIONS,
  interruptSignal,
  openContext,
  reportFailure,
} from "../context";
import { color, formatStatus, formatSummary, ui } from "../ui";

export async function restoreCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ...GLOBAL_OPTIONS,
      date: { type: "string", short: "d" },
      latest: { type: "boolean", default: false },
      "from-local": { type: "string" },
      dest: { type: "string" },
      "dry-run": { type: "boolean", default: false },
      force: { type: "boolean", short: "f", default: false },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  const service = positionals[0];
  if (!service) {
    ui.error("Service name is required");
    printHelp();
    return 1;
  }

  applyGlobalFlags(values);

  let ctx: CommandContext | null = null;
  try {
    ctx = await openContext(values);

    ui.banner("restore");

    const engine = new RestoreEngine(ctx.config, ctx.store, {
      notifier: ctx.notifier ?? undefined,
    });
    const interactive = process.stdin.isTTY === true;

    const s = ui.spinner();
    s.start(`Restoring ${service}...`);

    const results = await engine.runService({
      service,
      date: values.date,
      latest: values.latest,
      dest: values.dest,
      force: values.force,
      dryRun: values["dry-run"],
      fromLocal: values["from-local"],
      signal: interruptSignal(),
      confirmOverwrite: interactive
        ? async (destination) => {
            s.stop(`Destination ${destination} already exists`);
            const confirmed = await ui.confirm({
              message: `Overwrite files in ${destination}?`,
              initialValue: false,
            });
            s.start(`Restoring ${service}...`);
            return !ui.isCancel(confirmed) && confirmed;
          }
        : undefined,
    });

    s.stop(values["dry-run"] ? "Preview complete" : "Restore finished");

    printResults(results, values["dry-run"] ?? false);

    if (values["dry-run"]) {
      ui.warn("[DRY RUN] No changes were made.");
      ui.outro("Preview complete");
      return 0;
    }

    const summary = summarizeRestore(results);
    ui.note(
      formatSummary([
        { label: "Restored", value: summary.succeeded },
        { label: "Failed", value: summary.failed },
      ]),
      "Restore Summary",
    );

    if (hasFailures(summary)) {
      ui.outro("Restore finished with errors");
      return 1;
    }

    ui.outro("Restore complete!");
    return 0;
  } catch (error) {
    return reportFailure("Restore failed", error, values.verbose);
  } finally {
    await closeContext(ctx);
  }
}

function printResults(results: RestoreItemResult[], dryRun: boolean): void {
  for (const result of results) {
    const source = result.record
      ? `${formatDateTime(result.record.date)} ${color.dim(result.record.key)}`
      : "local archive";

    if (dryRun) {
      ui.message(`  ${color.dim("•")} ${result.path}: ${source} -> ${result.restorePath}`);
      continue;
    }

    ui.message(
      `[${formatStatus(result.error)}] ${result.path} -> ${result.restorePath} ${color.dim(`(${result.filesCount} files, ${formatDuration(result.durationMs)})`)}`,
    );
    if (result.error !== undefined) {
      ui.error(`         ${result.error}`);
    }
  }
}

function printHelp(): void {
  console.log(`
${color.bold("stowage restore")} - Download archives and extract them

${color.dim("USAGE:")}
  stowage restore <service> [OPTIONS]

${color.dim("OPTIONS:")}
  -d, --date <date>       Restore archives from a day (YYYYMMDD) or moment (YYYYMMDD-HHMMSS);
                          a day's archives are restored oldest first, so the newest wins
      --latest            Restore only the newest archive per path
      --dest <dir>        Restore each path to <dir>/<path> instead of its configured location
      --from-local <file> Extract a local archive into --dest instead of downloading
      --dry-run           Show what would be restored without writing anything
  -f, --force             Overwrite existing destinations without asking
${GLOBAL_HELP}

${color.dim("EXAMPLES:")}
  stowage restore app                            # Newest archive of every path
  stowage restore app --date 20240301            # Every archive from March 1st
  stowage restore app --date 20240301 --latest   # Newest archive from March 1st
  stowage restore app --date 20240301-020000     # Exact archive
  stowage restore app --dest /tmp/restore        # Restore somewhere else
  stowage restore app --from-local a.tar.gz --dest /tmp/x
`);
}
