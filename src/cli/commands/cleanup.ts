import { parseArgs } from "node:util";
import { CleanupEngine, type CleanupOptions, hasFailures, summarizeCleanup } from "../../core";
import type { BackupRecord } from "../../types";
import { formatBytes, formatDateTime } from "../../utils/format";
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

function numberFlag(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

export async function cleanupCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...GLOBAL_OPTIONS,
      service: { type: "string", short: "s" },
      "older-than": { type: "string" },
      "keep-latest": { type: "string" },
      "dry-run": { type: "boolean", default: false },
      force: { type: "boolean", short: "f", default: false },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  applyGlobalFlags(values);

  let ctx: CommandContext | null = null;
  try {
    ctx = await openContext(values);

    ui.banner("cleanup");

    const options: CleanupOptions = {
      service: values.service,
      olderThanDays: numberFlag(values["older-than"]),
      keepLatest: numberFlag(values["keep-latest"]),
      signal: interruptSignal(),
    };
    const engine = new CleanupEngine(ctx.config, ctx.store, {
      notifier: ctx.notifier ?? undefined,
    });

    // Preview what will be deleted first
    const preview = await engine.run({ ...options, dryRun: true });

    for (const entry of preview.services) {
      if (entry.error !== undefined) {
        ui.error(`${entry.service}: ${entry.error}`);
      }
    }

    if (preview.deleted.length === 0) {
      ui.success("No backups need to be cleaned up");
      ui.outro("Nothing to do");
      return hasFailures(summarizeCleanup(preview)) ? 1 : 0;
    }

    ui.step(
      `Found ${preview.deleted.length} backup(s) to delete (${formatBytes(preview.totalBytes)}):`,
    );
    for (const record of preview.deleted) {
      ui.message(`  ${color.dim("•")} ${describe(record)}`);
    }

    if (values["dry-run"]) {
      ui.warn("[DRY RUN] No changes were made.");
      ui.outro("Preview complete");
      return 0;
    }

    if (!values.force) {
      const confirmed = await ui.confirm({
        message: `Delete ${preview.deleted.length} backup(s)?`,
        initialValue: false,
      });

      if (ui.isCancel(confirmed) || !confirmed) {
        ui.cancel("Cleanup cancelled");
        return 1;
      }
    }

    const s = ui.spinner();
    s.start("Cleaning up old backups...");
    const result = await engine.run({ ...options, dryRun: false });
    s.stop("Cleanup complete");

    ui.step("Services:");
    for (const entry of result.services) {
      ui.message(
        `  [${formatStatus(entry.error)}] ${entry.service} ${color.dim(`(${entry.selected.length} of ${entry.checked} selected)`)}`,
      );
      if (entry.error !== undefined) {
        ui.error(`         ${entry.error}`);
      }
    }

    const summary = summarizeCleanup(result);
    ui.note(
      formatSummary([
        { label: "Deleted", value: result.deleted.length },
        { label: "Freed", value: formatBytes(result.totalBytes) },
        { label: "Failed services", value: summary.failed },
      ]),
      "Cleanup Summary",
    );

    if (hasFailures(summary)) {
      ui.outro("Cleanup finished with errors");
      return 1;
    }

    ui.outro("Cleanup complete!");
    return 0;
  } catch (error) {
    return reportFailure("Cleanup failed", error, values.verbose);
  } finally {
    await closeContext(ctx);
  }
}

function describe(record: BackupRecord): string {
  return `${record.key} ${color.dim(`(${formatDateTime(record.date)}, ${formatBytes(record.sizeBytes)})`)}`;
}

function printHelp(): void {
  console.log(`
${color.bold("stowage cleanup")} - Delete archives that fall outside the retention policy

${color.dim("USAGE:")}
  stowage cleanup [OPTIONS]

${color.dim("OPTIONS:")}
  -s, --service <name>    Only clean up this service (default: all)
      --older-than <days> Delete archives older than this many days (default: config retention)
      --keep-latest <n>   Always keep the newest n archives per path (default: 0)
      --dry-run           Preview deletions without making changes
  -f, --force             Skip confirmation prompt
${GLOBAL_HELP}

${color.dim("EXAMPLES:")}
  stowage cleanup                          # Preview and confirm
  stowage cleanup --dry-run                # Preview only
  stowage cleanup -s app --older-than 30   # One service, 30 day cutoff
  stowage cleanup --keep-latest 3 --force  # Keep three per path, no prompt
`);
}
