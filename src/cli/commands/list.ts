import { parseArgs } from "node:util";
import { listBackups } from "../../core";
import type { BackupRecord } from "../../types";
import { formatAge, formatBytes, formatDateTime } from "../../utils/format";
import {
  applyGlobalFlags,
  type CommandContext,
  closeContext,
  GLOBAL_HELP,
  GLOBAL_OPTIONS,
  openContext,
  reportFailure,
} from "../context";
import { color, formatTableRow, formatTableSeparator, TABLE_WIDTHS, ui } from "../ui";

const FORMATS = ["table", "json", "csv"] as const;
type ListFormat = (typeof FORMATS)[number];

function isListFormat(value: string): value is ListFormat {
  return FORMATS.some((format) => format === value);
}

export async function listCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...GLOBAL_OPTIONS,
      service: { type: "string", short: "s" },
      limit: { type: "string", short: "n" },
      format: { type: "string", default: "table" },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  applyGlobalFlags(values);

  const format = values.format ?? "table";
  if (!isListFormat(format)) {
    ui.error(`Unknown format: ${format} (expected ${FORMATS.join(", ")})`);
    return 1;
  }

  let ctx: CommandContext | null = null;
  try {
    ctx = await openContext({ ...values, "no-notify": true });

    let backups = await listBackups(ctx.store, { service: values.service });

    const limit = values.limit ? Number.parseInt(values.limit, 10) : undefined;
    if (limit && limit > 0) {
      backups = backups.slice(0, limit);
    }

    // No banner for scripting formats
    switch (format) {
      case "json":
        console.log(JSON.stringify(backups, null, 2));
        return 0;
      case "csv":
        printCsv(backups);
        return 0;
      case "table":
        ui.banner("list");

        if (backups.length === 0) {
          ui.info("No backups found");
          ui.outro("Done");
          return 0;
        }

        printTable(backups, values.verbose ?? false);

        ui.outro(
          `${backups.length} backup(s), ${formatBytes(backups.reduce((sum, b) => sum + b.sizeBytes, 0))} total`,
        );
        return 0;
    }
  } catch (error) {
    return reportFailure("List failed", error, values.verbose);
  } finally {
    await closeContext(ctx);
  }
}

function printTable(backups: BackupRecord[], verbose: boolean): void {
  const widths = [
    TABLE_WIDTHS.service,
    TABLE_WIDTHS.path,
    TABLE_WIDTHS.created,
    TABLE_WIDTHS.age,
    TABLE_WIDTHS.size,
  ];
  const headers = ["Service", "Path", "Created (UTC)", "Age", "Size"];
  const now = new Date();

  ui.step("Backups:");
  console.log(formatTableRow(headers, widths));
  console.log(formatTableSeparator(widths));

  for (const backup of backups) {
    console.log(
      formatTableRow(
        [
          backup.service,
          backup.path,
          formatDateTime(backup.date),
          formatAge(backup.date, now),
          formatBytes(backup.sizeBytes),
        ],
        widths,
      ),
    );
    if (verbose) {
      console.log(color.dim(`  ${backup.key}`));
    }
  }

  console.log(formatTableSeparator(widths));
}

function printCsv(backups: BackupRecord[]): void {
  console.log("service,path,timestamp,key,compressed,size_bytes,etag");

  for (const backup of backups) {
    console.log(
      [
        backup.service,
        backup.path,
        backup.timestamp,
        backup.key,
        backup.compressed,
        backup.sizeBytes,
        backup.etag,
      ].join(","),
    );
  }
}

function printHelp(): void {
  console.log(`
${color.bold("stowage list")} - List archives in the bucket

${color.dim("USAGE:")}
  stowage list [OPTIONS]

${color.dim("OPTIONS:")}
  -s, --service <name>    Filter by service
  -n, --limit <number>    Limit number of results
      --format <format>   Output format: table, json, csv (default: table)
${GLOBAL_HELP}

${color.dim("EXAMPLES:")}
  stowage list                             # List all archives, newest first
  stowage list -s app                      # List archives of one service
  stowage list -n 10                       # List the 10 newest archives
  stowage list --format json               # Output as JSON (for scripting)
`);
}
