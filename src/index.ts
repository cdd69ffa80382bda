#!/usr/bin/env node

import * as p from "@clack/prompts";
import color from "picocolors";
import { backupCommand } from "./cli/commands/backup";
import { cleanupCommand } from "./cli/commands/cleanup";
import { configCommand } from "./cli/commands/config";
import { listCommand } from "./cli/commands/list";
import { restoreCommand } from "./cli/commands/restore";
import { NAME, VERSION } from "./cli/ui";

type Command = (args: string[]) => Promise<number>;

const COMMANDS = new Map<string, Command>([
  ["backup", backupCommand],
  ["restore", restoreCommand],
  ["cleanup", cleanupCommand],
  ["list", listCommand],
  ["config", configCommand],
]);

function printHelp(): void {
  p.intro(`${color.cyan("stowage")} ${color.dim(`v${VERSION}`)} - Directory backups to S3`);

  p.note(
    `${color.cyan("backup")}      Archive service paths and upload them
${color.cyan("restore")}     Download archives and extract them
${color.cyan("cleanup")}     Delete archives outside the retention policy
${color.cyan("list")}        List archives in the bucket
${color.cyan("config")}      Show, test or create a config file`,
    "Commands",
  );

  p.note(
    `-h, --help      Show this help message
-v, --version   Show version`,
    "Options",
  );

  p.note(
    `stowage backup all                ${color.dim("# Back up every service")}
stowage backup app                ${color.dim("# Back up one service")}
stowage restore app --latest      ${color.dim("# Restore the newest archives")}
stowage cleanup --dry-run         ${color.dim("# Preview cleanup")}
stowage list -s app               ${color.dim("# List archives of a service")}
stowage config init               ${color.dim("# Create a starter config")}`,
    "Examples",
  );

  p.outro(`Run ${color.cyan("stowage <command> --help")} for command details`);
}

function printVersion(): void {
  console.log(`${NAME} v${VERSION}`);
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    printHelp();
    return 0;
  }

  const [command = "", ...commandArgs] = args;

  const run = COMMANDS.get(command);
  if (run) {
    return run(commandArgs);
  }

  switch (command) {
    case "-h":
    case "--help":
    case "help":
      printHelp();
      return 0;

    case "-v":
    case "--version":
    case "version":
      printVersion();
      return 0;

    default:
      console.error(`${color.red("Error:")} Unknown command: ${command}`);
      console.error(`Run ${color.cyan("stowage --help")} for usage information.`);
      return 1;
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error) => {
    console.error(`${color.red("Fatal error:")}`, error);
    process.exit(1);
  });
