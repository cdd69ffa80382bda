/**
 * Plumbing shared by every command: global flags, config, store, notifier
 */

import { findAndLoadConfig } from "../config";
import { DiscordNotifier } from "../notifications";
import { S3ObjectStore } from "../storage";
import type { StowageConfig } from "../types";
import { setLogLevel } from "../utils/logger";
import { ui } from "./ui";

/** Flags every command accepts */
export const GLOBAL_OPTIONS = {
  config: { type: "string", short: "c" },
  verbose: { type: "boolean", short: "v", default: false },
  "no-notify": { type: "boolean", default: false },
  help: { type: "boolean", short: "h", default: false },
} as const;

export const GLOBAL_HELP = `  -c, --config <path>     Path to config file (default: ./stowage.config.yaml)
      --no-notify         Skip Discord notifications
  -v, --verbose           Verbose output
  -h, --help              Show this help message`;

export interface GlobalFlags {
  config?: string;
  verbose?: boolean;
  "no-notify"?: boolean;
}

export interface CommandContext {
  config: StowageConfig;
  store: S3ObjectStore;
  notifier: DiscordNotifier | null;
}

export function applyGlobalFlags(flags: GlobalFlags): void {
  if (flags.verbose) {
    setLogLevel("debug");
  }
}

export async function openContext(flags: GlobalFlags): Promise<CommandContext> {
  const config = await findAndLoadConfig(flags.config);
  const store = await S3ObjectStore.connect(config.s3);
  const notifier = flags["no-notify"] ? null : DiscordNotifier.fromConfig(config.notifications);
  return { config, store, notifier };
}

/**
 * Let queued notifications go out before the process exits
 */
export async function closeContext(ctx: CommandContext | null): Promise<void> {
  await ctx?.notifier?.flush();
}

export function reportFailure(label: string, error: unknown, verbose: boolean | undefined): number {
  ui.error(`${label}: ${error instanceof Error ? error.message : String(error)}`);
  if (verbose) {
    console.error(error);
  }
  return 1;
}

/**
 * Split repeated and comma-separated values: ["a,b", "c"] -> ["a", "b", "c"]
 */
export function splitList(values: readonly string[] | undefined): string[] | undefined {
  if (!values || values.length === 0) return undefined;
  return values
    .flatMap((value) => value.split(","))
    .map((value) => value.trim())
    .filter((value) => value.length > 0);
}

/**
 * Abort in-flight work on the first Ctrl-C; a second one exits at once
 */
export function interruptSignal(): AbortSignal {
  const controller = new AbortController();
  process.once("SIGINT", () => {
    ui.warn("Interrupted, stopping...");
    controller.abort(new Error("Interrupted"));
    process.once("SIGINT", () => process.exit(130));
  });
  return controller.signal;
}
