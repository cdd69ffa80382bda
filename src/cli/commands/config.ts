import { access, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { parseArgs } from "node:util";
import * as yaml from "js-yaml";
import {
  CONFIG_FILE_NAMES,
  CONFIG_TEMPLATE,
  findAndLoadConfig,
  getServiceNames,
  resolveServicePaths,
} from "../../config";
import type { StowageConfig } from "../../types";
import {
  applyGlobalFlags,
  type CommandContext,
  closeContext,
  GLOBAL_HELP,
  GLOBAL_OPTIONS,
  openContext,
  reportFailure,
} from "../context";
import { color, formatStatus, formatSummary, ui } from "../ui";

const SUBCOMMANDS = ["show", "test", "init"] as const;

export async function configCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ...GLOBAL_OPTIONS,
      force: { type: "boolean", short: "f", default: false },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  applyGlobalFlags(values);

  const subcommand = positionals[0] ?? "show";
  try {
    switch (subcommand) {
      case "show":
        return await showConfig(values.config);
      case "test":
        return await testConfig(values.config);
      case "init":
        return await initConfig(values.config, values.force ?? false);
      default:
        ui.error(`Unknown config subcommand: ${subcommand} (expected ${SUBCOMMANDS.join(", ")})`);
        return 1;
    }
  } catch (error) {
    return reportFailure(`Config ${subcommand} failed`, error, values.verbose);
  }
}

/**
 * Hide all but the last four characters of a secret
 */
export function mask(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  return value.length <= 4 ? "****" : `****${value.slice(-4)}`;
}

export function redactConfig(config: StowageConfig): StowageConfig {
  return {
    ...config,
    s3: {
      ...config.s3,
      accessKeyId: mask(config.s3.accessKeyId),
      secretAccessKey: mask(config.s3.secretAccessKey),
    },
    notifications: {
      ...config.notifications,
      discordWebhook: mask(config.notifications.discordWebhook),
    },
  };
}

async function showConfig(configPath: string | undefined): Promise<number> {
  const config = await findAndLoadConfig(configPath);
  // Drop undefined fields so they don't print as null
  const plain: unknown = JSON.parse(JSON.stringify(redactConfig(config)));
  console.log(yaml.dump(plain, { lineWidth: 120 }));
  return 0;
}

async function exists(target: string): Promise<boolean> {
  try {
    await access(target);
    return true;
  } catch {
    return false;
  }
}

async function testConfig(configPath: string | undefined): Promise<number> {
  ui.banner("config test");

  let ctx: CommandContext | null = null;
  try {
    const s = ui.spinner();
    s.start("Loading config and connecting to the bucket...");
    ctx = await openContext({ config: configPath, "no-notify": true });
    s.stop(`Connected to s3://${ctx.store.bucket}`);

    let missing = 0;
    ui.step("Service paths:");
    for (const service of getServiceNames(ctx.config)) {
      for (const target of resolveServicePaths(ctx.config, service)) {
        const error = (await exists(target.root)) ? undefined : "not found";
        if (error) missing++;
        ui.message(
          `  [${formatStatus(error)}] ${service}:${target.pathName} ${color.dim(target.root)}`,
        );
      }
    }

    ui.note(
      formatSummary([
        { label: "Bucket", value: ctx.store.bucket },
        { label: "Prefix", value: ctx.store.prefix || "(none)" },
        { label: "Services", value: getServiceNames(ctx.config).length },
        { label: "Retention", value: `${ctx.config.retention} days` },
        { label: "Notifications", value: ctx.config.notifications.discordWebhook ? "discord" : "off" },
      ]),
      "Config",
    );

    if (missing > 0) {
      ui.warn(`${missing} configured path(s) do not exist on this host`);
      ui.outro("Config loaded with warnings");
      return 1;
    }

    ui.outro("Config OK");
    return 0;
  } finally {
    await closeContext(ctx);
  }
}

async function initConfig(configPath: string | undefined, force: boolean): Promise<number> {
  const target = path.resolve(configPath ?? CONFIG_FILE_NAMES[0]);

  if (!force && (await exists(target))) {
    ui.error(`${target} already exists, use --force to overwrite`);
    return 1;
  }

  await writeFile(target, CONFIG_TEMPLATE, "utf-8");
  ui.success(`Wrote ${target}`);
  ui.info("Edit the bucket and service paths, then run `stowage config test`");
  return 0;
}

function printHelp(): void {
  console.log(`
${color.bold("stowage config")} - Inspect and create configuration

${color.dim("USAGE:")}
  stowage config [show|test|init] [OPTIONS]

${color.dim("SUBCOMMANDS:")}
  show                    Print the loaded config with secrets masked (default)
  test                    Load the config, check bucket access and service paths
  init                    Write a starter config file

${color.dim("OPTIONS:")}
  -f, --force             Overwrite an existing file (init)
${GLOBAL_HELP}

${color.dim("EXAMPLES:")}
  stowage config                           # Show the resolved config
  stowage config test -c /etc/stowage.yaml # Check a specific config
  stowage config init                      # Create ./stowage.config.yaml
`);
}
