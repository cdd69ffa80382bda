/**
 * Discord webhook notifications
 */

import type {
  Notification,
  NotificationConfig,
  NotificationKind,
  NotificationSink,
} from "../types";
import { logger } from "../utils/logger";

const COLORS: Record<NotificationKind, number> = {
  success: 0x00ff00,
  error: 0xff0000,
  warning: 0xffff00,
};

const TITLES: Record<NotificationKind, string> = {
  success: "Successful",
  error: "Failed",
  warning: "Warning",
};

const DESCRIPTIONS: Record<NotificationKind, (operation: string, subject: string) => string> = {
  success: (operation, subject) => `Completed ${operation} for service: **${subject}**`,
  error: (operation, subject) => `Failed to ${operation} for service: **${subject}**`,
  warning: (operation, subject) => `Warning during ${operation} for service: **${subject}**`,
};

const DELIVERY_TIMEOUT_MS = 10_000;

export interface DiscordEmbedField {
  name: string;
  value: string;
  inline: boolean;
}

export interface DiscordEmbed {
  title: string;
  description: string;
  color: number;
  fields: DiscordEmbedField[];
  footer: { text: string };
  timestamp: string;
}

export interface DiscordPayload {
  embeds: DiscordEmbed[];
}

export interface DiscordNotifierOptions {
  webhookUrl: string;
  onSuccess: boolean;
  onError: boolean;
  onWarning: boolean;
  fetch?: typeof fetch;
  clock?: () => Date;
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

export function buildPayload(notification: Notification, now: Date): DiscordPayload {
  const { kind, operation, subject, error } = notification;

  let description = DESCRIPTIONS[kind](operation, subject);
  if (error && kind !== "success") {
    description += `\n\n**Error:** \`\`\`${error}\`\`\``;
  }

  return {
    embeds: [
      {
        title: `${capitalize(operation)} ${TITLES[kind]}`,
        description,
        color: COLORS[kind],
        fields: Object.entries(notification.details).map(([name, value]) => ({
          name,
          value,
          inline: true,
        })),
        footer: { text: "stowage" },
        timestamp: now.toISOString(),
      },
    ],
  };
}

export class DiscordNotifier implements NotificationSink {
  private readonly pending = new Set<Promise<void>>();
  private readonly fetchFn: typeof fetch;
  private readonly clock: () => Date;

  constructor(private readonly options: DiscordNotifierOptions) {
    this.fetchFn = options.fetch ?? fetch;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Notifier for a config's webhook, or null when none is configured
   */
  static fromConfig(
    config: NotificationConfig,
    overrides: Pick<DiscordNotifierOptions, "fetch" | "clock"> = {},
  ): DiscordNotifier | null {
    if (!config.discordWebhook) return null;
    return new DiscordNotifier({
      webhookUrl: config.discordWebhook,
      onSuccess: config.onSuccess,
      onError: config.onError,
      onWarning: config.onWarning,
      ...overrides,
    });
  }

  shouldSend(kind: NotificationKind): boolean {
    const toggles: Record<NotificationKind, boolean> = {
      success: this.options.onSuccess,
      error: this.options.onError,
      warning: this.options.onWarning,
    };
    return toggles[kind];
  }

  send(notification: Notification): void {
    if (!this.shouldSend(notification.kind)) return;

    const payload = buildPayload(notification, this.clock());
    const delivery: Promise<void> = this.deliver(payload)
      .catch((error: unknown) => {
        logger.error("Failed to send Discord notification:", error);
      })
      .finally(() => {
        this.pending.delete(delivery);
      });
    this.pending.add(delivery);
  }

  /**
   * Wait for every notification sent so far to be delivered or given up on
   */
  async flush(): Promise<void> {
    await Promise.allSettled([...this.pending]);
  }

  private async deliver(payload: DiscordPayload): Promise<void> {
    const response = await this.fetchFn(this.options.webhookUrl, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(DELIVERY_TIMEOUT_MS),
    });

    if (!response.ok) {
      throw new Error(`Discord webhook returned status ${response.status}`);
    }
  }
}
