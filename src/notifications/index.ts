/**
 * Notification module exports
 */

export {
  buildPayload,
  type DiscordEmbed,
  type DiscordNotifierOptions,
  DiscordNotifier,
  type DiscordPayload,
} from "./discord";
