/**
 * Notification sink type definitions
 */

export type NotificationKind = "success" | "error" | "warning";

export interface Notification {
  kind: NotificationKind;
  subject: string;
  operation: string;
  details: Record<string, string>;
  error?: string;
}

/**
 * Fire-and-forget receiver for run outcomes. Delivery problems stay inside the sink.
 */
export interface NotificationSink {
  send(notification: Notification): void;
}
