// ============================================================================
// NOTIFICATIONS
// ============================================================================
// Outbound, time-triggered or event-triggered messages. The transport behind a
// Notifier is not the engine's concern: the server fans out over a WebSocket
// subscription, the CLI prints to the terminal.

import { Notification, NotificationKind } from "../types/index.js";
import { createLogger } from "../logging/index.js";

const log = createLogger("notify");

export interface Notifier {
  deliver(notification: Notification): Promise<void>;
}

const KIND_ICONS: Record<NotificationKind, string> = {
  daily_digest: "📋",
  deadline_reminder: "⏰",
  new_task: "✚",
};

/**
 * Prints notifications to stdout
 */
export class ConsoleNotifier implements Notifier {
  async deliver(notification: Notification): Promise<void> {
    console.log(`\n\x1b[35m${KIND_ICONS[notification.kind]} [${notification.userId}]\x1b[0m ${notification.text}\n`);
  }
}

/**
 * Deliver without letting a transport failure escape to the caller
 */
export async function deliverSafely(notifier: Notifier, notification: Notification): Promise<boolean> {
  try {
    await notifier.deliver(notification);
    return true;
  } catch (error) {
    log.error(`Failed to deliver ${notification.kind} to ${notification.userId}`, error);
    return false;
  }
}
