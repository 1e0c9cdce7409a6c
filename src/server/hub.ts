// ============================================================================
// NOTIFICATION HUB
// ============================================================================
// Notifier that fans out to live subscriptions. A notification with no
// listener for its user is logged and dropped. Event names are prefixed so a
// user id can never collide with the emitter's own "error" event.

import { EventEmitter } from "events";
import { Notification } from "../types/index.js";
import { Notifier } from "../notifications/index.js";
import { createLogger } from "../logging/index.js";

const log = createLogger("hub");

function channel(userId: string): string {
  return `user:${userId}`;
}

export class NotificationHub implements Notifier {
  private emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(0);
  }

  async deliver(notification: Notification): Promise<void> {
    const delivered = this.emitter.emit(channel(notification.userId), notification);
    if (!delivered) {
      log.debug(`No subscriber for ${notification.userId}; dropped ${notification.kind}`);
    }
  }

  /**
   * Listen for one user's notifications. Returns the unsubscribe function.
   */
  subscribe(userId: string, listener: (notification: Notification) => void): () => void {
    this.emitter.on(channel(userId), listener);
    return () => {
      this.emitter.off(channel(userId), listener);
    };
  }

  listenerCount(userId: string): number {
    return this.emitter.listenerCount(channel(userId));
  }
}
