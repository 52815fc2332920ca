import type { Logger } from "../../infra/logger.js";
import type { Notification, NotifierPort } from "../../ports/notifier.js";

/** Records notifications and logs them; delivery belongs to the notification service. */
export class LoggingNotifier implements NotifierPort {
  private readonly sent: Notification[] = [];

  constructor(private readonly logger: Logger) {}

  async notify(notification: Notification): Promise<void> {
    this.sent.push(notification);
    this.logger.info({ notification }, "notification queued");
  }

  getSentNotifications(): Notification[] {
    return [...this.sent];
  }
}
