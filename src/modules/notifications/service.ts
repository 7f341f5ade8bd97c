import type { NotificationRecord, NotificationStore } from "./store.js";
import { logger } from "../../config/logger.js";
import { NotFoundError } from "../../utils/errors.js";
import type { PaymentNotifier, SettledPayment } from "../payments/service.js";

/** In-app notifications. Push delivery is out of scope; records are read through the API. */
export class NotificationsService implements PaymentNotifier {
  constructor(
    private readonly notifications: NotificationStore,
    private readonly now: () => Date = () => new Date()
  ) {}

  async paymentSettled(event: SettledPayment): Promise<void> {
    const { notification, created } = await this.notifications.insert({
      userId: event.userId,
      type: event.status === "completed" ? "payment.completed" : "payment.failed",
      context: {
        bookingId: event.bookingId,
        paymentId: event.paymentId,
        transactionId: event.transactionId,
      },
      uniqKey: `payment:${event.paymentId}:${event.status}`,
    });
    if (created) {
      logger.info("notifications.created", {
        notificationId: notification.id,
        userId: event.userId,
        type: notification.type,
      });
    }
  }

  async list(userId: string, limit = 50): Promise<{ items: NotificationRecord[]; unread: number }> {
    const [items, unread] = await Promise.all([
      this.notifications.listForUser(userId, limit),
      this.notifications.countUnread(userId),
    ]);
    return { items, unread };
  }

  async markRead(userId: string, id: string): Promise<NotificationRecord> {
    const n = await this.notifications.markRead(userId, id, this.now());
    if (!n) throw new NotFoundError();
    return n;
  }
}

export function toPublicNotification(n: NotificationRecord) {
  return {
    id: n.id,
    type: n.type,
    context: n.context,
    readAt: n.readAt,
    createdAt: n.createdAt,
  };
}
