import {
  channelEnabled,
  type Notification,
  type NotificationPreferences,
  type NotificationPriority,
  type NotificationType,
} from '../domain/notification';
import type { Logger } from '../logger';
import type { NotificationRepository } from '../repositories/notificationRepository';

export interface SendOptions {
  type?: NotificationType;
  priority?: NotificationPriority;
}

export class NotificationService {
  constructor(
    private readonly repo: NotificationRepository,
    private readonly logger: Logger,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async send(userId: number, title: string, message: string, options: SendOptions = {}): Promise<Notification> {
    const created = await this.repo.create({
      userId,
      title,
      message,
      type: options.type ?? 'in_app',
      priority: options.priority ?? 'normal',
    });

    if (await this.deliver(created)) {
      const sentAt = this.clock();
      await this.repo.markSent(created.id, sentAt);
      return { ...created, sentAt };
    }
    return created;
  }

  private async deliver(notification: Notification): Promise<boolean> {
    const prefs = await this.repo.getPreferences(notification.userId);
    if (!channelEnabled(prefs, notification.type)) {
      this.logger.debug(`notification ${notification.id} skipped: ${notification.type} disabled for user ${notification.userId}`);
      return false;
    }

    // Outbound channels are log-only until a provider is wired in.
    if (notification.type !== 'in_app') {
      this.logger.info(`[${notification.type.toUpperCase()}] to user ${notification.userId}: ${notification.title}`);
    }
    return true;
  }

  /** Newest first. */
  async listForUser(userId: number, unreadOnly = false): Promise<Notification[]> {
    const all = await this.repo.listByUser(userId);
    return all
      .filter((n) => !unreadOnly || n.readAt === null)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  async findById(id: string): Promise<Notification | undefined> {
    return this.repo.findById(id);
  }

  async markAsRead(id: string): Promise<boolean> {
    return this.repo.markRead(id, this.clock());
  }

  async getPreferences(userId: number): Promise<NotificationPreferences> {
    return this.repo.getPreferences(userId);
  }

  async setPreferences(
    userId: number,
    prefs: Partial<Omit<NotificationPreferences, 'inAppEnabled'>>,
  ): Promise<NotificationPreferences> {
    const current = await this.repo.getPreferences(userId);
    const next: NotificationPreferences = { ...current, ...prefs, inAppEnabled: true };
    await this.repo.setPreferences(userId, next);
    return next;
  }

  async unreadCount(userId: number): Promise<number> {
    return (await this.listForUser(userId, true)).length;
  }
}
