import { v4 as uuidv4 } from 'uuid';
import {
  DEFAULT_PREFERENCES,
  type Notification,
  type NotificationPreferences,
} from '../domain/notification';

export type NewNotification = Omit<Notification, 'id' | 'createdAt' | 'sentAt' | 'readAt'>;

export interface NotificationRepository {
  create(input: NewNotification): Promise<Notification>;
  findById(id: string): Promise<Notification | undefined>;
  listByUser(userId: number): Promise<Notification[]>;
  markSent(id: string, at: Date): Promise<void>;
  markRead(id: string, at: Date): Promise<boolean>;
  getPreferences(userId: number): Promise<NotificationPreferences>;
  setPreferences(userId: number, prefs: NotificationPreferences): Promise<void>;
}

export class InMemoryNotificationRepository implements NotificationRepository {
  private readonly notifications = new Map<string, Notification>();
  private readonly preferences = new Map<number, NotificationPreferences>();

  async create(input: NewNotification): Promise<Notification> {
    const notification: Notification = {
      ...input,
      id: uuidv4(),
      createdAt: new Date(),
      sentAt: null,
      readAt: null,
    };
    this.notifications.set(notification.id, notification);
    return { ...notification };
  }

  async findById(id: string): Promise<Notification | undefined> {
    const found = this.notifications.get(id);
    return found && { ...found };
  }

  async listByUser(userId: number): Promise<Notification[]> {
    return [...this.notifications.values()].filter((n) => n.userId === userId).map((n) => ({ ...n }));
  }

  async markSent(id: string, at: Date): Promise<void> {
    const found = this.notifications.get(id);
    if (found) found.sentAt = at;
  }

  async markRead(id: string, at: Date): Promise<boolean> {
    const found = this.notifications.get(id);
    if (!found) return false;
    found.readAt = at;
    return true;
  }

  async getPreferences(userId: number): Promise<NotificationPreferences> {
    return this.preferences.get(userId) ?? DEFAULT_PREFERENCES;
  }

  async setPreferences(userId: number, prefs: NotificationPreferences): Promise<void> {
    this.preferences.set(userId, { ...prefs });
  }
}
