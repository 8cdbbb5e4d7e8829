export const NOTIFICATION_TYPES = ['email', 'push', 'in_app', 'sms'] as const;
export const NOTIFICATION_PRIORITIES = ['low', 'normal', 'high', 'urgent'] as const;

export type NotificationType = (typeof NOTIFICATION_TYPES)[number];
export type NotificationPriority = (typeof NOTIFICATION_PRIORITIES)[number];

export interface Notification {
  id: string;
  userId: number;
  title: string;
  message: string;
  type: NotificationType;
  priority: NotificationPriority;
  createdAt: Date;
  sentAt: Date | null;
  readAt: Date | null;
}

export interface NotificationPreferences {
  emailEnabled: boolean;
  pushEnabled: boolean;
  smsEnabled: boolean;
  // in_app cannot be switched off
  inAppEnabled: true;
}

export const DEFAULT_PREFERENCES: NotificationPreferences = {
  emailEnabled: true,
  pushEnabled: true,
  smsEnabled: false,
  inAppEnabled: true,
};

export function channelEnabled(prefs: NotificationPreferences, type: NotificationType): boolean {
  switch (type) {
    case 'email':
      return prefs.emailEnabled;
    case 'push':
      return prefs.pushEnabled;
    case 'sms':
      return prefs.smsEnabled;
    case 'in_app':
      return prefs.inAppEnabled;
  }
}
