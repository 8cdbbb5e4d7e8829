import type { Comment } from '../domain/comment';
import type { Notification, NotificationPreferences } from '../domain/notification';
import type { Task } from '../domain/task';
import type { User } from '../domain/user';

// Wire format is snake_case throughout.

export function presentUser(user: User) {
  return {
    id: user.id,
    email: user.email,
    username: user.username,
    full_name: user.fullName,
    is_active: user.isActive,
    is_admin: user.isAdmin,
    created_at: user.createdAt,
    last_login: user.lastLogin,
  };
}

export function presentTask(task: Task) {
  return {
    id: task.id,
    title: task.title,
    description: task.description,
    priority: task.priority,
    status: task.status,
    due_date: task.dueDate,
    user_id: task.userId,
    assigned_to: task.assignedTo,
    created_at: task.createdAt,
    updated_at: task.updatedAt,
  };
}

export function presentComment(comment: Comment) {
  return {
    id: comment.id,
    task_id: comment.taskId,
    user_id: comment.userId,
    text: comment.text,
    created_at: comment.createdAt,
  };
}

export function presentNotification(n: Notification) {
  return {
    id: n.id,
    user_id: n.userId,
    title: n.title,
    message: n.message,
    notification_type: n.type,
    priority: n.priority,
    created_at: n.createdAt,
    sent_at: n.sentAt,
    read_at: n.readAt,
  };
}

export function presentPreferences(p: NotificationPreferences) {
  return {
    email_enabled: p.emailEnabled,
    push_enabled: p.pushEnabled,
    sms_enabled: p.smsEnabled,
    in_app_enabled: p.inAppEnabled,
  };
}
