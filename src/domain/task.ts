import type { User } from './user';

export const TASK_PRIORITIES = ['low', 'medium', 'high', 'urgent'] as const;
export const TASK_STATUSES = ['pending', 'in_progress', 'completed', 'cancelled'] as const;

export type TaskPriority = (typeof TASK_PRIORITIES)[number];
export type TaskStatus = (typeof TASK_STATUSES)[number];

export interface Task {
  id: number;
  title: string;
  description: string | null;
  priority: TaskPriority;
  status: TaskStatus;
  dueDate: Date | null;
  userId: number;
  assignedTo: number | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewTask {
  title: string;
  description?: string | null;
  priority?: TaskPriority;
  dueDate?: Date | null;
}

/**
 * Fields a caller intends to change. Absent keys are left untouched; `null`
 * clears a nullable column.
 */
export type TaskPatch = Partial<
  Pick<Task, 'title' | 'description' | 'priority' | 'status' | 'dueDate' | 'assignedTo'>
>;

export interface TaskStatistics {
  total: number;
  by_status: Partial<Record<TaskStatus, number>>;
  by_priority: Partial<Record<TaskPriority, number>>;
  overdue_count: number;
}

export class TaskDomain {
  /** Owner or admin. Shared by read, update, delete, complete, assign and comments. */
  static canAccess(user: Pick<User, 'id' | 'isAdmin'>, task: Pick<Task, 'userId'>): boolean {
    return user.id === task.userId || user.isAdmin;
  }

  static isOverdue(task: Pick<Task, 'dueDate' | 'status'>, now: Date): boolean {
    return task.dueDate !== null && task.dueDate.getTime() < now.getTime() && task.status !== 'completed';
  }

  static summarize(rows: ReadonlyArray<Pick<Task, 'status' | 'priority' | 'dueDate'>>, now: Date): TaskStatistics {
    const stats: TaskStatistics = { total: 0, by_status: {}, by_priority: {}, overdue_count: 0 };

    for (const task of rows) {
      stats.total += 1;
      stats.by_status[task.status] = (stats.by_status[task.status] ?? 0) + 1;
      stats.by_priority[task.priority] = (stats.by_priority[task.priority] ?? 0) + 1;
      if (TaskDomain.isOverdue(task, now)) stats.overdue_count += 1;
    }

    return stats;
  }
}
