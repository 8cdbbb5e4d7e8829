import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';
import { TASK_PRIORITIES, TASK_STATUSES } from '../domain/task';

// --- Users Table ---
export const users = sqliteTable('users', {
  id: integer('id').primaryKey(), // allocated from counters, never autoincrement
  email: text('email').notNull().unique(),
  username: text('username').notNull().unique(),
  fullName: text('full_name'),
  passwordDigest: text('password_digest').notNull(),
  isActive: integer('is_active', { mode: 'boolean' }).notNull().default(true),
  isAdmin: integer('is_admin', { mode: 'boolean' }).notNull().default(false),
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
  lastLogin: integer('last_login', { mode: 'timestamp_ms' }),
});

// --- Tasks Table ---
export const tasks = sqliteTable('tasks', {
  id: integer('id').primaryKey(),
  title: text('title').notNull(),
  description: text('description'),
  priority: text('priority', { enum: TASK_PRIORITIES }).default('medium').notNull(),
  status: text('status', { enum: TASK_STATUSES }).default('pending').notNull(),
  dueDate: integer('due_date', { mode: 'timestamp_ms' }),
  userId: integer('user_id').notNull().references(() => users.id),
  assignedTo: integer('assigned_to').references(() => users.id),
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
  updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
}, (table) => ({
  userStatusIdx: index('idx_tasks_user_status').on(table.userId, table.status),
  userDueDateIdx: index('idx_tasks_user_due_date').on(table.userId, table.dueDate),
}));

// --- Counters Table ---
export const counters = sqliteTable('counters', {
  name: text('name').primaryKey(), // entity type: users, tasks
  sequence: integer('sequence').notNull(),
});

export type UserRow = typeof users.$inferSelect;
export type TaskRow = typeof tasks.$inferSelect;
