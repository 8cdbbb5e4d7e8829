import { and, asc, eq, isNotNull, lt, ne, type SQL } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { tasks, type TaskRow } from '../db/schema';
import {
  TaskDomain,
  type NewTask,
  type Task,
  type TaskPatch,
  type TaskPriority,
  type TaskStatistics,
  type TaskStatus,
} from '../domain/task';
import type { CounterRepository } from './counterRepository';

export interface TaskFilters {
  status?: TaskStatus;
  priority?: TaskPriority;
  skip?: number;
  limit?: number;
}

const OVERDUE_LIMIT = 100;

export class TaskRepository {
  constructor(
    private readonly db: AppDatabase,
    private readonly counters: CounterRepository,
  ) {}

  async create(data: NewTask, ownerId: number): Promise<Task> {
    const id = await this.counters.nextId('tasks');
    const now = new Date();

    return this.db
      .insert(tasks)
      .values({
        id,
        title: data.title,
        description: data.description ?? null,
        priority: data.priority ?? 'medium',
        status: 'pending',
        dueDate: data.dueDate ?? null,
        userId: ownerId,
        assignedTo: null,
        createdAt: now,
        updatedAt: now,
      })
      .returning()
      .get();
  }

  async findById(id: number): Promise<Task | undefined> {
    return this.db.select().from(tasks).where(eq(tasks.id, id)).get();
  }

  async list(ownerId: number, filters: TaskFilters = {}): Promise<Task[]> {
    const conditions: SQL[] = [eq(tasks.userId, ownerId)];

    if (filters.status) {
      conditions.push(eq(tasks.status, filters.status));
    }
    if (filters.priority) {
      conditions.push(eq(tasks.priority, filters.priority));
    }

    return this.db
      .select()
      .from(tasks)
      .where(and(...conditions))
      .orderBy(asc(tasks.id))
      .limit(filters.limit ?? 20)
      .offset(filters.skip ?? 0)
      .all();
  }

  /**
   * Applies exactly the keys present in `patch` plus a fresh `updatedAt`, in a
   * single UPDATE ... RETURNING. Undefined when no task has that id.
   */
  async update(id: number, patch: TaskPatch): Promise<Task | undefined> {
    const row: TaskRow | undefined = this.db
      .update(tasks)
      .set({ ...patch, updatedAt: new Date() })
      .where(eq(tasks.id, id))
      .returning()
      .get();

    return row;
  }

  async delete(id: number): Promise<boolean> {
    const result = this.db.delete(tasks).where(eq(tasks.id, id)).run();
    return result.changes > 0;
  }

  async overdue(ownerId: number, now = new Date()): Promise<Task[]> {
    return this.db
      .select()
      .from(tasks)
      .where(
        and(
          eq(tasks.userId, ownerId),
          ne(tasks.status, 'completed'),
          isNotNull(tasks.dueDate),
          lt(tasks.dueDate, now),
        ),
      )
      .orderBy(asc(tasks.dueDate))
      .limit(OVERDUE_LIMIT)
      .all();
  }

  /** Totals over every task of `ownerId`, read once inside a transaction. */
  async statistics(ownerId: number, now = new Date()): Promise<TaskStatistics> {
    return this.db.transaction((tx) => {
      const rows = tx
        .select({ status: tasks.status, priority: tasks.priority, dueDate: tasks.dueDate })
        .from(tasks)
        .where(eq(tasks.userId, ownerId))
        .all();

      return TaskDomain.summarize(rows, now);
    });
  }
}
