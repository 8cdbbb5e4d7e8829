import { eq, sql } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { counters } from '../db/schema';

export type CounterName = 'users' | 'tasks';

export class CounterRepository {
  constructor(private readonly db: AppDatabase) {}

  /**
   * Increments and returns the sequence for `name` in one statement, creating
   * the row at 1 on first use. Two callers can never observe the same value.
   */
  async nextId(name: CounterName): Promise<number> {
    const row = this.db
      .insert(counters)
      .values({ name, sequence: 1 })
      .onConflictDoUpdate({
        target: counters.name,
        set: { sequence: sql`${counters.sequence} + 1` },
      })
      .returning({ sequence: counters.sequence })
      .get();

    return row.sequence;
  }

  async current(name: CounterName): Promise<number> {
    const row = this.db.select().from(counters).where(eq(counters.name, name)).get();
    return row?.sequence ?? 0;
  }
}
