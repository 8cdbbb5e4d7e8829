import { eq } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { users, type UserRow } from '../db/schema';
import type { NewUser, User, UserFlags, UserRecord } from '../domain/user';
import { withoutDigest } from '../domain/user';
import { conflict, uniqueViolation } from '../errors';
import type { PasswordHasher } from '../services/passwordHasher';
import type { CounterRepository } from './counterRepository';

export class UserRepository {
  constructor(
    private readonly db: AppDatabase,
    private readonly counters: CounterRepository,
    private readonly hasher: PasswordHasher,
  ) {}

  async findByEmail(email: string): Promise<UserRecord | undefined> {
    return this.db.select().from(users).where(eq(users.email, email)).get();
  }

  async findByUsername(username: string): Promise<UserRecord | undefined> {
    return this.db.select().from(users).where(eq(users.username, username)).get();
  }

  async findById(id: number): Promise<UserRecord | undefined> {
    return this.db.select().from(users).where(eq(users.id, id)).get();
  }

  /**
   * Inserts a new active, non-admin user. The unique indexes on email and
   * username decide duplicates, so a concurrent registration that slipped past
   * the caller's pre-check still ends in a conflict.
   */
  async create(input: NewUser): Promise<User> {
    const passwordDigest = await this.hasher.hash(input.password);
    const id = await this.counters.nextId('users');

    try {
      const row = this.db
        .insert(users)
        .values({
          id,
          email: input.email,
          username: input.username,
          fullName: input.fullName ?? null,
          passwordDigest,
          isActive: true,
          isAdmin: false,
          createdAt: new Date(),
          lastLogin: null,
        })
        .returning()
        .get();
      return withoutDigest(row);
    } catch (e) {
      const violation = uniqueViolation(e);
      if (violation?.column === 'email') throw conflict('Email already registered');
      if (violation?.column === 'username') throw conflict('Username already taken');
      throw e;
    }
  }

  /** Returns the user on a matching password and stamps `lastLogin`; otherwise undefined. */
  async verifyCredentials(email: string, password: string): Promise<User | undefined> {
    const record = await this.findByEmail(email);
    if (!record) return undefined;

    const ok = await this.hasher.verify(password, record.passwordDigest);
    if (!ok) return undefined;

    const updated: UserRow | undefined = this.db
      .update(users)
      .set({ lastLogin: new Date() })
      .where(eq(users.id, record.id))
      .returning()
      .get();

    return withoutDigest(updated ?? record);
  }

  async updateFlags(id: number, flags: UserFlags): Promise<User | undefined> {
    const set: Partial<Pick<UserRecord, 'isActive' | 'isAdmin'>> = {};
    if (flags.isActive !== undefined) set.isActive = flags.isActive;
    if (flags.isAdmin !== undefined) set.isAdmin = flags.isAdmin;

    if (Object.keys(set).length === 0) {
      const existing = await this.findById(id);
      return existing && withoutDigest(existing);
    }

    const row: UserRow | undefined = this.db.update(users).set(set).where(eq(users.id, id)).returning().get();
    return row && withoutDigest(row);
  }
}
