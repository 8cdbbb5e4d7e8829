import { describe, it, expect } from 'vitest';
import { TaskDomain } from '../src/domain/task';

describe('TaskDomain.canAccess', () => {
    const task = { userId: 1 };

    it.each([
        { user: { id: 1, isAdmin: false }, allowed: true },
        { user: { id: 1, isAdmin: true }, allowed: true },
        { user: { id: 2, isAdmin: true }, allowed: true },
        { user: { id: 2, isAdmin: false }, allowed: false },
    ])('user $user.id (admin: $user.isAdmin) -> $allowed', ({ user, allowed }) => {
        expect(TaskDomain.canAccess(user, task)).toBe(allowed);
    });
});

describe('TaskDomain.summarize', () => {
    const now = new Date('2026-06-15T12:00:00Z');
    const yesterday = new Date('2026-06-14T12:00:00Z');
    const tomorrow = new Date('2026-06-16T12:00:00Z');

    it('groups by status and priority and counts unfinished past-due tasks', () => {
        const stats = TaskDomain.summarize(
            [
                { status: 'pending', priority: 'medium', dueDate: yesterday },
                { status: 'completed', priority: 'medium', dueDate: yesterday },
                { status: 'in_progress', priority: 'urgent', dueDate: tomorrow },
            ],
            now,
        );

        expect(stats).toEqual({
            total: 3,
            by_status: { pending: 1, completed: 1, in_progress: 1 },
            by_priority: { medium: 2, urgent: 1 },
            overdue_count: 1,
        });
    });

    it('counts a cancelled past-due task as overdue and ignores tasks without a due date', () => {
        const stats = TaskDomain.summarize(
            [
                { status: 'cancelled', priority: 'low', dueDate: yesterday },
                { status: 'pending', priority: 'low', dueDate: null },
            ],
            now,
        );

        expect(stats.overdue_count).toBe(1);
    });

    it('returns zeros for no tasks', () => {
        expect(TaskDomain.summarize([], now)).toEqual({ total: 0, by_status: {}, by_priority: {}, overdue_count: 0 });
    });
});
