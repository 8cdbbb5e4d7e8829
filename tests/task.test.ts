import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import type { Container } from '../src/container';
import { PASSWORD, registerAndLogin, testApp } from './helpers';

const DAY = 24 * 60 * 60 * 1000;

describe('Task API', () => {
    let app: Express;
    let container: Container;

    beforeEach(() => {
        ({ app, container } = testApp());
    });

    afterEach(() => {
        container.close();
    });

    const auth = (token: string) => ({ Authorization: `Bearer ${token}` });

    async function createTask(token: string, body: Record<string, unknown>) {
        const res = await request(app).post('/api/tasks').set(auth(token)).send(body);
        expect(res.status).toBe(201);
        const id: number = res.body.id;
        return id;
    }

    it('runs the register, login, create, complete, delete flow', async () => {
        const reg = await request(app)
            .post('/api/auth/register')
            .send({ email: 'alice@x.com', username: 'alice', password: PASSWORD });
        expect(reg.status).toBe(201);

        const login = await request(app).post('/api/auth/login').send({ email: 'alice@x.com', password: PASSWORD });
        const token: string = login.body.access_token;

        const created = await request(app).post('/api/tasks').set(auth(token)).send({ title: 'T' });
        expect(created.status).toBe(201);
        expect(created.body.status).toBe('pending');
        expect(created.body.priority).toBe('medium');
        expect(created.body.user_id).toBe(reg.body.id);
        expect(created.body.id).toBeGreaterThan(0);

        const id: number = created.body.id;

        const completed = await request(app).post(`/api/tasks/${id}/complete`).set(auth(token));
        expect(completed.status).toBe(200);
        expect(completed.body.status).toBe('completed');

        const deleted = await request(app).delete(`/api/tasks/${id}`).set(auth(token));
        expect(deleted.status).toBe(204);

        const after = await request(app).get(`/api/tasks/${id}`).set(auth(token));
        expect(after.status).toBe(404);
        expect(after.body).toEqual({ error: 'Task not found' });
    });

    it('requires authentication', async () => {
        expect((await request(app).get('/api/tasks')).status).toBe(401);
        expect((await request(app).post('/api/tasks').send({ title: 'T' })).status).toBe(401);
    });

    it('validates task fields before creating anything', async () => {
        const alice = await registerAndLogin(app, 'alice');

        const empty = await request(app).post('/api/tasks').set(auth(alice.token)).send({ title: '' });
        expect(empty.status).toBe(422);

        const long = await request(app).post('/api/tasks').set(auth(alice.token)).send({ title: 'x'.repeat(201) });
        expect(long.status).toBe(422);

        const badPriority = await request(app).post('/api/tasks').set(auth(alice.token)).send({ title: 'T', priority: 'asap' });
        expect(badPriority.status).toBe(422);

        const badDate = await request(app).post('/api/tasks').set(auth(alice.token)).send({ title: 'T', due_date: 'someday' });
        expect(badDate.status).toBe(422);

        expect(await container.counters.current('tasks')).toBe(0);
    });

    it('measures title length in characters, not UTF-16 units', async () => {
        const alice = await registerAndLogin(app, 'alice');
        const title = '\u{1F600}'.repeat(200);

        const ok = await request(app).post('/api/tasks').set(auth(alice.token)).send({ title });
        expect(ok.status).toBe(201);
        expect(ok.body.title).toBe(title);

        const tooLong = await request(app).post('/api/tasks').set(auth(alice.token)).send({ title: `${title}\u{1F600}` });
        expect(tooLong.status).toBe(422);
    });

    it('accepts only ISO timestamps as due dates', async () => {
        const alice = await registerAndLogin(app, 'alice');

        for (const due_date of [true, false, 0]) {
            const res = await request(app).post('/api/tasks').set(auth(alice.token)).send({ title: 'T', due_date });
            expect(res.status).toBe(422);
        }

        const id = await createTask(alice.token, { title: 'T', due_date: '2026-12-01T02:00:00+02:00' });
        const res = await request(app).get(`/api/tasks/${id}`).set(auth(alice.token));
        expect(res.body.due_date).toBe('2026-12-01T00:00:00.000Z');

        const bad = await request(app).put(`/api/tasks/${id}`).set(auth(alice.token)).send({ due_date: true });
        expect(bad.status).toBe(422);
    });

    it('keeps unspecified fields on update', async () => {
        const alice = await registerAndLogin(app, 'alice');
        const id = await createTask(alice.token, {
            title: 'T',
            description: 'keep me',
            priority: 'high',
            due_date: '2026-12-01T00:00:00.000Z',
        });

        const res = await request(app).put(`/api/tasks/${id}`).set(auth(alice.token)).send({ status: 'in_progress' });
        expect(res.status).toBe(200);
        expect(res.body).toMatchObject({
            title: 'T',
            description: 'keep me',
            priority: 'high',
            status: 'in_progress',
            due_date: '2026-12-01T00:00:00.000Z',
        });

        const cleared = await request(app).put(`/api/tasks/${id}`).set(auth(alice.token)).send({ due_date: null });
        expect(cleared.body.due_date).toBeNull();
        expect(cleared.body.description).toBe('keep me');
    });

    it('keeps other users out of a task', async () => {
        const alice = await registerAndLogin(app, 'alice');
        const bob = await registerAndLogin(app, 'bob');
        const id = await createTask(alice.token, { title: 'private' });

        expect((await request(app).get(`/api/tasks/${id}`).set(auth(bob.token))).status).toBe(403);
        expect((await request(app).put(`/api/tasks/${id}`).set(auth(bob.token)).send({ title: 'mine' })).status).toBe(403);
        expect((await request(app).post(`/api/tasks/${id}/complete`).set(auth(bob.token))).status).toBe(403);
        expect((await request(app).post(`/api/tasks/${id}/assign`).set(auth(bob.token)).send({ assigned_to: bob.id })).status).toBe(403);
        expect((await request(app).delete(`/api/tasks/${id}`).set(auth(bob.token))).status).toBe(403);

        const still = await request(app).get(`/api/tasks/${id}`).set(auth(alice.token));
        expect(still.body.title).toBe('private');
        expect(still.body.status).toBe('pending');
    });

    it('lets an admin act on any task', async () => {
        const alice = await registerAndLogin(app, 'alice');
        const carol = await registerAndLogin(app, 'carol');
        await container.users.updateFlags(carol.id, { isAdmin: true });
        const id = await createTask(alice.token, { title: 'shared' });

        expect((await request(app).get(`/api/tasks/${id}`).set(auth(carol.token))).status).toBe(200);

        const completed = await request(app).post(`/api/tasks/${id}/complete`).set(auth(carol.token));
        expect(completed.status).toBe(200);
        expect(completed.body.status).toBe('completed');

        expect((await request(app).delete(`/api/tasks/${id}`).set(auth(carol.token))).status).toBe(204);
    });

    it('answers 404 for a missing task and 422 for a non-numeric id', async () => {
        const alice = await registerAndLogin(app, 'alice');

        expect((await request(app).get('/api/tasks/999').set(auth(alice.token))).status).toBe(404);
        expect((await request(app).put('/api/tasks/999').set(auth(alice.token)).send({})).status).toBe(404);
        expect((await request(app).get('/api/tasks/abc').set(auth(alice.token))).status).toBe(422);
    });

    it('lists only the caller\'s tasks matching the filters', async () => {
        const alice = await registerAndLogin(app, 'alice');
        const bob = await registerAndLogin(app, 'bob');
        const first = await createTask(alice.token, { title: 'one', priority: 'low' });
        const second = await createTask(alice.token, { title: 'two', priority: 'high' });
        await createTask(bob.token, { title: 'bobs' });
        await request(app).post(`/api/tasks/${first}/complete`).set(auth(alice.token));

        const all = await request(app).get('/api/tasks').set(auth(alice.token));
        expect(all.body.map((t: { id: number }) => t.id)).toEqual([first, second]);

        const pending = await request(app).get('/api/tasks?status=pending').set(auth(alice.token));
        expect(pending.body.map((t: { id: number }) => t.id)).toEqual([second]);
        expect(pending.body.every((t: { status: string }) => t.status === 'pending')).toBe(true);

        const low = await request(app).get('/api/tasks?priority=low').set(auth(alice.token));
        expect(low.body.map((t: { id: number }) => t.id)).toEqual([first]);

        const page = await request(app).get('/api/tasks?skip=1&limit=1').set(auth(alice.token));
        expect(page.body.map((t: { id: number }) => t.id)).toEqual([second]);
    });

    it('bounds the page size to 1..100', async () => {
        const alice = await registerAndLogin(app, 'alice');

        expect((await request(app).get('/api/tasks?limit=0').set(auth(alice.token))).status).toBe(422);
        expect((await request(app).get('/api/tasks?limit=101').set(auth(alice.token))).status).toBe(422);
        expect((await request(app).get('/api/tasks?limit=100').set(auth(alice.token))).status).toBe(200);
        expect((await request(app).get('/api/tasks?status=done').set(auth(alice.token))).status).toBe(422);
    });

    it('assigns a task to an existing user and notifies them', async () => {
        const alice = await registerAndLogin(app, 'alice');
        const bob = await registerAndLogin(app, 'bob');
        const id = await createTask(alice.token, { title: 'review' });

        const res = await request(app).post(`/api/tasks/${id}/assign`).set(auth(alice.token)).send({ assigned_to: bob.id });
        expect(res.status).toBe(200);
        expect(res.body.assigned_to).toBe(bob.id);
        expect(res.body.user_id).toBe(alice.id);

        const inbox = await request(app).get('/api/notifications').set(auth(bob.token));
        expect(inbox.body).toHaveLength(1);
        expect(inbox.body[0]).toMatchObject({
            user_id: bob.id,
            title: 'Task assigned',
            message: 'alice assigned you "review"',
            notification_type: 'in_app',
            read_at: null,
        });

        const missing = await request(app).post(`/api/tasks/${id}/assign`).set(auth(alice.token)).send({ assigned_to: 999 });
        expect(missing.status).toBe(404);
        expect(missing.body).toEqual({ error: 'Target user not found' });
    });

    it('reports statistics and overdue tasks', async () => {
        const alice = await registerAndLogin(app, 'alice');
        const yesterday = new Date(Date.now() - DAY).toISOString();
        const tomorrow = new Date(Date.now() + DAY).toISOString();

        const late = await createTask(alice.token, { title: 'late', due_date: yesterday });
        const done = await createTask(alice.token, { title: 'done', due_date: yesterday, priority: 'urgent' });
        const going = await createTask(alice.token, { title: 'going', due_date: tomorrow });
        await request(app).post(`/api/tasks/${done}/complete`).set(auth(alice.token));
        await request(app).put(`/api/tasks/${going}`).set(auth(alice.token)).send({ status: 'in_progress' });

        const stats = await request(app).get('/api/tasks/stats').set(auth(alice.token));
        expect(stats.status).toBe(200);
        expect(stats.body).toEqual({
            total: 3,
            by_status: { pending: 1, completed: 1, in_progress: 1 },
            by_priority: { medium: 2, urgent: 1 },
            overdue_count: 1,
        });

        const overdue = await request(app).get('/api/tasks/overdue').set(auth(alice.token));
        expect(overdue.body.map((t: { id: number }) => t.id)).toEqual([late]);
    });
});
