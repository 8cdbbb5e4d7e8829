import type { Request, Response } from 'express';
import { z } from 'zod';
import { TASK_PRIORITIES, TASK_STATUSES, TaskDomain, type Task, type TaskPatch } from '../domain/task';
import type { User } from '../domain/user';
import { forbidden, notFound } from '../errors';
import { sendError } from '../http/errors';
import { boundedText, isoDateSchema } from '../http/fields';
import { idParamSchema } from '../http/params';
import { presentTask } from '../http/presenters';
import { currentUser } from '../middleware/auth';
import type { Logger } from '../logger';
import type { TaskRepository } from '../repositories/taskRepository';
import type { UserRepository } from '../repositories/userRepository';
import type { NotificationService } from '../services/notificationService';

// Validation Schemas
const createTaskSchema = z.object({
  title: boundedText(1, 200),
  description: boundedText(0, 2000).nullish(),
  priority: z.enum(TASK_PRIORITIES).default('medium'),
  due_date: isoDateSchema.nullish(),
});

const updateTaskSchema = z.object({
  title: boundedText(1, 200).optional(),
  description: boundedText(0, 2000).nullable().optional(),
  priority: z.enum(TASK_PRIORITIES).optional(),
  status: z.enum(TASK_STATUSES).optional(),
  due_date: isoDateSchema.nullable().optional(),
});

const assignTaskSchema = z.object({
  assigned_to: z.number().int().positive(),
});

const listQuerySchema = z.object({
  status: z.enum(TASK_STATUSES).optional(),
  priority: z.enum(TASK_PRIORITIES).optional(),
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

/** Only keys the client actually sent make it into the patch. */
export function toPatch(body: z.infer<typeof updateTaskSchema>): TaskPatch {
  const patch: TaskPatch = {};
  if (body.title !== undefined) patch.title = body.title;
  if (body.description !== undefined) patch.description = body.description;
  if (body.priority !== undefined) patch.priority = body.priority;
  if (body.status !== undefined) patch.status = body.status;
  if (body.due_date !== undefined) patch.dueDate = body.due_date;
  return patch;
}

export class TaskController {
  constructor(
    private readonly tasks: TaskRepository,
    private readonly users: UserRepository,
    private readonly notifications: NotificationService,
    private readonly logger: Logger,
  ) {}

  /** Loads the task named by `:taskId` and checks that `user` may touch it. */
  private async loadAccessible(req: Request, user: User): Promise<Task> {
    const id = idParamSchema.parse(req.params.taskId);
    const task = await this.tasks.findById(id);
    if (!task) throw notFound('Task not found');
    if (!TaskDomain.canAccess(user, task)) throw forbidden();
    return task;
  }

  private async applyPatch(id: number, patch: TaskPatch): Promise<Task> {
    const updated = await this.tasks.update(id, patch);
    // Deleted between the access check and the write.
    if (!updated) throw notFound('Task not found');
    return updated;
  }

  list = async (req: Request, res: Response) => {
    try {
      const user = currentUser(req);
      const query = listQuerySchema.parse(req.query);
      const results = await this.tasks.list(user.id, query);
      res.json(results.map(presentTask));
    } catch (e) {
      sendError(res, e, this.logger);
    }
  };

  create = async (req: Request, res: Response) => {
    try {
      const user = currentUser(req);
      const body = createTaskSchema.parse(req.body);

      const task = await this.tasks.create(
        {
          title: body.title,
          description: body.description ?? null,
          priority: body.priority,
          dueDate: body.due_date ?? null,
        },
        user.id,
      );

      res.status(201).json(presentTask(task));
    } catch (e) {
      sendError(res, e, this.logger);
    }
  };

  stats = async (req: Request, res: Response) => {
    try {
      const user = currentUser(req);
      res.json(await this.tasks.statistics(user.id));
    } catch (e) {
      sendError(res, e, this.logger);
    }
  };

  overdue = async (req: Request, res: Response) => {
    try {
      const user = currentUser(req);
      const results = await this.tasks.overdue(user.id);
      res.json(results.map(presentTask));
    } catch (e) {
      sendError(res, e, this.logger);
    }
  };

  get = async (req: Request, res: Response) => {
    try {
      const task = await this.loadAccessible(req, currentUser(req));
      res.json(presentTask(task));
    } catch (e) {
      sendError(res, e, this.logger);
    }
  };

  update = async (req: Request, res: Response) => {
    try {
      const task = await this.loadAccessible(req, currentUser(req));
      const body = updateTaskSchema.parse(req.body);
      const updated = await this.applyPatch(task.id, toPatch(body));
      res.json(presentTask(updated));
    } catch (e) {
      sendError(res, e, this.logger);
    }
  };

  delete = async (req: Request, res: Response) => {
    try {
      const task = await this.loadAccessible(req, currentUser(req));
      const deleted = await this.tasks.delete(task.id);
      if (!deleted) throw notFound('Task not found');
      res.status(204).end();
    } catch (e) {
      sendError(res, e, this.logger);
    }
  };

  complete = async (req: Request, res: Response) => {
    try {
      const task = await this.loadAccessible(req, currentUser(req));
      const updated = await this.applyPatch(task.id, { status: 'completed' });
      res.json(presentTask(updated));
    } catch (e) {
      sendError(res, e, this.logger);
    }
  };

  assign = async (req: Request, res: Response) => {
    try {
      const user = currentUser(req);
      const task = await this.loadAccessible(req, user);
      const body = assignTaskSchema.parse(req.body);

      const target = await this.users.findById(body.assigned_to);
      if (!target) throw notFound('Target user not found');

      const updated = await this.applyPatch(task.id, { assignedTo: target.id });

      if (target.id !== user.id) {
        await this.notifications.send(
          target.id,
          'Task assigned',
          `${user.username} assigned you "${updated.title}"`,
        );
      }

      res.json(presentTask(updated));
    } catch (e) {
      sendError(res, e, this.logger);
    }
  };
}
