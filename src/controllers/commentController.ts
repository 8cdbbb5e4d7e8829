import type { Request, Response } from 'express';
import { z } from 'zod';
import { TaskDomain } from '../domain/task';
import type { User } from '../domain/user';
import { forbidden, notFound } from '../errors';
import { sendError } from '../http/errors';
import { boundedText } from '../http/fields';
import { idParamSchema } from '../http/params';
import { presentComment } from '../http/presenters';
import { currentUser } from '../middleware/auth';
import type { Logger } from '../logger';
import type { CommentRepository } from '../repositories/commentRepository';
import type { TaskRepository } from '../repositories/taskRepository';

const createCommentSchema = z.object({
  task_id: z.number().int().positive(),
  text: z.string().trim().pipe(boundedText(1, 2000)),
});

export class CommentController {
  constructor(
    private readonly comments: CommentRepository,
    private readonly tasks: TaskRepository,
    private readonly logger: Logger,
  ) {}

  private async requireTaskAccess(taskId: number, user: User) {
    const task = await this.tasks.findById(taskId);
    if (!task) throw notFound('Task not found');
    if (!TaskDomain.canAccess(user, task)) throw forbidden();
  }

  create = async (req: Request, res: Response) => {
    try {
      const user = currentUser(req);
      const body = createCommentSchema.parse(req.body);
      await this.requireTaskAccess(body.task_id, user);

      const comment = await this.comments.create({ taskId: body.task_id, userId: user.id, text: body.text });
      res.status(201).json(presentComment(comment));
    } catch (e) {
      sendError(res, e, this.logger);
    }
  };

  listForTask = async (req: Request, res: Response) => {
    try {
      const user = currentUser(req);
      const taskId = idParamSchema.parse(req.params.taskId);
      await this.requireTaskAccess(taskId, user);

      const comments = await this.comments.listByTask(taskId);
      res.json(comments.map(presentComment));
    } catch (e) {
      sendError(res, e, this.logger);
    }
  };

  delete = async (req: Request, res: Response) => {
    try {
      const user = currentUser(req);
      const comment = await this.comments.findById(req.params.commentId);
      if (!comment) throw notFound('Comment not found');
      if (comment.userId !== user.id && !user.isAdmin) throw forbidden();

      await this.comments.delete(comment.id);
      res.json({ deleted: true });
    } catch (e) {
      sendError(res, e, this.logger);
    }
  };
}
