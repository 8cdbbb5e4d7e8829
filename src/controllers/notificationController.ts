import type { Request, Response } from 'express';
import { z } from 'zod';
import { notFound } from '../errors';
import { sendError } from '../http/errors';
import { presentNotification, presentPreferences } from '../http/presenters';
import { currentUser } from '../middleware/auth';
import type { Logger } from '../logger';
import type { NotificationService } from '../services/notificationService';

const listQuerySchema = z.object({
  unread_only: z.enum(['true', 'false']).default('false').transform((v) => v === 'true'),
});

const preferencesSchema = z.object({
  email_enabled: z.boolean().optional(),
  push_enabled: z.boolean().optional(),
  sms_enabled: z.boolean().optional(),
});

export class NotificationController {
  constructor(
    private readonly notifications: NotificationService,
    private readonly logger: Logger,
  ) {}

  list = async (req: Request, res: Response) => {
    try {
      const user = currentUser(req);
      const query = listQuerySchema.parse(req.query);
      const items = await this.notifications.listForUser(user.id, query.unread_only);
      res.json(items.map(presentNotification));
    } catch (e) {
      sendError(res, e, this.logger);
    }
  };

  unreadCount = async (req: Request, res: Response) => {
    try {
      const user = currentUser(req);
      res.json({ unread: await this.notifications.unreadCount(user.id) });
    } catch (e) {
      sendError(res, e, this.logger);
    }
  };

  markRead = async (req: Request, res: Response) => {
    try {
      const user = currentUser(req);
      const found = await this.notifications.findById(req.params.notificationId);
      // Someone else's notification is indistinguishable from a missing one.
      if (!found || found.userId !== user.id) throw notFound('Notification not found');

      await this.notifications.markAsRead(found.id);
      res.json({ read: true });
    } catch (e) {
      sendError(res, e, this.logger);
    }
  };

  updatePreferences = async (req: Request, res: Response) => {
    try {
      const user = currentUser(req);
      const body = preferencesSchema.parse(req.body);
      const prefs = await this.notifications.setPreferences(user.id, {
        ...(body.email_enabled !== undefined && { emailEnabled: body.email_enabled }),
        ...(body.push_enabled !== undefined && { pushEnabled: body.push_enabled }),
        ...(body.sms_enabled !== undefined && { smsEnabled: body.sms_enabled }),
      });
      res.json(presentPreferences(prefs));
    } catch (e) {
      sendError(res, e, this.logger);
    }
  };
}
