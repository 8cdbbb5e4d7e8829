import type { Request, Response } from 'express';
import { z } from 'zod';
import { forbidden, notFound } from '../errors';
import { sendError } from '../http/errors';
import { idParamSchema } from '../http/params';
import { presentUser } from '../http/presenters';
import { currentUser } from '../middleware/auth';
import type { Logger } from '../logger';
import type { UserRepository } from '../repositories/userRepository';

const updateFlagsSchema = z.object({
  is_active: z.boolean().optional(),
  is_admin: z.boolean().optional(),
});

export class UserController {
  constructor(
    private readonly users: UserRepository,
    private readonly logger: Logger,
  ) {}

  updateFlags = async (req: Request, res: Response) => {
    try {
      const actor = currentUser(req);
      if (!actor.isAdmin) throw forbidden('Admin privileges required');

      const id = idParamSchema.parse(req.params.userId);
      const body = updateFlagsSchema.parse(req.body);

      const user = await this.users.updateFlags(id, { isActive: body.is_active, isAdmin: body.is_admin });
      if (!user) throw notFound('User not found');

      this.logger.info(`user ${actor.id} set flags on user ${id}: ${JSON.stringify(body)}`);
      res.json(presentUser(user));
    } catch (e) {
      sendError(res, e, this.logger);
    }
  };
}
