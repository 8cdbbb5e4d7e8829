import type { Request, Response } from 'express';
import { z } from 'zod';
import { currentUser } from '../middleware/auth';
import { sendError } from '../http/errors';
import { boundedText, emailSchema } from '../http/fields';
import { presentUser } from '../http/presenters';
import type { Logger } from '../logger';
import type { AuthService } from '../services/authService';

// Validation Schemas
const passwordSchema = z
  .string()
  .min(8, 'Password must be at least 8 characters long')
  .regex(/[A-Z]/, 'Password must contain at least one uppercase letter')
  .regex(/[a-z]/, 'Password must contain at least one lowercase letter')
  .regex(/\d/, 'Password must contain at least one digit')
  .regex(/[!@#$%^&*(),.?":{}|<>]/, 'Password must contain at least one special character');

const usernameSchema = z
  .string()
  .min(3, 'Username must be at least 3 characters long')
  .max(30, 'Username cannot exceed 30 characters')
  .regex(
    /^[a-zA-Z][a-zA-Z0-9_-]*$/,
    'Username must start with a letter and contain only letters, numbers, underscores, and hyphens',
  );

const registerSchema = z.object({
  email: emailSchema,
  username: usernameSchema,
  full_name: boundedText(0, 100).nullish(),
  password: passwordSchema,
});

const loginSchema = z.object({
  email: emailSchema,
  password: z.string().min(1),
});

// OAuth2 password grant: `username` carries the email.
const tokenFormSchema = z.object({
  username: emailSchema,
  password: z.string().min(1),
});

export class AuthController {
  constructor(
    private readonly auth: AuthService,
    private readonly logger: Logger,
  ) {}

  register = async (req: Request, res: Response) => {
    try {
      const body = registerSchema.parse(req.body);
      const user = await this.auth.register({
        email: body.email,
        username: body.username,
        fullName: body.full_name ?? null,
        password: body.password,
      });
      this.logger.info(`registered user ${user.id}`);
      res.status(201).json(presentUser(user));
    } catch (e) {
      sendError(res, e, this.logger);
    }
  };

  login = async (req: Request, res: Response) => {
    try {
      const body = loginSchema.parse(req.body);
      res.json(await this.auth.login(body.email, body.password));
    } catch (e) {
      sendError(res, e, this.logger);
    }
  };

  token = async (req: Request, res: Response) => {
    try {
      const form = tokenFormSchema.parse(req.body);
      res.json(await this.auth.login(form.username, form.password, 'Invalid credentials'));
    } catch (e) {
      sendError(res, e, this.logger);
    }
  };

  me = async (req: Request, res: Response) => {
    try {
      res.json(presentUser(currentUser(req)));
    } catch (e) {
      sendError(res, e, this.logger);
    }
  };

  refresh = async (req: Request, res: Response) => {
    try {
      res.json(this.auth.refresh(currentUser(req)));
    } catch (e) {
      sendError(res, e, this.logger);
    }
  };
}
