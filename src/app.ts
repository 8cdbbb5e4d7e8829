import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import type { Container } from './container';
import { AuthController } from './controllers/authController';
import { CommentController } from './controllers/commentController';
import { NotificationController } from './controllers/notificationController';
import { TaskController } from './controllers/taskController';
import { UserController } from './controllers/userController';
import { sendError } from './http/errors';
import { requireAuth } from './middleware/auth';
import { requestLogger } from './middleware/requestLogger';

export function createApp(container: Container) {
  const { settings, logger } = container;
  const app = express();

  const origins = settings.corsOrigins;
  app.use(cors({ origin: origins.includes('*') ? '*' : origins }));
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));
  app.use(requestLogger(logger));

  const authenticated = requireAuth(container.auth, logger);

  const authController = new AuthController(container.auth, logger);
  const userController = new UserController(container.users, logger);
  const taskController = new TaskController(container.tasks, container.users, container.notifications, logger);
  const commentController = new CommentController(container.comments, container.tasks, logger);
  const notificationController = new NotificationController(container.notifications, logger);

  // Auth
  const authRouter = express.Router();
  authRouter.post('/register', authController.register);
  authRouter.post('/login', authController.login);
  authRouter.post('/token', authController.token);
  authRouter.get('/me', authenticated, authController.me);
  authRouter.post('/refresh', authenticated, authController.refresh);

  // Users (admin)
  const userRouter = express.Router();
  userRouter.use(authenticated);
  userRouter.patch('/:userId', userController.updateFlags);

  // Tasks; fixed paths before /:taskId
  const taskRouter = express.Router();
  taskRouter.use(authenticated);
  taskRouter.get('/', taskController.list);
  taskRouter.post('/', taskController.create);
  taskRouter.get('/stats', taskController.stats);
  taskRouter.get('/overdue', taskController.overdue);
  taskRouter.get('/:taskId', taskController.get);
  taskRouter.put('/:taskId', taskController.update);
  taskRouter.delete('/:taskId', taskController.delete);
  taskRouter.post('/:taskId/complete', taskController.complete);
  taskRouter.post('/:taskId/assign', taskController.assign);

  // Comments
  const commentRouter = express.Router();
  commentRouter.use(authenticated);
  commentRouter.post('/', commentController.create);
  commentRouter.get('/task/:taskId', commentController.listForTask);
  commentRouter.delete('/:commentId', commentController.delete);

  // Notifications
  const notificationRouter = express.Router();
  notificationRouter.use(authenticated);
  notificationRouter.get('/', notificationController.list);
  notificationRouter.get('/unread-count', notificationController.unreadCount);
  notificationRouter.put('/preferences', notificationController.updatePreferences);
  notificationRouter.post('/:notificationId/read', notificationController.markRead);

  app.use('/api/auth', authRouter);
  app.use('/api/users', userRouter);
  app.use('/api/tasks', taskRouter);
  app.use('/api/comments', commentRouter);
  app.use('/api/notifications', notificationRouter);

  // Health Check
  app.get('/health', (req, res) => {
    res.json({ status: 'healthy', version: settings.version });
  });

  // Catch-all 404
  app.use((req, res) => {
    logger.warn(`404 NOT FOUND: ${req.method} ${req.originalUrl}`);
    res.status(404).json({
      error: 'Route not found',
      path: req.originalUrl,
      method: req.method,
    });
  });

  // Body parser failures and anything thrown outside a controller
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    sendError(res, err, logger);
  });

  return app;
}
