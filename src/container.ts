import type { Settings } from './config';
import { openDatabase, type DatabaseHandle } from './db';
import { createLogger, type Logger } from './logger';
import { CounterRepository } from './repositories/counterRepository';
import { InMemoryCommentRepository, type CommentRepository } from './repositories/commentRepository';
import { InMemoryNotificationRepository } from './repositories/notificationRepository';
import { TaskRepository } from './repositories/taskRepository';
import { UserRepository } from './repositories/userRepository';
import { AuthService } from './services/authService';
import { NotificationService } from './services/notificationService';
import { BcryptPasswordHasher } from './services/passwordHasher';
import { TokenService } from './services/tokenService';

/** Process-wide dependencies, built once at startup and handed to the HTTP layer. */
export interface Container {
  settings: Settings;
  logger: Logger;
  database: DatabaseHandle;
  counters: CounterRepository;
  users: UserRepository;
  tasks: TaskRepository;
  comments: CommentRepository;
  tokens: TokenService;
  auth: AuthService;
  notifications: NotificationService;
  close(): void;
}

export interface ContainerOverrides {
  logger?: Logger;
  clock?: () => Date;
}

export function buildContainer(settings: Settings, overrides: ContainerOverrides = {}): Container {
  const logger = overrides.logger ?? createLogger(settings.logLevel);
  const database = openDatabase(settings.dbPath);

  const counters = new CounterRepository(database.db);
  const users = new UserRepository(database.db, counters, new BcryptPasswordHasher(settings.bcryptRounds));
  const tasks = new TaskRepository(database.db, counters);
  const tokens = new TokenService({
    secret: settings.secretKey,
    lifetimeMinutes: settings.accessTokenExpireMinutes,
    clock: overrides.clock,
  });

  return {
    settings,
    logger,
    database,
    counters,
    users,
    tasks,
    comments: new InMemoryCommentRepository(),
    tokens,
    auth: new AuthService(users, tokens),
    notifications: new NotificationService(new InMemoryNotificationRepository(), logger, overrides.clock),
    close: () => database.sqlite.close(),
  };
}
