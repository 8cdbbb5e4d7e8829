import request from 'supertest';
import type { Express } from 'express';
import { createApp } from '../src/app';
import { loadSettings } from '../src/config';
import { buildContainer, type Container, type ContainerOverrides } from '../src/container';

export const PASSWORD = 'Secret123!';

export function testContainer(overrides: ContainerOverrides = {}): Container {
  const settings = loadSettings({
    DB_PATH: ':memory:',
    SECRET_KEY: 'test-secret',
    BCRYPT_ROUNDS: '4',
    LOG_LEVEL: 'silent',
  });
  return buildContainer(settings, overrides);
}

export function testApp(overrides: ContainerOverrides = {}): { app: Express; container: Container } {
  const container = testContainer(overrides);
  return { app: createApp(container), container };
}

export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  throw new Error('expected function to throw');
}

export async function catchRejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (e) {
    return e;
  }
  throw new Error('expected promise to reject');
}

export async function registerAndLogin(app: Express, username: string) {
  const email = `${username}@example.com`;
  const registered = await request(app)
    .post('/api/auth/register')
    .send({ email, username, password: PASSWORD });

  const login = await request(app).post('/api/auth/login').send({ email, password: PASSWORD });

  const id: number = registered.body.id;
  const token: string = login.body.access_token;
  return { id, email, token };
}
