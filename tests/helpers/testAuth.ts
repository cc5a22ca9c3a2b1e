import request from 'supertest';
import jwt from 'jsonwebtoken';
import { Application } from 'express';

export const TEST_JWT_SECRET = 'test-secret';

/**
 * Sign a bearer token the way the upstream identity provider would
 */
export const createTestToken = (
  caller: string,
  options: { secret?: string; expiresIn?: number } = {}
): string =>
  jwt.sign({ sub: caller }, options.secret ?? TEST_JWT_SECRET, {
    expiresIn: options.expiresIn ?? 3600,
  });

export const authenticatedRequest = (app: Application, caller: string) => {
  const token = createTestToken(caller);
  return {
    get: (url: string) => request(app).get(url).set('Authorization', `Bearer ${token}`),
    post: (url: string) => request(app).post(url).set('Authorization', `Bearer ${token}`),
  };
};
