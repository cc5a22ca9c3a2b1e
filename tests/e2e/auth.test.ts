import request from 'supertest';
import jwt from 'jsonwebtoken';

import { createTestToken, getTestApp, TestApp } from '../helpers';
import { ErrorCode } from '../../src/types/errors';

describe('Auth Endpoints', () => {
  let t: TestApp;

  beforeEach(() => {
    t = getTestApp();
  });

  describe('GET /auth/me', () => {
    it('should return the caller named by the token', async () => {
      const response = await request(t.app).get('/auth/me').set('Authorization', `Bearer ${createTestToken('alice')}`);

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ success: true, data: { caller: 'alice' } });
    });

    it('should reject a request without an authorization header', async () => {
      const response = await request(t.app).get('/auth/me');

      expect(response.status).toBe(401);
      expect(response.body.error.code).toBe(ErrorCode.UNAUTHORIZED);
      expect(response.body.error.message).toBe('No authorization header provided');
    });

    it('should reject a non-bearer scheme', async () => {
      const response = await request(t.app).get('/auth/me').set('Authorization', 'Basic YWxpY2U6c2VjcmV0');

      expect(response.status).toBe(401);
      expect(response.body.error.message).toBe('Invalid authorization format. Use: Bearer <token>');
    });

    it('should reject a token signed with another secret', async () => {
      const token = createTestToken('alice', { secret: 'other-secret' });

      const response = await request(t.app).get('/auth/me').set('Authorization', `Bearer ${token}`);

      expect(response.status).toBe(401);
      expect(response.body.error.code).toBe(ErrorCode.INVALID_TOKEN);
    });

    it('should reject an expired token', async () => {
      const token = jwt.sign({ sub: 'alice', exp: Math.floor(Date.now() / 1000) - 60 }, 'test-secret');

      const response = await request(t.app).get('/auth/me').set('Authorization', `Bearer ${token}`);

      expect(response.status).toBe(401);
      expect(response.body.error.code).toBe(ErrorCode.TOKEN_EXPIRED);
    });
  });
});
