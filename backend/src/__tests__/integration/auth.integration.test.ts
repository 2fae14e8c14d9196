/**
 * Integration Tests: Authentication Routes
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { RecordingEmailSender } from '../fixtures.js';
import { createTestApp, signUp, type TestApp } from './test-app.js';

describe('Auth routes', () => {
  let app: TestApp;

  beforeEach(async () => {
    app = await createTestApp();
  });

  afterEach(async () => {
    await app.server.close();
  });

  describe('POST /api/auth/register', () => {
    it('should register an account pending email verification', async () => {
      const response = await app.server.inject({
        method: 'POST',
        url: '/api/auth/register',
        payload: { username: 'alice', email: 'Alice@Example.com', password: 'password123' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        success: true,
        data: {
          message: 'Registration successful. Please check your email to verify your account.',
          requiresEmailVerification: true,
          email: 'alice@example.com',
        },
      });
    });

    it('should validate the request body', async () => {
      const response = await app.server.inject({
        method: 'POST',
        url: '/api/auth/register',
        payload: { username: 'alice', email: 'not-an-email', password: 'password123' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        success: false,
        error: { code: 'VALIDATION_ERROR', message: 'Invalid email format' },
      });
    });

    it('should refuse short passwords', async () => {
      const response = await app.server.inject({
        method: 'POST',
        url: '/api/auth/register',
        payload: { username: 'alice', email: 'alice@example.com', password: 'short' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error.message).toBe('Password must be at least 8 characters');
    });

    it('should refuse passwords longer than 72 bytes even under 72 characters', async () => {
      const password = 'é'.repeat(36) + 'A'.repeat(36);

      const response = await app.server.inject({
        method: 'POST',
        url: '/api/auth/register',
        payload: { username: 'alice', email: 'alice@example.com', password },
      });

      expect(password).toHaveLength(72);
      expect(response.statusCode).toBe(400);
      expect(response.json().error).toEqual({ code: 'VALIDATION_ERROR', message: 'Password must be at most 72 bytes' });
      expect(app.users.users.size).toBe(0);
    });

    it('should accept a multibyte password of exactly 72 bytes', async () => {
      const response = await app.server.inject({
        method: 'POST',
        url: '/api/auth/register',
        payload: { username: 'alice', email: 'alice@example.com', password: 'é'.repeat(36) },
      });

      expect(response.statusCode).toBe(200);
    });

    it('should answer 403 when registration is closed', async () => {
      const closed = await createTestApp({ ALLOW_REGISTRATION: 'false' });

      const response = await closed.server.inject({
        method: 'POST',
        url: '/api/auth/register',
        payload: { username: 'alice', email: 'alice@example.com', password: 'password123' },
      });
      await closed.server.close();

      expect(response.statusCode).toBe(403);
      expect(response.json().error.code).toBe('REGISTRATION_DISABLED');
    });

    it('should answer 409 for a verified email', async () => {
      await signUp(app, 'alice@example.com');

      const response = await app.server.inject({
        method: 'POST',
        url: '/api/auth/register',
        payload: { username: 'alice', email: 'alice@example.com', password: 'password123' },
      });

      expect(response.statusCode).toBe(409);
      expect(response.json().error.code).toBe('EMAIL_EXISTS');
    });
  });

  describe('email verification and login', () => {
    it('should refuse login before verification and accept it after', async () => {
      await app.server.inject({
        method: 'POST',
        url: '/api/auth/register',
        payload: { username: 'alice', email: 'alice@example.com', password: 'password123' },
      });
      const credentials = { email: 'alice@example.com', password: 'password123' };

      const before = await app.server.inject({ method: 'POST', url: '/api/auth/login', payload: credentials });
      expect(before.statusCode).toBe(403);
      expect(before.json().error.code).toBe('EMAIL_NOT_VERIFIED');

      const token = RecordingEmailSender.tokenOf(app.email.verificationLinks[0]);
      const verify = await app.server.inject({
        method: 'GET',
        url: `/api/auth/verify-email?token=${encodeURIComponent(token)}`,
      });
      expect(verify.statusCode).toBe(200);

      const after = await app.server.inject({ method: 'POST', url: '/api/auth/login', payload: credentials });
      expect(after.statusCode).toBe(200);
      expect(after.json().data).toMatchObject({ email: 'alice@example.com', roles: ['Admin'] });
    });

    it('should answer 400 for an unknown verification token', async () => {
      const response = await app.server.inject({ method: 'GET', url: '/api/auth/verify-email?token=unknown' });

      expect(response.statusCode).toBe(400);
      expect(response.json().error.code).toBe('INVALID_TOKEN');
    });

    it('should answer 401 with one message for bad credentials', async () => {
      await signUp(app, 'alice@example.com');

      const wrongPassword = await app.server.inject({
        method: 'POST',
        url: '/api/auth/login',
        payload: { email: 'alice@example.com', password: 'wrong-password' },
      });
      const unknownEmail = await app.server.inject({
        method: 'POST',
        url: '/api/auth/login',
        payload: { email: 'bob@example.com', password: 'password123' },
      });

      expect(wrongPassword.statusCode).toBe(401);
      expect(unknownEmail.statusCode).toBe(401);
      expect(wrongPassword.json()).toEqual(unknownEmail.json());
      expect(wrongPassword.json().error).toEqual({ code: 'INVALID_CREDENTIALS', message: 'Invalid email or password' });
    });
  });

  describe('password reset', () => {
    it('should reset the password through the emailed link', async () => {
      await signUp(app, 'alice@example.com');

      const forgot = await app.server.inject({
        method: 'POST',
        url: '/api/auth/forgot-password',
        payload: { email: 'alice@example.com' },
      });
      const forgotUnknown = await app.server.inject({
        method: 'POST',
        url: '/api/auth/forgot-password',
        payload: { email: 'bob@example.com' },
      });
      expect(forgot.statusCode).toBe(200);
      expect(forgot.json()).toEqual(forgotUnknown.json());

      const reset = await app.server.inject({
        method: 'POST',
        url: '/api/auth/reset-password',
        payload: { token: RecordingEmailSender.tokenOf(app.email.resetLinks[0]), newPassword: 'new-password-456' },
      });
      expect(reset.statusCode).toBe(200);

      const login = await app.server.inject({
        method: 'POST',
        url: '/api/auth/login',
        payload: { email: 'alice@example.com', password: 'new-password-456' },
      });
      expect(login.statusCode).toBe(200);
    });

    it('should refuse a new password longer than 72 bytes and keep the reset token usable', async () => {
      await signUp(app, 'alice@example.com');
      await app.server.inject({ method: 'POST', url: '/api/auth/forgot-password', payload: { email: 'alice@example.com' } });
      const token = RecordingEmailSender.tokenOf(app.email.resetLinks[0]);

      const tooLong = await app.server.inject({
        method: 'POST',
        url: '/api/auth/reset-password',
        payload: { token, newPassword: 'é'.repeat(36) + 'A'.repeat(36) },
      });
      const valid = await app.server.inject({
        method: 'POST',
        url: '/api/auth/reset-password',
        payload: { token, newPassword: 'new-password-456' },
      });

      expect(tooLong.statusCode).toBe(400);
      expect(tooLong.json().error.message).toBe('Password must be at most 72 bytes');
      expect(valid.statusCode).toBe(200);
    });
  });

  describe('authenticated endpoints', () => {
    it('should return the profile for a bearer token', async () => {
      const token = await signUp(app, 'alice@example.com');

      const response = await app.server.inject({
        method: 'GET',
        url: '/api/auth/profile',
        headers: { authorization: `Bearer ${token}` },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json().data).toMatchObject({
        username: 'alice',
        email: 'alice@example.com',
        roles: ['Admin'],
        isEmailVerified: true,
      });
    });

    it('should describe the current principal', async () => {
      const token = await signUp(app, 'alice@example.com');
      const userId = [...app.users.users.values()][0]?.id;

      const response = await app.server.inject({
        method: 'GET',
        url: '/api/auth/me',
        headers: { authorization: `Bearer ${token}` },
      });

      expect(response.json()).toEqual({
        success: true,
        data: { subjectId: userId, label: 'alice@example.com', roles: ['Admin'], method: 'token' },
      });
    });

    it('should answer 401 to anonymous callers', async () => {
      const response = await app.server.inject({ method: 'GET', url: '/api/auth/me' });

      expect(response.statusCode).toBe(401);
      expect(response.json().error.code).toBe('UNAUTHORIZED');
    });
  });

  describe('auth cookie', () => {
    it('should set an http-only cookie that authenticates later requests', async () => {
      const token = await signUp(app, 'alice@example.com');

      const set = await app.server.inject({ method: 'POST', url: '/api/auth/cookie', payload: { token } });
      const cookie = set.cookies.find(c => c.name === 'AuthToken');

      expect(set.statusCode).toBe(200);
      expect(cookie).toMatchObject({ value: token, httpOnly: true, sameSite: 'Strict', maxAge: 3600, path: '/' });

      const me = await app.server.inject({ method: 'GET', url: '/api/auth/me', cookies: { AuthToken: token } });
      expect(me.json().data.method).toBe('token');
    });

    it('should refuse an empty token', async () => {
      const response = await app.server.inject({ method: 'POST', url: '/api/auth/cookie', payload: { token: '' } });

      expect(response.statusCode).toBe(400);
      expect(response.json().error).toEqual({ code: 'VALIDATION_ERROR', message: 'Token is required' });
    });

    it('should clear the cookie on logout', async () => {
      const response = await app.server.inject({ method: 'GET', url: '/api/auth/logout' });
      const cookie = response.cookies.find(c => c.name === 'AuthToken');

      expect(response.statusCode).toBe(200);
      expect(cookie?.value).toBe('');
    });
  });

  describe('rate limiting', () => {
    it('should throttle credential endpoints', async () => {
      const limited = await createTestApp({ AUTH_RATE_LIMIT_MAX: '2' });
      const send = () => limited.server.inject({
        method: 'POST',
        url: '/api/auth/forgot-password',
        payload: { email: 'bob@example.com' },
      });

      const statuses = [(await send()).statusCode, (await send()).statusCode, (await send()).statusCode];
      await limited.server.close();

      expect(statuses).toEqual([200, 200, 429]);
    });
  });
});
