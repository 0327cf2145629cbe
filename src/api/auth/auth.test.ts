import { describe, it, expect, vi, beforeEach } from 'vitest';
import bcrypt from 'bcrypt';
import jwt from 'jsonwebtoken';

vi.mock('../../utils/io/users');
vi.mock('../../utils/config/config', () => ({
  getConfig: () => ({ jwtSecret: 'test-secret' }),
}));

import { loadUsers } from '../../utils/io/users';
import { issueToken, validateToken, verifyAuthorization } from './auth';
import { createMockRequest } from '../../utils/test/mockData';

const mockLoadUsers = vi.mocked(loadUsers);

describe('Auth API', () => {
  beforeEach(async () => {
    vi.clearAllMocks();
    mockLoadUsers.mockReturnValue([
      { id: 7, username: 'household', passwordHash: await bcrypt.hash('test-password', 4) },
    ]);
  });

  describe('issueToken', () => {
    it('should issue a token carrying the user id', async () => {
      const { token } = await issueToken(
        createMockRequest({ body: { username: 'household', password: 'test-password' } }),
      );

      expect(verifyAuthorization(token)).toBe(7);
    });

    it('should issue tokens valid for 30 days', async () => {
      const { token } = await issueToken(
        createMockRequest({ body: { username: 'household', password: 'test-password' } }),
      );
      const decoded = jwt.decode(token, { json: true });

      expect((decoded?.exp ?? 0) - (decoded?.iat ?? 0)).toBe(30 * 24 * 60 * 60);
    });

    it('should reject a wrong password', async () => {
      await expect(
        issueToken(createMockRequest({ body: { username: 'household', password: 'wrong' } })),
      ).rejects.toMatchObject({ statusCode: 401, message: 'Invalid username or password' });
    });

    it('should reject an unknown user', async () => {
      await expect(
        issueToken(createMockRequest({ body: { username: 'guest', password: 'test-password' } })),
      ).rejects.toMatchObject({ statusCode: 401 });
    });

    it('should require both fields', async () => {
      await expect(issueToken(createMockRequest({ body: { username: 'household' } }))).rejects.toMatchObject({
        statusCode: 400,
        message: 'username and password are required',
      });
    });
  });

  describe('verifyAuthorization', () => {
    it('should reject missing, foreign and malformed tokens', () => {
      expect(verifyAuthorization(undefined)).toBeNull();
      expect(verifyAuthorization(jwt.sign({ userId: 7 }, 'other-secret'))).toBeNull();
      expect(verifyAuthorization(jwt.sign({ name: 'household' }, 'test-secret'))).toBeNull();
      expect(verifyAuthorization('not-a-token')).toBeNull();
    });
  });

  describe('validateToken', () => {
    it('should return the user id for a valid token', () => {
      const request = createMockRequest({ headers: { authorization: jwt.sign({ userId: 7 }, 'test-secret') } });

      expect(validateToken(request)).toEqual({ userId: 7 });
    });

    it('should reject an invalid token with a 401', () => {
      expect(() => validateToken(createMockRequest())).toThrow('Invalid token');
    });
  });
});
