import { Request } from 'express';
import bcrypt from 'bcrypt';
import jwt from 'jsonwebtoken';
import { ApiError } from '../errors';
import { loadUsers } from '../../utils/io/users';
import { getConfig } from '../../utils/config/config';

const TOKEN_LIFETIME = '30d';

/**
 * Reads the user id from an `Authorization` header value.
 *
 * @returns The user id, or null when the token is missing, invalid or expired
 */
export function verifyAuthorization(token?: string): number | null {
  if (!token) {
    return null;
  }
  try {
    const decoded = jwt.verify(token, getConfig().jwtSecret);
    if (typeof decoded === 'object' && typeof decoded.userId === 'number') {
      return decoded.userId;
    }
    return null;
  } catch {
    return null;
  }
}

/**
 * Exchanges a username and password for a token valid for 30 days.
 *
 * @param request - Express request with `{ username, password }` in the body
 * @throws ApiError (401) if the credentials do not match a stored user
 */
export async function issueToken(request: Request): Promise<{ token: string }> {
  const { username, password } = request.body ?? {};
  if (typeof username !== 'string' || typeof password !== 'string') {
    throw new ApiError('username and password are required', 400);
  }

  const user = loadUsers().find((u) => u.username === username);
  if (!user || !(await bcrypt.compare(password, user.passwordHash))) {
    throw new ApiError('Invalid username or password', 401);
  }

  const token = jwt.sign({ userId: user.id }, getConfig().jwtSecret, { expiresIn: TOKEN_LIFETIME });
  return { token };
}

/**
 * @throws ApiError (401) if the request's token is not valid
 */
export function validateToken(request: Request): { userId: number } {
  const userId = verifyAuthorization(request.headers.authorization);
  if (userId === null) {
    throw new ApiError('Invalid token', 401);
  }
  return { userId };
}
