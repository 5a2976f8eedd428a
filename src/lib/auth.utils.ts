import bcrypt from 'bcryptjs';
import jwt from 'jsonwebtoken';
import { config } from '@/config/app.config';
import { SessionPayload } from '@/models/auth.types';
import { ROLES, Role } from '@/models/user.types';

export const SESSION_COOKIE = 'session';

export const hashPassword = async (password: string): Promise<string> => {
  const salt = await bcrypt.genSalt(config.bcryptRounds);
  return bcrypt.hash(password, salt);
};

export const comparePasswords = async (password: string, hash: string): Promise<boolean> => {
  return bcrypt.compare(password, hash);
};

const isRole = (value: unknown): value is Role =>
  typeof value === 'string' && ROLES.some((role) => role === value);

export const generateSessionToken = (payload: SessionPayload): string => {
  return jwt.sign({ ...payload }, config.sessionSecret, { expiresIn: config.sessionTtlSeconds });
};

/**
 * Verifies a session token and returns its claims, or null when the token is
 * malformed, expired or signed with another secret.
 */
export const verifySessionToken = (token: string): SessionPayload | null => {
  try {
    const decoded = jwt.verify(token, config.sessionSecret);
    if (typeof decoded === 'string') {
      return null;
    }
    const { user_id, username, role } = decoded;
    if (typeof user_id !== 'number' || typeof username !== 'string' || !isRole(role)) {
      return null;
    }
    return { user_id, username, role };
  } catch {
    return null;
  }
};
