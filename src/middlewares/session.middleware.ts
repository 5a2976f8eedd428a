import { Request, Response, NextFunction, CookieOptions } from 'express';
import { config } from '@/config/app.config';
import { SESSION_COOKIE, generateSessionToken, verifySessionToken } from '@/lib/auth.utils';
import { Identity } from '@/models/auth.types';
import { Role, User } from '@/models/user.types';

// Extend Express Request type to include the authenticated identity
declare global {
  namespace Express {
    interface Request {
      identity?: Identity;
    }
  }
}

const cookieOptions = (): CookieOptions => ({
  httpOnly: true,
  sameSite: 'lax',
  secure: config.nodeEnv === 'production',
  path: '/',
});

export const startSession = (res: Response, user: User) => {
  const token = generateSessionToken({ user_id: user.id, username: user.username, role: user.role });
  res.cookie(SESSION_COOKIE, token, { ...cookieOptions(), maxAge: config.sessionTtlSeconds * 1000 });
};

export const clearSession = (res: Response) => {
  res.clearCookie(SESSION_COOKIE, cookieOptions());
};

/**
 * Reads the session cookie and attaches the identity it carries to the
 * request. A cookie that fails verification is cleared.
 */
export const loadSession = (req: Request, res: Response, next: NextFunction) => {
  const cookies: Record<string, unknown> = req.cookies ?? {};
  const token = cookies[SESSION_COOKIE];
  if (typeof token !== 'string' || token.length === 0) {
    return next();
  }

  const payload = verifySessionToken(token);
  if (!payload) {
    clearSession(res);
    return next();
  }

  req.identity = {
    userId: payload.user_id,
    username: payload.username,
    role: payload.role,
  };
  next();
};

export const requireSession = (req: Request, res: Response, next: NextFunction) => {
  if (!req.identity) {
    return res.redirect('/login');
  }
  next();
};

// Role-based guard; anyone else is sent back to the login page
export const requireRole = (...allowedRoles: Role[]) => {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!req.identity || !allowedRoles.includes(req.identity.role)) {
      return res.redirect('/login');
    }
    next();
  };
};
