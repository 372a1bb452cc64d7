import type { Request, Response, NextFunction, RequestHandler } from 'express';
import logger from './logger';
import type { LoginUser } from './session-store';

export interface Authenticator {
  authenticate(bearer: string): Promise<LoginUser | null>;
}

const parseCookies = (header?: string | null): Record<string, string> => {
  const cookies: Record<string, string> = {};
  if (!header) {
    return cookies;
  }
  header.split(';').forEach((part) => {
    const [key, ...rest] = part.trim().split('=');
    if (!key) {
      return;
    }
    try {
      cookies[key] = decodeURIComponent(rest.join('='));
    } catch {
      cookies[key] = rest.join('=');
    }
  });
  return cookies;
};

export const getAccessTokenFromRequest = (req: Request): string | null => {
  const authHeader = req.header('authorization');
  if (authHeader && authHeader.startsWith('Bearer ')) {
    const token = authHeader.slice(7).trim();
    return token.length > 0 ? token : null;
  }
  const cookies = parseCookies(req.headers.cookie);
  if (cookies.accessToken) {
    return cookies.accessToken;
  }
  return null;
};

/**
 * Attaches `req.loginUser` when the request carries a valid session token and
 * rejects the request with 401 otherwise.
 */
export const requireAuthenticatedUser = (authenticator: Authenticator): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction) => {
    const token = getAccessTokenFromRequest(req);
    if (!token) {
      res.status(401).json({ error: 'Unauthorized' });
      return;
    }
    authenticator
      .authenticate(token)
      .then((loginUser) => {
        if (!loginUser) {
          res.status(401).json({ error: 'Unauthorized' });
          return;
        }
        req.loginUser = loginUser;
        next();
      })
      .catch((error: unknown) => {
        logger.error('[AUTH] Session lookup failed', error);
        res.status(500).json({ error: 'Internal server error' });
      });
  };
};

export const currentUser = (req: Request): LoginUser => {
  if (!req.loginUser) {
    throw new Error('requireAuthenticatedUser must run before this handler');
  }
  return req.loginUser;
};
