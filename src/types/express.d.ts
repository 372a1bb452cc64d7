import type { LoginUser } from '../session-store';

declare global {
  namespace Express {
    interface Request {
      /** Set by requireAuthenticatedUser. */
      loginUser?: LoginUser;
      requestId?: string;
    }
  }
}

export {};
