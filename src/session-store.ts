import { z } from 'zod';
import type { KeyValueCache } from './cache';
import logger from './logger';
import type { UserRecord } from './repositories/user-repository';

const LOGIN_KEY_PREFIX = 'LOGIN:';
const NONCE_KEY_PREFIX = 'UUID:';
const VCODE_KEY_PREFIX = 'vCodeEmail:';

const loginUserSchema = z.object({
  token: z.string(),
  user: z.object({
    userId: z.string(),
    userName: z.string(),
    email: z.string(),
    password: z.string(),
    status: z.union([z.literal(0), z.literal(1)]),
    createdAt: z.number(),
    updatedAt: z.number()
  })
});

/**
 * Cached login state. `token` is the session token embedded in issued JWTs;
 * a JWT is only honoured while it matches the cached value.
 */
export interface LoginUser {
  user: UserRecord;
  token: string;
}

export const buildUserCacheKey = (userId: string) => `${LOGIN_KEY_PREFIX}${userId}`;

export class SessionStore {
  constructor(private readonly cache: KeyValueCache) {}

  async getSession(userId: string): Promise<LoginUser | null> {
    const raw = await this.cache.get(buildUserCacheKey(userId));
    if (!raw) {
      return null;
    }
    try {
      return loginUserSchema.parse(JSON.parse(raw));
    } catch (error) {
      logger.warn('[AUTH] Discarding unreadable session entry', { userId, error });
      await this.cache.del(buildUserCacheKey(userId));
      return null;
    }
  }

  async setSession(session: LoginUser, ttlSeconds: number): Promise<void> {
    await this.cache.set(buildUserCacheKey(session.user.userId), JSON.stringify(session), ttlSeconds);
  }

  /**
   * Read-modify-write of the cached session, starting from `fallback` when
   * nothing is cached yet.
   */
  async updateSession(
    fallback: LoginUser,
    updater: (current: LoginUser) => LoginUser,
    ttlSeconds: number
  ): Promise<LoginUser> {
    const current = (await this.getSession(fallback.user.userId)) ?? fallback;
    const next = updater(current);
    await this.setSession(next, ttlSeconds);
    return next;
  }

  async removeSession(userId: string): Promise<void> {
    await this.cache.del(buildUserCacheKey(userId));
  }

  async putActivationNonce(nonce: string, email: string, ttlSeconds: number): Promise<void> {
    await this.cache.set(`${NONCE_KEY_PREFIX}${nonce}`, email, ttlSeconds);
  }

  async getActivationEmail(nonce: string): Promise<string | null> {
    return this.cache.get(`${NONCE_KEY_PREFIX}${nonce}`);
  }

  async removeActivationNonce(nonce: string): Promise<void> {
    await this.cache.del(`${NONCE_KEY_PREFIX}${nonce}`);
  }

  async putVerificationCode(email: string, code: string, ttlSeconds: number): Promise<void> {
    await this.cache.set(`${VCODE_KEY_PREFIX}${email}`, code, ttlSeconds);
  }

  async getVerificationCode(email: string): Promise<string | null> {
    return this.cache.get(`${VCODE_KEY_PREFIX}${email}`);
  }

  async removeVerificationCode(email: string): Promise<void> {
    await this.cache.del(`${VCODE_KEY_PREFIX}${email}`);
  }
}
