import { randomInt } from 'node:crypto';
import bcrypt from 'bcryptjs';
import jwt from 'jsonwebtoken';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { ApiError, USER_EXISTS_CODE, USER_NOT_FOUND_CODE } from './errors';
import logger from './logger';
import type { EmailService } from './email-service';
import { DuplicateUserError, type UserRecord, type UserRepository } from './repositories/user-repository';
import type { LoginUser, SessionStore } from './session-store';

const BCRYPT_ROUNDS = 10;
const SESSION_TOKEN_LENGTH = 16;
const TOKEN_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';

export const registerSchema = z.object({
  email: z.string().trim().toLowerCase().email(),
  userName: z.string().trim().min(1).max(32),
  password: z.string().min(8).max(64)
});

export const loginSchema = z.object({
  email: z.string().trim().toLowerCase().email(),
  password: z.string().min(1)
});

export const passwordSchema = z.object({
  password: z.string().min(8).max(64)
});

export const userInfoUpdateSchema = z.object({
  userName: z.string().trim().min(1).max(32)
});

export const activateSchema = z.object({
  token: z.string().trim().min(1)
});

export const emailSchema = z.object({
  email: z.string().trim().toLowerCase().email()
});

export const passwordResetSchema = z.object({
  email: z.string().trim().toLowerCase().email(),
  activeCode: z.string().trim().min(1),
  password: z.string().min(8).max(64)
});

export const activateAccountSchema = z.object({
  nonce: z.string().trim().min(1)
});

export type RegisterRequest = z.infer<typeof registerSchema>;
export type LoginRequest = z.infer<typeof loginSchema>;
export type UserInfoUpdateRequest = z.infer<typeof userInfoUpdateSchema>;
export type ActivateRequest = z.infer<typeof activateSchema>;
export type PasswordResetRequest = z.infer<typeof passwordResetSchema>;
export type ActivateAccountRequest = z.infer<typeof activateAccountSchema>;

export interface UserInfo {
  id: string;
  userName: string;
  activated: boolean;
}

export interface LoginResponse {
  token: string;
  validBefore: string;
  validAfter: string;
  refreshToken: string;
  refreshTokenValidBefore: string;
  userInfo: UserInfo;
}

const jwtPayloadSchema = z.object({
  userId: z.string(),
  token: z.string()
});

export type SessionClaims = z.infer<typeof jwtPayloadSchema>;

export const toUserInfo = (user: UserRecord): UserInfo => ({
  id: user.userId,
  userName: user.userName,
  activated: user.status === 1
});

export const generateSessionToken = (): string => {
  return Array.from({ length: SESSION_TOKEN_LENGTH }, () => TOKEN_ALPHABET[randomInt(TOKEN_ALPHABET.length)]).join('');
};

export interface UserServiceOptions {
  jwtSecret: string;
  jwtExpireSeconds: number;
  now?: () => number;
}

export class UserService {
  private readonly now: () => number;

  constructor(
    private readonly users: UserRepository,
    private readonly sessions: SessionStore,
    private readonly email: EmailService,
    private readonly options: UserServiceOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  async register(request: RegisterRequest): Promise<UserInfo> {
    const timestamp = this.now();
    const user: UserRecord = {
      userId: uuidv4(),
      userName: request.userName,
      email: request.email,
      password: await bcrypt.hash(request.password, BCRYPT_ROUNDS),
      status: 0,
      createdAt: timestamp,
      updatedAt: timestamp
    };
    try {
      await this.users.create(user);
    } catch (error) {
      if (error instanceof DuplicateUserError) {
        throw new ApiError(409, 'User already exists', USER_EXISTS_CODE);
      }
      throw error;
    }
    logger.info('[AUTH] Registered user', { userId: user.userId });
    await this.email.sendActivateUrl(user.email);
    return toUserInfo(user);
  }

  async login(request: LoginRequest): Promise<LoginResponse> {
    const user = await this.users.findByEmail(request.email);
    if (!user || !(await bcrypt.compare(request.password, user.password))) {
      throw new ApiError(401, 'Invalid email or password');
    }
    const session = await this.sessions.updateSession(
      { user, token: generateSessionToken() },
      (cached) => ({ user, token: cached.token || generateSessionToken() }),
      this.options.jwtExpireSeconds
    );
    logger.info('[AUTH] User signed in', { userId: user.userId });
    return this.issueToken(session);
  }

  /**
   * Re-signs a JWT for the caller's current session and extends its lifetime.
   */
  async refreshToken(loginUser: LoginUser): Promise<LoginResponse> {
    await this.sessions.setSession(loginUser, this.options.jwtExpireSeconds);
    return this.issueToken(loginUser);
  }

  async modifyPassword(loginUser: LoginUser, password: string): Promise<LoginResponse> {
    const user: UserRecord = {
      ...loginUser.user,
      password: await bcrypt.hash(password, BCRYPT_ROUNDS),
      updatedAt: this.now()
    };
    await this.users.save(user);
    // rotating the session token invalidates every JWT issued before the change
    const session: LoginUser = { user, token: generateSessionToken() };
    await this.sessions.setSession(session, this.options.jwtExpireSeconds);
    logger.info('[AUTH] Password changed', { userId: user.userId });
    return this.issueToken(session);
  }

  async updateUserInfo(loginUser: LoginUser, request: UserInfoUpdateRequest): Promise<UserInfo> {
    const user: UserRecord = { ...loginUser.user, userName: request.userName, updatedAt: this.now() };
    await this.users.save(user);
    await this.sessions.setSession({ ...loginUser, user }, this.options.jwtExpireSeconds);
    return toUserInfo(user);
  }

  async activateUser(loginUser: LoginUser, request: ActivateRequest): Promise<void> {
    if (loginUser.user.status === 1) {
      return;
    }
    await this.email.verifyVCode(loginUser.user.email, request.token);
    const user: UserRecord = { ...loginUser.user, status: 1, updatedAt: this.now() };
    await this.users.save(user);
    await this.sessions.setSession({ ...loginUser, user }, this.options.jwtExpireSeconds);
    logger.info('[AUTH] User activated by code', { userId: user.userId });
  }

  async sendEmailCode(loginUser: LoginUser): Promise<void> {
    if (loginUser.user.status !== 0) {
      throw new ApiError(400, 'User is already activated');
    }
    await this.email.sendVCode(loginUser.user.email);
  }

  async checkUserExistByEmail(email: string): Promise<void> {
    if (!(await this.users.findByEmail(email))) {
      throw new ApiError(404, 'User not found', USER_NOT_FOUND_CODE);
    }
  }

  async sendPasswordResetCode(email: string): Promise<void> {
    await this.checkUserExistByEmail(email);
    await this.email.sendVCode(email);
  }

  async modifyPasswordByActiveCode(request: PasswordResetRequest): Promise<void> {
    await this.email.verifyVCode(request.email, request.activeCode);
    const user = await this.users.findByEmail(request.email);
    if (!user) {
      throw new ApiError(404, 'User not found', USER_NOT_FOUND_CODE);
    }
    await this.modifyPassword({ user, token: '' }, request.password);
  }

  async activateAccount(request: ActivateAccountRequest): Promise<void> {
    const email = await this.sessions.getActivationEmail(request.nonce);
    if (!email) {
      throw new ApiError(400, 'Activation link has expired');
    }
    const user = await this.users.findByEmail(email);
    if (!user) {
      await this.sessions.removeActivationNonce(request.nonce);
      throw new ApiError(404, 'User not found', USER_NOT_FOUND_CODE);
    }
    if (user.status === 1) {
      await this.sessions.removeActivationNonce(request.nonce);
      return;
    }
    const activated: UserRecord = { ...user, status: 1, updatedAt: this.now() };
    await this.users.save(activated);
    await this.sessions.removeActivationNonce(request.nonce);

    const cached = await this.sessions.getSession(user.userId);
    if (cached) {
      await this.sessions.setSession({ ...cached, user: activated }, this.options.jwtExpireSeconds);
    }
    logger.info('[AUTH] User activated by link', { userId: user.userId });
  }

  /**
   * Resolves the cached session for a bearer JWT, or null when the token is
   * invalid, expired, or belongs to a session that was rotated away.
   */
  async authenticate(bearer: string): Promise<LoginUser | null> {
    let claims: SessionClaims;
    try {
      claims = jwtPayloadSchema.parse(
        jwt.verify(bearer, this.options.jwtSecret, { clockTimestamp: Math.floor(this.now() / 1000) })
      );
    } catch (error) {
      logger.debug('[AUTH] Rejected bearer token', { error: error instanceof Error ? error.message : error });
      return null;
    }
    const session = await this.sessions.getSession(claims.userId);
    if (!session || !session.token || session.token !== claims.token) {
      return null;
    }
    return session;
  }

  private issueToken(session: LoginUser): LoginResponse {
    const issuedAt = this.now();
    const expiresAt = issuedAt + this.options.jwtExpireSeconds * 1000;
    const token = jwt.sign(
      {
        userId: session.user.userId,
        token: session.token,
        iat: Math.floor(issuedAt / 1000),
        nbf: Math.floor(issuedAt / 1000),
        exp: Math.floor(expiresAt / 1000)
      },
      this.options.jwtSecret
    );
    return {
      token,
      validAfter: new Date(issuedAt).toISOString(),
      validBefore: new Date(expiresAt).toISOString(),
      refreshToken: '',
      refreshTokenValidBefore: '',
      userInfo: toUserInfo(session.user)
    };
  }
}
