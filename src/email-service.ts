import { randomInt } from 'node:crypto';
import nodemailer, { type Transporter } from 'nodemailer';
import { v4 as uuidv4 } from 'uuid';
import { ApiError } from './errors';
import logger from './logger';
import type { Settings } from './config/settings';
import type { SessionStore } from './session-store';

const CODE_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
const CODE_LENGTH = 6;

export const generateVerificationCode = (): string => {
  let code = '';
  for (let i = 0; i < CODE_LENGTH; i++) {
    code += CODE_ALPHABET[randomInt(CODE_ALPHABET.length)];
  }
  return code;
};

export const generateNonce = (): string => uuidv4().replace(/-/g, '');

export interface EmailServiceOptions {
  from: string;
  publicBaseUrl: string;
  activationLinkTtlSeconds: number;
  verificationCodeTtlSeconds: number;
  createCode?: () => string;
  createNonce?: () => string;
}

export const createMailTransport = (mail: Settings['mail']): Transporter => {
  if (!mail.host) {
    logger.warn('[MAIL] MAIL_HOST is not set; outgoing mail is only logged');
    return nodemailer.createTransport({ jsonTransport: true });
  }
  return nodemailer.createTransport({
    host: mail.host,
    port: mail.port,
    secure: mail.port === 465,
    auth: mail.user && mail.pass ? { user: mail.user, pass: mail.pass } : undefined
  });
};

export class EmailService {
  private readonly createCode: () => string;
  private readonly createNonce: () => string;

  constructor(
    private readonly transport: Transporter,
    private readonly sessions: SessionStore,
    private readonly options: EmailServiceOptions
  ) {
    this.createCode = options.createCode ?? generateVerificationCode;
    this.createNonce = options.createNonce ?? generateNonce;
  }

  async sendActivateUrl(email: string): Promise<void> {
    const nonce = this.createNonce();
    await this.sessions.putActivationNonce(nonce, email, this.options.activationLinkTtlSeconds);
    const link = `${this.options.publicBaseUrl}/user/activateAccount?nonce=${nonce}`;
    await this.send(
      email,
      'Activate your account',
      `Open the following link to activate your account:\n\n${link}\n`
    );
  }

  async sendVCode(email: string): Promise<void> {
    const code = this.createCode();
    await this.sessions.putVerificationCode(email, code, this.options.verificationCodeTtlSeconds);
    const minutes = Math.round(this.options.verificationCodeTtlSeconds / 60);
    await this.send(
      email,
      'Your verification code',
      `Your verification code is ${code}. It expires in ${minutes} minutes.\n`
    );
  }

  async verifyVCode(email: string, code: string): Promise<void> {
    const expected = await this.sessions.getVerificationCode(email);
    if (!expected || expected.toUpperCase() !== code.trim().toUpperCase()) {
      throw new ApiError(400, 'Invalid or expired verification code');
    }
    await this.sessions.removeVerificationCode(email);
  }

  private async send(to: string, subject: string, text: string): Promise<void> {
    const info: unknown = await this.transport.sendMail({
      from: this.options.from,
      to,
      subject,
      text
    });
    logger.debug('[MAIL] Message dispatched', { to, subject, info });
  }
}
