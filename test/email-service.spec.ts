import nodemailer from 'nodemailer';
import { describe, expect, it, vi } from 'vitest';
import { MemoryCache } from '../src/cache';
import { EmailService, generateNonce, generateVerificationCode } from '../src/email-service';
import { ApiError } from '../src/errors';
import { SessionStore } from '../src/session-store';

const setup = () => {
  const transport = nodemailer.createTransport({ jsonTransport: true });
  const sendMail = vi.spyOn(transport, 'sendMail');
  const cache = new MemoryCache();
  const sessions = new SessionStore(cache);
  const service = new EmailService(transport, sessions, {
    from: 'no-reply@example.test',
    publicBaseUrl: 'https://copilot.example.test',
    activationLinkTtlSeconds: 86400,
    verificationCodeTtlSeconds: 600,
    createCode: () => 'QX7K2M',
    createNonce: () => 'nonce123'
  });
  return { sendMail, cache, service };
};

describe('EmailService', () => {
  it('mails an activation link and remembers its nonce', async () => {
    const { sendMail, cache, service } = setup();

    await service.sendActivateUrl('reader@example.test');

    expect(await cache.get('UUID:nonce123')).toBe('reader@example.test');
    expect(sendMail).toHaveBeenCalledWith({
      from: 'no-reply@example.test',
      to: 'reader@example.test',
      subject: 'Activate your account',
      text: 'Open the following link to activate your account:\n\nhttps://copilot.example.test/user/activateAccount?nonce=nonce123\n'
    });
  });

  it('mails a verification code that expires with the configured ttl', async () => {
    const { sendMail, cache, service } = setup();

    await service.sendVCode('reader@example.test');

    expect(await cache.get('vCodeEmail:reader@example.test')).toBe('QX7K2M');
    expect(sendMail).toHaveBeenCalledWith(
      expect.objectContaining({ text: 'Your verification code is QX7K2M. It expires in 10 minutes.\n' })
    );
  });

  it('accepts the code in any case once and then forgets it', async () => {
    const { service } = setup();
    await service.sendVCode('reader@example.test');

    await expect(service.verifyVCode('reader@example.test', ' qx7k2m ')).resolves.toBeUndefined();
    await expect(service.verifyVCode('reader@example.test', 'QX7K2M')).rejects.toThrow(
      'Invalid or expired verification code'
    );
  });

  it('rejects a wrong code with a 400', async () => {
    const { service } = setup();
    await service.sendVCode('reader@example.test');

    const error = await service.verifyVCode('reader@example.test', 'AAAAAA').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ApiError);
    expect(error instanceof ApiError && error.statusCode).toBe(400);
  });
});

describe('code generators', () => {
  it('produces six upper-case alphanumerics', () => {
    expect(generateVerificationCode()).toMatch(/^[A-Z0-9]{6}$/);
  });

  it('produces dashless nonces', () => {
    expect(generateNonce()).toMatch(/^[0-9a-f]{32}$/);
  });
});
