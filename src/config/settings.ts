import 'dotenv/config';

const opt = (name: string): string | undefined => {
  const value = process.env[name];
  return value && value.trim() ? value.trim() : undefined;
};

const optInt = (name: string, fallback: number): number => {
  const value = opt(name);
  if (!value) return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Invalid positive integer for ${name}: ${value}`);
  }
  return parsed;
};

const optBool = (name: string, fallback: boolean): boolean => {
  const value = opt(name);
  if (!value) return fallback;
  if (['1', 'true', 'yes', 'on'].includes(value.toLowerCase())) return true;
  if (['0', 'false', 'no', 'off'].includes(value.toLowerCase())) return false;
  throw new Error(`Invalid boolean for ${name}: ${value}`);
};

const CACHE_DRIVERS = ['redis', 'memory'] as const;
export type CacheDriver = (typeof CACHE_DRIVERS)[number];

const isCacheDriver = (value: string): value is CacheDriver =>
  CACHE_DRIVERS.some((driver) => driver === value);

export interface Settings {
  port: number;
  awsRegion: string;
  adminToken: string | null;
  publicBaseUrl: string;
  jwt: {
    secret: string;
    expireSeconds: number;
  };
  cache: {
    driver: CacheDriver;
    redisUrl: string;
  };
  mail: {
    host: string | null;
    port: number;
    user: string | null;
    pass: string | null;
    from: string;
    activationLinkTtlSeconds: number;
    verificationCodeTtlSeconds: number;
  };
  gameData: {
    baseUrl: string;
    syncEnabled: boolean;
    syncIntervalMs: number;
    fetchTimeoutMs: number;
  };
}

const DEFAULT_GAME_DATA_BASE_URL =
  'https://raw.githubusercontent.com/Kengxxiao/ArknightsGameData/master/zh_CN/gamedata/excel';

export const loadSettings = (): Settings => {
  const secret = opt('JWT_SECRET');
  if (!secret) {
    throw new Error('JWT_SECRET environment variable is required');
  }
  const cacheDriver = (opt('CACHE_DRIVER') ?? 'redis').toLowerCase();
  if (!isCacheDriver(cacheDriver)) {
    throw new Error(`Invalid value for CACHE_DRIVER: ${cacheDriver}. Allowed: ${CACHE_DRIVERS.join(', ')}`);
  }

  return {
    port: optInt('PORT', 3000),
    awsRegion: opt('AWS_REGION') ?? 'us-east-1',
    adminToken: opt('ADMIN_TOKEN') ?? null,
    publicBaseUrl: (opt('PUBLIC_BASE_URL') ?? 'http://localhost:3000').replace(/\/+$/, ''),
    jwt: {
      secret,
      expireSeconds: optInt('JWT_EXPIRE', 21600)
    },
    cache: {
      driver: cacheDriver,
      redisUrl: opt('REDIS_URL') ?? 'redis://localhost:6379'
    },
    mail: {
      host: opt('MAIL_HOST') ?? null,
      port: optInt('MAIL_PORT', 587),
      user: opt('MAIL_USER') ?? null,
      pass: opt('MAIL_PASS') ?? null,
      from: opt('MAIL_FROM') ?? 'no-reply@localhost',
      activationLinkTtlSeconds: optInt('ACTIVATION_LINK_TTL', 86400),
      verificationCodeTtlSeconds: optInt('VCODE_TTL', 600)
    },
    gameData: {
      baseUrl: (opt('GAME_DATA_BASE_URL') ?? DEFAULT_GAME_DATA_BASE_URL).replace(/\/+$/, ''),
      syncEnabled: optBool('GAME_DATA_SYNC_ENABLED', true),
      syncIntervalMs: optInt('GAME_DATA_SYNC_INTERVAL_MS', 60 * 60 * 1000),
      fetchTimeoutMs: optInt('GAME_DATA_FETCH_TIMEOUT_MS', 30000)
    }
  };
};
