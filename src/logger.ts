import winston from 'winston';
import { configure } from 'safe-stable-stringify';

const suppressedMessagePatterns = [
  /^\[HTTP\]\s+GET\s+\/health\b/i,
  /^\[HTTP\]\s+GET\s+\/arknights\/status\b/i
];

const stringify = configure({ circularValue: '[Circular]' });

type Primitive = string | number | boolean | null;

const isPrimitive = (value: unknown): value is Primitive =>
  value === null || ['string', 'number', 'boolean'].includes(typeof value);

/**
 * Flattens an error to its name, message, stack and primitive own fields
 * (`code`, `status`, `url`...). Client errors carry sockets and requests
 * that must never reach a transport.
 */
export const serializeError = (error: unknown) => {
  if (!(error instanceof Error)) {
    return error;
  }
  const serialized: Record<string, Primitive | undefined> = {
    name: error.name,
    message: error.message,
    stack: error.stack
  };
  Object.entries(error).forEach(([key, value]) => {
    if (isPrimitive(value)) {
      serialized[key] = value;
    }
  });
  if (error.cause instanceof Error) {
    serialized.cause = error.cause.message;
  }
  return serialized;
};

const splatSymbol = Symbol.for('splat');

const normalizeErrorsFormat = winston.format((info) => {
  const splat = info[splatSymbol];
  if (Array.isArray(splat)) {
    const errors = splat.filter((item) => item instanceof Error);
    if (errors.length > 0 && !info.error) {
      info.error = serializeError(errors[0]);
    }
  }
  Object.entries(info).forEach(([key, value]) => {
    if (value instanceof Error) {
      info[key] = serializeError(value);
    }
  });
  return info;
});

const suppressNoiseFormat = winston.format((info) => {
  const message = typeof info.message === 'string' ? info.message : '';
  const shouldSuppress = suppressedMessagePatterns.some((pattern) => pattern.test(message));
  return shouldSuppress ? false : info;
});

interface ConsoleInfo {
  level: string;
  message: unknown;
  [key: string]: unknown;
}

export const renderConsoleLine = ({ level, message, timestamp, ...meta }: ConsoleInfo): string => {
  const details = Object.keys(meta).length ? ` ${stringify(meta)}` : '';
  return `${String(timestamp)} [${level}]: ${String(message)}${details}`;
};

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  silent: process.env.LOG_SILENT === 'true',
  format: winston.format.combine(
    suppressNoiseFormat(),
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    normalizeErrorsFormat(),
    winston.format.json()
  ),
  defaultMeta: { service: 'copilot-backend' },
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(winston.format.colorize(), winston.format.printf(renderConsoleLine))
    })
  ]
});

export default logger;
