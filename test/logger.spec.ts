import { afterEach, describe, expect, it } from 'vitest';
import logger, { renderConsoleLine, serializeError } from '../src/logger';

const circularSocket = () => {
  const socket: Record<string, unknown> = { remoteAddress: '127.0.0.1' };
  socket.self = socket;
  return socket;
};

describe('logger', () => {
  afterEach(() => {
    logger.silent = true;
  });

  it('renders circular metadata on the console line', () => {
    const socket = circularSocket();

    const line = renderConsoleLine({ level: 'error', message: 'boom', timestamp: 'T0', socket });

    expect(line).toBe('T0 [error]: boom {"socket":{"remoteAddress":"127.0.0.1","self":"[Circular]"}}');
  });

  it('omits the metadata block when there is none', () => {
    expect(renderConsoleLine({ level: 'info', message: 'ready', timestamp: 'T0' })).toBe('T0 [info]: ready');
  });

  it('keeps only the primitive fields of an error', () => {
    const error = Object.assign(new Error('connect refused', { cause: new Error('socket hang up') }), {
      code: 'ECONNREFUSED',
      status: null,
      request: circularSocket()
    });

    const serialized = serializeError(error);

    expect(serialized).toEqual({
      name: 'Error',
      message: 'connect refused',
      stack: error.stack,
      code: 'ECONNREFUSED',
      status: null,
      cause: 'socket hang up'
    });
  });

  it('passes non-errors through', () => {
    expect(serializeError('plain')).toBe('plain');
  });

  it('writes errors that reference themselves', () => {
    logger.silent = false;
    const error = Object.assign(new Error('loop'), { request: circularSocket() });

    expect(() => logger.error('[TEST] circular failure', { error, context: circularSocket() })).not.toThrow();
  });
});
