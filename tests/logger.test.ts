import { describe, it, expect, afterEach, vi } from 'vitest';
import { createLogger, describeError } from '../src/lib/logger.js';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes one JSON entry per call', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-15T09:05:07.000Z'));
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    createLogger('info', 'test-service').info('Order saved', { orderId: 1001 });
    vi.useRealTimers();

    expect(log).toHaveBeenCalledWith(
      JSON.stringify({
        timestamp: '2024-01-15T09:05:07.000Z',
        level: 'info',
        message: 'Order saved',
        service: 'test-service',
        context: { orderId: 1001 },
      })
    );
  });

  it('drops entries below the minimum level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    const logger = createLogger('warn', 'test-service');
    logger.debug('hidden');
    logger.info('hidden');

    expect(log).not.toHaveBeenCalled();
  });

  it('sends errors to stderr and omits an empty context', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    createLogger('debug', 'test-service').error('Failed', {});

    expect(error).toHaveBeenCalledOnce();
    const entry: unknown = JSON.parse(String(error.mock.calls[0][0]));
    expect(entry).toMatchObject({ level: 'error', message: 'Failed', service: 'test-service' });
    expect(entry).not.toHaveProperty('context');
  });
});

describe('describeError', () => {
  it('uses the message of an Error', () => {
    expect(describeError(new Error('disk full'))).toBe('disk full');
  });

  it('stringifies anything else', () => {
    expect(describeError(42)).toBe('42');
  });
});
