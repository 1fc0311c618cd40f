import { afterEach, describe, it, expect, vi } from 'vitest';
import { createLogger, formatLog } from '../../src/lib/logger';

const TIMESTAMP = '2026-01-01T00:00:00.000Z';

describe('formatLog', () => {
  it('prefixes timestamp, level and module', () => {
    expect(formatLog({ timestamp: TIMESTAMP, level: 'info', module: 'Exporter', message: 'Done' })).toBe(
      '[2026-01-01T00:00:00.000Z] [INFO] [Exporter] Done'
    );
  });

  it('appends data as JSON', () => {
    expect(
      formatLog({
        timestamp: TIMESTAMP,
        level: 'warn',
        module: 'Config',
        message: 'Odd size',
        data: { size: 17 },
      })
    ).toBe('[2026-01-01T00:00:00.000Z] [WARN] [Config] Odd size {"size":17}');
  });

  it('serializes errors by name and message', () => {
    const error = new Error('disk full');
    error.stack = 'stack';
    expect(
      formatLog({ timestamp: TIMESTAMP, level: 'error', module: 'Exporter', message: 'Failed', data: error })
    ).toBe('[2026-01-01T00:00:00.000Z] [ERROR] [Exporter] Failed {"name":"Error","message":"disk full","stack":"stack"}');
  });

  it('survives circular data', () => {
    const data: Record<string, unknown> = {};
    data.self = data;
    expect(formatLog({ timestamp: TIMESTAMP, level: 'debug', module: 'M', message: 'loop', data })).toBe(
      '[2026-01-01T00:00:00.000Z] [DEBUG] [M] loop [Unserializable data]'
    );
  });
});

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  it('routes each level to the matching console method', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const log = createLogger('Test');

    log.info('hello', { a: 1 });
    log.error('bad');

    expect(info).toHaveBeenCalledTimes(1);
    expect(info.mock.calls[0][0]).toMatch(/^\[[^\]]+Z\] \[INFO\] \[Test\] hello \{"a":1\}$/);
    expect(error.mock.calls[0][0]).toMatch(/\[ERROR\] \[Test\] bad$/);
  });

  it('drops debug output in production', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    vi.stubEnv('NODE_ENV', 'production');
    createLogger('Test').debug('hidden');
    expect(debug).not.toHaveBeenCalled();

    vi.stubEnv('NODE_ENV', 'development');
    createLogger('Test').debug('shown');
    expect(debug).toHaveBeenCalledTimes(1);
  });
});
