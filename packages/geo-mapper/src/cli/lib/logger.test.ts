import { describe, it, expect, vi, afterEach } from 'vitest';
import { createCLILogger, formatBytes, formatDuration } from './logger.js';

describe('CLILogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes JSON entries with command context to stderr', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createCLILogger({ json: true, level: 'debug' });

    logger.commandStart('inspect');
    logger.info('Verified map', { records: 3 });

    const entry: unknown = JSON.parse(String(stderr.mock.calls[1]?.[0]));
    expect(entry).toMatchObject({
      level: 'info',
      message: 'Verified map',
      service: 'geo-mapper',
      command: 'inspect',
      records: 3,
    });
  });

  it('drops entries below the configured level', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createCLILogger({ level: 'warn' });

    logger.info('hidden');
    logger.debug('hidden');
    logger.warn('shown');

    expect(stderr).toHaveBeenCalledTimes(1);
    expect(String(stderr.mock.calls[0]?.[0])).toContain('shown');
  });
});

describe('formatDuration', () => {
  it.each([
    [500, '500ms'],
    [1500, '1.50s'],
    [61000, '1m 1.0s'],
  ])('formats %i ms as %s', (ms, expected) => {
    expect(formatDuration(ms)).toBe(expected);
  });
});

describe('formatBytes', () => {
  it.each([
    [512, '512 B'],
    [2048, '2.00 KB'],
    [3 * 1024 * 1024, '3.00 MB'],
  ])('formats %i bytes as %s', (bytes, expected) => {
    expect(formatBytes(bytes)).toBe(expected);
  });
});
