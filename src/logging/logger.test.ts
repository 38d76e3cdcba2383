/**
 * tierdata — Logger tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConsoleLogger, formatLogLine } from './logger.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('ConsoleLogger', () => {
  it('drops entries below the minimum level', () => {
    const logger = new ConsoleLogger({ outputToConsole: false });
    logger.debug('hidden');
    logger.info('shown', { sources: 3 });

    expect(logger.entries).toHaveLength(1);
    expect(logger.entries[0]).toMatchObject({ level: 'info', message: 'shown', fields: { sources: 3 } });
  });

  it('keeps debug entries when asked to', () => {
    const logger = new ConsoleLogger({ minLevel: 'debug', outputToConsole: false });
    logger.debug('step');
    expect(logger.entries.map((entry) => entry.level)).toEqual(['debug']);
  });

  it('copies the fields it is given', () => {
    const logger = new ConsoleLogger({ outputToConsole: false });
    const fields: Record<string, unknown> = { a: 1 };
    logger.warn('careful', fields);
    fields['a'] = 2;
    expect(logger.entries[0]?.fields).toEqual({ a: 1 });
  });

  it('stamps entries with an ISO timestamp', () => {
    const logger = new ConsoleLogger({ outputToConsole: false });
    logger.info('now');
    const timestamp = logger.entries[0]?.timestamp ?? '';
    expect(new Date(timestamp).toISOString()).toBe(timestamp);
  });

  it('sends warnings and errors to stderr and the rest to stdout', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = new ConsoleLogger();

    logger.info('one');
    logger.warn('two');
    logger.error('three');

    expect(log).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledTimes(2);
    expect(String(log.mock.calls[0]?.[0])).toContain('one');
  });
});

describe('formatLogLine', () => {
  it('renders level, message and fields', () => {
    expect(formatLogLine({ level: 'error', message: 'failed', timestamp: '', fields: { code: 'IO_ERROR' } })).toBe(
      '[ERROR] failed {"code":"IO_ERROR"}',
    );
  });

  it('omits absent fields', () => {
    expect(formatLogLine({ level: 'info', message: 'done', timestamp: '' })).toBe('[INFO] done');
  });

  it('applies the colour to the level tag only', () => {
    const line = formatLogLine({ level: 'warn', message: 'x', timestamp: '' }, (text) => `<${text}>`);
    expect(line).toBe('<[WARN]> x');
  });
});
