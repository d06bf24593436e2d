import { describe, it, expect } from 'vitest';

import { createLogger, serializeError, type LogLevel } from '../logger';

function captureSink(): { lines: Array<{ level: LogLevel; entry: Record<string, unknown> }>; sink: (level: LogLevel, line: string) => void } {
  const lines: Array<{ level: LogLevel; entry: Record<string, unknown> }> = [];
  return {
    lines,
    sink: (level, line) => {
      const entry: Record<string, unknown> = JSON.parse(line);
      lines.push({ level, entry });
    },
  };
}

describe('createLogger', () => {
  it('writes one JSON entry with service, message and fields', () => {
    const { lines, sink } = captureSink();
    const logger = createLogger({ service: 'api', sink });

    logger.info('service created', { serviceId: 7, skipped: undefined });

    expect(lines).toHaveLength(1);
    expect(lines[0].level).toBe('info');
    expect(lines[0].entry.service).toBe('api');
    expect(lines[0].entry.message).toBe('service created');
    expect(lines[0].entry.serviceId).toBe(7);
    expect('skipped' in lines[0].entry).toBe(false);
    expect(typeof lines[0].entry.timestamp).toBe('string');
  });

  it('drops entries below the configured level', () => {
    const { lines, sink } = captureSink();
    const logger = createLogger({ service: 'api', level: 'warn', sink });

    logger.debug('noise');
    logger.info('noise');
    logger.warn('kept');
    logger.error('kept too');

    expect(lines.map((line) => line.level)).toEqual(['warn', 'error']);
  });

  it('child loggers merge base fields and keep the level', () => {
    const { lines, sink } = captureSink();
    const logger = createLogger({ service: 'api', level: 'info', base: { region: 'eu' }, sink });
    const child = logger.child({ requestId: 'req-1' });

    child.debug('hidden');
    child.info('visible', { step: 2 });

    expect(lines).toHaveLength(1);
    expect(lines[0].entry.region).toBe('eu');
    expect(lines[0].entry.requestId).toBe('req-1');
    expect(lines[0].entry.step).toBe(2);
  });
});

describe('serializeError', () => {
  it('extracts name and message from errors', () => {
    const fields = serializeError(new TypeError('bad input'));
    expect(fields.errorName).toBe('TypeError');
    expect(fields.errorMessage).toBe('bad input');
  });

  it('stringifies non-error values', () => {
    expect(serializeError('boom')).toEqual({ errorMessage: 'boom' });
  });
});
