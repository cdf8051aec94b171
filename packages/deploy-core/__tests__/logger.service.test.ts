import { describe, expect, it } from 'vitest';

import { LoggerService, type LogLevel, type LogRecord } from '../src/logger.service';

function captureLogger(level: LogLevel = 'debug') {
  const records: LogRecord[] = [];
  const payloads: string[] = [];
  const logger = new LoggerService({
    level,
    sink: (_level, payload, record) => {
      payloads.push(payload);
      records.push(record);
    },
  });
  return { logger, records, payloads };
}

describe('LoggerService', () => {
  it('merges a single plain context object into the record', () => {
    const { logger, records } = captureLogger();

    logger.info('node deployed', { nodeId: 'n-1', address: '172.18.0.2' });

    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({ level: 'info', message: 'node deployed', nodeId: 'n-1', address: '172.18.0.2' });
  });

  it('drops records below the configured level', () => {
    const { logger, records } = captureLogger('warn');

    logger.debug('noise');
    logger.info('more noise');
    logger.warn('kept');
    logger.error('kept too');

    expect(records.map((r) => r.message)).toEqual(['kept', 'kept too']);
  });

  it('carries child bindings on every record', () => {
    const { logger, records } = captureLogger();
    const child = logger.child({ component: 'NodeController' }).child({ nodeId: 'n-2' });

    child.debug('removing node');

    expect(records[0]).toMatchObject({ component: 'NodeController', nodeId: 'n-2', message: 'removing node' });
  });

  it('redacts secrets by key and bearer values', () => {
    const { logger, records } = captureLogger();

    logger.info('request', { password: 'test-secret', header: 'Bearer abc.def' });

    expect(records[0].password).toBe('[REDACTED]');
    expect(records[0].header).toBe('Bearer [REDACTED]');
  });

  it('keeps multiple params under context and flattens errors', () => {
    const { logger, records } = captureLogger();
    const err = new Error('outer', { cause: new Error('inner') });

    logger.error('failed', 'first', err);

    const context = records[0].context as Array<unknown>;
    expect(context[0]).toBe('first');
    expect(context[1]).toMatchObject({ name: 'Error', message: 'outer', cause: { message: 'inner' } });
  });

  it('emits one JSON line per record', () => {
    const { logger, payloads } = captureLogger();

    logger.warn('expiry unknown', { nodeId: 'n-3' });

    const parsed = JSON.parse(payloads[0]) as Record<string, unknown>;
    expect(parsed.level).toBe('warn');
    expect(parsed.nodeId).toBe('n-3');
    expect(typeof parsed.ts).toBe('string');
  });

  it('marks circular references', () => {
    const { logger, records } = captureLogger();
    const loop: Record<string, unknown> = { name: 'loop' };
    loop.self = loop;

    logger.info('circular', { loop });

    expect(records[0].loop).toEqual({ name: 'loop', self: '[Circular]' });
  });
});
