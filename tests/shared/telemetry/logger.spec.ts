import { describe, expect, it, vi } from 'vitest';

import { createLogger, formatLog, redactSensitive, type LogSink } from '../../../shared/telemetry/logger';

describe('formatLog', () => {
  it('redacts user text and keeps the rest', () => {
    expect(
      formatLog({
        level: 'info',
        scope: 'assistant',
        message: 'm',
        build_id: 'b',
        ts: 1,
        data: { text: 'my secret swing thought', kind: 'navigate' },
      }),
    ).toBe('{"level":"info","scope":"assistant","message":"m","build_id":"b","ts":1,"data":{"text":"[redacted]","kind":"navigate"}}');
  });

  it('does not mutate the original entry', () => {
    const data = { rawInput: 'hello' };
    redactSensitive({ level: 'debug', scope: 's', message: 'm', build_id: 'b', ts: 0, data });
    expect(data.rawInput).toBe('hello');
  });
});

describe('createLogger', () => {
  it('writes structured lines at or above the minimum level', () => {
    const sink = vi.fn<LogSink>();
    const logger = createLogger('pipeline', { sink, buildId: 'test-build', minLevel: 'info', clock: () => 42 });

    logger.debug('dropped');
    logger.info('hello', { rawInput: 'x' });

    expect(sink).toHaveBeenCalledTimes(1);
    expect(sink.mock.calls[0]?.[0]).toBe(
      '{"level":"info","scope":"pipeline","message":"hello","build_id":"test-build","ts":42,"data":{"rawInput":"[redacted]"}}',
    );
  });

  it('nests child scopes', () => {
    const sink = vi.fn<LogSink>();
    createLogger('pipeline', { sink, clock: () => 0 }).child('classifier').warn('slow');
    expect(sink.mock.calls[0]?.[1]).toEqual({
      level: 'warn',
      scope: 'pipeline.classifier',
      message: 'slow',
      build_id: 'dev',
      ts: 0,
    });
  });

  it('survives a failing sink', () => {
    const logger = createLogger('pipeline', {
      sink: () => {
        throw new Error('disk full');
      },
    });
    expect(() => logger.error('boom')).not.toThrow();
  });
});
