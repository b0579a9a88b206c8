import { describe, it, expect } from 'vitest';
import { createLogger, createScopedLogger, isLogLevel, type StructuredLogEntry } from '../index.js';

function capture() {
  const entries: StructuredLogEntry[] = [];
  const lines: string[] = [];
  return {
    entries,
    lines,
    sink: (entry: StructuredLogEntry, formatted: string) => {
      entries.push(entry);
      lines.push(formatted);
    },
  };
}

describe('createLogger', () => {
  it('drops entries below the minimum level', () => {
    const out = capture();
    const logger = createLogger({ minLevel: 'warn', sink: out.sink });

    logger.info('hidden');
    logger.warn('shown');

    expect(out.entries.map((e) => e.message)).toEqual(['shown']);
    expect(out.entries[0].level).toBe('warn');
  });

  it('emits one JSON document per entry in json format', () => {
    const out = capture();
    const logger = createLogger({ format: 'json', minLevel: 'trace', sink: out.sink });

    logger.debug('parsed row', { caseId: '4' });

    const parsed: unknown = JSON.parse(out.lines[0]);
    expect(parsed).toMatchObject({ level: 'debug', message: 'parsed row', context: { caseId: '4' } });
  });

  it('merges child context over the parent scope', () => {
    const out = capture();
    const logger = createScopedLogger('evaluation', { sink: out.sink, minLevel: 'info' });

    logger.child({ caseId: '12' }).warn('skipped');

    expect(out.entries[0].context).toEqual({ scope: 'evaluation', caseId: '12' });
  });

  it('renders scope, message and extra context in pretty format', () => {
    const out = capture();
    const logger = createScopedLogger('classifier', { format: 'pretty', sink: out.sink, minLevel: 'info' });

    logger.info('classified', { caseId: '3' });

    expect(out.lines[0]).toBe('\x1b[34m[INFO] \x1b[0m [classifier] classified caseId=3');
  });

  it('attaches error details to error entries', () => {
    const out = capture();
    const logger = createLogger({ sink: out.sink, minLevel: 'error' });

    logger.error('request failed', new Error('socket hang up'));

    expect(out.entries[0].error).toMatchObject({ name: 'Error', message: 'socket hang up' });
  });
});

describe('isLogLevel', () => {
  it('accepts known levels only', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
