import { afterEach, describe, expect, it, vi } from 'vitest';
import type { LogRecord } from './logger';
import { Logger, LogLevel, formatJsonRecord, resolveDefaultLevel, resolveDefaultSink, consoleSink, jsonSink } from './logger';

describe('resolveDefaultLevel', () => {
  it('honours LOG_LEVEL over NODE_ENV', () => {
    expect(resolveDefaultLevel({ LOG_LEVEL: 'Info', NODE_ENV: 'test' })).toBe(LogLevel.INFO);
  });

  it('is silent under test', () => {
    expect(resolveDefaultLevel({ NODE_ENV: 'test' })).toBe(LogLevel.SILENT);
  });

  it('shows warnings in production', () => {
    expect(resolveDefaultLevel({ NODE_ENV: 'production' })).toBe(LogLevel.WARN);
  });

  it('ignores unknown level names', () => {
    expect(resolveDefaultLevel({ LOG_LEVEL: 'verbose' })).toBe(LogLevel.DEBUG);
    expect(resolveDefaultLevel({ LOG_LEVEL: 'constructor' })).toBe(LogLevel.DEBUG);
  });
});

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prefixes messages with the chained module names', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const log = new Logger({ level: LogLevel.DEBUG }).child('morphing').child('cache');

    log.warn('evicted', 3);

    expect(warn).toHaveBeenCalledWith('[morphing:cache] evicted', 3);
  });

  it('drops messages below the configured level', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const log = new Logger({ level: LogLevel.WARN, prefix: 'engine' });

    log.info('hidden');
    log.setLevel(LogLevel.INFO);
    log.info('shown');

    expect(info).toHaveBeenCalledTimes(1);
    expect(info).toHaveBeenCalledWith('[engine] shown');
  });

  it('shares level and sink with its children', () => {
    const records: LogRecord[] = [];
    const root = new Logger({ level: LogLevel.ERROR, sink: (record) => records.push(record) });
    const child = root.child('aligner');

    child.warn('dropped');
    root.setLevel(LogLevel.DEBUG);
    child.debug('kept', { offset: 2 });

    expect(records).toEqual([{ level: LogLevel.DEBUG, module: 'aligner', message: 'kept', args: [{ offset: 2 }] }]);
    expect(child.isEnabled(LogLevel.DEBUG)).toBe(true);
  });
});

describe('formatJsonRecord', () => {
  it('writes one JSON object with optional fields left out', () => {
    const time = new Date('2024-01-02T03:04:05.000Z');
    expect(formatJsonRecord({ level: LogLevel.WARN, module: '', message: 'hello', args: [] }, time)).toBe(
      '{"time":"2024-01-02T03:04:05.000Z","level":"warn","message":"hello"}'
    );
  });

  it('keeps the name and message of errors', () => {
    const line = formatJsonRecord(
      { level: LogLevel.ERROR, module: 'cache', message: 'failed', args: [new RangeError('bad size')] },
      new Date(0)
    );
    expect(JSON.parse(line)).toEqual({
      time: '1970-01-01T00:00:00.000Z',
      level: 'error',
      module: 'cache',
      message: 'failed',
      context: [{ name: 'RangeError', message: 'bad size' }],
    });
  });
});

describe('resolveDefaultSink', () => {
  it('selects JSON lines from LOG_FORMAT', () => {
    expect(resolveDefaultSink({ LOG_FORMAT: 'JSON' })).toBe(jsonSink);
    expect(resolveDefaultSink({})).toBe(consoleSink);
  });
});
