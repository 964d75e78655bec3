import { describe, it, expect, vi } from 'vitest';
import { Logger, LogLevel, createLogger, parseLogLevel, DEFAULT_SENSITIVE_FIELDS } from './logger';
import type { LogEntry, LogOutput } from './logger';

/** Create a logger whose output is captured into an array for inspection. */
function captureLogger(
  level: LogLevel = LogLevel.DEBUG,
  component?: string,
): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const output: LogOutput = (entry) => entries.push(entry);
  const logger = new Logger({ level, component, output });
  return { logger, entries };
}

describe('Logger — levels', () => {
  it('defaults to INFO', () => {
    expect(new Logger().getLevel()).toBe(LogLevel.INFO);
  });

  it('drops entries below the threshold', () => {
    const { logger, entries } = captureLogger(LogLevel.WARN);
    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');
    expect(entries.map((e) => e.level)).toEqual(['WARN', 'ERROR']);
  });

  it('SILENT suppresses everything', () => {
    const { logger, entries } = captureLogger(LogLevel.SILENT);
    logger.error('boom');
    expect(entries).toHaveLength(0);
  });

  it('setLevel changes the threshold at runtime', () => {
    const { logger, entries } = captureLogger(LogLevel.ERROR);
    logger.info('hidden');
    logger.setLevel(LogLevel.INFO);
    logger.info('shown');
    expect(entries).toHaveLength(1);
    expect(entries[0].message).toBe('shown');
  });

  it('writes JSON to console.log by default', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    new Logger().info('hello', { team: 'ops' });
    expect(spy).toHaveBeenCalledOnce();
    const parsed = JSON.parse(spy.mock.calls[0][0] as string);
    expect(parsed.message).toBe('hello');
    expect(parsed.team).toBe('ops');
    spy.mockRestore();
  });
});

describe('Logger — fields and components', () => {
  it('attaches context fields and the component', () => {
    const { logger, entries } = captureLogger(LogLevel.DEBUG, 'engine');
    logger.info('team optimized', { team: 'ops', members: 3 });
    expect(entries[0]).toMatchObject({
      level: 'INFO',
      message: 'team optimized',
      component: 'engine',
      team: 'ops',
      members: 3,
    });
    expect(typeof entries[0].timestamp).toBe('string');
  });

  it('child loggers extend the component path', () => {
    const { logger, entries } = captureLogger(LogLevel.DEBUG, 'engine');
    logger.child('reveal').info('x');
    expect(entries[0].component).toBe('engine.reveal');
  });

  it('fields cannot overwrite reserved keys', () => {
    const { logger, entries } = captureLogger();
    logger.info('real', { message: 'fake', level: 'NOPE' });
    expect(entries[0].message).toBe('real');
    expect(entries[0].level).toBe('INFO');
  });
});

describe('Logger — redaction', () => {
  it('redacts the default sensitive fields', () => {
    const { logger, entries } = captureLogger();
    logger.info('resolved', { requestId: 'r1', plaintext: '0000000400000006', proof: 'ab' });
    expect(entries[0].requestId).toBe('r1');
    expect(entries[0].plaintext).toBe('[redacted]');
    expect(entries[0].proof).toBe('[redacted]');
  });

  it('child loggers keep the redaction list', () => {
    const entries: LogEntry[] = [];
    const logger = createLogger({ output: (e) => entries.push(e), sensitiveFields: ['secret'] });
    logger.child('x').info('m', { secret: 1, plaintext: 2 });
    expect(entries[0].secret).toBe('[redacted]');
    expect(entries[0].plaintext).toBe(2);
  });

  it('lists plaintext and ciphertext as sensitive by default', () => {
    expect(DEFAULT_SENSITIVE_FIELDS).toContain('plaintext');
    expect(DEFAULT_SENSITIVE_FIELDS).toContain('ciphertext');
  });
});

describe('parseLogLevel', () => {
  it('maps configuration names case-insensitively', () => {
    expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel('WARN')).toBe(LogLevel.WARN);
    expect(parseLogLevel('silent')).toBe(LogLevel.SILENT);
  });

  it('returns undefined for unknown names', () => {
    expect(parseLogLevel('verbose')).toBeUndefined();
  });
});
