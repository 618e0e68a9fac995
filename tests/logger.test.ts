import { StoreError, storeWriteError } from '../src/domain/errors';
import {
  LogEntry,
  LogLevel,
  createLogger,
  errorContext,
  parseLogLevel,
  resetLogging,
  setLogHandler,
  setLogLevel,
} from '../src/logger';

describe('logger', () => {
  let entries: LogEntry[];

  beforeEach(() => {
    entries = [];
    setLogHandler((entry) => entries.push(entry));
  });

  afterEach(() => {
    resetLogging();
  });

  it('merges parent and child context', () => {
    const log = createLogger({ component: 'test' }).child({ observer: 'PodObserver' });
    log.info('started watching', { testCaseId: 'tc_1' });

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      level: LogLevel.Info,
      message: 'started watching',
      context: { component: 'test', observer: 'PodObserver', testCaseId: 'tc_1' },
    });
  });

  it('drops entries below the minimum level', () => {
    const log = createLogger();
    log.debug('hidden');
    setLogLevel(LogLevel.Warn);
    log.info('hidden too');
    log.error('shown');

    expect(entries.map((e) => e.message)).toEqual(['shown']);
  });
});

describe('parseLogLevel', () => {
  it('accepts level names in any case', () => {
    expect(parseLogLevel('DEBUG')).toBe(LogLevel.Debug);
    expect(parseLogLevel('warning')).toBe(LogLevel.Warn);
    expect(parseLogLevel(' error ')).toBe(LogLevel.Error);
  });

  it('falls back for unknown or missing values', () => {
    expect(parseLogLevel(undefined)).toBe(LogLevel.Info);
    expect(parseLogLevel('trace', LogLevel.Error)).toBe(LogLevel.Error);
  });
});

describe('errorContext', () => {
  it('includes the typed error code when there is one', () => {
    const err = new StoreError(storeWriteError('save events', 'disk full'));
    expect(errorContext(err)).toEqual({ error: 'save events failed: disk full', code: 'STORE.WRITE_FAILED' });
  });

  it('handles plain errors and thrown values', () => {
    expect(errorContext(new Error('boom'))).toEqual({ error: 'boom' });
    expect(errorContext('boom')).toEqual({ error: 'boom' });
  });
});
