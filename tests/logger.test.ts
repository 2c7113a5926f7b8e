import { LogEntry, LogLevel, createLogger, parseLogLevel, resetLogHandler, setLogHandler, setLogLevel } from '../src/logger';

describe('logger', () => {
  let entries: LogEntry[];

  beforeEach(() => {
    entries = [];
    setLogHandler((entry) => entries.push(entry));
  });

  afterEach(() => {
    resetLogHandler();
    setLogLevel(LogLevel.Info);
  });

  test('child loggers merge context', () => {
    const log = createLogger({ runId: 'run_1' }).child({ jobRunId: 'job_1' });
    log.info('Step started', { stepIndex: 2 });

    expect(entries).toHaveLength(1);
    expect(entries[0].level).toBe(LogLevel.Info);
    expect(entries[0].message).toBe('Step started');
    expect(entries[0].context).toEqual({ runId: 'run_1', jobRunId: 'job_1', stepIndex: 2 });
  });

  test('messages below the level are dropped', () => {
    setLogLevel(LogLevel.Warn);
    const log = createLogger();
    log.debug('a');
    log.info('b');
    log.warn('c');
    log.error('d');
    expect(entries.map((e) => e.message)).toEqual(['c', 'd']);
  });

  test('parseLogLevel', () => {
    expect(parseLogLevel(' Warn ')).toBe(LogLevel.Warn);
    expect(parseLogLevel('verbose')).toBeUndefined();
  });
});
