import { TypedError } from '../../domain/errors';
import { LogLevel, setLogHandler, setLogLevel } from '../../logger';

export type ErrorSummary = Pick<TypedError, 'code' | 'message'>;

export function printErrors(errors: ErrorSummary[]): void {
  for (const error of errors) {
    console.error(`error ${error.code}: ${error.message}`);
  }
}

/** Route structured logs to stderr so stdout carries only command output. */
export function logToStderr(verbose: boolean): void {
  setLogLevel(verbose ? LogLevel.Debug : LogLevel.Warn);
  setLogHandler((entry) => {
    process.stderr.write(`${JSON.stringify({ level: entry.level, ts: entry.timestamp, msg: entry.message, ...entry.context })}\n`);
  });
}
