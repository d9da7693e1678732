import type { LoggerOptions } from 'pino';
import { stdTimeFunctions } from 'pino';
import type { LogLevel } from './config/serviceConfig';

export const SERVICE_NAME = 'gridvfs';

/** Grid identities carried in error details stay out of the log stream. */
export const REDACTED_FIELDS = ['err.details.owner', 'err.details.identity'];

export function createServiceLoggerOptions(level: LogLevel): LoggerOptions {
  return {
    level,
    base: { service: SERVICE_NAME },
    timestamp: stdTimeFunctions.isoTime,
    redact: { paths: REDACTED_FIELDS, censor: '[redacted]' }
  };
}
