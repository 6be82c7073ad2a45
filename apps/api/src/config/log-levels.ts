import { LogLevel } from '@nestjs/common';
import { AppLogLevel, LOG_LEVELS } from './env.validation';

/** Enabled levels for a threshold: 'log' also enables 'warn' and 'error'. Unknown values fall back to 'log'. */
export function logLevelsFrom(threshold: string | undefined): LogLevel[] {
  const index = LOG_LEVELS.findIndex((level: AppLogLevel) => level === threshold);
  return LOG_LEVELS.slice(0, index === -1 ? LOG_LEVELS.indexOf('log') + 1 : index + 1);
}
