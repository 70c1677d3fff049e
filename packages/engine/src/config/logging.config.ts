import { Logger } from '@nestjs/common';
import type { LogLevel } from '@nestjs/common';

/** Most severe first */
const LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];

/**
 * Enable `level` and everything more severe for every engine logger
 */
export function configureLogging(level: LogLevel): LogLevel[] {
  const enabled = LEVELS.slice(0, LEVELS.indexOf(level) + 1);
  Logger.overrideLogger(enabled);
  return enabled;
}
