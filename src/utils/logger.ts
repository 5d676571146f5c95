/**
 * Structured logger (pino)
 *
 * Level comes from LOG_LEVEL before configuration is validated so that
 * modules can log at import time; `configureLogger` applies the validated
 * settings once the app config is loaded.
 */

import pino from 'pino';
import type { Logger, LevelWithSilent } from 'pino';

const LEVELS: readonly LevelWithSilent[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function initialLevel(): LevelWithSilent {
  const fromEnv = process.env.LOG_LEVEL;
  const match = LEVELS.find((level) => level === fromEnv);
  if (match) {
    return match;
  }
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

function createLogger(level: LevelWithSilent, file?: string): Logger {
  const options = {
    level,
    base: { service: 'story-sync' },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: { error: pino.stdSerializers.err, err: pino.stdSerializers.err },
  };

  if (!file || level === 'silent') {
    return pino(options);
  }

  return pino(
    options,
    pino.multistream([
      { stream: process.stdout, level },
      { stream: pino.destination({ dest: file, mkdir: true, sync: false }), level },
    ])
  );
}

export let logger: Logger = createLogger(initialLevel());

/**
 * Rebuild the root logger with validated settings
 */
export function configureLogger(settings: { level: LevelWithSilent; file?: string }): Logger {
  logger = createLogger(settings.level, settings.file);
  return logger;
}

export type { Logger };
