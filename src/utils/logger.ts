/**
 * Development logger with subsystem prefixes.
 *
 * Usage:
 *   import { logger } from '../utils/logger';
 *   logger.log('message');           // Only in dev
 *   logger.warn('warning');          // Only in dev
 *   logger.error('error');           // Always logs (errors are important)
 *   logger.debug('debug info');      // Only in dev
 *
 * For synth-specific logging:
 *   logger.synth.log('Created synth');  // [Synth] prefix, only in dev
 *
 * For note container logging:
 *   logger.notes.debug('Evicted');   // [Notes] prefix, only in dev
 *
 * Dev output is off when NODE_ENV is 'production' or 'test'.
 * Set SYNTH_DEBUG=true to turn it on regardless.
 */

function resolveIsDev(env: NodeJS.ProcessEnv): boolean {
  if (env.SYNTH_DEBUG === 'true' || env.SYNTH_DEBUG === '1') return true;
  return env.NODE_ENV !== 'production' && env.NODE_ENV !== 'test';
}

const isDev = resolveIsDev(process.env);

export interface Logger {
  log: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
}

export function createLogger(prefix?: string, devOutput: boolean = isDev): Logger {
  const formatMessage = (args: unknown[]): unknown[] => {
    if (prefix) {
      const first = args[0];
      if (typeof first === 'string') {
        return [`${prefix} ${first}`, ...args.slice(1)];
      }
      return [prefix, ...args];
    }
    return args;
  };

  return {
    log: (...args: unknown[]) => {
      if (devOutput) console.log(...formatMessage(args));
    },
    warn: (...args: unknown[]) => {
      if (devOutput) console.warn(...formatMessage(args));
    },
    error: (...args: unknown[]) => {
      // Always log errors, even in production
      console.error(...formatMessage(args));
    },
    debug: (...args: unknown[]) => {
      if (devOutput) console.debug(...formatMessage(args));
    },
  };
}

// Main logger (no prefix)
export const logger = {
  ...createLogger(),

  // Prefixed loggers for specific subsystems
  synth: createLogger('[Synth]'),
  notes: createLogger('[Notes]'),
};

export { isDev, resolveIsDev };
