/**
 * Console logger with secret redaction.
 * Bot-API URLs carry the token in their path, so transport errors are
 * scrubbed before they reach the run log.
 */

import { inspect } from 'node:util';

const AUTHORIZATION_HEADER_PATTERN = /(?<=Authorization:\s*(?:Bearer\s+|token\s+)?)\S+/gi;
const BOT_URL_TOKEN_PATTERN = /(?<=\/bot)\d+:[\w-]+/g;

const secretFragments: string[] = [];
let secretPattern: RegExp | null = null;

/** Register a secret value so it is redacted from all log output. */
export function registerSecret(secret: string): void {
  if (secret && secret.length >= 8) {
    secretFragments.push(secret.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'));
    secretPattern = new RegExp(secretFragments.join('|'), 'g');
  }
}

/** Forget registered secrets (tests). */
export function clearSecrets(): void {
  secretFragments.length = 0;
  secretPattern = null;
}

export function sanitize(message: string): string {
  let result = message
    .replace(AUTHORIZATION_HEADER_PATTERN, '[REDACTED]')
    .replace(BOT_URL_TOKEN_PATTERN, '[REDACTED]');
  if (secretPattern) {
    result = result.replace(secretPattern, '[REDACTED]');
  }
  return result;
}

function formatArgs(args: unknown[]): string {
  return args
    .map((arg) => {
      if (arg instanceof Error) {
        return sanitize(arg.stack ?? arg.message);
      }
      if (typeof arg === 'string') {
        return sanitize(arg);
      }
      return sanitize(inspect(arg, { depth: 3, breakLength: Infinity }));
    })
    .join(' ');
}

function timestamp(): string {
  return new Date().toISOString();
}

export interface Logger {
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  debug(...args: unknown[]): void;
}

export const logger: Logger = {
  info(...args: unknown[]): void {
    console.log(`[${timestamp()}] [INFO]`, formatArgs(args));
  },
  warn(...args: unknown[]): void {
    console.warn(`[${timestamp()}] [WARN]`, formatArgs(args));
  },
  error(...args: unknown[]): void {
    console.error(`[${timestamp()}] [ERROR]`, formatArgs(args));
  },
  debug(...args: unknown[]): void {
    if (process.env.DEBUG) {
      console.debug(`[${timestamp()}] [DEBUG]`, formatArgs(args));
    }
  },
};

/** Logger that prefixes every line with `label:`. */
export function scopedLogger(label: string): Logger {
  return {
    info: (...args) => logger.info(`${label}:`, ...args),
    warn: (...args) => logger.warn(`${label}:`, ...args),
    error: (...args) => logger.error(`${label}:`, ...args),
    debug: (...args) => logger.debug(`${label}:`, ...args),
  };
}
