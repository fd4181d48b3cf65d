/**
 * stderr logger with credential redaction.
 *
 * stdout belongs to the event stream (one JSON record per line), so no level
 * ever writes there. Objects are rendered with util.inspect: errors from ws
 * carry sockets and requests with circular references.
 */

import { inspect } from 'util';

const BEARER_PATTERN = /(?<=Bearer\s+)\S+/gi;
const API_KEY_PATTERN = /\bsk-[A-Za-z0-9]{16,}\b/g;

/** Values shorter than this would redact ordinary words. */
const MIN_SECRET_LENGTH = 8;

const secrets = new Set<string>();
let secretPattern: RegExp | null = null;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Redact `secret` (the configured API key) from every later log line. */
export function registerSecret(secret: string): void {
  if (secret.length < MIN_SECRET_LENGTH || secrets.has(secret)) return;
  secrets.add(secret);
  secretPattern = new RegExp([...secrets].map(escapeRegExp).join('|'), 'g');
}

/** Forget registered secrets. Tests only. */
export function clearSecrets(): void {
  secrets.clear();
  secretPattern = null;
}

export function sanitize(message: string): string {
  const redacted = message
    .replace(BEARER_PATTERN, '[REDACTED]')
    .replace(API_KEY_PATTERN, '[REDACTED_KEY]');
  return secretPattern ? redacted.replace(secretPattern, '[REDACTED]') : redacted;
}

function render(arg: unknown): string {
  if (typeof arg === 'string') return arg;
  if (arg instanceof Error) return arg.stack ?? `${arg.name}: ${arg.message}`;
  return inspect(arg, { depth: 3, breakLength: Infinity });
}

export function formatArgs(args: unknown[]): string {
  return sanitize(args.map(render).join(' '));
}

type Level = 'INFO' | 'WARN' | 'ERROR' | 'DEBUG';

function write(level: Level, args: unknown[]): void {
  console.error(`[${new Date().toISOString()}] [${level}]`, formatArgs(args));
}

export const logger = {
  info(...args: unknown[]): void {
    write('INFO', args);
  },
  warn(...args: unknown[]): void {
    write('WARN', args);
  },
  error(...args: unknown[]): void {
    write('ERROR', args);
  },
  debug(...args: unknown[]): void {
    if (process.env.DEBUG) write('DEBUG', args);
  },
};
