import * as winston from 'winston';
import { RequestContextService, RequestContextStore } from './request-context.service';
import { deepRedact, REDACTED, shouldRedact } from './redaction.util';

const LEVEL = Symbol.for('level');

const levelIcon: Record<string, string> = {
  error: '⛔',
  warn: '⚠',
  info: 'ℹ',
  http: '🌐',
  verbose: '🔍',
  debug: '🐞',
  silly: '✨',
};

const CONTEXT_KEYS: ReadonlyArray<keyof RequestContextStore> = [
  'requestId',
  'correlationId',
  'serviceName',
];

// Rendered in the line prefix, or not at all.
const CONSOLE_HIDDEN_KEYS = new Set([
  'timestamp',
  'level',
  'message',
  'context',
  'trace',
  ...CONTEXT_KEYS,
]);

function humanizeValueInline(value: unknown): string {
  if (value === null || value === undefined) return String(value);
  if (Array.isArray(value)) return value.map(humanizeValueInline).join(', ');
  if (value instanceof Error) return value.message;
  if (typeof value === 'object') return humanizeObjectInline(Object.entries(value));
  return String(value);
}

function humanizeObjectInline(entries: Array<[string, unknown]>): string {
  return entries.map(([k, v]) => `${k}=${humanizeValueInline(v)}`).join(' ');
}

const upperCaseLevelFormat = winston.format((info) => {
  info.level = info.level.toUpperCase();
  return info;
});

const redactFormat = winston.format((info) => {
  for (const key of Object.keys(info)) {
    if (key === 'level' || key === 'message') continue;
    info[key] = shouldRedact(key) ? REDACTED : deepRedact(info[key]);
  }
  return info;
});

export function makeAttachRequestContextFormat(ctx?: RequestContextService) {
  return winston.format((info) => {
    const store = ctx?.getStore();
    if (store) {
      for (const key of CONTEXT_KEYS) {
        const value = store[key];
        if (value && !info[key]) info[key] = value;
      }
    }
    return info;
  });
}

export function makePrettyConsoleFormat(ctx?: RequestContextService) {
  return winston.format.combine(
    makeAttachRequestContextFormat(ctx)(),
    redactFormat(),
    upperCaseLevelFormat(),
    winston.format.colorize(),
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    winston.format.printf((info) => {
      const requestPart = info.requestId ? ` [req:${String(info.requestId)}]` : '';
      const contextLabel = typeof info.context === 'string' ? ` [${info.context}]` : '';
      const rawLevel = String(info[LEVEL]);
      const icon = levelIcon[rawLevel] || '•';
      const padding = ' '.repeat(Math.max(0, 7 - rawLevel.length));
      const tracePart = typeof info.trace === 'string' ? `\n${info.trace}` : '';

      const extra = Object.entries(info).filter(([key]) => !CONSOLE_HIDDEN_KEYS.has(key));
      const restPart = extra.length ? ` ${humanizeObjectInline(extra)}` : '';
      const body = `${String(info.message)}${restPart}`.trim();

      const line = `${String(info.timestamp)} ${icon} ${info.level}${padding}${requestPart}${contextLabel}: ${body}`;
      return `${line}${tracePart}`.trimEnd();
    }),
  );
}

export function makeJsonFileFormat(ctx?: RequestContextService) {
  return winston.format.combine(
    makeAttachRequestContextFormat(ctx)(),
    redactFormat(),
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  );
}
