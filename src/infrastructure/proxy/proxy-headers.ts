import { IncomingHttpHeaders } from 'http';

export type ForwardedHeaders = Record<string, string | string[]>;

/** Connection-scoped headers that must not travel past this hop. */
export const HOP_BY_HOP_HEADERS: ReadonlySet<string> = new Set([
  'host',
  'connection',
  'keep-alive',
  'proxy-authenticate',
  'proxy-authorization',
  'te',
  'trailers',
  'transfer-encoding',
  'upgrade',
]);

// The body is re-framed and already decoded by the time it reaches the client.
export const EXCLUDED_RESPONSE_HEADERS: ReadonlySet<string> = new Set([
  ...HOP_BY_HOP_HEADERS,
  'content-encoding',
  'content-length',
]);

export function filterRequestHeaders(headers: IncomingHttpHeaders): ForwardedHeaders {
  const forwarded: ForwardedHeaders = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined || HOP_BY_HOP_HEADERS.has(name.toLowerCase())) continue;
    forwarded[name] = value;
  }
  return forwarded;
}

export function filterResponseHeaders(headers: Record<string, unknown>): ForwardedHeaders {
  const forwarded: ForwardedHeaders = {};
  for (const [name, value] of Object.entries(headers)) {
    if (EXCLUDED_RESPONSE_HEADERS.has(name.toLowerCase())) continue;
    if (typeof value === 'string') {
      forwarded[name] = value;
    } else if (typeof value === 'number') {
      forwarded[name] = String(value);
    } else if (Array.isArray(value)) {
      forwarded[name] = value.map(String);
    }
  }
  return forwarded;
}
