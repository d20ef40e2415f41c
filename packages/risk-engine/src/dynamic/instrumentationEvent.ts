import type { RawInstrumentationEvent } from '../schemas/event.js';

/**
 * Instrumentation event after boundary classification. Consumers switch on
 * `kind`; tags outside the known set land in the `unknown` branch.
 */
export type InstrumentationEvent =
  | { readonly kind: 'permission'; readonly permission: string; readonly timestamp?: number }
  | {
      readonly kind: 'network';
      readonly endpoint: string;
      /** Lowercase URL scheme, when the endpoint parses as a URL */
      readonly scheme?: string;
      /** Lowercase host name or IP */
      readonly host?: string;
      readonly timestamp?: number;
    }
  | { readonly kind: 'file_write'; readonly path: string; readonly timestamp?: number }
  | { readonly kind: 'unknown'; readonly tag: string; readonly payload: unknown; readonly timestamp?: number };

export type InstrumentationEventKind = InstrumentationEvent['kind'];

/**
 * Split a hook's compact "TAG:payload" line at the first colon.
 */
function splitCompactEvent(line: string): { tag: string; payload: string } {
  const idx = line.indexOf(':');
  if (idx === -1) {
    return { tag: line, payload: '' };
  }
  return { tag: line.slice(0, idx), payload: line.slice(idx + 1) };
}

function pickString(payload: unknown, keys: readonly string[]): string {
  if (typeof payload === 'string') {
    return payload;
  }
  if (typeof payload === 'object' && payload !== null) {
    for (const key of keys) {
      const value: unknown = Reflect.get(payload, key);
      if (typeof value === 'string') {
        return value;
      }
    }
  }
  return '';
}

/**
 * Scheme and host of a network endpoint. Bare "host:port" or "host/path"
 * endpoints yield a host and no scheme.
 */
export function parseEndpoint(endpoint: string): { scheme?: string; host?: string } {
  const trimmed = endpoint.trim();
  if (!trimmed) {
    return {};
  }

  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed)) {
    try {
      const url = new URL(trimmed);
      const host = url.hostname.replace(/^\[|\]$/g, '').toLowerCase();
      return {
        scheme: url.protocol.slice(0, -1).toLowerCase(),
        ...(host ? { host } : {}),
      };
    } catch {
      return { scheme: trimmed.slice(0, trimmed.indexOf(':')).toLowerCase() };
    }
  }

  const host = trimmed.split('/')[0]?.split(':')[0]?.toLowerCase();
  return host ? { host } : {};
}

/**
 * Map a raw hook event into the closed InstrumentationEvent union.
 */
export function classifyInstrumentationEvent(raw: RawInstrumentationEvent): InstrumentationEvent {
  const { tag: rawTag, payload, timestamp } =
    typeof raw === 'string' ? { ...splitCompactEvent(raw), timestamp: undefined } : raw;
  const tag = rawTag.trim().toUpperCase();
  const time = timestamp === undefined ? {} : { timestamp };

  switch (tag) {
    case 'PERMISSION':
      return { kind: 'permission', permission: pickString(payload, ['permission', 'name']), ...time };
    case 'NETWORK': {
      const endpoint = pickString(payload, ['url', 'endpoint', 'host']);
      return { kind: 'network', endpoint, ...parseEndpoint(endpoint), ...time };
    }
    case 'FILE_WRITE':
      return { kind: 'file_write', path: pickString(payload, ['path', 'file']), ...time };
    default:
      return { kind: 'unknown', tag, payload, ...time };
  }
}
