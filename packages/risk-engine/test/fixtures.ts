import pino, { type Logger } from 'pino';
import type { RawInstrumentationEvent } from '../src/index.js';

export const manifestResult = {
  packageName: 'com.example.sample',
  components: [
    { name: '.MainActivity', type: 'activity', exported: true },
    { name: '.SyncService', type: 'service', exported: false },
    { name: '.BootReceiver', type: 'receiver', exported: true },
    { name: '.DataProvider', type: 'provider' },
  ],
};

export const permissionsResult = {
  permissions: [
    { name: 'android.permission.INTERNET' },
    { name: 'android.permission.READ_CONTACTS', dangerous: true },
    { name: 'android.permission.ACCESS_FINE_LOCATION', dangerous: true },
    { name: 'android.permission.VIBRATE', dangerous: false },
    { name: 'android.permission.CAMERA', dangerous: true },
  ],
};

/** Every extractor reporting; yields a score of 35 with the events below */
export function fullStaticResults(): Record<string, unknown> {
  return {
    manifest: manifestResult,
    permissions: permissionsResult,
    network_security: { cleartextPermitted: true, certificatePinning: false, debugOverrides: false },
    secrets: { findings: ['api_key=placeholder-1', 'password=placeholder-2'] },
    dependencies: {
      dependencies: [
        { name: 'okhttp', version: '3.12.0' },
        { name: 'gson', version: '2.8.9' },
      ],
      vulnerabilities: [{ name: 'okhttp', version: '3.12.0', cve: 'CVE-0000-0001' }],
    },
    certificates: { certificates: [{ subject: 'CN=Sample' }], expired: false, selfSigned: true },
    signature: { valid: true, trusted: false, fingerprints: ['ab:cd:ef'] },
    yara: {
      matches: {
        'classes.dex': ['Suspicious_Reflection', 'Dynamic_Loader'],
        'lib/arm64-v8a/libnative.so': ['Packed_Binary'],
      },
    },
  };
}

export const sampleEvents: RawInstrumentationEvent[] = [
  'PERMISSION:android.permission.READ_CONTACTS',
  'PERMISSION:android.permission.CAMERA',
  'NETWORK:http://tracker.invalid/collect',
  'NETWORK:https://api.example.com/v1',
  { tag: 'NETWORK', payload: { url: 'http://bad.example.net/c2' }, timestamp: 1700000000 },
  'FILE_WRITE:/data/data/com.example.sample/files/cache.bin',
  'CRYPTO:AES/ECB',
];

export const sampleIntelFeed = '# test feed\nbad.example.net\n';

/** Yields the given events, then never finishes */
export async function* stalledStream(events: readonly RawInstrumentationEvent[]): AsyncGenerator<RawInstrumentationEvent> {
  for (const event of events) {
    yield event;
  }
  await new Promise<never>(() => undefined);
}

export interface CapturedLog {
  level: number;
  msg: string;
  [key: string]: unknown;
}

/** A debug-level pino logger that records each line it writes */
export function captureLogger(): { logger: Logger; entries: CapturedLog[] } {
  const entries: CapturedLog[] = [];
  const logger = pino(
    { level: 'debug' },
    {
      write(line: string) {
        entries.push(JSON.parse(line));
      },
    },
  );
  return { logger, entries };
}
