import { MetricCatalog, type MetricSpec } from './metricCatalog.js';

const DEFAULT_METRIC_SPECS: readonly MetricSpec[] = [
  {
    name: 'permission_density',
    kind: 'continuous',
    source: 'static',
    origin: 'permissions',
    defaultWeight: 0.23,
    description: 'Dangerous permissions as a fraction of all declared permissions',
    reason: 'elevated permission density',
  },
  {
    name: 'component_exposure',
    kind: 'continuous',
    source: 'static',
    origin: 'manifest',
    defaultWeight: 0.1,
    description: 'Exported components as a fraction of all declared components',
    reason: 'many exported components',
  },
  {
    name: 'permission_invocation_count',
    kind: 'count',
    source: 'dynamic',
    origin: 'instrumentation',
    defaultWeight: 0.14,
    cap: 50,
    description: 'Permission-guarded API calls observed at runtime',
    reason: 'frequent permission use at runtime',
  },
  {
    name: 'cleartext_endpoint_count',
    kind: 'count',
    source: 'dynamic',
    origin: 'instrumentation',
    defaultWeight: 0.09,
    cap: 10,
    description: 'Network connections over a cleartext scheme',
    reason: 'cleartext network endpoints contacted',
  },
  {
    name: 'malicious_endpoint_count',
    kind: 'count',
    source: 'dynamic',
    origin: 'instrumentation',
    defaultWeight: 0.08,
    cap: 10,
    description: 'Network connections to hosts listed in the threat intelligence feed',
    reason: 'connections to known malicious endpoints',
  },
  {
    name: 'file_write_count',
    kind: 'count',
    source: 'dynamic',
    origin: 'instrumentation',
    defaultWeight: 0.06,
    cap: 100,
    description: 'File writes observed at runtime',
    reason: 'file system writes observed',
  },
  {
    name: 'vulnerable_dependency_count',
    kind: 'count',
    source: 'static',
    origin: 'dependencies',
    defaultWeight: 0.07,
    cap: 50,
    description: 'Bundled libraries with known vulnerabilities',
    reason: 'known vulnerable dependencies found',
  },
  {
    name: 'yara_match_count',
    kind: 'count',
    source: 'static',
    origin: 'yara',
    defaultWeight: 0.05,
    cap: 10,
    description: 'YARA rule hits across extracted files',
    reason: 'YARA rule matches',
  },
  {
    name: 'hardcoded_secret_count',
    kind: 'count',
    source: 'static',
    origin: 'secrets',
    defaultWeight: 0.04,
    cap: 20,
    description: 'Credentials and keys found in decompiled sources',
    reason: 'hardcoded secrets in decompiled sources',
  },
  {
    name: 'untrusted_signature',
    kind: 'boolean',
    source: 'static',
    origin: 'signature',
    defaultWeight: 0.04,
    description: 'APK signature is missing or not trusted',
    reason: 'untrusted or missing signature',
  },
  {
    name: 'cleartext_traffic_permitted',
    kind: 'boolean',
    source: 'static',
    origin: 'network_security',
    defaultWeight: 0.03,
    description: 'Network security config permits cleartext traffic',
    reason: 'cleartext traffic permitted',
  },
  {
    name: 'missing_certificate_pinning',
    kind: 'boolean',
    source: 'static',
    origin: 'network_security',
    defaultWeight: 0.02,
    description: 'Network security config declares no certificate pins',
    reason: 'missing certificate pinning',
  },
  {
    name: 'debug_overrides',
    kind: 'boolean',
    source: 'static',
    origin: 'network_security',
    defaultWeight: 0.01,
    description: 'Network security config carries debug overrides',
    reason: 'debug network overrides present',
  },
  {
    name: 'expired_certificate',
    kind: 'boolean',
    source: 'static',
    origin: 'certificates',
    defaultWeight: 0.02,
    description: 'A signing certificate has expired',
    reason: 'expired signing certificate',
  },
  {
    name: 'self_signed_certificate',
    kind: 'boolean',
    source: 'static',
    origin: 'certificates',
    defaultWeight: 0.02,
    description: 'A signing certificate is self-signed',
    reason: 'self-signed signing certificate',
  },
  {
    name: 'other_event_count',
    kind: 'count',
    source: 'dynamic',
    origin: 'instrumentation',
    defaultWeight: 0,
    cap: 100,
    description: 'Instrumentation events with an unrecognized tag',
    reason: 'unclassified runtime events',
  },
];

/**
 * Catalog every call uses unless given another
 */
export const DEFAULT_METRIC_CATALOG = new MetricCatalog(DEFAULT_METRIC_SPECS);
