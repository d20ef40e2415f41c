import { describe, it, expect } from 'vitest';
import { loadConfig, droidriskConfigSchema, loggerOptions, toScoringOverrides } from '../src/index.js';

describe('config schema', () => {
  it('validates a complete valid configuration', () => {
    const config = {
      api: { port: 3000, host: '0.0.0.0' },
      scoring: { dynamicTimeoutMs: 60000, bandMedium: 40, bandHigh: 70 },
      intel: {},
      logging: { level: 'info', format: 'json' },
      nodeEnv: 'test',
    };

    const result = droidriskConfigSchema.safeParse(config);
    expect(result.success).toBe(true);
  });

  it('rejects inverted score bands', () => {
    const result = droidriskConfigSchema.safeParse({
      api: {},
      scoring: { bandMedium: 80, bandHigh: 70 },
      intel: {},
      logging: {},
    });

    expect(result.success).toBe(false);
  });
});

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.api.port).toBe(3000);
    expect(config.api.host).toBe('0.0.0.0');
    expect(config.api.apiKey).toBeUndefined();
    expect(config.scoring.dynamicTimeoutMs).toBe(60000);
    expect(config.scoring.bandMedium).toBe(40);
    expect(config.scoring.bandHigh).toBe(70);
    expect(config.scoring.unavailablePolicy).toBe('redistribute');
    expect(config.scoring.weights).toEqual({});
    expect(config.scoring.caps).toEqual({});
    expect(config.intel.feedPath).toBeUndefined();
    expect(config.logging.level).toBe('info');
    expect(config.logging.format).toBe('pretty');
    expect(config.nodeEnv).toBe('development');
  });

  it('coerces numeric environment values', () => {
    const config = loadConfig({
      API_PORT: '8080',
      DYNAMIC_TIMEOUT_MS: '1500',
      SCORE_BAND_MEDIUM: '30',
      SCORE_BAND_HIGH: '60',
    });

    expect(config.api.port).toBe(8080);
    expect(config.scoring.dynamicTimeoutMs).toBe(1500);
    expect(config.scoring.bandMedium).toBe(30);
    expect(config.scoring.bandHigh).toBe(60);
  });

  it('parses RISK_WEIGHTS and RISK_CAPS as JSON objects', () => {
    const config = loadConfig({
      RISK_WEIGHTS: '{"permission_density":0.5}',
      RISK_CAPS: '{"file_write_count":200}',
    });

    expect(config.scoring.weights).toEqual({ permission_density: 0.5 });
    expect(config.scoring.caps).toEqual({ file_write_count: 200 });
  });

  it('rejects RISK_WEIGHTS that is not JSON', () => {
    expect(() => loadConfig({ RISK_WEIGHTS: 'permission_density=0.5' })).toThrow(
      'RISK_WEIGHTS is not valid JSON',
    );
  });

  it('rejects RISK_CAPS that is a JSON array', () => {
    expect(() => loadConfig({ RISK_CAPS: '[1,2]' })).toThrow('RISK_CAPS must be a JSON object');
  });

  it('reads DISABLED_FEATURES as a comma-separated list', () => {
    expect(loadConfig({}).features.disabled).toEqual([]);
    expect(loadConfig({ DISABLED_FEATURES: ' yara, jadx,,' }).features.disabled).toEqual(['yara', 'jadx']);
  });

  it('rejects an unknown feature in DISABLED_FEATURES', () => {
    expect(() => loadConfig({ DISABLED_FEATURES: 'yara,frida' })).toThrow(
      'features.disabled.1: Invalid enum value',
    );
  });

  it('rejects non-numeric weight values', () => {
    expect(() => loadConfig({ RISK_WEIGHTS: '{"permission_density":"high"}' })).toThrow(
      'Configuration validation failed',
    );
  });

  it('treats an empty API key as unset', () => {
    const config = loadConfig({ DROIDRISK_API_KEY: '' });
    expect(config.api.apiKey).toBeUndefined();
  });

  it('rejects a short API key', () => {
    expect(() => loadConfig({ DROIDRISK_API_KEY: 'abc' })).toThrow(
      'api.apiKey: DROIDRISK_API_KEY must be at least 8 characters',
    );
  });

  it('rejects an unknown unavailable-metric policy', () => {
    expect(() => loadConfig({ RISK_UNAVAILABLE_POLICY: 'ignore' })).toThrow(
      'scoring.unavailablePolicy',
    );
  });

  it('lists every invalid setting in one error', () => {
    let message = '';
    try {
      loadConfig({ API_PORT: '70000', LOG_LEVEL: 'verbose' });
    } catch (error) {
      message = error instanceof Error ? error.message : '';
    }

    expect(message).toContain('Configuration validation failed:');
    expect(message).toContain('  - api.port:');
    expect(message).toContain('  - logging.level:');
  });
});

describe('loggerOptions', () => {
  it('adds the pino-pretty transport for pretty format', () => {
    const options = loggerOptions('debug', 'pretty');
    expect(options.level).toBe('debug');
    expect(options.transport).toBeDefined();
  });

  it('points the pretty transport at the requested stream', () => {
    const options = loggerOptions('info', 'pretty', 2);
    expect(options.transport).toMatchObject({ target: 'pino-pretty', options: { destination: 2 } });
  });

  it('omits the transport for json format', () => {
    const options = loggerOptions('warn', 'json');
    expect(options.level).toBe('warn');
    expect(options.transport).toBeUndefined();
  });
});

describe('toScoringOverrides', () => {
  it('maps scoring settings to engine overrides', () => {
    const config = loadConfig({
      SCORE_BAND_MEDIUM: '30',
      RISK_UNAVAILABLE_POLICY: 'zero',
      RISK_WEIGHTS: '{"permission_density":0.3}',
    });

    expect(toScoringOverrides(config.scoring)).toEqual({
      weights: { permission_density: 0.3 },
      caps: {},
      bands: { medium: 30, high: 70 },
      unavailablePolicy: 'zero',
    });
  });
});
