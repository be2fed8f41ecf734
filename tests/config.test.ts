/**
 * Engine Config Tests
 *
 * The config loader must reject settings that would change trading
 * behaviour in unintended ways, and fall back to defaults otherwise.
 */
import { describe, test, expect, afterEach } from 'vitest';
import { fileURLToPath } from 'url';
import { join, dirname } from 'path';
import {
  clearConfigCache,
  getBrokerCredentials,
  getEngineConfig,
  getStorageCredentials,
  parseEngineConfig,
  setConfigPath,
} from '../src/config/index.ts';
import { defaultEngineConfig } from '../src/config/defaults.ts';
import { ConfigError } from '../src/utils/errors.ts';

const CONFIG_PATH = join(dirname(fileURLToPath(import.meta.url)), '..', 'engine.config.yaml');

afterEach(() => {
  clearConfigCache();
});

describe('parseEngineConfig', () => {
  test('an empty file gives the defaults', () => {
    expect(parseEngineConfig('')).toEqual(defaultEngineConfig);
  });

  test('percentages become fractions', () => {
    const config = parseEngineConfig(`
engine:
  profit_target_pct: 8
  sizing_pct: 2.5
`);

    expect(config.profitTarget).toBe(0.08);
    expect(config.sizingFraction).toBe(0.025);
    expect(config.dividendSymbol).toBe('VIG');
  });

  test('dividend symbol is normalized', () => {
    expect(parseEngineConfig('engine:\n  dividend_symbol: " schd "').dividendSymbol).toBe(
      'SCHD'
    );
  });

  test('rejects a non-positive profit target', () => {
    expect(() => parseEngineConfig('engine:\n  profit_target_pct: 0')).toThrow(
      ConfigError
    );
  });

  test('rejects a sizing fraction over 100%', () => {
    expect(() => parseEngineConfig('engine:\n  sizing_pct: 150')).toThrow(
      /engine\.sizing_pct/
    );
  });

  test('rejects a reinvestment minimum under the $1 order floor', () => {
    expect(() => parseEngineConfig('engine:\n  min_reinvest_usd: 0.5')).toThrow(
      ConfigError
    );
  });

  test('rejects unknown keys', () => {
    expect(() => parseEngineConfig('engine:\n  profit_target: 0.05')).toThrow(
      ConfigError
    );
  });

  test('rejects the same sheet for screener and log', () => {
    expect(() =>
      parseEngineConfig('sheets:\n  screener: data\n  log: data')
    ).toThrow('screener and log must be different sheets');
  });
});

describe('getEngineConfig', () => {
  test('the shipped config file is valid', () => {
    setConfigPath(CONFIG_PATH);

    const config = getEngineConfig();

    expect(config.dividendSymbol).toBe('VIG');
    expect(config.profitTarget).toBe(0.05);
    expect(config.sizingFraction).toBe(0.05);
    expect(config.minimumReinvestThreshold).toBe(1);
    expect(config.orderDelayMs).toBe(2000);
    expect(config.brokerBaseUrl).toBe('https://paper-api.alpaca.markets');
  });

  test('a missing explicit path is an error', () => {
    setConfigPath(join(dirname(CONFIG_PATH), 'does-not-exist.yaml'));

    expect(() => getEngineConfig()).toThrow(ConfigError);
  });
});

describe('credentials', () => {
  test('broker credentials come from the environment', () => {
    const creds = getBrokerCredentials(defaultEngineConfig, {
      APCA_API_KEY_ID: 'test-key',
      APCA_API_SECRET_KEY: 'test-secret',
    });

    expect(creds).toEqual({
      keyId: 'test-key',
      secretKey: 'test-secret',
      baseUrl: 'https://api.alpaca.markets',
    });
  });

  test('APCA_API_BASE_URL overrides the configured endpoint', () => {
    const creds = getBrokerCredentials(defaultEngineConfig, {
      APCA_API_KEY_ID: 'test-key',
      APCA_API_SECRET_KEY: 'test-secret',
      APCA_API_BASE_URL: 'https://paper-api.alpaca.markets',
    });

    expect(creds.baseUrl).toBe('https://paper-api.alpaca.markets');
  });

  test('missing credentials are fatal', () => {
    expect(() =>
      getBrokerCredentials(defaultEngineConfig, { APCA_API_KEY_ID: 'test-key' })
    ).toThrow('Missing environment variable APCA_API_SECRET_KEY');
    expect(() => getStorageCredentials({ SUPABASE_URL: 'http://localhost' })).toThrow(
      ConfigError
    );
  });
});
