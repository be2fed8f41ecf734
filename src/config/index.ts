/**
 * Engine Configuration Loader
 *
 * Loads engine.config.yaml (validated with the zod schema) and the
 * broker / storage credentials from the environment.
 *
 * @example
 * ```typescript
 * import { getEngineConfig } from './config/index.ts';
 *
 * const config = getEngineConfig();
 * console.log(config.dividendSymbol); // VIG
 * ```
 */

import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { parse as parseYaml } from 'yaml';
import { validateEngineConfig, type RawEngineConfig } from './schema.ts';
import { defaultEngineConfig } from './defaults.ts';
import { ConfigError } from '../utils/errors.ts';
import { logger } from '../utils/logger.ts';

// ============================================================================
// TYPES
// ============================================================================

export interface SheetNames {
  screener: string;
  log: string;
}

export interface EngineConfig {
  dividendSymbol: string;
  profitTarget: number; // fraction, 0.05 = +5%
  sizingFraction: number; // fraction of buying power per new position
  minimumReinvestThreshold: number; // USD
  orderDelayMs: number;
  sheets: SheetNames;
  brokerBaseUrl: string;
}

export interface BrokerCredentials {
  keyId: string;
  secretKey: string;
  baseUrl: string;
}

export interface StorageCredentials {
  url: string;
  serviceKey: string;
}

// ============================================================================
// LOADER
// ============================================================================

const CONFIG_FILE = 'engine.config.yaml';

let cachedConfig: EngineConfig | null = null;
let configPath: string | null = null;

function findConfigPath(): string | null {
  const candidates = [
    join(process.cwd(), CONFIG_FILE),
    join(process.cwd(), '..', CONFIG_FILE),
  ];
  return candidates.find((p) => existsSync(p)) ?? null;
}

/**
 * Merge a validated config file over the defaults
 */
export function resolveEngineConfig(raw: RawEngineConfig): EngineConfig {
  const engine = raw.engine ?? {};
  const sheets = raw.sheets ?? {};

  return {
    dividendSymbol: engine.dividend_symbol ?? defaultEngineConfig.dividendSymbol,
    profitTarget:
      engine.profit_target_pct !== undefined
        ? engine.profit_target_pct / 100
        : defaultEngineConfig.profitTarget,
    sizingFraction:
      engine.sizing_pct !== undefined
        ? engine.sizing_pct / 100
        : defaultEngineConfig.sizingFraction,
    minimumReinvestThreshold:
      engine.min_reinvest_usd ?? defaultEngineConfig.minimumReinvestThreshold,
    orderDelayMs: engine.order_delay_ms ?? defaultEngineConfig.orderDelayMs,
    sheets: {
      screener: sheets.screener ?? defaultEngineConfig.sheets.screener,
      log: sheets.log ?? defaultEngineConfig.sheets.log,
    },
    brokerBaseUrl: raw.broker?.base_url ?? defaultEngineConfig.brokerBaseUrl,
  };
}

/**
 * Parse and validate config text. Throws ConfigError listing every issue.
 */
export function parseEngineConfig(yaml: string, source = CONFIG_FILE): EngineConfig {
  const parsed: unknown = parseYaml(yaml) ?? {};
  const result = validateEngineConfig(parsed);

  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new ConfigError(`Invalid ${source}:\n${issues}`);
  }

  const config = resolveEngineConfig(result.data);
  if (config.sheets.screener === config.sheets.log) {
    throw new ConfigError(
      `Invalid ${source}:\n  sheets: screener and log must be different sheets`
    );
  }
  return config;
}

/**
 * Get the engine config (cached). Falls back to defaults when no
 * config file exists.
 */
export function getEngineConfig(forceReload = false): EngineConfig {
  if (cachedConfig && !forceReload) {
    return cachedConfig;
  }

  const path = configPath ?? findConfigPath();
  if (!path) {
    logger.warn(`${CONFIG_FILE} not found, using defaults`);
    cachedConfig = defaultEngineConfig;
    return cachedConfig;
  }

  if (!existsSync(path)) {
    throw new ConfigError(`Config file not found: ${path}`);
  }

  cachedConfig = parseEngineConfig(readFileSync(path, 'utf-8'), path);
  logger.debug(`Loaded engine config from ${path}`);
  return cachedConfig;
}

/**
 * Clear the config cache (useful for testing)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
  configPath = null;
}

/**
 * Set a custom config path
 */
export function setConfigPath(path: string): void {
  configPath = path;
  cachedConfig = null;
}

// ============================================================================
// CREDENTIALS
// ============================================================================

function requireEnv(env: NodeJS.ProcessEnv, names: string[]): string {
  for (const name of names) {
    const value = env[name]?.trim();
    if (value) return value;
  }
  throw new ConfigError(`Missing environment variable ${names[0]}`);
}

export function getBrokerCredentials(
  config: EngineConfig,
  env: NodeJS.ProcessEnv = process.env
): BrokerCredentials {
  return {
    keyId: requireEnv(env, ['APCA_API_KEY_ID']),
    secretKey: requireEnv(env, ['APCA_API_SECRET_KEY']),
    baseUrl: env.APCA_API_BASE_URL?.trim() || config.brokerBaseUrl,
  };
}

export function getStorageCredentials(
  env: NodeJS.ProcessEnv = process.env
): StorageCredentials {
  return {
    url: requireEnv(env, ['SUPABASE_URL', 'NEXT_PUBLIC_SUPABASE_URL']),
    serviceKey: requireEnv(env, ['SUPABASE_SERVICE_KEY']),
  };
}
