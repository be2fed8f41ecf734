/**
 * Wires configuration, credentials and adapters for the CLI commands.
 */

import {
  getBrokerCredentials,
  getEngineConfig,
  getStorageCredentials,
  setConfigPath,
  type EngineConfig,
} from '../config/index.ts';
import { AlpacaBroker } from '../broker/alpaca.ts';
import { DryRunBroker } from '../broker/dry-run.ts';
import type { Brokerage } from '../broker/types.ts';
import { getSupabaseClient, SupabaseWorksheet } from '../storage/supabase.ts';
import { InMemoryWorksheet, type Worksheet } from '../storage/worksheet.ts';
import { logger } from '../utils/logger.ts';
import { errorMessage } from '../utils/errors.ts';

export interface CommonOptions {
  config?: string;
  verbose?: boolean;
}

export interface Runtime {
  config: EngineConfig;
  broker: Brokerage;
  screenerSheet: Worksheet;
  logSheet: Worksheet;
  dryRun: boolean;
}

export function loadConfig(options: CommonOptions): EngineConfig {
  logger.setVerbose(options.verbose ?? false);
  if (options.config) setConfigPath(options.config);
  return getEngineConfig();
}

export function openSheets(config: EngineConfig): {
  screenerSheet: Worksheet;
  logSheet: Worksheet;
} {
  const db = getSupabaseClient(getStorageCredentials());
  return {
    screenerSheet: new SupabaseWorksheet(db, config.sheets.screener),
    logSheet: new SupabaseWorksheet(db, config.sheets.log),
  };
}

export function openBroker(config: EngineConfig): Brokerage {
  return new AlpacaBroker(getBrokerCredentials(config));
}

/**
 * In-memory copy of the log sheet for a dry run. An unreadable sheet
 * gives an empty copy, the same way a live run reads a $0.00 ledger.
 */
export async function snapshotLogSheet(source: Worksheet): Promise<Worksheet> {
  try {
    return await InMemoryWorksheet.snapshotOf(source);
  } catch (error) {
    logger.warn(
      `Could not copy sheet "${source.name}", starting empty: ${errorMessage(error)}`
    );
    return new InMemoryWorksheet(source.name);
  }
}

/**
 * Live runtime, or a dry-run one whose orders and sheet writes stay in
 * memory.
 */
export async function createRuntime(
  options: CommonOptions & { dryRun?: boolean }
): Promise<Runtime> {
  const config = loadConfig(options);
  const broker = openBroker(config);
  const sheets = openSheets(config);

  if (!options.dryRun) {
    return { config, broker, ...sheets, dryRun: false };
  }

  return {
    config,
    broker: new DryRunBroker(broker),
    screenerSheet: sheets.screenerSheet,
    logSheet: await snapshotLogSheet(sheets.logSheet),
    dryRun: true,
  };
}
