/**
 * Engine Config Zod Schema
 *
 * Runtime validation for engine.config.yaml. Every section is optional;
 * omitted keys fall back to the defaults in ./defaults.ts.
 */

import { z } from 'zod';

const symbolSchema = z
  .string()
  .trim()
  .min(1)
  .max(12)
  .regex(/^[A-Za-z.]+$/, 'must be a ticker symbol')
  .transform((s) => s.toUpperCase());

const engineSchema = z
  .object({
    dividend_symbol: symbolSchema.optional(),
    profit_target_pct: z.number().gt(0).max(1000).optional(),
    sizing_pct: z.number().gt(0).max(100).optional(),
    min_reinvest_usd: z.number().min(1).optional(),
    order_delay_ms: z.number().int().min(0).max(60_000).optional(),
  })
  .strict();

const sheetsSchema = z
  .object({
    screener: z.string().min(1).optional(),
    log: z.string().min(1).optional(),
  })
  .strict();

const brokerSchema = z
  .object({
    base_url: z.string().url().optional(),
  })
  .strict();

export const engineConfigSchema = z
  .object({
    engine: engineSchema.optional(),
    sheets: sheetsSchema.optional(),
    broker: brokerSchema.optional(),
  })
  .strict();

export type RawEngineConfig = z.infer<typeof engineConfigSchema>;

export function validateEngineConfig(config: unknown) {
  return engineConfigSchema.safeParse(config);
}
