/**
 * Supabase Worksheet Storage
 *
 * Stores worksheet rows in a single table (worksheet_rows), keyed by
 * sheet name and row number. See db/migrations/001_worksheet_rows.sql.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { logger } from '../utils/logger.ts';
import type { StorageCredentials } from '../config/index.ts';
import type { CellValue, Worksheet } from './worksheet.ts';

const TABLE = 'worksheet_rows';

/** PostgREST's default max-rows; reads are paged at this size. */
export const PAGE_SIZE = 1000;

let client: SupabaseClient | null = null;

export function getSupabaseClient(credentials: StorageCredentials): SupabaseClient {
  if (client) return client;
  client = createClient(credentials.url, credentials.serviceKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
  return client;
}

interface WorksheetRow {
  row_number: number;
  cells: string[] | null;
}

export class SupabaseWorksheet implements Worksheet {
  constructor(
    private readonly db: SupabaseClient,
    readonly name: string
  ) {}

  async getAllValues(): Promise<string[][]> {
    const rows: string[][] = [];

    for (let from = 0; ; from += PAGE_SIZE) {
      const { data, error } = await this.db
        .from(TABLE)
        .select('row_number, cells')
        .eq('sheet', this.name)
        .order('row_number', { ascending: true })
        .range(from, from + PAGE_SIZE - 1)
        .returns<WorksheetRow[]>();

      if (error) {
        throw new Error(`Failed to read sheet "${this.name}": ${error.message}`);
      }

      const page = data ?? [];
      for (const row of page) rows.push(row.cells ?? []);
      if (page.length < PAGE_SIZE) return rows;
    }
  }

  async appendRow(cells: CellValue[]): Promise<void> {
    const next = (await this.lastRowNumber()) + 1;

    const { error } = await this.db.from(TABLE).insert({
      sheet: this.name,
      row_number: next,
      cells: cells.map(String),
    });

    if (error) {
      throw new Error(
        `Failed to append to sheet "${this.name}": ${error.message}`
      );
    }
    logger.debug(`[${this.name}] appended row ${next}`);
  }

  async updateCell(row: number, column: number, value: CellValue): Promise<void> {
    const { data, error } = await this.db
      .from(TABLE)
      .select('row_number, cells')
      .eq('sheet', this.name)
      .order('row_number', { ascending: true })
      .range(row - 1, row - 1)
      .returns<WorksheetRow[]>();

    if (error) {
      throw new Error(`Failed to read sheet "${this.name}": ${error.message}`);
    }

    const target = data?.[0];
    if (!target || column < 1) {
      throw new Error(`Cell ${row}:${column} is outside sheet "${this.name}"`);
    }

    const cells = [...(target.cells ?? [])];
    while (cells.length < column) cells.push('');
    cells[column - 1] = String(value);

    const { error: updateError } = await this.db
      .from(TABLE)
      .update({ cells })
      .eq('sheet', this.name)
      .eq('row_number', target.row_number);

    if (updateError) {
      throw new Error(
        `Failed to update sheet "${this.name}": ${updateError.message}`
      );
    }
  }

  private async lastRowNumber(): Promise<number> {
    const { data, error } = await this.db
      .from(TABLE)
      .select('row_number')
      .eq('sheet', this.name)
      .order('row_number', { ascending: false })
      .limit(1)
      .returns<Array<{ row_number: number }>>();

    if (error) {
      throw new Error(`Failed to read sheet "${this.name}": ${error.message}`);
    }
    return data?.[0]?.row_number ?? 0;
  }
}
