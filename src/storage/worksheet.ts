/**
 * Worksheet abstraction
 *
 * A named grid of string cells. The screener feed, the audit log and
 * the ledger sentinel row all live in worksheets.
 */

export type CellValue = string | number;

export interface Worksheet {
  readonly name: string;
  /** Every row, first row first. Cells come back as strings. */
  getAllValues(): Promise<string[][]>;
  appendRow(cells: CellValue[]): Promise<void>;
  /** 1-based row and column */
  updateCell(row: number, column: number, value: CellValue): Promise<void>;
}

/**
 * Worksheet held in process memory
 */
export class InMemoryWorksheet implements Worksheet {
  private rows: string[][];

  constructor(
    readonly name: string,
    rows: CellValue[][] = []
  ) {
    this.rows = rows.map((row) => row.map(String));
  }

  /**
   * Copy of another worksheet; writes stay local
   */
  static async snapshotOf(source: Worksheet): Promise<InMemoryWorksheet> {
    return new InMemoryWorksheet(source.name, await source.getAllValues());
  }

  async getAllValues(): Promise<string[][]> {
    return this.rows.map((row) => [...row]);
  }

  async appendRow(cells: CellValue[]): Promise<void> {
    this.rows.push(cells.map(String));
  }

  async updateCell(row: number, column: number, value: CellValue): Promise<void> {
    const target = this.rows[row - 1];
    if (!target || column < 1) {
      throw new Error(`Cell ${row}:${column} is outside sheet "${this.name}"`);
    }
    while (target.length < column) target.push('');
    target[column - 1] = String(value);
  }
}
