/**
 * Tabular Store Types
 *
 * The dashboard is a set of named tabs, each a grid of string cells.
 * Row 1 of every tab is its header; data rows start at row 2.
 * Row numbers are 1-based, as in a spreadsheet.
 */

/** A cell as written. Numbers are stored as their string form. */
export type CellValue = string | number;

/** A row as read back. */
export type SheetRow = string[];

export interface RowUpdate {
  /** 1-based row number. */
  row: number;
  values: CellValue[];
}

export interface UpsertSummary {
  updated: number;
  appended: number;
}

export interface TabularStore {
  /** Every row of a tab in row order, header included. Missing tab → []. */
  readAll(tab: string): SheetRow[];

  /** Overwrite the given rows in one batch. */
  writeRows(tab: string, updates: RowUpdate[]): void;

  /**
   * Update rows whose key columns match (case-insensitive), append the rest.
   * One read, one batched write. Repeated keys within `rows` overwrite the
   * row written earlier in the same call.
   */
  upsertRows(tab: string, keyColumns: number[], rows: CellValue[][]): UpsertSummary;

  /** Replace a tab's contents with a header row and data rows. */
  clearAndWrite(tab: string, headers: string[], rows: CellValue[][]): void;

  /** Config tab as a key → value map (column A → column B, trimmed). */
  readConfig(): Record<string, string>;

  listTabs(): string[];

  close(): void;
}
