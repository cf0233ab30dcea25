/**
 * Tabular Store
 *
 * SQLite-backed dashboard tabs. Each row of each tab is one record holding
 * its cells as a JSON array of strings.
 * Uses better-sqlite3 for synchronous, fast local storage.
 * Database lives at ~/.cohort-tracker/tracker.db unless COHORT_TRACKER_DB
 * points elsewhere.
 */

import Database from 'better-sqlite3';
import { z } from 'zod';
import type { CellValue, RowUpdate, SheetRow, TabularStore, UpsertSummary } from './types.js';
import { prepareStorePath } from '../config/paths.js';
import { createLogger } from '../logger.js';

export const CONFIG_TAB = 'Config';

const CellsSchema = z.array(z.string());

const log = createLogger('tabular-store');

export class SqliteTabularStore implements TabularStore {
  private db: Database.Database;

  constructor(dbPath?: string) {
    this.db = new Database(dbPath ?? prepareStorePath());
    this.db.pragma('journal_mode = WAL');
    this.migrate();
  }

  readAll(tab: string): SheetRow[] {
    const rows = this.db
      .prepare(`SELECT row_index, cells FROM sheet_rows WHERE tab = ? ORDER BY row_index`)
      .all(tab) as SheetRowRecord[];

    // Keep positions aligned with row numbers: row N is at index N - 1.
    const result: SheetRow[] = [];
    for (const record of rows) {
      while (result.length < record.row_index - 1) {
        result.push([]);
      }
      result.push(parseCells(record.cells, tab, record.row_index));
    }
    return result;
  }

  writeRows(tab: string, updates: RowUpdate[]): void {
    if (updates.length === 0) return;

    const stmt = this.db.prepare(`
      INSERT INTO sheet_rows (tab, row_index, cells) VALUES (@tab, @row, @cells)
      ON CONFLICT (tab, row_index) DO UPDATE SET cells = excluded.cells
    `);

    const writeMany = this.db.transaction((items: RowUpdate[]) => {
      for (const update of items) {
        if (!Number.isInteger(update.row) || update.row < 1) {
          throw new Error(`Invalid row number ${update.row} for tab "${tab}"`);
        }
        stmt.run({ tab, row: update.row, cells: serializeCells(update.values) });
      }
    });

    writeMany(updates);
  }

  upsertRows(tab: string, keyColumns: number[], rows: CellValue[][]): UpsertSummary {
    const existing = this.readAll(tab);
    const rowByKey = new Map<string, number>();
    existing.forEach((row, index) => {
      if (index === 0) return; // header
      rowByKey.set(rowKey(row, keyColumns), index + 1);
    });

    // Row 1 is reserved for the header even when the tab is empty.
    let nextRow = Math.max(existing.length, 1) + 1;
    const updates: RowUpdate[] = [];
    let updated = 0;
    let appended = 0;

    for (const values of rows) {
      const key = rowKey(values, keyColumns);
      const target = rowByKey.get(key);
      if (target !== undefined) {
        updates.push({ row: target, values });
        updated++;
      } else {
        rowByKey.set(key, nextRow);
        updates.push({ row: nextRow, values });
        nextRow++;
        appended++;
      }
    }

    this.writeRows(tab, updates);
    log.debug('Upserted rows', { tab, updated, appended });
    return { updated, appended };
  }

  clearAndWrite(tab: string, headers: string[], rows: CellValue[][]): void {
    const replace = this.db.transaction(() => {
      this.db.prepare(`DELETE FROM sheet_rows WHERE tab = ?`).run(tab);
      this.writeRows(tab, [headers, ...rows].map((values, i) => ({ row: i + 1, values })));
    });
    replace();
  }

  readConfig(): Record<string, string> {
    const config: Record<string, string> = {};
    this.readAll(CONFIG_TAB).forEach((row, index) => {
      if (index === 0) return; // header
      const key = row[0]?.trim();
      if (key) {
        config[key] = row[1]?.trim() ?? '';
      }
    });
    return config;
  }

  listTabs(): string[] {
    const rows = this.db
      .prepare(`SELECT DISTINCT tab FROM sheet_rows ORDER BY tab`)
      .all() as Array<{ tab: string }>;
    return rows.map((r) => r.tab);
  }

  /**
   * Close the database connection.
   */
  close(): void {
    this.db.close();
  }

  // ─── Schema Migration ─────────────────────────────────────

  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS sheet_rows (
        tab         TEXT NOT NULL,
        row_index   INTEGER NOT NULL,
        cells       TEXT NOT NULL,
        PRIMARY KEY (tab, row_index)
      );
    `);
  }
}

// ─── Row Mapping ────────────────────────────────────────────

interface SheetRowRecord {
  row_index: number;
  cells: string;
}

function serializeCells(values: CellValue[]): string {
  return JSON.stringify(values.map((v) => String(v)));
}

function parseCells(json: string, tab: string, row: number): SheetRow {
  const result = CellsSchema.safeParse(JSON.parse(json));
  if (!result.success) {
    throw new Error(`Corrupt cells in tab "${tab}" row ${row}`);
  }
  return result.data;
}

function rowKey(row: ReadonlyArray<CellValue | undefined>, keyColumns: number[]): string {
  return keyColumns.map((c) => String(row[c] ?? '').toLowerCase()).join('\u0000');
}
