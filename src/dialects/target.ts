/**
 * Target dialect interface.
 * Implement this to persist the ordered species list anywhere (PostgreSQL, a hosted table, ...)
 */
export type ColumnSpec = {
  name: string;
  alias: string;
  type: 'text' | 'date';
  length?: number;
};

/** Fixed output schema a profile hands to every target. */
export type TableSpec = {
  name: string;
  identityColumn: string;
  columns: readonly ColumnSpec[];
  description: string;
};

export type TableRow = Record<string, string | Date | null>;

export type SyncSummary = {
  rowCount: number;
  source: string;
  syncedAt: Date;
};

export interface TargetDialect {
  /** Unique name for logging and diagnostics */
  readonly name: string;

  /**
   * Make the destination ready for a fresh load (create, or clear existing rows).
   * Resolves to the number of rows the preparation already persisted.
   */
  prepare(rows: readonly TableRow[]): Promise<{ seeded: number }>;

  /** Append a batch of rows. Return count of rows written. */
  writeBatch(batch: TableRow[]): Promise<number>;

  /** Optional: called once after every batch is written (indexes, metadata, cleanup) */
  finalize?(summary: SyncSummary): Promise<void>;

  /** Optional: cleanup resources when done */
  close?(): Promise<void>;
}

/**
 * Configuration for target dialects
 */
export type TargetConfig =
  | { type: 'postgresql'; host: string; port: number; user: string; password: string; database: string; ssl: boolean }
  | {
      type: 'arcgis-online';
      portalUrl: string;
      itemTitle: string;
      username?: string;
      password?: string;
      token?: string;
    }
  | { type: 'custom'; [key: string]: unknown };
