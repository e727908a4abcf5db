import type { SourceConfig, SourceRecord } from '../dialects/source';
import type { TableRow, TableSpec, TargetConfig } from '../dialects/target';
import type { BoundingBox, CoordinateFields, GroupMap } from '../odata/query';
import type { PagerConfig } from './config';
import type { PageEvent, StopReason } from './pager';

/**
 * Contract that each sync profile implements.
 * The engine is generic; a profile says what to query and how a record is stored.
 */
export type SyncProfile = {
  /** Profile name, used in logs and the CLI */
  name: string;

  /** OData entity set queried for sightings */
  entitySet: string;

  /** Field whose normalised value identifies a unique record */
  identityField: string;

  /** Fields requested on every page, identity first */
  fields: readonly string[];

  /** Group selector → `Class` values */
  groups: GroupMap;

  /** Selector used when the CLI gets no --group */
  defaultGroup: string;

  /** Sighting coordinates, filtered on by --bbox */
  coordinateFields: CoordinateFields;

  /** Output table, shared by every target */
  table: TableSpec;

  /** Raw record → output row, or null to skip */
  toRow: (record: SourceRecord) => TableRow | null;
};

export type RunResult = {
  profileName: string;
  pages: number;
  rows: number;
  unique: number;
  written: number;
  skipped: number;
  errors: number;
  removedFields: string[];
  completed: boolean;
  stopReason?: StopReason;
  error?: Error;
  elapsedMs: number;
};

/**
 * Metrics hook for monitoring a sync run.
 */
export type MetricsHook = {
  /** Called after each page is merged */
  onPage?: (event: PageEvent) => void;

  /** Called when the run ends (success, abort or interruption) */
  onComplete?: (result: RunResult) => void;
};

export type RunnerConfig = {
  sourceConfig: SourceConfig;
  targetConfig: TargetConfig;
  pager: PagerConfig;
  /** Group selector; defaults to the profile's */
  group?: string;
  /** Extra OData predicate, ANDed with the group filter */
  filter?: string;
  /** Area of interest, ANDed with the group filter */
  bbox?: BoundingBox;
  /** Overrides the profile's table name */
  tableName?: string;
  /** Rows per sink write */
  batchSize: number;
  /** Store what was gathered even when paging aborted */
  allowPartial: boolean;
  metrics?: MetricsHook;
};
