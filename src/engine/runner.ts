import type { SourceDialect } from '../dialects/source';
import type { TableRow, TableSpec, TargetDialect } from '../dialects/target';
import { createSource } from '../dialects/source-registry';
import { createTarget } from '../dialects/target-registry';
import { andPredicates, boundingBoxPredicate, buildGroupFilter, isKnownGroup, type BoundingBox } from '../odata/query';
import { chunk, writeWithRetry } from './batch';
import { log, formatError } from './logger';
import { collectUnique, type PagerResult } from './pager';
import type { RunResult, RunnerConfig, SyncProfile } from './types';

// Import dialects to register them
import '../dialects/source/bionet-odata';
import '../dialects/target/postgresql';
import '../dialects/target/arcgis-online';

export type RunDeps = {
  source?: SourceDialect;
  target?: TargetDialect;
};

/** Group filter for the run; an unknown selector is logged and dropped. */
export const buildRunFilter = (
  profile: SyncProfile,
  group: string | undefined,
  extra?: string,
  bbox?: BoundingBox
): string => {
  const selector = group ?? profile.defaultGroup;
  if (!isKnownGroup(profile.groups, selector)) {
    const known = Object.keys(profile.groups).join(', ');
    log.warn(`Unknown group "${selector}" for profile ${profile.name}, fetching without a group filter (known: ${known})`);
  }
  const area = bbox ? boundingBoxPredicate(bbox, profile.coordinateFields) : undefined;
  return buildGroupFilter(profile.groups, selector, andPredicates(extra, area));
};

export const resolveTable = (profile: SyncProfile, tableName?: string): TableSpec =>
  tableName ? { ...profile.table, name: tableName } : profile.table;

type WriteOutcome = {
  written: number;
  skipped: number;
  interrupted: boolean;
};

const writeRows = async (
  target: TargetDialect,
  table: TableSpec,
  rows: TableRow[],
  config: RunnerConfig,
  shouldStop: () => boolean
): Promise<WriteOutcome> => {
  const prepareStart = Date.now();
  const { seeded } = await target.prepare(rows);
  if (seeded > 0) {
    log.batch(target.name, 'seeded', seeded, Date.now() - prepareStart);
  }

  let written = seeded;
  let skipped = 0;
  let interrupted = false;

  for (const batch of chunk(rows.slice(seeded), config.batchSize)) {
    if (shouldStop()) {
      log.info('Stop requested, remaining batches not written');
      interrupted = true;
      break;
    }

    const batchStart = Date.now();
    const result = await writeWithRetry(
      batch,
      (items) => target.writeBatch(items),
      (row) => `${table.identityColumn} ${String(row[table.identityColumn])}`
    );
    written += result.written;
    skipped += result.skipped;
    log.batch(target.name, 'wrote', result.written, Date.now() - batchStart);
  }

  return { written, skipped, interrupted };
};

/**
 * One sync pass: page the source into a unique, ordered list, then replace the
 * target table with it.
 */
export const run = async (
  profile: SyncProfile,
  config: RunnerConfig,
  shouldStop: () => boolean = () => false,
  deps: RunDeps = {}
): Promise<RunResult> => {
  const startTime = Date.now();

  const filter = buildRunFilter(profile, config.group, config.filter, config.bbox);
  const table = resolveTable(profile, config.tableName);
  const source =
    deps.source ??
    createSource(config.sourceConfig, {
      entitySet: profile.entitySet,
      identityField: profile.identityField,
      filter,
    });
  let target = deps.target;

  let paged: PagerResult | undefined;
  let written = 0;
  let skipped = 0;
  let parseErrors = 0;
  let interrupted = false;
  let sinkError: Error | undefined;

  const finish = (): RunResult => {
    const outcome = paged?.outcome;
    const aborted = outcome?.status === 'aborted';
    const result: RunResult = {
      profileName: profile.name,
      pages: paged?.progress.pagesFetched ?? 0,
      rows: paged?.progress.rowsSeen ?? 0,
      unique: paged?.progress.uniqueCount ?? 0,
      written,
      skipped,
      errors: parseErrors + skipped + (aborted ? 1 : 0) + (sinkError ? 1 : 0),
      removedFields: paged?.removedFields ?? [],
      completed: outcome?.status === 'done' && !interrupted && !sinkError,
      stopReason: outcome?.status === 'done' ? outcome.reason : undefined,
      error: sinkError ?? (outcome?.status === 'aborted' ? outcome.error : undefined),
      elapsedMs: Date.now() - startTime,
    };

    log.sync.summary({
      pages: result.pages,
      rows: result.rows,
      unique: result.unique,
      written: result.written,
      skipped: result.skipped,
      errors: result.errors,
      completed: result.completed,
      stopReason: result.stopReason,
      elapsed: result.elapsedMs,
    });
    config.metrics?.onComplete?.(result);
    return result;
  };

  try {
    log.sync.start({
      profile: profile.name,
      query: source.describe(),
      target: config.targetConfig.type,
      pageSize: config.pager.pageSize,
      maxRecords: config.pager.maxRecords,
    });

    paged = await collectUnique(source, {
      fields: profile.fields,
      identityField: profile.identityField,
      config: config.pager,
      onPage: (event) => {
        log.page(event.pageIndex, {
          rows: event.recordCount,
          newUnique: event.newUnique,
          unique: event.progress.uniqueCount,
          target: event.stopTarget,
          totalCount: event.totalCount,
        });
        config.metrics?.onPage?.(event);
      },
    });

    if (paged.removedFields.length > 0) {
      log.warn(`Server does not serve: ${paged.removedFields.join(', ')}; those columns stay empty`);
    }
    if (paged.progress.skippedRows > 0) {
      log.warn(`${paged.progress.skippedRows} rows had no ${profile.identityField} and were ignored`);
    }

    if (paged.outcome.status === 'aborted') {
      log.error(
        `Paging aborted after ${paged.progress.pagesFetched} pages with ${paged.progress.uniqueCount} unique records\n${formatError(paged.outcome.error)}`
      );
      if (!config.allowPartial) {
        log.warn('Nothing written; pass --allow-partial to store partial results');
        return finish();
      }
      log.warn(`Writing ${paged.records.length} partial results`);
    }

    if (paged.records.length === 0) {
      log.warn('No records matched the query; nothing to write');
      return finish();
    }

    const rows: TableRow[] = [];
    for (const record of paged.records) {
      const row = profile.toRow(record);
      if (row) {
        rows.push(row);
      } else {
        parseErrors++;
      }
    }

    if (rows.length === 0) {
      log.warn(`None of the ${paged.records.length} unique records could be parsed; nothing to write`);
      return finish();
    }

    try {
      target = target ?? createTarget(config.targetConfig, table);
      const outcome = await writeRows(target, table, rows, config, shouldStop);
      written = outcome.written;
      skipped = outcome.skipped;
      interrupted = outcome.interrupted;

      if (!interrupted && target.finalize) {
        await target.finalize({ rowCount: written, source: source.describe(), syncedAt: new Date() });
        log.success(`Finalized ${table.name}`);
      }
    } catch (err) {
      sinkError = err instanceof Error ? err : new Error(String(err));
      log.error(`Writing ${table.name} failed\n${formatError(sinkError)}`);
    }

    return finish();
  } finally {
    if (target?.close) {
      await target.close();
    }
    if (source.close) {
      await source.close();
    }
    log.info('Connections closed');
  }
};
