import { setTimeout as sleep } from 'node:timers/promises';
import type { PageRequest, SourceDialect, SourcePage, SourceRecord } from '../dialects/source';
import { IterationLimitExceeded, SchemaMismatchError, SyncError } from '../odata/errors';
import { negotiateFields } from '../odata/negotiate';
import { UniqueAccumulator } from './accumulator';
import type { PagerConfig } from './config';
import { log } from './logger';

export type StopReason = 'target-reached' | 'record-cap' | 'short-page' | 'idle-pages';

export type PagerState =
  | { phase: 'fetching'; request: PageRequest }
  | { phase: 'done'; reason: StopReason }
  | { phase: 'aborted'; error: Error };

export type PagerProgress = {
  pagesFetched: number;
  rowsSeen: number;
  skippedRows: number;
  uniqueCount: number;
  idlePages: number;
  negotiations: number;
};

export type PageOutcome = {
  request: PageRequest;
  recordCount: number;
  nextLink?: string;
};

export type PageEvent = {
  pageIndex: number;
  request: PageRequest;
  recordCount: number;
  newUnique: number;
  totalCount?: number;
  progress: PagerProgress;
  stopTarget?: number;
};

export type PagerResult = {
  records: SourceRecord[];
  fields: readonly string[];
  removedFields: string[];
  stopTarget?: number;
  progress: PagerProgress;
  outcome: { status: 'done'; reason: StopReason } | { status: 'aborted'; error: Error };
};

export type CollectOptions = {
  fields: readonly string[];
  identityField: string;
  config: PagerConfig;
  onPage?: (event: PageEvent) => void;
};

const toError = (err: unknown): Error => (err instanceof Error ? err : new SyncError(String(err)));

const toOutcome = (state: PagerState): PagerResult['outcome'] => {
  switch (state.phase) {
    case 'done':
      return { status: 'done', reason: state.reason };
    case 'aborted':
      return { status: 'aborted', error: state.error };
    case 'fetching':
      return { status: 'aborted', error: new SyncError('Pager stopped with a request still pending') };
  }
};

export const firstRequest = (config: PagerConfig): PageRequest => ({ kind: 'offset', offset: 0, top: config.pageSize });

/**
 * Termination policy, evaluated after a page has been merged.
 * Order matters: a known target wins over a continuation link, which wins over
 * the short-page and idle-page rules.
 */
export const decideNext = (
  progress: PagerProgress,
  outcome: PageOutcome,
  stopTarget: number | undefined,
  config: PagerConfig
): PagerState => {
  if (stopTarget !== undefined && progress.uniqueCount >= stopTarget) {
    return { phase: 'done', reason: 'target-reached' };
  }
  if (config.maxRecords !== undefined && progress.uniqueCount >= config.maxRecords) {
    return { phase: 'done', reason: 'record-cap' };
  }
  if (outcome.nextLink) {
    return { phase: 'fetching', request: { kind: 'link', url: outcome.nextLink } };
  }
  if (outcome.recordCount < config.pageSize) {
    return { phase: 'done', reason: 'short-page' };
  }
  if (stopTarget === undefined && progress.idlePages >= config.idlePageThreshold) {
    return { phase: 'done', reason: 'idle-pages' };
  }

  const offset = outcome.request.kind === 'offset' ? outcome.request.offset + config.pageSize : progress.rowsSeen;
  return { phase: 'fetching', request: { kind: 'offset', offset, top: config.pageSize } };
};

export type FailureContext = {
  fields: readonly string[];
  request: PageRequest;
  error: unknown;
  negotiations: number;
  maxNegotiations: number;
  protectedFields: readonly string[];
};

export type Recovery = {
  state: PagerState;
  fields: readonly string[];
  removed?: string;
};

/**
 * A failed fetch either shrinks the field set and retries the same request, or
 * aborts the run. Server links carry their own `$select`, so they are never
 * negotiated.
 */
export const recoverFromFailure = (context: FailureContext): Recovery => {
  const { fields, request, error } = context;

  if (request.kind === 'link') {
    return { state: { phase: 'aborted', error: toError(error) }, fields };
  }

  if (context.negotiations >= context.maxNegotiations) {
    const exhausted = new SchemaMismatchError(
      `Gave up after ${context.negotiations} field negotiations`,
      undefined,
      { cause: error }
    );
    return { state: { phase: 'aborted', error: exhausted }, fields };
  }

  const negotiation = negotiateFields(fields, error, context.protectedFields);
  if (negotiation.kind === 'fatal') {
    return { state: { phase: 'aborted', error: toError(negotiation.error) }, fields };
  }

  return {
    state: { phase: 'fetching', request },
    fields: negotiation.fields,
    removed: negotiation.removed,
  };
};

/**
 * Walk the source page by page, keeping the first record seen for every identity.
 * Never throws for source failures: an aborted run still returns what it gathered.
 */
export const collectUnique = async (source: SourceDialect, options: CollectOptions): Promise<PagerResult> => {
  const { config, identityField } = options;
  const accumulator = new UniqueAccumulator<SourceRecord>((record) => record[identityField]);
  const maxNegotiations = options.fields.length;
  const removedFields: string[] = [];

  let fields = options.fields;
  const progress: PagerProgress = {
    pagesFetched: 0,
    rowsSeen: 0,
    skippedRows: 0,
    uniqueCount: 0,
    idlePages: 0,
    negotiations: 0,
  };

  let stopTarget: number | undefined;
  if (source.estimateUniqueCount) {
    try {
      stopTarget = await source.estimateUniqueCount();
    } catch (err) {
      log.warn(`Unique count unavailable, stopping on idle pages instead: ${toError(err).message}`);
    }
  }

  let state: PagerState = { phase: 'fetching', request: firstRequest(config) };

  while (state.phase === 'fetching') {
    if (progress.pagesFetched >= config.maxPages) {
      state = { phase: 'aborted', error: new IterationLimitExceeded(config.maxPages) };
      break;
    }

    const request: PageRequest = state.request;
    let page: SourcePage;
    try {
      page = await source.fetchPage(request, fields);
    } catch (err) {
      const recovery = recoverFromFailure({
        fields,
        request,
        error: err,
        negotiations: progress.negotiations,
        maxNegotiations,
        protectedFields: [identityField],
      });
      if (recovery.removed !== undefined) {
        progress.negotiations++;
        removedFields.push(recovery.removed);
        log.warn(`Server does not recognise field "${recovery.removed}", retrying without it`);
      }
      fields = recovery.fields;
      state = recovery.state;
      continue;
    }

    progress.pagesFetched++;
    let newUnique = 0;
    for (const record of page.records) {
      progress.rowsSeen++;
      const merged = accumulator.add(record);
      if (merged === 'new') newUnique++;
      if (merged === 'skipped') progress.skippedRows++;
    }
    progress.uniqueCount = accumulator.size;
    progress.idlePages = newUnique === 0 ? progress.idlePages + 1 : 0;

    state = decideNext(
      progress,
      { request, recordCount: page.records.length, nextLink: page.nextLink },
      stopTarget,
      config
    );

    options.onPage?.({
      pageIndex: progress.pagesFetched,
      request,
      recordCount: page.records.length,
      newUnique,
      totalCount: page.totalCount,
      progress: { ...progress },
      stopTarget,
    });

    if (state.phase === 'fetching' && config.pageDelayMs > 0) {
      await sleep(config.pageDelayMs);
    }
  }

  const sorted = accumulator.sorted();
  const records = config.maxRecords !== undefined ? sorted.slice(0, config.maxRecords) : sorted;

  return {
    records,
    fields,
    removedFields,
    stopTarget,
    progress: { ...progress },
    outcome: toOutcome(state),
  };
};
