import type { PageRequest, SourceDialect, SourcePage, SourceRecord } from '../dialects/source';
import type { SyncSummary, TableRow, TargetDialect } from '../dialects/target';
import { HttpStatusError } from '../odata/errors';
import faunaProfile from '../profiles/fauna';
import { resolvePagerConfig } from './config';
import { buildRunFilter, resolveTable, run } from './runner';
import type { RunResult, RunnerConfig } from './types';

class ScriptedSource implements SourceDialect {
  readonly name = 'scripted';
  calls = 0;

  constructor(private readonly pages: Array<SourceRecord[] | Error>) {}

  describe(): string {
    return 'scripted source';
  }

  async fetchPage(_request: PageRequest): Promise<SourcePage> {
    const page = this.pages[this.calls++] ?? [];
    if (page instanceof Error) throw page;
    return { records: page };
  }
}

class MemoryTarget implements TargetDialect {
  readonly name = 'memory';
  readonly prepared: TableRow[][] = [];
  readonly batches: TableRow[][] = [];
  readonly summaries: SyncSummary[] = [];
  closed = false;

  constructor(
    private readonly options: {
      seedAll?: boolean;
      rejects?: (row: TableRow) => boolean;
      prepareError?: Error;
    } = {}
  ) {}

  async prepare(rows: readonly TableRow[]): Promise<{ seeded: number }> {
    if (this.options.prepareError) throw this.options.prepareError;
    this.prepared.push([...rows]);
    return { seeded: this.options.seedAll ? rows.length : 0 };
  }

  async writeBatch(batch: TableRow[]): Promise<number> {
    const { rejects } = this.options;
    if (rejects && batch.some(rejects)) throw new Error('row rejected');
    this.batches.push(batch);
    return batch.length;
  }

  async finalize(summary: SyncSummary): Promise<void> {
    this.summaries.push(summary);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

const runnerConfig = (overrides: Partial<RunnerConfig> = {}): RunnerConfig => ({
  sourceConfig: { type: 'bionet-odata', baseUrl: 'https://odata.test/odata' },
  targetConfig: {
    type: 'postgresql',
    host: 'localhost',
    port: 5432,
    user: 'sync',
    password: 'test-secret',
    database: 'bionet',
    ssl: false,
  },
  pager: resolvePagerConfig({ pageSize: 3, pageDelayMs: 0 }),
  batchSize: 1,
  allowPartial: false,
  ...overrides,
});

const fox = { ScientificName: 'Vulpes vulpes', CommonName: 'Red Fox', DateLast: '2022-05-01' };
const dingo = { ScientificName: 'canis lupus', CommonName: 'Dingo' };
const foxAgain = { ScientificName: 'VULPES VULPES', CommonName: 'Fox' };

const scientificNames = (batches: TableRow[][]): unknown[] => batches.flat().map((row) => row.ScientificName);

beforeEach(() => {
  jest.spyOn(console, 'info').mockImplementation(() => {});
  jest.spyOn(console, 'warn').mockImplementation(() => {});
  jest.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('run', () => {
  it('writes the sorted unique species and finalizes the target', async () => {
    const source = new ScriptedSource([[fox, dingo, foxAgain], []]);
    const target = new MemoryTarget();

    const result = await run(faunaProfile, runnerConfig(), () => false, { source, target });

    expect(scientificNames(target.batches)).toEqual(['canis lupus', 'Vulpes vulpes']);
    expect(target.batches).toHaveLength(2);
    expect(target.batches[1][0]).toMatchObject({ CommonName: 'Red Fox', DateLast: new Date('2022-05-01T00:00:00.000Z') });
    expect(target.summaries).toHaveLength(1);
    expect(target.summaries[0]).toMatchObject({ rowCount: 2, source: 'scripted source' });
    expect(target.closed).toBe(true);
    expect(result).toMatchObject({
      profileName: 'fauna',
      pages: 2,
      rows: 3,
      unique: 2,
      written: 2,
      skipped: 0,
      errors: 0,
      completed: true,
      stopReason: 'short-page',
    });
  });

  it('does not write rows the target already seeded', async () => {
    const source = new ScriptedSource([[fox, dingo]]);
    const target = new MemoryTarget({ seedAll: true });

    const result = await run(faunaProfile, runnerConfig(), () => false, { source, target });

    expect(target.prepared[0]).toHaveLength(2);
    expect(target.batches).toEqual([]);
    expect(result.written).toBe(2);
  });

  it('writes nothing when paging aborts without --allow-partial', async () => {
    const failure = new HttpStatusError(500, 'boom', 'https://odata.test/odata/SpeciesSightings_CoreData');
    const source = new ScriptedSource([[fox, dingo, foxAgain], failure]);
    const target = new MemoryTarget();

    const result = await run(faunaProfile, runnerConfig(), () => false, { source, target });

    expect(target.prepared).toEqual([]);
    expect(result.completed).toBe(false);
    expect(result.error).toBe(failure);
    expect(result.errors).toBe(1);
    expect(result.unique).toBe(2);
    expect(target.closed).toBe(true);
  });

  it('writes the partial result when allowed', async () => {
    const failure = new HttpStatusError(500, 'boom', 'https://odata.test/odata/SpeciesSightings_CoreData');
    const source = new ScriptedSource([[fox, dingo, foxAgain], failure]);
    const target = new MemoryTarget();

    const result = await run(faunaProfile, runnerConfig({ allowPartial: true }), () => false, { source, target });

    expect(scientificNames(target.batches)).toEqual(['canis lupus', 'Vulpes vulpes']);
    expect(result.written).toBe(2);
    expect(result.completed).toBe(false);
  });

  it('skips the target entirely when nothing matched', async () => {
    const source = new ScriptedSource([[]]);
    const target = new MemoryTarget();

    const result = await run(faunaProfile, runnerConfig(), () => false, { source, target });

    expect(target.prepared).toEqual([]);
    expect(result).toMatchObject({ completed: true, written: 0, unique: 0 });
    expect(console.warn).toHaveBeenCalledWith(expect.stringContaining('No records matched the query'));
  });

  it('does not touch the target when no unique record can be parsed', async () => {
    const broken = { ScientificName: 'Felis catus', CommonName: { en: 'Cat' } };
    const source = new ScriptedSource([[broken]]);
    const target = new MemoryTarget();

    const result = await run(faunaProfile, runnerConfig(), () => false, { source, target });

    expect(target.prepared).toEqual([]);
    expect(result).toMatchObject({ unique: 1, written: 0, errors: 1, completed: true });
    expect(console.warn).toHaveBeenCalledWith(
      expect.stringContaining('None of the 1 unique records could be parsed; nothing to write')
    );
  });

  it('reports what was gathered when the target fails', async () => {
    const failure = new Error('connect ECONNREFUSED 127.0.0.1:5432');
    const source = new ScriptedSource([[fox]]);
    const target = new MemoryTarget({ prepareError: failure });
    const results: RunResult[] = [];

    const result = await run(
      faunaProfile,
      runnerConfig({ metrics: { onComplete: (complete) => results.push(complete) } }),
      () => false,
      { source, target }
    );

    expect(results).toEqual([result]);
    expect(result).toMatchObject({ pages: 1, rows: 1, unique: 1, written: 0, errors: 1, completed: false });
    expect(result.error).toBe(failure);
    expect(target.summaries).toEqual([]);
    expect(target.closed).toBe(true);
  });

  it('stops between batches when asked and skips finalization', async () => {
    const source = new ScriptedSource([[fox, dingo]]);
    const target = new MemoryTarget();

    const result = await run(faunaProfile, runnerConfig(), () => true, { source, target });

    expect(target.batches).toEqual([]);
    expect(target.summaries).toEqual([]);
    expect(result.completed).toBe(false);
    expect(result.stopReason).toBe('short-page');
  });

  it('skips rows the target rejects and records records it cannot parse', async () => {
    const broken = { ScientificName: 'Felis catus', CommonName: { en: 'Cat' } };
    const source = new ScriptedSource([[fox, dingo, broken]]);
    const target = new MemoryTarget({ rejects: (row) => row.ScientificName === 'canis lupus' });

    const result = await run(faunaProfile, runnerConfig({ pager: resolvePagerConfig({ pageSize: 10, pageDelayMs: 0 }) }), () => false, {
      source,
      target,
    });

    expect(scientificNames(target.batches)).toEqual(['Vulpes vulpes']);
    expect(result).toMatchObject({ unique: 3, written: 1, skipped: 1, errors: 2, completed: true });
  });

  it('reports pages and the final result to metrics hooks', async () => {
    const source = new ScriptedSource([[fox]]);
    const pages: number[] = [];
    const results: RunResult[] = [];

    await run(
      faunaProfile,
      runnerConfig({
        metrics: {
          onPage: (event) => pages.push(event.pageIndex),
          onComplete: (result) => results.push(result),
        },
      }),
      () => false,
      { source, target: new MemoryTarget() }
    );

    expect(pages).toEqual([1]);
    expect(results).toHaveLength(1);
    expect(results[0].written).toBe(1);
  });
});

describe('buildRunFilter', () => {
  it('uses the profile default group when none is given', () => {
    expect(buildRunFilter(faunaProfile, undefined)).toBe(
      "Class eq 'Mammalia' or Class eq 'Aves' or Class eq 'Reptilia' or Class eq 'Amphibia'"
    );
  });

  it('combines a group with an extra predicate', () => {
    expect(buildRunFilter(faunaProfile, 'Birds', "EPBCActStatus eq 'Endangered'")).toBe(
      "(Class eq 'Aves') and (EPBCActStatus eq 'Endangered')"
    );
  });

  it('ANDs an area of interest onto the group and extra predicate', () => {
    const bbox = { minLon: 150, minLat: -34, maxLon: 151, maxLat: -33 };

    expect(buildRunFilter(faunaProfile, 'Birds', "EPBCActStatus eq 'Endangered'", bbox)).toBe(
      "(Class eq 'Aves') and ((EPBCActStatus eq 'Endangered') and (DecimalLatitude ge -34 and DecimalLatitude le -33 and DecimalLongitude ge 150 and DecimalLongitude le 151))"
    );
    expect(buildRunFilter(faunaProfile, 'Birds', undefined, bbox)).toBe(
      "(Class eq 'Aves') and (DecimalLatitude ge -34 and DecimalLatitude le -33 and DecimalLongitude ge 150 and DecimalLongitude le 151)"
    );
  });

  it('warns and drops an unknown group', () => {
    expect(buildRunFilter(faunaProfile, 'Fish')).toBe('');
    expect(console.warn).toHaveBeenCalledWith(expect.stringContaining('Unknown group "Fish" for profile fauna'));
  });
});

describe('resolveTable', () => {
  it('renames the table but keeps its columns', () => {
    const table = resolveTable(faunaProfile, 'birds_only');

    expect(table.name).toBe('birds_only');
    expect(table.columns).toBe(faunaProfile.table.columns);
    expect(resolveTable(faunaProfile)).toBe(faunaProfile.table);
  });
});
