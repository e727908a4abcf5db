#!/usr/bin/env node
import 'dotenv/config';

import { parseArgs } from 'node:util';
import { ConfigError, loadEnv, parseBoundingBox, sourceConfigFromEnv, targetConfigFromEnv } from './config';
import { createSource, listTargetTypes } from './dialects';
import { DEFAULT_BIONET_BASE_URL } from './dialects/source/bionet-odata';
import { resolvePagerConfig } from './engine/config';
import { log, formatError } from './engine/logger';
import { buildRunFilter, run } from './engine/runner';
import type { RunnerConfig, SyncProfile } from './engine/types';
import { getProfile, listProfiles } from './profiles/registry';

const { values, positionals } = parseArgs({
  allowPositionals: true,
  options: {
    profile: { type: 'string', short: 'p' },
    group: { type: 'string', short: 'g' },
    filter: { type: 'string' },
    bbox: { type: 'string' },
    'max-records': { type: 'string', short: 'm' },
    'page-size': { type: 'string' },
    'batch-size': { type: 'string', short: 'b' },
    target: { type: 'string', short: 't' },
    table: { type: 'string' },
    'allow-partial': { type: 'boolean', default: false },
  },
});

const command = positionals[0] ?? 'run';

const parseOptionalInt = (raw: string | undefined, flag: string): number | undefined => {
  if (raw === undefined) return undefined;
  const parsed = Number.parseInt(raw, 10);
  if (Number.isNaN(parsed) || parsed <= 0) {
    throw new ConfigError(`--${flag} expects a positive integer, got "${raw}"`);
  }
  return parsed;
};

const selectedProfile = (): SyncProfile => getProfile(values.profile ?? 'fauna');

const selectedBoundingBox = () => (values.bbox === undefined ? undefined : parseBoundingBox(values.bbox));

const buildRunnerConfig = (profile: SyncProfile): RunnerConfig => {
  const env = loadEnv();
  const targetType = values.target ?? 'postgresql';

  return {
    sourceConfig: sourceConfigFromEnv(env),
    targetConfig: targetConfigFromEnv(targetType, env, profile.table.description),
    pager: resolvePagerConfig({
      pageSize: parseOptionalInt(values['page-size'], 'page-size'),
      maxRecords: parseOptionalInt(values['max-records'], 'max-records'),
      pageDelayMs: env.PAGE_DELAY_MS,
    }),
    group: values.group,
    filter: values.filter,
    bbox: selectedBoundingBox(),
    tableName: values.table,
    batchSize: parseOptionalInt(values['batch-size'], 'batch-size') ?? 500,
    allowPartial: values['allow-partial'] === true,
  };
};

const runCommand = async (): Promise<void> => {
  const profile = selectedProfile();
  const config = buildRunnerConfig(profile);

  const abortController = new AbortController();
  const shouldStop = () => abortController.signal.aborted;

  const onSignal = () => {
    if (abortController.signal.aborted) return;
    abortController.abort();
    console.info('\nGraceful shutdown requested, waiting for the current batch to finish...');
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    const result = await run(profile, config, shouldStop);
    if (!result.completed) {
      process.exitCode = 1;
    }
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
};

const countCommand = async (): Promise<void> => {
  const profile = selectedProfile();
  const env = loadEnv();
  const filter = buildRunFilter(profile, values.group, values.filter, selectedBoundingBox());
  const source = createSource(sourceConfigFromEnv(env), {
    entitySet: profile.entitySet,
    identityField: profile.identityField,
    filter,
  });

  const count = source.estimateUniqueCount ? await source.estimateUniqueCount() : undefined;
  if (count === undefined) {
    console.info(`Distinct ${profile.identityField} count is not available for ${source.describe()}`);
    process.exitCode = 1;
    return;
  }
  console.info(`${count} distinct ${profile.identityField} values for ${source.describe()}`);
};

const groupsCommand = (): void => {
  const profile = selectedProfile();
  console.info(`Groups for profile ${profile.name} (default: ${profile.defaultGroup}):`);
  for (const [selector, classes] of Object.entries(profile.groups)) {
    console.info(`  ${selector.padEnd(14)} ${classes.join(', ')}`);
  }
};

const printUsage = (): void => {
  console.info(`
Usage: tsx src/cli.ts <command> [options]

Available profiles: ${listProfiles().join(', ')}
Available targets:  ${listTargetTypes().join(', ')}

Commands:
  run      Page BioNet, collect unique species and replace the target table (default)
  count    Print the server's distinct species count for a profile and group
  groups   List a profile's group selectors

Options:
  -p, --profile <name>       Sync profile (default: fauna)
  -g, --group <selector>     Group selector, e.g. "Mammals" (default: the profile's "All ..." group)
  --filter <odata>           Extra OData predicate, ANDed with the group filter
  --bbox <w,s,e,n>           Only sightings inside minLon,minLat,maxLon,maxLat (decimal degrees)
  -m, --max-records <n>      Stop after n unique species
  --page-size <n>            Rows per page request (default: 1000)
  -b, --batch-size <n>       Rows per target write (default: 500)
  -t, --target <type>        postgresql or arcgis-online (default: postgresql)
  --table <name>             Override the output table name
  --allow-partial            Write what was collected even if paging aborted

Environment:
  BIONET_BASE_URL       OData service root (default: ${DEFAULT_BIONET_BASE_URL})
  BIONET_USERNAME       Optional Basic auth user
  BIONET_PASSWORD       Optional Basic auth password
  PAGE_DELAY_MS         Pause between pages (default: 250)
  REQUEST_TIMEOUT_MS    Per-request timeout (default: 60000)
  PG_HOST, PG_PORT, PG_USER, PG_PASSWORD, PG_DATABASE, DB_SSL
                        PostgreSQL connection (--target postgresql)
  ARCGIS_PORTAL_URL, ARCGIS_TOKEN | ARCGIS_USERNAME + ARCGIS_PASSWORD, ARCGIS_ITEM_TITLE
                        Hosted table (--target arcgis-online)
`);
};

const main = async (): Promise<void> => {
  switch (command) {
    case 'run':
      await runCommand();
      break;
    case 'count':
      await countCommand();
      break;
    case 'groups':
      groupsCommand();
      break;
    default:
      printUsage();
      process.exitCode = 1;
  }
};

main().catch((err: unknown) => {
  log.error(formatError(err));
  process.exit(1);
});
