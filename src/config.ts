import { z } from 'zod';
import type { SourceConfig } from './dialects/source';
import type { TargetConfig } from './dialects/target';
import { DEFAULT_BIONET_BASE_URL } from './dialects/source/bionet-odata';
import { SyncError } from './odata/errors';
import type { BoundingBox } from './odata/query';

export class ConfigError extends SyncError {}

// `KEY=` in a .env file means "not set"
const unsetIfBlank = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (typeof value === 'string' && value.trim() === '' ? undefined : value), schema);

const optionalText = unsetIfBlank(z.string().trim().optional());

const EnvSchema = z.object({
  BIONET_BASE_URL: unsetIfBlank(z.string().url().default(DEFAULT_BIONET_BASE_URL)),
  BIONET_USERNAME: optionalText,
  BIONET_PASSWORD: optionalText,
  PAGE_DELAY_MS: unsetIfBlank(z.coerce.number().int().nonnegative().default(250)),
  REQUEST_TIMEOUT_MS: unsetIfBlank(z.coerce.number().int().positive().default(60_000)),

  PG_HOST: optionalText,
  PG_PORT: unsetIfBlank(z.coerce.number().int().min(1).max(65535).default(5432)),
  PG_USER: optionalText,
  PG_PASSWORD: optionalText,
  PG_DATABASE: unsetIfBlank(z.string().default('bionet')),
  DB_SSL: unsetIfBlank(
    z
      .enum(['true', 'false'])
      .default('false')
      .transform((value) => value === 'true')
  ),

  ARCGIS_PORTAL_URL: unsetIfBlank(z.string().url().default('https://www.arcgis.com')),
  ARCGIS_USERNAME: optionalText,
  ARCGIS_PASSWORD: optionalText,
  ARCGIS_TOKEN: optionalText,
  ARCGIS_ITEM_TITLE: optionalText,
});

export type Env = z.infer<typeof EnvSchema>;

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `  ${issue.path.join('.')}: ${issue.message}`).join('\n');
    throw new ConfigError(`Invalid environment:\n${issues}`);
  }
  return result.data;
};

export const sourceConfigFromEnv = (env: Env): SourceConfig => ({
  type: 'bionet-odata',
  baseUrl: env.BIONET_BASE_URL,
  username: env.BIONET_USERNAME,
  password: env.BIONET_PASSWORD,
  timeoutMs: env.REQUEST_TIMEOUT_MS,
});

const missingVars = (env: Env, names: ReadonlyArray<keyof Env>): ConfigError => {
  const missing = names.filter((name) => env[name] === undefined);
  return new ConfigError(`Missing required env vars: ${missing.join(', ')}`);
};

/**
 * @param defaultTitle - hosted table title used when ARCGIS_ITEM_TITLE is unset
 */
export const targetConfigFromEnv = (type: string, env: Env, defaultTitle: string): TargetConfig => {
  if (type === 'postgresql') {
    const { PG_HOST: host, PG_USER: user, PG_PASSWORD: password } = env;
    if (!host || !user || !password) {
      throw missingVars(env, ['PG_HOST', 'PG_USER', 'PG_PASSWORD']);
    }
    return {
      type: 'postgresql',
      host,
      port: env.PG_PORT,
      user,
      password,
      database: env.PG_DATABASE,
      ssl: env.DB_SSL,
    };
  }

  if (type === 'arcgis-online') {
    if (!env.ARCGIS_TOKEN && (!env.ARCGIS_USERNAME || !env.ARCGIS_PASSWORD)) {
      throw new ConfigError('Set ARCGIS_TOKEN, or ARCGIS_USERNAME and ARCGIS_PASSWORD');
    }
    return {
      type: 'arcgis-online',
      portalUrl: env.ARCGIS_PORTAL_URL,
      itemTitle: env.ARCGIS_ITEM_TITLE ?? defaultTitle,
      username: env.ARCGIS_USERNAME,
      password: env.ARCGIS_PASSWORD,
      token: env.ARCGIS_TOKEN,
    };
  }

  throw new ConfigError(`Unknown target "${type}". Available: postgresql, arcgis-online`);
};

const longitude = z.number().min(-180, 'longitude out of range').max(180, 'longitude out of range');
const latitude = z.number().min(-90, 'latitude out of range').max(90, 'latitude out of range');

const BoundingBoxSchema = z
  .tuple([longitude, latitude, longitude, latitude])
  .superRefine(([minLon, minLat, maxLon, maxLat], ctx) => {
    if (minLon >= maxLon) ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'minLon must be less than maxLon' });
    if (minLat >= maxLat) ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'minLat must be less than maxLat' });
  })
  .transform(([minLon, minLat, maxLon, maxLat]): BoundingBox => ({ minLon, minLat, maxLon, maxLat }));

/** Parse `minLon,minLat,maxLon,maxLat` in decimal degrees. */
export const parseBoundingBox = (raw: string): BoundingBox => {
  const parts = raw.split(',').map((part) => (part.trim() === '' ? Number.NaN : Number(part)));
  const result = BoundingBoxSchema.safeParse(parts);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => issue.message).join('; ');
    throw new ConfigError(`--bbox expects minLon,minLat,maxLon,maxLat: ${issues}`);
  }
  return result.data;
};
