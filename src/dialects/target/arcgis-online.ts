import { setTimeout as sleep } from 'node:timers/promises';
import { z } from 'zod';
import type { FetchFn } from '../../odata/client';
import {
  AuthenticationError,
  DecodeError,
  HttpStatusError,
  NetworkError,
  SyncError,
  isAuthFailure,
} from '../../odata/errors';
import { log, formatError } from '../../engine/logger';
import type { ColumnSpec, SyncSummary, TableRow, TableSpec, TargetConfig, TargetDialect } from '../target';
import { registerTarget } from '../target-registry';
import { toCsv } from './csv';

const TokenSchema = z.object({ token: z.string() });
const SelfSchema = z.object({ user: z.object({ username: z.string() }) });
const SearchSchema = z.object({
  results: z.array(z.object({ id: z.string(), title: z.string(), url: z.string().nullish() })),
});
const AddItemSchema = z.object({ success: z.boolean(), id: z.string() });
const PublishSchema = z.object({
  services: z.array(
    z.object({
      serviceurl: z.string().optional(),
      serviceItemId: z.string().optional(),
      jobId: z.string().optional(),
      error: z.object({ message: z.string().optional() }).optional(),
    })
  ),
});
const StatusSchema = z.object({ status: z.string(), statusMessage: z.string().optional() });
const AckSchema = z.object({ success: z.boolean().optional() }).passthrough();
const LayerSchema = z.object({
  fields: z.array(z.object({ name: z.string(), alias: z.string().optional() })).default([]),
  indexes: z.array(z.object({ name: z.string(), fields: z.string() })).default([]),
});
const AddFeaturesSchema = z.object({
  addResults: z.array(
    z.object({
      success: z.boolean(),
      error: z.object({ description: z.string().optional() }).nullish(),
    })
  ),
});
const ErrorEnvelopeSchema = z.object({
  error: z.object({ code: z.number().optional(), message: z.string().optional() }),
});

type LayerInfo = z.infer<typeof LayerSchema>;
type FormTarget = { set(name: string, value: string): void };

/** ArcGIS reports expired or invalid tokens with these codes inside a 200 response. */
const TOKEN_ERROR_CODES = new Set([498, 499]);

export type ArcGISOnlineOptions = {
  fetchFn?: FetchFn;
  pollIntervalMs?: number;
  maxPolls?: number;
};

/** Server field name for each column, matched exactly first, then ignoring case. */
export const resolveFieldNames = (
  columns: readonly ColumnSpec[],
  serverFields: ReadonlyArray<{ name: string }>
): Map<string, string> => {
  const names = new Map<string, string>();
  for (const column of columns) {
    const match =
      serverFields.find((field) => field.name === column.name) ??
      serverFields.find((field) => field.name.toLowerCase() === column.name.toLowerCase());
    if (match) names.set(column.name, match.name);
  }
  return names;
};

export const toAttributes = (
  row: TableRow,
  fieldNames: ReadonlyMap<string, string>
): Record<string, string | number | null> => {
  const attributes: Record<string, string | number | null> = {};
  for (const [column, value] of Object.entries(row)) {
    const name = fieldNames.size > 0 ? fieldNames.get(column) : column;
    if (name === undefined) continue;
    attributes[name] = value instanceof Date ? value.getTime() : value;
  }
  return attributes;
};

export const toAdminUrl = (serviceUrl: string): string => serviceUrl.replace('/rest/services/', '/rest/admin/services/');

const setParams = (form: FormTarget, params: Record<string, string>): void => {
  for (const [key, value] of Object.entries(params)) form.set(key, value);
};

/**
 * ArcGIS Online hosted table target.
 * The first run publishes the rows as a CSV-backed hosted table; later runs
 * truncate that table and append in batches.
 */
export class ArcGISOnlineTarget implements TargetDialect {
  readonly name = 'arcgis-online';

  private readonly portalUrl: string;
  private readonly itemTitle: string;
  private readonly username?: string;
  private readonly password?: string;
  private readonly fetchFn: FetchFn;
  private readonly pollIntervalMs: number;
  private readonly maxPolls: number;

  private token?: string;
  private owner?: string;
  private layerUrl?: string;
  private serviceItemId?: string;
  private csvItemId?: string;
  private fieldNames = new Map<string, string>();

  constructor(
    config: TargetConfig,
    private readonly table: TableSpec,
    options: ArcGISOnlineOptions = {}
  ) {
    if (config.type !== 'arcgis-online') {
      throw new Error('Invalid config type for ArcGIS Online target');
    }

    this.portalUrl = config.portalUrl.replace(/\/+$/, '');
    this.itemTitle = config.itemTitle;
    this.username = config.username;
    this.password = config.password;
    this.token = config.token;
    this.fetchFn = options.fetchFn ?? ((url, init) => fetch(url, init));
    this.pollIntervalMs = options.pollIntervalMs ?? 2000;
    this.maxPolls = options.maxPolls ?? 60;
  }

  private get sharingUrl(): string {
    return `${this.portalUrl}/sharing/rest`;
  }

  private get contentUrl(): string {
    return `${this.sharingUrl}/content/users/${encodeURIComponent(this.requireOwner())}`;
  }

  private requireOwner(): string {
    if (!this.owner) throw new SyncError('ArcGIS Online owner is not resolved; call prepare() first');
    return this.owner;
  }

  private requireLayerUrl(): string {
    if (!this.layerUrl) throw new SyncError('ArcGIS Online layer is not resolved; call prepare() first');
    return this.layerUrl;
  }

  private async call<T>(
    url: string,
    params: Record<string, string>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    form: URLSearchParams | FormData = new URLSearchParams()
  ): Promise<T> {
    setParams(form, { f: 'json', ...params });
    if (this.token) form.set('token', this.token);

    let response: Response;
    let text: string;
    try {
      response = await this.fetchFn(url, { method: 'POST', body: form });
      text = await response.text();
    } catch (err) {
      throw new NetworkError(url, err);
    }

    if (!response.ok) {
      if (isAuthFailure(response.status)) throw new AuthenticationError(response.status, text, url);
      throw new HttpStatusError(response.status, text, url);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      throw new DecodeError(url, `body is not JSON (${text.slice(0, 80)})`, { cause: err });
    }

    const envelope = ErrorEnvelopeSchema.safeParse(parsed);
    if (envelope.success) {
      const code = envelope.data.error.code ?? 400;
      if (TOKEN_ERROR_CODES.has(code)) throw new AuthenticationError(code, text, url);
      throw new HttpStatusError(code, text, url);
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
      throw new DecodeError(url, result.error.issues[0]?.message ?? 'schema mismatch', { cause: result.error });
    }
    return result.data;
  }

  private async authenticate(): Promise<void> {
    if (!this.token) {
      if (!this.username || !this.password) {
        throw new SyncError('ArcGIS Online needs ARCGIS_TOKEN, or ARCGIS_USERNAME and ARCGIS_PASSWORD');
      }
      const body = await this.call(
        `${this.sharingUrl}/generateToken`,
        { username: this.username, password: this.password, referer: this.portalUrl, expiration: '120' },
        TokenSchema
      );
      this.token = body.token;
    }

    if (this.username) {
      this.owner = this.username;
    } else {
      const self = await this.call(`${this.sharingUrl}/portals/self`, {}, SelfSchema);
      this.owner = self.user.username;
    }
  }

  private async findService(): Promise<{ id: string; url: string } | undefined> {
    const query = `title:"${this.itemTitle}" AND owner:${this.requireOwner()} AND type:"Feature Service"`;
    const body = await this.call(`${this.sharingUrl}/search`, { q: query, num: '20' }, SearchSchema);
    const match = body.results.find((item) => item.title === this.itemTitle && item.url);
    return match?.url ? { id: match.id, url: match.url } : undefined;
  }

  private async describeLayer(): Promise<LayerInfo> {
    return this.call(this.requireLayerUrl(), {}, LayerSchema);
  }

  private async publishFromCsv(rows: readonly TableRow[]): Promise<void> {
    const csv = toCsv(this.table.columns, rows);
    const fileName = `${this.itemTitle.replace(/[^A-Za-z0-9]+/g, '_')}.csv`;

    const form = new FormData();
    form.set('file', new Blob([csv], { type: 'text/csv' }), fileName);
    const added = await this.call(
      `${this.contentUrl}/addItem`,
      { type: 'CSV', title: `${this.itemTitle} (upload)`, tags: 'bionet,species' },
      AddItemSchema,
      form
    );
    if (!added.success) throw new SyncError(`CSV upload for "${this.itemTitle}" was not accepted`);
    this.csvItemId = added.id;
    log.info(`Uploaded CSV item ${added.id} (${rows.length} rows)`);

    const publishParameters = {
      type: 'csv',
      name: this.itemTitle.replace(/[^A-Za-z0-9]+/g, '_'),
      locationType: 'none',
      columnDelimiter: ',',
      qualifier: '"',
    };
    const published = await this.call(
      `${this.contentUrl}/publish`,
      { itemId: added.id, filetype: 'csv', publishParameters: JSON.stringify(publishParameters) },
      PublishSchema
    );

    const service = published.services[0];
    if (!service?.serviceurl || !service.serviceItemId) {
      throw new SyncError(`Publishing "${this.itemTitle}" failed: ${service?.error?.message ?? 'no service returned'}`);
    }

    if (service.jobId) {
      await this.waitForJob(service.serviceItemId, service.jobId);
    }

    this.serviceItemId = service.serviceItemId;
    this.layerUrl = `${service.serviceurl}/0`;
    log.success(`Published hosted table ${this.itemTitle} (${service.serviceItemId})`);
  }

  private async waitForJob(itemId: string, jobId: string): Promise<void> {
    for (let attempt = 0; attempt < this.maxPolls; attempt++) {
      const status = await this.call(
        `${this.contentUrl}/items/${itemId}/status`,
        { jobId, jobType: 'publish' },
        StatusSchema
      );
      if (status.status === 'completed') return;
      if (status.status === 'failed') {
        throw new SyncError(`Publish job ${jobId} failed: ${status.statusMessage ?? 'no detail'}`);
      }
      if (this.pollIntervalMs > 0) await sleep(this.pollIntervalMs);
    }
    throw new SyncError(`Publish job ${jobId} did not finish after ${this.maxPolls} checks`);
  }

  /** Truncate when the admin endpoint allows it, otherwise delete every feature. */
  private async clear(): Promise<void> {
    const layerUrl = this.requireLayerUrl();
    try {
      await this.call(`${toAdminUrl(layerUrl)}/truncate`, { async: 'false' }, AckSchema);
      log.info(`Truncated ${this.itemTitle}`);
    } catch (err) {
      log.warn(`Truncate not available, deleting all rows instead\n${formatError(err)}`);
      await this.call(`${layerUrl}/deleteFeatures`, { where: '1=1' }, AckSchema);
      log.info(`Deleted existing rows from ${this.itemTitle}`);
    }
  }

  async prepare(rows: readonly TableRow[]): Promise<{ seeded: number }> {
    await this.authenticate();

    const existing = await this.findService();
    if (!existing) {
      log.info(`No hosted table named "${this.itemTitle}", publishing one from CSV`);
      await this.publishFromCsv(rows);
      return { seeded: rows.length };
    }

    this.serviceItemId = existing.id;
    this.layerUrl = `${existing.url.replace(/\/+$/, '')}/0`;

    const layer = await this.describeLayer();
    this.fieldNames = resolveFieldNames(this.table.columns, layer.fields);
    for (const column of this.table.columns) {
      if (!this.fieldNames.has(column.name)) {
        log.warn(`Hosted table has no field matching "${column.name}"; its values will not be written`);
      }
    }

    await this.clear();
    return { seeded: 0 };
  }

  async writeBatch(batch: TableRow[]): Promise<number> {
    if (batch.length === 0) {
      return 0;
    }

    const features = batch.map((row) => ({ attributes: toAttributes(row, this.fieldNames) }));
    const body = await this.call(
      `${this.requireLayerUrl()}/addFeatures`,
      { features: JSON.stringify(features), rollbackOnFailure: 'true' },
      AddFeaturesSchema
    );

    const failed = body.addResults.find((result) => !result.success);
    if (failed) {
      throw new SyncError(`addFeatures rejected the batch: ${failed.error?.description ?? 'no detail'}`);
    }
    return body.addResults.length;
  }

  private async alignAliases(layer: LayerInfo): Promise<void> {
    const fieldNames = resolveFieldNames(this.table.columns, layer.fields);
    const updates: Array<{ name: string; alias: string }> = [];

    for (const column of this.table.columns) {
      const serverName = fieldNames.get(column.name);
      const field = layer.fields.find((candidate) => candidate.name === serverName);
      if (serverName && field && field.alias !== column.alias) {
        updates.push({ name: serverName, alias: column.alias });
      }
    }
    if (updates.length === 0) return;

    await this.call(
      `${toAdminUrl(this.requireLayerUrl())}/updateDefinition`,
      { updateDefinition: JSON.stringify({ fields: updates }) },
      AckSchema
    );
    log.info(`Updated ${updates.length} field aliases`);
  }

  private async ensureIdentityIndex(layer: LayerInfo): Promise<void> {
    const identity =
      resolveFieldNames(this.table.columns, layer.fields).get(this.table.identityColumn) ?? this.table.identityColumn;
    const indexed = layer.indexes.some((index) => index.fields.toLowerCase() === identity.toLowerCase());
    if (indexed) return;

    const index = {
      name: `${identity}_idx`,
      fields: identity,
      isAscending: true,
      isUnique: false,
      description: `Lookup by ${identity}`,
    };
    await this.call(
      `${toAdminUrl(this.requireLayerUrl())}/addToDefinition`,
      { addToDefinition: JSON.stringify({ indexes: [index] }) },
      AckSchema
    );
    log.info(`Added index on ${identity}`);
  }

  private async annotate(summary: SyncSummary): Promise<void> {
    if (!this.serviceItemId) return;
    await this.call(
      `${this.contentUrl}/items/${this.serviceItemId}/update`,
      {
        snippet: `${this.table.description} (${summary.rowCount} species)`,
        description: `${summary.rowCount} unique species from ${summary.source}. Last synced ${summary.syncedAt.toISOString()}.`,
        tags: 'bionet,species,nsw',
      },
      AckSchema
    );
  }

  private async removeUpload(): Promise<void> {
    if (!this.csvItemId) return;
    await this.call(`${this.contentUrl}/items/${this.csvItemId}/delete`, {}, AckSchema);
    log.info(`Removed CSV item ${this.csvItemId}`);
    this.csvItemId = undefined;
  }

  /** Maintenance steps are independent; one failing does not stop the others. */
  async finalize(summary: SyncSummary): Promise<void> {
    const steps: Array<[string, () => Promise<void>]> = [
      [
        'field aliases and index',
        async () => {
          const layer = await this.describeLayer();
          await this.alignAliases(layer);
          await this.ensureIdentityIndex(layer);
        },
      ],
      ['item metadata', () => this.annotate(summary)],
      ['upload cleanup', () => this.removeUpload()],
    ];

    for (const [label, step] of steps) {
      try {
        await step();
      } catch (err) {
        log.warn(`Post-sync ${label} failed\n${formatError(err)}`);
      }
    }
  }
}

registerTarget('arcgis-online', (config, table) => new ArcGISOnlineTarget(config, table));
