import { ODataClient, type FetchFn } from '../../odata/client';
import { estimateDistinctCount } from '../../odata/estimate';
import { buildUrl } from '../../odata/query';
import { log } from '../../engine/logger';
import type { PageRequest, SourceConfig, SourceDialect, SourcePage, SourceQuery } from '../source';
import { registerSource } from '../source-registry';

export const DEFAULT_BIONET_BASE_URL = 'https://data.bionet.nsw.gov.au/biosvcapp/odata';

/**
 * BioNet OData source dialect.
 * Builds `$select/$filter/$top/$skip` requests for offset pages and follows
 * server continuation links verbatim.
 */
export class BioNetODataSource implements SourceDialect {
  readonly name = 'bionet-odata';

  private readonly client: ODataClient;
  private readonly baseUrl: string;
  private readonly query: SourceQuery;

  constructor(config: SourceConfig, query: SourceQuery, options: { fetchFn?: FetchFn } = {}) {
    if (config.type !== 'bionet-odata') {
      throw new Error('Invalid config type for BioNet OData source');
    }

    const credentials =
      config.username && config.password ? { username: config.username, password: config.password } : undefined;

    this.client = new ODataClient({ credentials, timeoutMs: config.timeoutMs, fetchFn: options.fetchFn });
    this.baseUrl = config.baseUrl;
    this.query = query;
  }

  describe(): string {
    const access = this.client.isAuthenticated ? 'authenticated' : 'anonymous';
    return `${this.query.entitySet} where ${this.query.filter || '<no filter>'} (${access})`;
  }

  pageUrl(request: PageRequest, fields: readonly string[]): string {
    if (request.kind === 'link') {
      return new URL(request.url, `${this.baseUrl.replace(/\/+$/, '')}/`).toString();
    }

    return buildUrl(this.baseUrl, this.query.entitySet, {
      select: fields,
      filter: this.query.filter || undefined,
      top: request.top,
      skip: request.offset,
      count: request.offset === 0,
    });
  }

  async fetchPage(request: PageRequest, fields: readonly string[]): Promise<SourcePage> {
    return this.client.fetchPage(this.pageUrl(request, fields));
  }

  async estimateUniqueCount(): Promise<number | undefined> {
    const estimate = await estimateDistinctCount(
      this.client,
      this.baseUrl,
      this.query.entitySet,
      this.query.identityField,
      this.query.filter || undefined
    );

    if (!estimate.known) {
      log.warn(`Distinct count unavailable, stopping on idle pages instead (${estimate.reason})`);
      return undefined;
    }

    log.info(`Server reports ${estimate.count.toLocaleString('en-US')} distinct ${this.query.identityField} values`);
    return estimate.count;
  }
}

// Register the dialect
registerSource('bionet-odata', (config, query) => new BioNetODataSource(config, query));
