import { z } from 'zod';
import { AuthenticationError, DecodeError, HttpStatusError, NetworkError, isAuthFailure } from './errors';

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export type Credentials = {
  username: string;
  password: string;
};

export type ODataClientOptions = {
  credentials?: Credentials;
  timeoutMs?: number;
  fetchFn?: FetchFn;
};

const ODataPageSchema = z.object({
  value: z.array(z.record(z.unknown())),
  '@odata.nextLink': z.string().optional(),
  'odata.nextLink': z.string().optional(),
  '@odata.count': z.number().optional(),
});

export type ODataRecord = Record<string, unknown>;

export type ODataPage = {
  records: ODataRecord[];
  nextLink?: string;
  totalCount?: number;
};

const DEFAULT_TIMEOUT_MS = 60_000;

export const basicAuthHeader = (credentials: Credentials): string =>
  `Basic ${Buffer.from(`${credentials.username}:${credentials.password}`).toString('base64')}`;

/**
 * Thin GET-only transport for the BioNet OData service.
 * Keeps no state between calls beyond the credentials it was built with.
 */
export class ODataClient {
  private readonly fetchFn: FetchFn;
  private readonly timeoutMs: number;
  private readonly authorization?: string;

  constructor(options: ODataClientOptions = {}) {
    this.fetchFn = options.fetchFn ?? ((url, init) => fetch(url, init));
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.authorization = options.credentials ? basicAuthHeader(options.credentials) : undefined;
  }

  get isAuthenticated(): boolean {
    return this.authorization !== undefined;
  }

  async get<T>(url: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.authorization) headers.Authorization = this.authorization;

    let response: Response;
    let text: string;
    try {
      response = await this.fetchFn(url, { headers, signal: AbortSignal.timeout(this.timeoutMs) });
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

    const result = schema.safeParse(parsed);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue ? `${issue.path.join('.') || '<root>'}: ${issue.message}` : 'schema mismatch';
      throw new DecodeError(url, where, { cause: result.error });
    }
    return result.data;
  }

  async fetchPage(url: string): Promise<ODataPage> {
    const body = await this.get(url, ODataPageSchema);
    return {
      records: body.value,
      nextLink: body['@odata.nextLink'] ?? body['odata.nextLink'],
      totalCount: body['@odata.count'],
    };
  }
}
