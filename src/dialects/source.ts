/**
 * Source dialect interface.
 * A source serves pages of raw records to the pager; it owns the wire protocol,
 * the pager owns deduplication and termination.
 */
export type SourceRecord = Record<string, unknown>;

/** Either an offset page the pager builds, or a server-issued continuation link used verbatim. */
export type PageRequest =
  | { kind: 'offset'; offset: number; top: number }
  | { kind: 'link'; url: string };

export type SourcePage = {
  records: SourceRecord[];
  nextLink?: string;
  totalCount?: number;
};

export interface SourceDialect {
  /** Unique name for logging and diagnostics */
  readonly name: string;

  /** Human-readable summary of what is being queried */
  describe(): string;

  /** Fetch one page, requesting only `fields` when the request is built locally */
  fetchPage(request: PageRequest, fields: readonly string[]): Promise<SourcePage>;

  /** Optional: number of distinct identities the query matches, or undefined if unknown */
  estimateUniqueCount?(): Promise<number | undefined>;

  /** Optional: cleanup resources when done */
  close?(): Promise<void>;
}

/**
 * What to query, independent of where it is served from.
 */
export type SourceQuery = {
  entitySet: string;
  identityField: string;
  filter: string;
};

/**
 * Configuration for source dialects
 */
export type SourceConfig =
  | {
      type: 'bionet-odata';
      baseUrl: string;
      username?: string;
      password?: string;
      timeoutMs?: number;
    }
  | { type: 'custom'; [key: string]: unknown };
