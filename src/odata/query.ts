/**
 * OData query construction.
 *
 * BioNet rejects URLs where the OData punctuation is over-escaped, so values are
 * percent-encoded with parentheses, commas and single quotes kept literal.
 */

export type ODataQuery = {
  select?: readonly string[];
  filter?: string;
  apply?: string;
  top?: number;
  skip?: number;
  count?: boolean;
};

/** Selector → list of `Class` values it covers. */
export type GroupMap = Readonly<Record<string, readonly string[]>>;

export const encodeODataValue = (value: string): string =>
  // encodeURIComponent already leaves ( ) and ' alone
  encodeURIComponent(value).replace(/%2C/gi, ',');

export const quoteLiteral = (value: string): string => `'${value.replace(/'/g, "''")}'`;

export const toQueryString = (query: ODataQuery): string => {
  const pairs: Array<[string, string]> = [];

  if (query.select && query.select.length > 0) pairs.push(['$select', query.select.join(',')]);
  if (query.filter) pairs.push(['$filter', query.filter]);
  if (query.apply) pairs.push(['$apply', query.apply]);
  if (query.top !== undefined) pairs.push(['$top', String(query.top)]);
  if (query.skip !== undefined) pairs.push(['$skip', String(query.skip)]);
  if (query.count) pairs.push(['$count', 'true']);

  return pairs.map(([key, value]) => `${key}=${encodeODataValue(value)}`).join('&');
};

export const buildUrl = (baseUrl: string, entitySet: string, query: ODataQuery): string => {
  const root = `${baseUrl.replace(/\/+$/, '')}/${entitySet}`;
  const queryString = toQueryString(query);
  return queryString ? `${root}?${queryString}` : root;
};

const classPredicate = (classes: readonly string[], field: string): string =>
  classes.map((name) => `${field} eq ${quoteLiteral(name)}`).join(' or ');

/**
 * Build the `$filter` for a group selector plus an optional free-form predicate.
 * An unknown selector contributes nothing; the caller decides whether an
 * unfiltered fetch is acceptable.
 */
export const buildGroupFilter = (
  groups: GroupMap,
  selector: string | undefined,
  extra?: string,
  field = 'Class'
): string => {
  const classes = selector === undefined ? undefined : groups[selector];
  const groupPart = classes && classes.length > 0 ? classPredicate(classes, field) : '';
  const extraPart = extra?.trim() ?? '';

  if (groupPart && extraPart) return `(${groupPart}) and (${extraPart})`;
  return groupPart || extraPart;
};

export const isKnownGroup = (groups: GroupMap, selector: string): boolean =>
  Object.prototype.hasOwnProperty.call(groups, selector);

/** WGS84 rectangle, in decimal degrees. */
export type BoundingBox = {
  minLon: number;
  minLat: number;
  maxLon: number;
  maxLat: number;
};

export type CoordinateFields = {
  latitude: string;
  longitude: string;
};

/** Inclusive range predicate keeping sightings whose coordinates fall inside the box. */
export const boundingBoxPredicate = (box: BoundingBox, fields: CoordinateFields): string =>
  [
    `${fields.latitude} ge ${box.minLat}`,
    `${fields.latitude} le ${box.maxLat}`,
    `${fields.longitude} ge ${box.minLon}`,
    `${fields.longitude} le ${box.maxLon}`,
  ].join(' and ');

/** AND together the non-empty predicates, parenthesising each when there is more than one. */
export const andPredicates = (...predicates: Array<string | undefined>): string => {
  const parts = predicates.map((predicate) => predicate?.trim() ?? '').filter((predicate) => predicate !== '');
  return parts.length > 1 ? parts.map((part) => `(${part})`).join(' and ') : (parts[0] ?? '');
};
