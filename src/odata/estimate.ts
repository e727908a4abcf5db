import { z } from 'zod';
import type { ODataClient } from './client';
import { buildUrl } from './query';

const CountSchema = z.object({ '@odata.count': z.number().int().nonnegative() });

export type EstimateResult =
  | { known: true; count: number }
  | { known: false; reason: string };

export const groupByApply = (identityField: string, filter?: string): string => {
  const groupBy = `groupby((${identityField}))`;
  return filter ? `filter(${filter})/${groupBy}` : groupBy;
};

/**
 * Ask the server how many distinct identities match, using the aggregation
 * extension. Best effort: any failure yields `known: false`.
 */
export const estimateDistinctCount = async (
  client: ODataClient,
  baseUrl: string,
  entitySet: string,
  identityField: string,
  filter?: string
): Promise<EstimateResult> => {
  const url = buildUrl(baseUrl, entitySet, {
    apply: groupByApply(identityField, filter),
    top: 0,
    count: true,
  });

  try {
    const body = await client.get(url, CountSchema);
    return { known: true, count: body['@odata.count'] };
  } catch (err) {
    return { known: false, reason: err instanceof Error ? err.message : String(err) };
  }
};
