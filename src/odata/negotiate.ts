import { HttpStatusError, SchemaMismatchError } from './errors';

const MISSING_PROPERTY_PATTERNS: readonly RegExp[] = [
  /could not find a property named\s+['"]([^'"]+)['"]/i,
  /property\s+['"]([^'"]+)['"]\s+(?:does not exist|is not found|was not found|not found)/i,
];

const MESSAGE_KEYS = new Set(['message', 'Message']);
const MAX_DEPTH = 6;

const collectMessages = (node: unknown, depth: number, out: string[]): void => {
  if (depth > MAX_DEPTH || node === null || typeof node !== 'object') return;

  for (const [key, value] of Object.entries(node)) {
    if (typeof value === 'string' && MESSAGE_KEYS.has(key)) {
      out.push(value);
    } else if (typeof value === 'object') {
      collectMessages(value, depth + 1, out);
    }
  }
};

const parseJson = (text: string): unknown => {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
};

/**
 * Extract the field a server names as unknown from an error body.
 * Looks at every `message` of a JSON body (including nested inner errors)
 * before the raw text. Returns undefined when no field can be isolated.
 */
export const parseMissingProperty = (body: string): string | undefined => {
  const messages: string[] = [];
  collectMessages(parseJson(body), 0, messages);
  messages.push(body);

  for (const message of messages) {
    for (const pattern of MISSING_PROPERTY_PATTERNS) {
      const match = pattern.exec(message);
      if (match?.[1]) return match[1];
    }
  }
  return undefined;
};

export type Negotiation =
  | { kind: 'retry'; fields: readonly string[]; removed: string }
  | { kind: 'fatal'; error: unknown };

/**
 * Turn a failed request into a smaller field set, or decide it cannot be
 * recovered. Every `retry` strictly shrinks the field set.
 */
export const negotiateFields = (
  fields: readonly string[],
  error: unknown,
  protectedFields: readonly string[] = []
): Negotiation => {
  if (!(error instanceof HttpStatusError) || error.status !== 400) {
    return { kind: 'fatal', error };
  }

  const named = parseMissingProperty(error.body);
  if (named === undefined) {
    return {
      kind: 'fatal',
      error: new SchemaMismatchError(`Request rejected and no field could be isolated: ${error.body.slice(0, 200)}`, undefined, {
        cause: error,
      }),
    };
  }

  const member = fields.find((field) => field.toLowerCase() === named.toLowerCase());
  if (member === undefined) {
    return {
      kind: 'fatal',
      error: new SchemaMismatchError(`Server rejected field "${named}", which is not in the requested set`, named, {
        cause: error,
      }),
    };
  }

  if (protectedFields.some((field) => field.toLowerCase() === member.toLowerCase())) {
    return {
      kind: 'fatal',
      error: new SchemaMismatchError(`Server does not recognise required field "${member}"`, member, { cause: error }),
    };
  }

  const remaining = fields.filter((field) => field !== member);
  if (remaining.length === 0) {
    return {
      kind: 'fatal',
      error: new SchemaMismatchError('Every requested field was rejected by the server', member, { cause: error }),
    };
  }

  return { kind: 'retry', fields: remaining, removed: member };
};
