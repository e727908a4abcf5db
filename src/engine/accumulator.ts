export type MergeOutcome = 'new' | 'duplicate' | 'skipped';

/** Trimmed, lower-cased identity, or undefined when the value cannot identify a record. */
export const normalizeIdentity = (value: unknown): string | undefined => {
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value !== 'string') return undefined;
  const normalized = value.trim().toLowerCase();
  return normalized === '' ? undefined : normalized;
};

const compareKeys = (a: string, b: string): number => {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
};

/**
 * First-seen-wins store of records keyed by their normalised identity.
 * Grows monotonically for the lifetime of one run.
 */
export class UniqueAccumulator<T> {
  private readonly byKey = new Map<string, T>();

  constructor(private readonly identityOf: (record: T) => unknown) {}

  get size(): number {
    return this.byKey.size;
  }

  add(record: T): MergeOutcome {
    const key = normalizeIdentity(this.identityOf(record));
    if (key === undefined) return 'skipped';
    if (this.byKey.has(key)) return 'duplicate';
    this.byKey.set(key, record);
    return 'new';
  }

  /** Records ordered case-insensitively by identity, original casing untouched. */
  sorted(): T[] {
    return Array.from(this.byKey.entries())
      .sort(([a], [b]) => compareKeys(a, b))
      .map(([, record]) => record);
  }
}
