import { log, formatError } from './logger';

export const chunk = <T>(items: readonly T[], size: number): T[][] => {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
};

/**
 * Retry strategy for sink writes: on failure, split the batch in half and retry
 * each half in turn. Recurses until individual rows, then logs and skips the
 * failing row. Halves run one after the other so the sink sees one request at a time.
 *
 * @param writeFn    - The actual write (sink-specific), resolving to rows written
 * @param itemLabel  - Log-friendly label for a single row (e.g. "species Canis lupus")
 */
export const writeWithRetry = async <T>(
  items: T[],
  writeFn: (batch: T[]) => Promise<number>,
  itemLabel: (item: T) => string
): Promise<{ written: number; skipped: number }> => {
  try {
    return { written: await writeFn(items), skipped: 0 };
  } catch (err) {
    if (items.length === 1) {
      const detail = formatError(err);
      log.warn(`Skipping ${itemLabel(items[0])}\n${detail}`);
      return { written: 0, skipped: 1 };
    }

    const mid = Math.ceil(items.length / 2);
    const left = items.slice(0, mid);
    const right = items.slice(mid);

    log.warn(`Batch of ${items.length} failed, splitting into ${left.length} + ${right.length}`);

    const leftResult = await writeWithRetry(left, writeFn, itemLabel);
    const rightResult = await writeWithRetry(right, writeFn, itemLabel);

    return {
      written: leftResult.written + rightResult.written,
      skipped: leftResult.skipped + rightResult.skipped,
    };
  }
};
