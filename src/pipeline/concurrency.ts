export const assertPositiveInteger = (label: string, value: number) => {
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${label} must be a positive integer (got ${value})`);
  }
};

/**
 * Runs `fn` over `items` with at most `limit` calls in flight. Results keep
 * the input order. After the first failure no new items start; calls already
 * running are awaited, then the first error is thrown.
 */
export const mapWithConcurrency = async <T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> => {
  assertPositiveInteger("Concurrency limit", limit);
  const results = new Array<R>(items.length);
  const failures: unknown[] = [];
  let next = 0;

  const worker = async () => {
    while (failures.length === 0 && next < items.length) {
      const index = next;
      next += 1;
      try {
        results[index] = await fn(items[index], index);
      } catch (error) {
        failures.push(error);
      }
    }
  };

  const workerCount = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  if (failures.length > 0) {
    throw failures[0];
  }
  return results;
};

export const chunk = <T>(items: readonly T[], size: number): T[][] => {
  assertPositiveInteger("Chunk size", size);
  const chunks: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    chunks.push(items.slice(start, start + size));
  }
  return chunks;
};
