export type PoolOutcome<R> =
  | { readonly kind: 'fulfilled'; readonly index: number; readonly value: R }
  | { readonly kind: 'rejected'; readonly index: number; readonly error: Error };

const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));

/**
 * Runs `execute` over `items` with at most `concurrency` in flight. A rejection is
 * recorded for its item and never stops the others. Outcomes keep item order.
 */
export const runPool = async <T, R>(
  items: readonly T[],
  concurrency: number,
  execute: (item: T, index: number) => Promise<R>,
): Promise<PoolOutcome<R>[]> => {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`Pool concurrency must be a positive integer, got ${concurrency}`);
  }
  const outcomes: PoolOutcome<R>[] = new Array(items.length);
  let next = 0;

  const lane = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      try {
        outcomes[index] = { kind: 'fulfilled', index, value: await execute(items[index], index) };
      } catch (error) {
        outcomes[index] = { kind: 'rejected', index, error: toError(error) };
      }
    }
  };

  const lanes = Array.from({ length: Math.min(concurrency, items.length) }, () => lane());
  await Promise.all(lanes);
  return outcomes;
};
