import type { RunState } from "./types";

export async function mapLimit<T, R>(
  items: readonly T[],
  limit: number,
  asyncMapper: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new Error("mapLimit requires an integer limit >= 1");
  }

  const results: R[] = new Array(items.length);
  let nextIndex = 0;

  async function worker(): Promise<void> {
    while (nextIndex < items.length) {
      const currentIndex = nextIndex;
      nextIndex += 1;
      results[currentIndex] = await asyncMapper(items[currentIndex], currentIndex);
    }
  }

  const workerCount = Math.min(limit, items.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}

export interface BatchOutcome {
  query: string;
  state: RunState;
}

/**
 * Runs independent queries, at most `concurrency` at a time. Each run gets
 * its own state from `runOne`; nothing is shared between them.
 */
export async function runBatch(
  queries: readonly string[],
  concurrency: number,
  runOne: (query: string, index: number) => Promise<RunState>,
): Promise<BatchOutcome[]> {
  return mapLimit(queries, concurrency, async (query, index) => ({ query, state: await runOne(query, index) }));
}

export function batchSucceeded(outcomes: readonly BatchOutcome[]): boolean {
  return outcomes.every((outcome) => outcome.state.terminal === "SUCCEEDED");
}
