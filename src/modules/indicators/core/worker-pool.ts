/**
 * Fixed-size worker pool for independent async jobs.
 */

export interface WorkerPoolOptions {
  /** Number of jobs in flight at once */
  concurrency: number;
}

/**
 * Runs `work` for every item with at most `concurrency` jobs in flight.
 * Each worker finishes its current item before taking the next.
 *
 * Results are returned in item order regardless of completion order.
 * `work` is expected to settle with a value; a rejection rejects the whole run.
 */
export const runWorkerPool = async <T, R>(
  items: readonly T[],
  work: (item: T, index: number) => Promise<R>,
  options: WorkerPoolOptions
): Promise<R[]> => {
  const queue = items.map((item, index) => ({ item, index }));
  const slots: ({ value: R } | undefined)[] = items.map(() => undefined);

  const worker = async (): Promise<void> => {
    for (let job = queue.shift(); job !== undefined; job = queue.shift()) {
      slots[job.index] = { value: await work(job.item, job.index) };
    }
  };

  const workerCount = Math.max(1, Math.min(Math.floor(options.concurrency), items.length));
  await Promise.all(Array.from({ length: workerCount }, worker));

  const results: R[] = [];
  for (const slot of slots) {
    if (slot !== undefined) {
      results.push(slot.value);
    }
  }
  return results;
};
