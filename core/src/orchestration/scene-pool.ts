import pLimit from 'p-limit';

/**
 * Runs one task per scene on a bounded pool and waits for all of them.
 * Any failure fails the whole batch with the lowest-index scene's error, so
 * the outcome does not depend on which worker finished first.
 */
export async function runScenePool<T>(
  sceneCount: number,
  concurrency: number,
  task: (sceneIndex: number) => Promise<T>
): Promise<T[]> {
  const limit = pLimit(concurrency);
  const settled = await Promise.allSettled(
    Array.from({ length: sceneCount }, (_, sceneIndex) => limit(() => task(sceneIndex)))
  );

  const results: T[] = [];
  for (const outcome of settled) {
    if (outcome.status === 'rejected') {
      throw outcome.reason;
    }
    results.push(outcome.value);
  }
  return results;
}
