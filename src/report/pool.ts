/**
 * Fixed-size worker pool over a shared queue.
 *
 * Each worker takes the next task when its previous one settles. Results are
 * handed to `onResult` in completion order, on the caller's side of the
 * await, so `onResult` never runs concurrently with itself. The first task
 * failure stops the workers from taking new tasks and rejects the pool once
 * the tasks already running have settled.
 */

export async function runPool<T, R>(
  tasks: readonly T[],
  concurrency: number,
  run: (task: T) => Promise<R>,
  onResult: (result: R, task: T) => void,
): Promise<void> {
  const queue = tasks.slice();
  const workerCount = Math.max(1, Math.min(concurrency, queue.length));
  const state: { failure?: { error: unknown } } = {};

  const workers = Array.from({ length: workerCount }, async () => {
    while (!state.failure && queue.length > 0) {
      const task = queue.shift();
      if (task === undefined) continue;
      try {
        onResult(await run(task), task);
      } catch (error: unknown) {
        state.failure ??= { error };
      }
    }
  });

  await Promise.all(workers);
  if (state.failure) throw state.failure.error;
}
