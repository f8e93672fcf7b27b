/**
 * Runs `tasks` with at most `maxWorkers` in flight. Results keep the index order of
 * `tasks`, never completion order. A rejected task rejects the whole call.
 */
export async function runWithWorkerPool<T>(
  tasks: readonly (() => Promise<T>)[],
  maxWorkers: number,
): Promise<T[]> {
  const results = new Array<T>(tasks.length);
  let next = 0;
  const worker = async () => {
    while (next < tasks.length) {
      const index = next;
      next += 1;
      const task = tasks[index];
      if (task) {
        results[index] = await task();
      }
    }
  };
  const workers = Math.max(1, Math.min(Math.floor(maxWorkers), tasks.length));
  await Promise.all(Array.from({ length: workers }, () => worker()));
  return results;
}
