/**
 * Fixed-size pool scoped to a single `run`: tasks are pulled from a shared
 * queue by `size` workers and each result is handed to `onResult` as soon as
 * it completes. Tasks are frozen before dispatch.
 */
export class WorkerPool<T, R> {
  readonly size: number;

  constructor(
    size: number,
    private readonly handler: (task: Readonly<T>) => Promise<R>
  ) {
    this.size = Math.max(1, Math.floor(size) || 1);
  }

  async run(tasks: readonly T[], onResult?: (result: R, task: Readonly<T>) => void): Promise<R[]> {
    const queue = tasks.map((t) => Object.freeze(t));
    const results: R[] = [];
    const state: { failure?: { error: unknown } } = {};

    const pull = (): Readonly<T> | undefined => (state.failure ? undefined : queue.shift());

    const worker = async (): Promise<void> => {
      for (let task = pull(); task !== undefined; task = pull()) {
        try {
          const result = await this.handler(task);
          results.push(result);
          onResult?.(result, task);
        } catch (error) {
          // Stop handing out work; workers finish what they hold.
          state.failure ??= { error };
        }
      }
    };

    const workers = Array.from({ length: Math.min(this.size, queue.length) }, () => worker());
    await Promise.all(workers);
    if (state.failure) throw state.failure.error;
    return results;
  }
}
