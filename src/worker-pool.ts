/**
 * Worker Pool
 *
 * Bounded-concurrency runner used to index documents. Workers pull the next
 * task from a shared cursor. Once the signal is aborted no further task starts;
 * tasks already running finish and keep their results.
 *
 * A task that throws stops the pool: running tasks settle, then the first
 * error is rethrown. Per-task failures that should not stop a run must be
 * returned as values by the processor.
 *
 * Usage:
 * ```typescript
 * const run = await runWorkerPool(
 *   toIndex,
 *   (document, index) => indexOne(document, index),
 *   { concurrency: config.indexConcurrency, signal }
 * )
 * ```
 */

const DEFAULT_CONCURRENCY = 1

type TaskProcessor<T, R> = (task: T, index: number) => Promise<R>

export interface WorkerPoolOptions {
  /** Number of concurrent workers (default 1) */
  readonly concurrency?: number | undefined
  readonly signal?: AbortSignal | undefined
}

export interface WorkerPoolRun<R> {
  /** Results of finished tasks, in task order */
  readonly completed: R[]
  /** True when the signal kept at least one task from starting */
  readonly cancelled: boolean
}

export async function runWorkerPool<T, R>(
  tasks: readonly T[],
  processor: TaskProcessor<T, R>,
  options: WorkerPoolOptions = {}
): Promise<WorkerPoolRun<R>> {
  const concurrency = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY)
  const finished = new Map<number, R>()

  let cursor = 0
  let cancelled = false
  const errors: unknown[] = []

  async function worker(): Promise<void> {
    while (errors.length === 0 && cursor < tasks.length) {
      if (options.signal?.aborted) {
        cancelled = true
        return
      }
      const index = cursor++
      const task = tasks[index]
      if (task === undefined) return
      try {
        finished.set(index, await processor(task, index))
      } catch (error) {
        errors.push(error)
      }
    }
  }

  const workerCount = Math.min(concurrency, tasks.length)
  await Promise.all(Array.from({ length: workerCount }, () => worker()))

  if (errors.length > 0) {
    throw errors[0]
  }

  const completed = [...finished.entries()]
    .sort(([a], [b]) => a - b)
    .map(([, result]) => result)

  return { completed, cancelled }
}
