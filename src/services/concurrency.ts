/**
 * Concurrency utilities for bounded parallel task execution
 */

export class AbortedError extends Error {
  constructor() {
    super('Aborted')
    this.name = 'AbortedError'
  }
}

/**
 * Run async tasks with limited concurrency
 * Returns results in same order as input tasks. Once the signal is aborted no
 * further task is started; tasks never started settle as rejected with AbortedError
 */
export function limitConcurrency<T>(
  tasks: (() => Promise<T>)[],
  concurrency: number,
  signal?: AbortSignal
): Promise<PromiseSettledResult<T>[]> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`Concurrency must be a positive integer (got ${concurrency})`)
  }

  return new Promise((resolve) => {
    const results: PromiseSettledResult<T>[] = new Array(tasks.length)
    let running = 0
    let completed = 0
    let nextIndex = 0

    const runNext = () => {
      if (signal?.aborted) {
        // Mark remaining as rejected
        while (nextIndex < tasks.length) {
          results[nextIndex] = { status: 'rejected', reason: new AbortedError() }
          nextIndex++
          completed++
        }
        if (completed === tasks.length) resolve(results)
        return
      }

      while (running < concurrency && nextIndex < tasks.length) {
        const index = nextIndex++
        running++

        // A task that throws synchronously is treated like one that rejects
        Promise.resolve()
          .then(() => tasks[index]())
          .then(value => {
            results[index] = { status: 'fulfilled', value }
          })
          .catch((reason: unknown) => {
            results[index] = { status: 'rejected', reason }
          })
          .finally(() => {
            running--
            completed++
            if (completed === tasks.length) {
              resolve(results)
            } else {
              runNext()
            }
          })
      }
    }

    if (tasks.length === 0) {
      resolve([])
    } else {
      runNext()
    }
  })
}
