/**
 * Bounded worker pool for asset transfers
 */

/**
 * Run `processor` over `items` with at most `concurrency` calls in flight
 *
 * Results keep the order of `items`. After the first failure no new item is
 * started; calls already in flight are awaited and the first error is then
 * rethrown.
 *
 * @example
 * ```typescript
 * const sizes = await mapWithConcurrency(files, 4, async file => (await fs.stat(file)).size)
 * ```
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  processor: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = []
  const queue = items.map((item, index) => ({ item, index }))
  const failures: unknown[] = []

  const worker = async (): Promise<void> => {
    for (;;) {
      if (failures.length > 0) return
      const next = queue.shift()
      if (!next) return
      try {
        results[next.index] = await processor(next.item, next.index)
      } catch (error: unknown) {
        failures.push(error)
      }
    }
  }

  const width = Math.max(1, Math.min(Math.floor(concurrency), items.length))
  await Promise.all(Array.from({ length: width }, () => worker()))

  if (failures.length > 0) {
    throw failures[0]
  }
  return results
}
