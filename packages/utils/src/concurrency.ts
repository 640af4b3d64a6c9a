import { makeLogger } from '@plate-designer/logger'

const logger = makeLogger('concurrency')

export async function runWithConcurrency<T>(
  items: readonly T[],
  limit: number,
  fn: (item: T) => Promise<void>,
): Promise<void> {
  logger.trace('runWithConcurrency start', { items: items.length, limit })

  const executing = new Set<Promise<void>>()
  const cap = Math.max(1, limit)

  for (const item of items) {
    const p: Promise<void> = (async () => fn(item))().finally(() => executing.delete(p))
    executing.add(p)

    if (executing.size >= cap) {
      await Promise.race(executing)
    }
  }

  await Promise.all(executing)
  logger.trace('runWithConcurrency done', { items: items.length })
}
