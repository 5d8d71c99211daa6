/**
 * Runs `processFunction` over `items` with at most `batchSize` calls in flight.
 * Results keep the order of `items`.
 */
export async function batch<T, R>(
    items: readonly T[],
    processFunction: (item: T, index: number) => Promise<R>,
    batchSize: number = 1,
    afterBatchMethod?: (processedCount: number, total: number) => void
): Promise<R[]> {
    const size = Math.max(1, Math.floor(batchSize))
    const total = items.length
    const results: R[] = []

    for (let i = 0; i < total; i += size) {
        const chunk = items.slice(i, i + size)
        const chunkResults = await Promise.all(chunk.map((item, offset) => processFunction(item, i + offset)))
        results.push(...chunkResults)

        if (afterBatchMethod) afterBatchMethod(Math.min(i + size, total), total)
    }

    return results
}
