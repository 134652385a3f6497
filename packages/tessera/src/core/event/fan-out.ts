/**
 * Runs `fn` over `items` on at most `concurrency` workers and resolves with the results
 * in input order. Workers pull from one shared iterator.
 */
export async function fanOut<T, R>(
    items: readonly T[],
    concurrency: number,
    fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
    const results = new Array<R>(items.length);
    const cursor = items.entries();

    const worker = async () => {
        for (const [index, item] of cursor) {
            results[index] = await fn(item, index);
        }
    };

    const workers = Math.max(1, Math.min(concurrency, items.length));
    await Promise.all(Array.from({ length: workers }, worker));
    return results;
}
