/**
 * Bounded-concurrency helpers.
 *
 * Workers share one iterator; pulling from it is synchronous, so no two
 * workers ever receive the same item.
 */

export interface PoolStats {
    started: number;
    /** Items never started because the signal aborted first */
    skipped: number;
}

/**
 * Consume a (possibly lazy) iterable with at most `width` workers in flight.
 * Once `signal` aborts no new item is started; in-flight items drain.
 */
export async function runPool<T>(
    source: Iterable<T>,
    width: number,
    worker: (item: T) => Promise<void>,
    signal?: AbortSignal
): Promise<PoolStats> {
    const iterator = source[Symbol.iterator]();
    let started = 0;
    let exhausted = false;

    const loop = async (): Promise<void> => {
        while (!signal?.aborted) {
            const next = iterator.next();
            if (next.done) {
                exhausted = true;
                return;
            }
            started++;
            await worker(next.value);
        }
    };

    await Promise.all(Array.from({ length: Math.max(1, width) }, () => loop()));

    let skipped = 0;
    if (!exhausted) {
        for (let next = iterator.next(); !next.done; next = iterator.next()) skipped++;
    }
    return { started, skipped };
}

/**
 * Map over `items` with at most `width` calls in flight; results keep input order.
 */
export async function mapPool<T, R>(
    items: readonly T[],
    width: number,
    fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
    const results: R[] = new Array<R>(items.length);
    let cursor = 0;

    const loop = async (): Promise<void> => {
        while (cursor < items.length) {
            const index = cursor++;
            results[index] = await fn(items[index], index);
        }
    };

    await Promise.all(Array.from({ length: Math.min(Math.max(1, width), items.length) }, () => loop()));
    return results;
}
