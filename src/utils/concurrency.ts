// src/utils/concurrency.ts

export type Limit = <T>(fn: () => Promise<T>) => Promise<T>;

/**
 * Limits the number of async operations running at once
 *
 * @param concurrency - Max number of concurrent operations
 */
export function pLimit(concurrency: number): Limit {
    if (!(Number.isInteger(concurrency) && concurrency > 0)) {
        throw new TypeError('Expected `concurrency` to be a number from 1 and up');
    }

    const queue: (() => void)[] = [];
    let activeCount = 0;

    const next = (): void => {
        activeCount--;
        const nextFn = queue.shift();
        if (nextFn) {
            nextFn();
        }
    };

    return async <T>(fn: () => Promise<T>): Promise<T> => {
        const execute = async (): Promise<T> => {
            activeCount++;
            try {
                return await fn();
            } finally {
                next();
            }
        };

        if (activeCount < concurrency) {
            return execute();
        }
        return new Promise<T>((resolve, reject) => {
            queue.push(() => {
                execute().then(resolve, reject);
            });
        });
    };
}

/**
 * Map items through an async function with at most `limit` calls in flight.
 * Results keep the order of `items`.
 */
export async function mapWithConcurrency<T, R>(
    items: readonly T[],
    limit: number,
    fn: (item: T) => Promise<R>
): Promise<R[]> {
    const limitFn = pLimit(limit);
    return Promise.all(items.map(item => limitFn(() => fn(item))));
}
