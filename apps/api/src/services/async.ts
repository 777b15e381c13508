import { TimeoutError } from './errors.js';

export type Sleep = (ms: number) => Promise<void>;

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Races `operation` against a timer. The loser is cancelled: on timeout the
 * signal handed to the operation is aborted, on completion the timer is cleared.
 */
export async function withTimeout<T>(
    operation: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number,
    label = 'operation',
): Promise<T> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_resolve, reject) => {
        timer = setTimeout(() => {
            const error = new TimeoutError(`${label} exceeded ${timeoutMs}ms`);
            controller.abort(error);
            reject(error);
        }, timeoutMs);
    });

    try {
        return await Promise.race([operation(controller.signal), timeout]);
    } finally {
        clearTimeout(timer);
    }
}

export function chunked<T>(items: readonly T[], size: number): T[][] {
    const step = Math.max(1, size);
    const chunks: T[][] = [];
    for (let i = 0; i < items.length; i += step) {
        chunks.push(items.slice(i, i + step));
    }
    return chunks;
}

export async function mapWithConcurrency<T, R>(
    items: readonly T[],
    concurrency: number,
    fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
    const results = new Array<R>(items.length);
    if (!items.length) return results;
    const limit = Math.max(1, concurrency);
    let cursor = 0;
    const workers = new Array(Math.min(limit, items.length)).fill(0).map(async () => {
        while (true) {
            const index = cursor;
            cursor += 1;
            if (index >= items.length) break;
            results[index] = await fn(items[index], index);
        }
    });
    await Promise.all(workers);
    return results;
}
