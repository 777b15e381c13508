import { describe, expect, it } from 'vitest';
import { chunked, mapWithConcurrency, withTimeout } from './async.js';
import { TimeoutError } from './errors.js';

describe('withTimeout', () => {
    it('resolves with the operation result', async () => {
        await expect(withTimeout(async () => 'done', 1000)).resolves.toBe('done');
    });

    it('rejects with TimeoutError and aborts the operation', async () => {
        let seen: AbortSignal | undefined;
        const pending = withTimeout((signal) => {
            seen = signal;
            return new Promise<string>(() => undefined);
        }, 10, 'vertex generation');

        await expect(pending).rejects.toThrow(TimeoutError);
        await expect(pending).rejects.toThrow('vertex generation exceeded 10ms');
        expect(seen?.aborted).toBe(true);
    });
});

describe('mapWithConcurrency', () => {
    it('keeps results in input order and caps parallelism', async () => {
        let active = 0;
        let peak = 0;
        const results = await mapWithConcurrency([30, 5, 20, 1, 10], 2, async (delay, index) => {
            active += 1;
            peak = Math.max(peak, active);
            await new Promise((resolve) => setTimeout(resolve, delay));
            active -= 1;
            return `${index}:${delay}`;
        });

        expect(results).toEqual(['0:30', '1:5', '2:20', '3:1', '4:10']);
        expect(peak).toBe(2);
    });
});

describe('chunked', () => {
    it('splits into fixed-size chunks', () => {
        expect(chunked([1, 2, 3, 4, 5, 6, 7], 3)).toEqual([[1, 2, 3], [4, 5, 6], [7]]);
        expect(chunked([], 3)).toEqual([]);
    });
});
