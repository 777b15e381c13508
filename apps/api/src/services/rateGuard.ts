// ============================================================================
// Rate Guards - Fixed-window call counters for the remote endpoints
// ============================================================================

import { sleep as defaultSleep, type Sleep } from './async.js';
import { QuotaExceededError } from './errors.js';

export interface RateWindow {
    windowStart: number;
    count: number;
}

export interface RateGuardOptions {
    limit: number;
    windowMs: number;
    label: string;
    now?: () => number;
    sleep?: Sleep;
}

abstract class WindowCounter {
    protected readonly window: RateWindow;
    protected readonly limit: number;
    protected readonly windowMs: number;
    protected readonly label: string;
    protected readonly now: () => number;

    constructor(options: RateGuardOptions) {
        this.limit = Math.max(1, options.limit);
        this.windowMs = options.windowMs;
        this.label = options.label;
        this.now = options.now ?? Date.now;
        this.window = { windowStart: this.now(), count: 0 };
    }

    snapshot(): RateWindow {
        return { ...this.window };
    }

    protected resetIfElapsed(at: number) {
        if (at - this.window.windowStart >= this.windowMs) {
            this.window.windowStart = at;
            this.window.count = 0;
        }
    }

    protected remainingMs(at: number): number {
        return Math.max(0, this.window.windowStart + this.windowMs - at);
    }
}

/**
 * Analysis path: once the limit is hit the caller waits for the window to roll
 * over. Acquisitions are chained so concurrent callers never interleave the
 * read-modify-write of the counter.
 */
export class BlockingRateGuard extends WindowCounter {
    private readonly sleep: Sleep;
    private tail: Promise<void> = Promise.resolve();

    constructor(options: RateGuardOptions) {
        super(options);
        this.sleep = options.sleep ?? defaultSleep;
    }

    acquire(): Promise<void> {
        const next = this.tail.then(() => this.take());
        this.tail = next.catch(() => undefined);
        return next;
    }

    private async take(): Promise<void> {
        const at = this.now();
        this.resetIfElapsed(at);

        if (this.window.count >= this.limit) {
            const waitMs = this.remainingMs(at);
            console.warn(`[RateGuard] ${this.label}: limit of ${this.limit} reached, waiting ${Math.ceil(waitMs / 1000)}s`);
            if (waitMs > 0) await this.sleep(waitMs);
            this.window.windowStart = this.now();
            this.window.count = 0;
        }

        this.window.count += 1;
    }
}

/** Generation path: over the limit is an immediate QuotaExceededError. */
export class RejectingRateGuard extends WindowCounter {
    acquire(): void {
        const at = this.now();
        this.resetIfElapsed(at);

        if (this.window.count >= this.limit) {
            const retryAfterMs = this.remainingMs(at);
            throw new QuotaExceededError(
                `${this.label} limit of ${this.limit} per ${Math.round(this.windowMs / 1000)}s reached; retry in ${Math.ceil(retryAfterMs / 1000)}s`,
                retryAfterMs,
            );
        }

        this.window.count += 1;
    }
}

export function createAnalysisGuard(limitPerMinute: number, overrides: Partial<RateGuardOptions> = {}) {
    return new BlockingRateGuard({ limit: limitPerMinute, windowMs: 60_000, label: 'analysis', ...overrides });
}

export function createGenerationGuard(limitPerHour: number, overrides: Partial<RateGuardOptions> = {}) {
    return new RejectingRateGuard({ limit: limitPerHour, windowMs: 3_600_000, label: 'generation', ...overrides });
}
