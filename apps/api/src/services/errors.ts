// ============================================================================
// Pipeline Errors - Failure taxonomy shared by clients, cascade and routes
// ============================================================================

import type { BackendAttemptSummary, FailureKind } from '@prefcanvas/shared';

export abstract class PipelineError extends Error {
    abstract readonly kind: FailureKind;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }

    /** Only transport-level failures are worth another attempt on the same backend. */
    get retryable(): boolean {
        return false;
    }
}

/** Missing or placeholder credentials/settings. Raised before any network call. */
export class ConfigurationError extends PipelineError {
    readonly kind = 'configuration' as const;
}

export class AuthenticationError extends PipelineError {
    readonly kind = 'authentication' as const;

    constructor(message: string, readonly status?: number) {
        super(message);
    }
}

export class NetworkError extends PipelineError {
    readonly kind = 'network' as const;

    override get retryable(): boolean {
        return true;
    }
}

export class TimeoutError extends PipelineError {
    readonly kind = 'timeout' as const;
}

export class DecodingError extends PipelineError {
    readonly kind = 'decoding' as const;
}

export class UpstreamGenerationError extends PipelineError {
    readonly kind = 'upstream' as const;

    constructor(message: string, readonly status?: number) {
        super(message);
    }
}

export class QuotaExceededError extends PipelineError {
    readonly kind = 'quota' as const;

    constructor(message: string, readonly retryAfterMs: number) {
        super(message);
    }
}

export class InvalidInputError extends PipelineError {
    readonly kind = 'invalid_input' as const;
}

/** A fault inside this process rather than in the upstream service. */
export class InternalError extends PipelineError {
    readonly kind = 'internal' as const;
}

/** Every backend in the cascade failed, the procedural fallback included. */
export class GenerationFailedError extends Error {
    constructor(readonly attempts: BackendAttemptSummary[]) {
        super(`All generation backends failed: ${attempts.map((a) => a.backend).join(', ')}`);
        this.name = 'GenerationFailedError';
    }
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message || error.name || 'Unknown error';
    if (typeof error === 'string') return error;
    return 'Unknown error';
}

export function isAbortError(error: unknown): boolean {
    return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

export function classifyHttpStatus(status: number, message: string): PipelineError {
    if (status === 401 || status === 403) {
        return new AuthenticationError(`Authentication failed (${status}): ${message}`, status);
    }
    if (status === 408) {
        return new TimeoutError(`Upstream timed out (${status}): ${message}`);
    }
    if (status === 429 || status >= 500) {
        return new NetworkError(`Upstream unavailable (${status}): ${message}`);
    }
    return new UpstreamGenerationError(`Upstream rejected the request (${status}): ${message}`, status);
}

/**
 * fetch rejects with `TypeError('fetch failed')`; socket and body-stream
 * failures carry a `cause` or a system error `code`.
 */
export function isTransportError(error: unknown): boolean {
    if (!(error instanceof Error)) return false;
    if (error instanceof TypeError && error.message === 'fetch failed') return true;
    if (error.cause !== undefined) return true;
    return 'code' in error && typeof error.code === 'string';
}

export function toPipelineError(error: unknown): PipelineError {
    if (error instanceof PipelineError) return error;
    if (isAbortError(error)) return new TimeoutError(errorMessage(error), { cause: error });
    if (error instanceof SyntaxError) return new DecodingError(errorMessage(error), { cause: error });
    if (isTransportError(error)) return new NetworkError(errorMessage(error), { cause: error });
    return new InternalError(errorMessage(error), { cause: error });
}

const PLACEHOLDER_PATTERNS = [
    /^YOUR[_-][A-Z0-9_-]*$/i,
    /^<[^>]*>$/,
    /^(changeme|change-me|placeholder|todo|xxx+|none|null|undefined)$/i,
];

export function isPlaceholderCredential(value: string | undefined | null): boolean {
    const trimmed = (value || '').trim();
    if (!trimmed) return true;
    return PLACEHOLDER_PATTERNS.some((pattern) => pattern.test(trimmed));
}

export function requireCredential(value: string | undefined, name: string): string {
    if (isPlaceholderCredential(value)) {
        throw new ConfigurationError(`${name} is not configured`);
    }
    return (value || '').trim();
}
