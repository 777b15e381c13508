// ============================================================================
// Image Pipeline - Backend selection and the fallback cascade
// ============================================================================

import {
    isNativeModel,
    type BackendAttemptSummary,
    type BackendId,
    type GeneratedImage,
    type GenerationRequest,
    type GenerationResult,
    type ModelDescriptor,
} from '@prefcanvas/shared';
import type { CascadeOrder } from '../config.js';
import { sleep as defaultSleep, withTimeout, type Sleep } from './async.js';
import { GenerationFailedError, toPipelineError, type PipelineError } from './errors.js';

export interface ImageBackend {
    readonly id: BackendId;
    generate(request: GenerationRequest, model: ModelDescriptor, signal?: AbortSignal): Promise<GeneratedImage>;
}

// ----------------------------------------------------------------------------
// Per-backend attempt state machine
// ----------------------------------------------------------------------------

export type AttemptState =
    | { status: 'notStarted'; calls: number; lastError?: PipelineError }
    | { status: 'inFlight'; calls: number }
    | { status: 'succeeded'; calls: number; image: GeneratedImage }
    | { status: 'failed'; calls: number; error: PipelineError };

export type AttemptEvent =
    | { type: 'start' }
    | { type: 'success'; image: GeneratedImage }
    | { type: 'failure'; error: PipelineError };

export const INITIAL_ATTEMPT_STATE: AttemptState = { status: 'notStarted', calls: 0 };

/**
 * notStarted -start-> inFlight -success-> succeeded
 *                     inFlight -failure-> notStarted (retryable, calls left) | failed
 */
export function nextAttemptState(state: AttemptState, event: AttemptEvent, maxCalls: number): AttemptState {
    switch (state.status) {
        case 'notStarted':
            if (event.type === 'start') return { status: 'inFlight', calls: state.calls + 1 };
            break;
        case 'inFlight':
            if (event.type === 'success') return { status: 'succeeded', calls: state.calls, image: event.image };
            if (event.type === 'failure') {
                if (event.error.retryable && state.calls < maxCalls) {
                    return { status: 'notStarted', calls: state.calls, lastError: event.error };
                }
                return { status: 'failed', calls: state.calls, error: event.error };
            }
            break;
        case 'succeeded':
        case 'failed':
            break;
    }
    throw new Error(`Invalid attempt transition: ${state.status} -> ${event.type}`);
}

export type TerminalAttemptState = Extract<AttemptState, { status: 'succeeded' | 'failed' }>;

export function isTerminal(state: AttemptState): state is TerminalAttemptState {
    return state.status === 'succeeded' || state.status === 'failed';
}

// ----------------------------------------------------------------------------
// Cascade
// ----------------------------------------------------------------------------

export interface CascadeStep {
    backend: ImageBackend;
    model: ModelDescriptor;
    timeoutMs?: number;
}

export interface CascadeOptions {
    native?: ImageBackend;
    job?: ImageBackend;
    procedural: ImageBackend;
    order?: CascadeOrder;
    /** Job-API model used when the caller selected a native model. */
    jobFallbackModel?: ModelDescriptor;
    maxAttempts?: number;
    backoffMs?: number;
    nativeTimeoutMs?: number;
    sleep?: Sleep;
}

export interface CascadeContext {
    /** Rationale from prompt synthesis; provenance is appended to it. */
    rationale?: string;
    signal?: AbortSignal;
}

const BACKEND_LABELS: Record<BackendId, string> = {
    vertex: 'Vertex AI Imagen',
    replicate: 'Replicate',
    procedural: 'the procedural fallback',
};

function joinClauses(clauses: string[]): string {
    if (clauses.length <= 1) return clauses.join('');
    return `${clauses.slice(0, -1).join(', ')} and ${clauses[clauses.length - 1]}`;
}

export function describeProvenance(backend: BackendId, attempts: readonly BackendAttemptSummary[]): string {
    const failures = attempts.flatMap((attempt) =>
        attempt.status === 'failed' ? [`${attempt.backend} failed (${attempt.kind}: ${attempt.message})`] : [],
    );
    const label = BACKEND_LABELS[backend];
    if (!failures.length) return `Generated by ${label}.`;
    return `Generated by ${label} because ${joinClauses(failures)}.`;
}

export class GenerationCascade {
    private readonly order: CascadeOrder;
    private readonly maxAttempts: number;
    private readonly backoffMs: number;
    private readonly nativeTimeoutMs: number;
    private readonly sleep: Sleep;

    constructor(private readonly options: CascadeOptions) {
        this.order = options.order ?? 'native-first';
        this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
        this.backoffMs = options.backoffMs ?? 1000;
        this.nativeTimeoutMs = options.nativeTimeoutMs ?? 30_000;
        this.sleep = options.sleep ?? defaultSleep;
    }

    /** Ordered backends for a model; the procedural backend is always last. */
    plan(model: ModelDescriptor): CascadeStep[] {
        const { native, job, procedural, jobFallbackModel } = this.options;
        const nativeStep: CascadeStep[] = native ? [{ backend: native, model, timeoutMs: this.nativeTimeoutMs }] : [];
        const jobModel = isNativeModel(model) ? jobFallbackModel : model;
        const jobStep: CascadeStep[] = job && jobModel ? [{ backend: job, model: jobModel }] : [];

        const remote = this.order === 'selected-first' && !isNativeModel(model)
            ? [...jobStep, ...nativeStep]
            : [...nativeStep, ...jobStep];

        return [...remote, { backend: procedural, model }];
    }

    async generate(request: GenerationRequest, model: ModelDescriptor, context: CascadeContext = {}): Promise<GenerationResult> {
        const attempts: BackendAttemptSummary[] = [];
        const steps = this.plan(model);

        console.info('[Cascade] starting', { model: model.name, order: this.order, backends: steps.map((s) => s.backend.id) });

        for (const step of steps) {
            const state = await this.runStep(step, request, context.signal);
            const backend = step.backend.id;

            if (state.status === 'succeeded') {
                attempts.push({ backend, status: 'succeeded', calls: state.calls });
                console.info(`[Cascade] ${backend} succeeded after ${state.calls} call(s)`);
                const provenance = describeProvenance(backend, attempts);
                return {
                    image: state.image,
                    prompt: request.prompt,
                    rationale: [context.rationale?.trim(), provenance].filter(Boolean).join(' '),
                    backend,
                    attempts,
                };
            }

            attempts.push({
                backend,
                status: 'failed',
                calls: state.calls,
                kind: state.error.kind,
                message: state.error.message,
            });
            console.warn(`[Cascade] ${backend} failed (${state.error.kind}) after ${state.calls} call(s): ${state.error.message}`);
        }

        console.error('[Cascade] every backend failed', attempts);
        throw new GenerationFailedError(attempts);
    }

    private async runStep(step: CascadeStep, request: GenerationRequest, signal?: AbortSignal): Promise<TerminalAttemptState> {
        let state: AttemptState = INITIAL_ATTEMPT_STATE;

        while (!isTerminal(state)) {
            if (state.status === 'notStarted' && state.lastError) {
                const delay = this.backoffMs * state.calls;
                console.warn(`[Cascade] ${step.backend.id} ${state.lastError.kind} error, retrying in ${delay}ms (${state.calls}/${this.maxAttempts})`);
                await this.sleep(delay);
            }

            state = nextAttemptState(state, { type: 'start' }, this.maxAttempts);
            try {
                const image = await this.call(step, request, signal);
                state = nextAttemptState(state, { type: 'success', image }, this.maxAttempts);
            } catch (error) {
                state = nextAttemptState(state, { type: 'failure', error: toPipelineError(error) }, this.maxAttempts);
            }
        }

        return state;
    }

    private call(step: CascadeStep, request: GenerationRequest, signal?: AbortSignal): Promise<GeneratedImage> {
        const { backend, model, timeoutMs } = step;
        if (!timeoutMs) return backend.generate(request, model, signal);

        return withTimeout((timeoutSignal) => {
            const combined = signal ? AbortSignal.any([signal, timeoutSignal]) : timeoutSignal;
            return backend.generate(request, model, combined);
        }, timeoutMs, `${backend.id} generation`);
    }
}
