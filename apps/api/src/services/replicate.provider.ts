// ============================================================================
// Replicate Provider - Prediction jobs (create, poll, download)
// ============================================================================

import { z } from 'zod';
import type { GeneratedImage, GenerationRequest, ModelDescriptor } from '@prefcanvas/shared';
import { sleep as defaultSleep, type Sleep } from './async.js';
import {
    AuthenticationError,
    ConfigurationError,
    DecodingError,
    requireCredential,
    TimeoutError,
    toPipelineError,
    UpstreamGenerationError,
} from './errors.js';
import { extractErrorMessage, readJson, sendRequest, type FetchLike } from './http.js';
import type { ImageBackend } from './imagePipeline.js';

const REPLICATE_PREDICTIONS_URL = 'https://api.replicate.com/v1/predictions';
const ACTIVE_STATUSES = new Set(['starting', 'processing']);
const REQUEST_TIMEOUT_MS = 30_000;

const PredictionSchema = z.object({
    id: z.string(),
    status: z.string(),
    urls: z.object({
        get: z.string().url(),
        cancel: z.string().optional(),
    }).passthrough().optional(),
    output: z.union([z.string(), z.array(z.string()), z.null()]).optional(),
    error: z.union([z.string(), z.null()]).optional(),
}).passthrough();

export type ReplicatePrediction = z.infer<typeof PredictionSchema>;

export function buildReplicateInput(request: GenerationRequest, model: ModelDescriptor): Record<string, unknown> {
    switch (model.inputShape) {
        case 'simpleText':
            return {
                prompt: request.prompt,
                width: 1024,
                height: 1024,
                num_outputs: 1,
                ...(request.negativePrompt ? { negative_prompt: request.negativePrompt } : {}),
            };
        case 'structuredImagen':
            return {
                prompt: request.prompt,
                aspect_ratio: request.aspectRatio,
                num_outputs: 1,
                ...(request.negativePrompt ? { negative_prompt: request.negativePrompt } : {}),
                output_format: 'png',
                output_quality: 90,
            };
        case 'flagOnly':
            return { prompt_conjunction: true };
        case 'nativeCloud':
            throw new ConfigurationError(`${model.name} is only served by the native cloud backend`);
    }
}

function firstOutputUrl(prediction: ReplicatePrediction): string | undefined {
    const { output } = prediction;
    if (typeof output === 'string') return output || undefined;
    if (Array.isArray(output)) return output.find(Boolean);
    return undefined;
}

export interface ReplicateClientOptions {
    apiToken?: string;
    maxPollAttempts?: number;
    pollIntervalMs?: number;
    /** Bound on each individual HTTP request (create, poll, download). */
    requestTimeoutMs?: number;
    fetchImpl?: FetchLike;
    sleep?: Sleep;
}

export class ReplicateClient implements ImageBackend {
    readonly id = 'replicate' as const;
    private readonly fetchImpl: FetchLike;
    private readonly sleep: Sleep;
    private readonly maxPollAttempts: number;
    private readonly pollIntervalMs: number;
    private readonly requestTimeoutMs: number;

    constructor(private readonly options: ReplicateClientOptions) {
        this.fetchImpl = options.fetchImpl ?? fetch;
        this.sleep = options.sleep ?? defaultSleep;
        this.maxPollAttempts = options.maxPollAttempts ?? 60;
        this.pollIntervalMs = options.pollIntervalMs ?? 1000;
        this.requestTimeoutMs = options.requestTimeoutMs ?? REQUEST_TIMEOUT_MS;
    }

    private requestSignal(signal?: AbortSignal): AbortSignal {
        const timeout = AbortSignal.timeout(this.requestTimeoutMs);
        return signal ? AbortSignal.any([signal, timeout]) : timeout;
    }

    private authHeaders(): Record<string, string> {
        const token = requireCredential(this.options.apiToken, 'REPLICATE_API_TOKEN');
        return {
            Authorization: `Bearer ${token}`,
            Accept: 'application/json',
        };
    }

    async submit(request: GenerationRequest, model: ModelDescriptor, signal?: AbortSignal): Promise<ReplicatePrediction> {
        const headers = this.authHeaders();
        const input = buildReplicateInput(request, model);

        console.info('[Replicate] creating prediction', { model: model.backendIdentifier });
        const response = await sendRequest(this.fetchImpl, REPLICATE_PREDICTIONS_URL, {
            method: 'POST',
            headers: { ...headers, 'Content-Type': 'application/json' },
            body: JSON.stringify({ version: model.versionIdentifier, input }),
            signal: this.requestSignal(signal),
        });
        return readJson(response, PredictionSchema, 'Replicate');
    }

    /**
     * Polls until the job leaves starting/processing. Non-2xx poll responses
     * other than auth failures count as an attempt and are retried.
     */
    async poll(prediction: ReplicatePrediction, signal?: AbortSignal): Promise<ReplicatePrediction> {
        const headers = this.authHeaders();
        let current = prediction;
        let attempts = 0;

        while (ACTIVE_STATUSES.has(current.status)) {
            if (attempts >= this.maxPollAttempts) {
                throw new TimeoutError(`Replicate prediction ${current.id} still ${current.status} after ${attempts} polls`);
            }
            const getUrl = current.urls?.get;
            if (!getUrl) throw new DecodingError(`Replicate prediction ${current.id} has no status URL`);

            attempts += 1;
            await this.sleep(this.pollIntervalMs);

            let response: Response;
            try {
                response = await this.fetchImpl(getUrl, { headers, signal: this.requestSignal(signal) });
            } catch (error) {
                throw toPipelineError(error);
            }

            if (response.status === 401 || response.status === 403) {
                const body = await response.text().catch(() => '');
                throw new AuthenticationError(`Replicate rejected the token (${response.status}): ${extractErrorMessage(body, response.statusText)}`, response.status);
            }
            if (!response.ok) {
                const body = await response.text().catch(() => '');
                console.warn(`[Replicate] poll ${attempts}/${this.maxPollAttempts} returned ${response.status}: ${extractErrorMessage(body, response.statusText)}`);
                continue;
            }

            current = await readJson(response, PredictionSchema, 'Replicate');
            console.info(`[Replicate] status ${current.status} (poll ${attempts}/${this.maxPollAttempts})`);
        }

        if (current.status === 'failed') {
            throw new UpstreamGenerationError(current.error || 'Replicate prediction failed');
        }
        if (current.status === 'canceled') {
            throw new UpstreamGenerationError('Replicate prediction was canceled');
        }
        if (current.status !== 'succeeded') {
            throw new DecodingError(`Unknown Replicate prediction status: ${current.status}`);
        }
        return current;
    }

    async download(prediction: ReplicatePrediction, signal?: AbortSignal): Promise<GeneratedImage> {
        const url = firstOutputUrl(prediction);
        if (!url) throw new DecodingError(`Replicate prediction ${prediction.id} succeeded without an output URL`);

        const response = await sendRequest(this.fetchImpl, url, { signal: this.requestSignal(signal) });
        let bytes: Buffer;
        try {
            bytes = Buffer.from(await response.arrayBuffer());
        } catch (error) {
            throw toPipelineError(error);
        }
        if (!bytes.length) throw new DecodingError('Replicate output image is empty');

        const contentType = response.headers.get('content-type') || '';
        return {
            data: bytes,
            mimeType: contentType.startsWith('image/') ? contentType.split(';')[0].trim() : 'image/png',
        };
    }

    async generate(request: GenerationRequest, model: ModelDescriptor, signal?: AbortSignal): Promise<GeneratedImage> {
        const created = await this.submit(request, model, signal);
        const finished = await this.poll(created, signal);
        return this.download(finished, signal);
    }
}
