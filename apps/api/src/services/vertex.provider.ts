// ============================================================================
// Vertex AI Provider - Imagen predict endpoint (synchronous, bearer auth)
// ============================================================================

import { GoogleAuth } from 'google-auth-library';
import { z } from 'zod';
import type { GeneratedImage, GenerationRequest, ModelDescriptor } from '@prefcanvas/shared';
import { AuthenticationError, DecodingError, errorMessage, isPlaceholderCredential, requireCredential } from './errors.js';
import { readJson, sendRequest, type FetchLike } from './http.js';
import type { ImageBackend } from './imagePipeline.js';

const CLOUD_PLATFORM_SCOPE = 'https://www.googleapis.com/auth/cloud-platform';
const DEFAULT_IMAGEN_MODEL = 'imagen-3.0-generate-001';
const TOKEN_LIFETIME_MS = 60 * 60 * 1000;
const TOKEN_REFRESH_MARGIN_MS = 5 * 60 * 1000;

export interface AccessToken {
    token: string;
    expiresAt?: number;
}

export type TokenRefresher = () => Promise<AccessToken>;

export interface AccessTokenSource {
    getAccessToken(): Promise<string>;
    /** Drops a cached token the endpoint rejected. */
    invalidate(): void;
}

/** Short-lived tokens from application default credentials (service account, gcloud login, metadata server). */
export function createAdcRefresher(): TokenRefresher {
    const auth = new GoogleAuth({ scopes: [CLOUD_PLATFORM_SCOPE] });
    return async () => {
        const client = await auth.getClient();
        const { token } = await client.getAccessToken();
        if (!token) throw new AuthenticationError('Application default credentials returned no access token');
        // The library may hand back a token it cached earlier; keep its real expiry.
        return { token, expiresAt: client.credentials.expiry_date ?? undefined };
    };
}

/**
 * Prefers a refreshed short-lived token (cached for roughly an hour) and falls
 * back to the statically configured token when refreshing fails.
 */
export class VertexTokenSource implements AccessTokenSource {
    private cached: Required<AccessToken> | null = null;
    private readonly now: () => number;

    constructor(private readonly options: { staticToken?: string; refresh?: TokenRefresher; now?: () => number }) {
        this.now = options.now ?? Date.now;
    }

    async getAccessToken(): Promise<string> {
        const at = this.now();
        if (this.cached && at < this.cached.expiresAt - TOKEN_REFRESH_MARGIN_MS) {
            return this.cached.token;
        }

        if (this.options.refresh) {
            try {
                const refreshed = await this.options.refresh();
                if (!isPlaceholderCredential(refreshed.token)) {
                    this.cached = { token: refreshed.token, expiresAt: refreshed.expiresAt ?? at + TOKEN_LIFETIME_MS };
                    return refreshed.token;
                }
                console.warn('[Vertex] token refresh returned an empty token');
            } catch (error) {
                console.warn('[Vertex] token refresh failed, falling back to static token:', errorMessage(error));
            }
        }

        this.cached = null;
        return requireCredential(this.options.staticToken, 'VERTEX_ACCESS_TOKEN');
    }

    invalidate(): void {
        if (this.cached) console.warn('[Vertex] dropping rejected access token');
        this.cached = null;
    }
}

const VertexPredictResponseSchema = z.object({
    predictions: z.array(z.object({
        bytesBase64Encoded: z.string().optional(),
        mimeType: z.string().optional(),
    }).passthrough()).optional(),
}).passthrough();

export function buildVertexRequest(request: GenerationRequest, outputFormat: 'PNG' | 'JPEG' = 'PNG') {
    return {
        instances: [
            {
                prompt: request.prompt,
                ...(request.negativePrompt ? { negativePrompt: request.negativePrompt } : {}),
                aspectRatio: request.aspectRatio,
                outputFormat,
                sampleCount: 1,
            },
        ],
        parameters: {
            sampleCount: 1,
            outputImageType: outputFormat,
            language: 'auto',
        },
    };
}

export interface VertexImagenClientOptions {
    projectId?: string;
    location: string;
    tokens: AccessTokenSource;
    fetchImpl?: FetchLike;
}

export class VertexImagenClient implements ImageBackend {
    readonly id = 'vertex' as const;
    private readonly fetchImpl: FetchLike;

    constructor(private readonly options: VertexImagenClientOptions) {
        this.fetchImpl = options.fetchImpl ?? fetch;
    }

    endpointFor(projectId: string, modelId: string): string {
        const { location } = this.options;
        return `https://${location}-aiplatform.googleapis.com/v1/projects/${projectId}/locations/${location}/publishers/google/models/${modelId}:predict`;
    }

    async generate(request: GenerationRequest, model: ModelDescriptor, signal?: AbortSignal): Promise<GeneratedImage> {
        const projectId = requireCredential(this.options.projectId, 'VERTEX_PROJECT_ID');
        const accessToken = await this.options.tokens.getAccessToken();
        const modelId = model.inputShape === 'nativeCloud' ? model.backendIdentifier : DEFAULT_IMAGEN_MODEL;
        const url = this.endpointFor(projectId, modelId);

        console.info('[Vertex] predict', { model: modelId, aspectRatio: request.aspectRatio });
        let response: Response;
        try {
            response = await sendRequest(this.fetchImpl, url, {
                method: 'POST',
                headers: {
                    'Content-Type': 'application/json',
                    Authorization: `Bearer ${accessToken}`,
                },
                body: JSON.stringify(buildVertexRequest(request)),
                signal,
            });
        } catch (error) {
            if (error instanceof AuthenticationError) this.options.tokens.invalidate();
            throw error;
        }

        const data = await readJson(response, VertexPredictResponseSchema, 'Vertex AI');
        const prediction = data.predictions?.[0];
        if (!prediction?.bytesBase64Encoded) {
            throw new DecodingError('Vertex AI returned no image bytes');
        }

        const bytes = Buffer.from(prediction.bytesBase64Encoded, 'base64');
        if (!bytes.length) throw new DecodingError('Vertex AI returned an empty image');

        return { data: bytes, mimeType: prediction.mimeType || 'image/png' };
    }
}
