// ============================================================================
// Generation Types - Model descriptors, requests and results
// ============================================================================

import { z } from 'zod';

export const AspectRatioSchema = z.enum(['1:1', '3:4', '4:3', '9:16', '16:9']);

export type AspectRatio = z.infer<typeof AspectRatioSchema>;

/**
 * Request shape a backend expects.
 * - simpleText: prompt plus width/height
 * - structuredImagen: prompt, aspect ratio, negative prompt, output format
 * - nativeCloud: served by the native cloud backend, never by the job API
 * - flagOnly: no prompt, a single boolean flag
 */
export type InputShape = 'simpleText' | 'structuredImagen' | 'nativeCloud' | 'flagOnly';

export interface ModelDescriptor {
    name: string;
    backendIdentifier: string;
    versionIdentifier: string;
    inputShape: InputShape;
}

export const GenerationRequestSchema = z.object({
    prompt: z.string().trim().min(1),
    modelSelector: z.string(),
    negativePrompt: z.string().optional(),
    aspectRatio: AspectRatioSchema.default('1:1'),
});

export type GenerationRequest = z.infer<typeof GenerationRequestSchema>;

export type BackendId = 'vertex' | 'replicate' | 'procedural';

export interface GeneratedImage {
    data: Buffer;
    mimeType: string;
    width?: number;
    height?: number;
}

export type FailureKind =
    | 'configuration'
    | 'authentication'
    | 'network'
    | 'timeout'
    | 'decoding'
    | 'upstream'
    | 'quota'
    | 'invalid_input'
    | 'internal';

export type BackendAttemptSummary =
    | { backend: BackendId; status: 'succeeded'; calls: number }
    | { backend: BackendId; status: 'failed'; calls: number; kind: FailureKind; message: string };

export interface GenerationResult {
    image: GeneratedImage;
    /** Never empty. */
    prompt: string;
    rationale?: string;
    backend: BackendId;
    attempts: BackendAttemptSummary[];
}
