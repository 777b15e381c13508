import { z } from 'zod';
import { classifyHttpStatus, DecodingError, toPipelineError } from './errors.js';

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

const ErrorBodySchema = z.object({
    error: z.union([
        z.string(),
        z.object({ message: z.string().optional(), status: z.string().optional() }).passthrough(),
    ]).optional(),
    detail: z.string().optional(),
    message: z.string().optional(),
}).passthrough();

export function parseJsonSafe(text: string): unknown {
    try {
        return JSON.parse(text || '{}');
    } catch {
        return undefined;
    }
}

export function extractErrorMessage(bodyText: string, fallback: string): string {
    const parsed = ErrorBodySchema.safeParse(parseJsonSafe(bodyText));
    if (parsed.success) {
        const { error, detail, message } = parsed.data;
        if (typeof error === 'string' && error) return error;
        if (error && typeof error === 'object' && error.message) return error.message;
        if (detail) return detail;
        if (message) return message;
    }
    const snippet = bodyText.trim().slice(0, 200);
    return snippet || fallback;
}

/** Transport failures become NetworkError/TimeoutError; non-2xx statuses are classified. */
export async function sendRequest(fetchImpl: FetchLike, url: string, init: RequestInit): Promise<Response> {
    let response: Response;
    try {
        response = await fetchImpl(url, init);
    } catch (error) {
        throw toPipelineError(error);
    }
    if (!response.ok) {
        const bodyText = await response.text().catch(() => '');
        throw classifyHttpStatus(response.status, extractErrorMessage(bodyText, response.statusText || 'Unknown error'));
    }
    return response;
}

export async function readJson<T>(response: Response, schema: z.ZodType<T, z.ZodTypeDef, unknown>, label: string): Promise<T> {
    let text: string;
    try {
        text = await response.text();
    } catch (error) {
        throw toPipelineError(error);
    }
    const raw = parseJsonSafe(text);
    if (raw === undefined) throw new DecodingError(`${label} response is not valid JSON`);
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
        throw new DecodingError(`${label} response has an unexpected shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    return parsed.data;
}
