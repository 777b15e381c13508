// ============================================================================
// Gemini Service - Image analysis, swipe evaluation and text completion
// ============================================================================

import {
    GoogleGenerativeAI,
    GoogleGenerativeAIError,
    GoogleGenerativeAIFetchError,
    GoogleGenerativeAIResponseError,
    type Part,
} from '@google/generative-ai';
import type {
    EvaluationResult,
    InlineImage,
    SwipeDirection,
    UserPreferenceAnalysis,
} from '@prefcanvas/shared';
import { chunked, mapWithConcurrency, sleep as defaultSleep, type Sleep } from './async.js';
import {
    classifyHttpStatus,
    ConfigurationError,
    DecodingError,
    errorMessage,
    InvalidInputError,
    NetworkError,
    requireCredential,
    toPipelineError,
    UpstreamGenerationError,
    type PipelineError,
} from './errors.js';
import type { EvaluationSession } from './evaluationSession.js';
import type { BlockingRateGuard } from './rateGuard.js';
import type { TextCompleter } from './promptSynthesizer.js';

export type ContentPart = { text: string } | { inlineData: { data: string; mimeType: string } };

export interface ContentModel {
    readonly name: string;
    generate(parts: ContentPart[], options?: { timeoutMs?: number }): Promise<string>;
}

const DESCRIBE_TIMEOUT_MS = 15_000;
const EVALUATE_TIMEOUT_MS = 10_000;
const ANALYSIS_TIMEOUT_MS = 60_000;
const MAX_CONCURRENT_ANALYSES = 3;
const CHUNK_DELAY_MS = 500;
const MAX_SECTION_ITEMS = 5;

function toSdkPart(part: ContentPart): Part {
    if ('inlineData' in part) return { inlineData: { data: part.inlineData.data, mimeType: part.inlineData.mimeType } };
    return { text: part.text };
}

export function toGeminiError(error: unknown): PipelineError {
    if (error instanceof GoogleGenerativeAIFetchError && typeof error.status === 'number') {
        return classifyHttpStatus(error.status, error.statusText || error.message);
    }
    if (error instanceof GoogleGenerativeAIResponseError) {
        return new UpstreamGenerationError(`Gemini response was blocked or empty: ${error.message}`);
    }
    // The SDK rewraps fetch rejections without keeping the cause.
    if (error instanceof GoogleGenerativeAIError && error.message.startsWith('Error fetching from')) {
        return new NetworkError(error.message, { cause: error });
    }
    return toPipelineError(error);
}

export class GeminiContentModel implements ContentModel {
    private client: GoogleGenerativeAI | null = null;

    constructor(private readonly apiKey: string | undefined, readonly name: string) {}

    async generate(parts: ContentPart[], options: { timeoutMs?: number } = {}): Promise<string> {
        const apiKey = requireCredential(this.apiKey, 'GEMINI_API_KEY');
        if (!this.client) this.client = new GoogleGenerativeAI(apiKey);

        const model = this.client.getGenerativeModel(
            { model: this.name },
            options.timeoutMs ? { timeout: options.timeoutMs } : undefined,
        );

        try {
            const result = await model.generateContent({
                contents: [{ role: 'user', parts: parts.map(toSdkPart) }],
            });
            const text = result.response.text().trim();
            if (!text) throw new DecodingError('Gemini returned no candidate text');
            return text;
        } catch (error) {
            throw toGeminiError(error);
        }
    }
}

function imagePart(image: InlineImage): ContentPart {
    return { inlineData: { data: image.data, mimeType: image.mimeType || 'image/jpeg' } };
}

function directionLabel(direction: SwipeDirection) {
    return direction === 'liked' ? 'liked' : 'disliked';
}

export function fallbackEvaluationText(direction: SwipeDirection): string {
    return `The user ${directionLabel(direction)} this image. Detailed analysis is unavailable right now, but the rating still counts toward their preferences.`;
}

const SECTION_HEADINGS = {
    preferred: /^(\d+[.)]\s*)?preferred features/i,
    avoided: /^(\d+[.)]\s*)?avoided elements/i,
    recommendations: /^(\d+[.)]\s*)?recommendations/i,
    profile: /^(\d+[.)]\s*)?aesthetic profile/i,
} as const;

type SectionKey = keyof typeof SECTION_HEADINGS;

const SECTION_KEYS: readonly SectionKey[] = ['preferred', 'avoided', 'recommendations', 'profile'];

/** Collects "- item" / "• item" lines under each known heading, five per section at most. */
export function parsePreferenceSections(text: string): Record<SectionKey, string[]> {
    const sections: Record<SectionKey, string[]> = { preferred: [], avoided: [], recommendations: [], profile: [] };
    let current: SectionKey | null = null;

    for (const rawLine of text.split(/\r?\n/)) {
        const line = rawLine.replace(/\*\*/g, '').replace(/^#+\s*/, '').trim();
        if (!line) continue;

        const heading = SECTION_KEYS.find((key) => SECTION_HEADINGS[key].test(line));
        if (heading) {
            current = heading;
            continue;
        }

        if (current && /^[-•*]\s*/.test(line)) {
            const item = line.replace(/^[-•*]\s*/, '').trim();
            if (item && sections[current].length < MAX_SECTION_ITEMS) sections[current].push(item);
        }
    }

    return sections;
}

export interface ImageAnalysisServiceOptions {
    model?: ContentModel;
    guard: BlockingRateGuard;
    sleep?: Sleep;
    chunkDelayMs?: number;
    now?: () => number;
}

export class ImageAnalysisService implements TextCompleter {
    private readonly model?: ContentModel;
    private readonly guard: BlockingRateGuard;
    private readonly sleep: Sleep;
    private readonly chunkDelayMs: number;
    private readonly now: () => number;

    constructor(options: ImageAnalysisServiceOptions) {
        this.model = options.model;
        this.guard = options.guard;
        this.sleep = options.sleep ?? defaultSleep;
        this.chunkDelayMs = options.chunkDelayMs ?? CHUNK_DELAY_MS;
        this.now = options.now ?? Date.now;
    }

    get configured(): boolean {
        return Boolean(this.model);
    }

    private async request(parts: ContentPart[], timeoutMs: number): Promise<string> {
        if (!this.model) throw new ConfigurationError('GEMINI_API_KEY is not configured');
        await this.guard.acquire();
        return this.model.generate(parts, { timeoutMs });
    }

    async complete(prompt: string): Promise<string> {
        return this.request([{ text: prompt }], ANALYSIS_TIMEOUT_MS);
    }

    async describeImage(image: InlineImage): Promise<string | null> {
        try {
            return await this.request(
                [
                    { text: 'Describe the main visual features of this image in one short sentence of at most 50 words.' },
                    imagePart(image),
                ],
                DESCRIBE_TIMEOUT_MS,
            );
        } catch (error) {
            console.warn('[Gemini] describeImage failed:', errorMessage(error));
            return null;
        }
    }

    /** Never throws: a failed analysis still records the rating with a fallback text. */
    async evaluateSwipedImage(
        image: InlineImage,
        direction: SwipeDirection,
        session: EvaluationSession,
        imageId?: string,
    ): Promise<EvaluationResult> {
        const label = directionLabel(direction);
        const instruction = `The user rated this image as "${label}".
In at most 100 words, explain:
- why they may have ${label} it
- its main visual features
- what to learn from it for future image generation
Answer concisely in English.`;

        let analysisText: string;
        try {
            analysisText = await this.request([{ text: instruction }, imagePart(image)], EVALUATE_TIMEOUT_MS);
        } catch (error) {
            console.warn('[Gemini] evaluateSwipedImage failed, using fallback evaluation:', errorMessage(error));
            analysisText = fallbackEvaluationText(direction);
        }

        return session.record(session.create({ direction, analysisText, imageId }));
    }

    /** Up to three analyses in flight, chunk by chunk, with a short pause between chunks. */
    async describeImages(images: readonly InlineImage[]): Promise<Array<string | null>> {
        const chunks = chunked(images, MAX_CONCURRENT_ANALYSES);
        const results: Array<string | null> = [];

        for (let index = 0; index < chunks.length; index++) {
            const chunkResults = await mapWithConcurrency(chunks[index], MAX_CONCURRENT_ANALYSES, (image) => this.describeImage(image));
            results.push(...chunkResults);
            if (index < chunks.length - 1) await this.sleep(this.chunkDelayMs);
        }

        return results;
    }

    async analyzeUserPreferences(evaluations: readonly EvaluationResult[]): Promise<UserPreferenceAnalysis> {
        if (!evaluations.length) throw new InvalidInputError('No evaluations to analyze');

        const liked = evaluations.filter((e) => e.direction === 'liked');
        const disliked = evaluations.filter((e) => e.direction === 'disliked');
        const bullets = (items: EvaluationResult[]) => (items.length ? items.map((e) => `- ${e.analysisText}`).join('\n') : '- (none)');

        const prompt = `Analyze the following image evaluations and identify the user's preference patterns.

Analyses of liked images:
${bullets(liked)}

Analyses of disliked images:
${bullets(disliked)}

Answer with exactly these four headings, each followed by bullet points starting with "- ":
Preferred features: (colors, composition, style, themes)
Avoided elements:
Recommendations: (concrete advice for future image generation)
Aesthetic profile:`;

        const response = await this.request([{ text: prompt }], ANALYSIS_TIMEOUT_MS);
        const sections = parsePreferenceSections(response);

        return {
            preferredFeatures: sections.preferred,
            avoidedElements: sections.avoided,
            recommendations: sections.recommendations,
            aestheticProfile: response,
            analyzedAt: new Date(this.now()).toISOString(),
            totalEvaluations: evaluations.length,
            likeCount: liked.length,
            likeRate: (liked.length / evaluations.length) * 100,
        };
    }

    async optimizePrompt(basePrompt: string, preferences: UserPreferenceAnalysis): Promise<string> {
        const prompt = `Optimize the following image generation prompt for this user's taste while keeping its intent.

Original prompt: "${basePrompt}"

Preferred features: ${preferences.preferredFeatures.join(', ') || 'none recorded'}
Elements to avoid: ${preferences.avoidedElements.join(', ') || 'none recorded'}
Recommendations: ${preferences.recommendations.join(', ') || 'none recorded'}

Reply with the optimized English prompt only.`;

        const response = await this.request([{ text: prompt }], ANALYSIS_TIMEOUT_MS);
        return response.replace(/^["'`]+|["'`]+$/g, '').trim() || basePrompt;
    }
}
