import { describe, expect, it, vi } from 'vitest';
import { GoogleGenerativeAIError, GoogleGenerativeAIFetchError } from '@google/generative-ai';
import type { EvaluationResult, InlineImage } from '@prefcanvas/shared';
import { AuthenticationError, ConfigurationError, InternalError, InvalidInputError, NetworkError } from './errors.js';
import { EvaluationSession } from './evaluationSession.js';
import {
    fallbackEvaluationText,
    GeminiContentModel,
    ImageAnalysisService,
    parsePreferenceSections,
    toGeminiError,
    type ContentModel,
    type ContentPart,
} from './gemini.js';
import { createAnalysisGuard } from './rateGuard.js';

type Generate = ContentModel['generate'];

function fakeModel(generate: Generate) {
    return { name: 'fake-model', generate: vi.fn<Generate>(generate) };
}

function imageData(parts: ContentPart[]): string | undefined {
    for (const part of parts) {
        if ('inlineData' in part) return part.inlineData.data;
    }
    return undefined;
}

const image = (data: string): InlineImage => ({ data, mimeType: 'image/png' });

function service(model?: ContentModel, sleep = vi.fn(async (_ms: number) => undefined)) {
    return new ImageAnalysisService({
        model,
        guard: createAnalysisGuard(100),
        sleep,
        now: () => Date.parse('2024-06-01T00:00:00.000Z'),
    });
}

function evaluation(direction: EvaluationResult['direction'], analysisText: string): EvaluationResult {
    return { id: analysisText, direction, analysisText, timestamp: '2024-06-01T00:00:00.000Z' };
}

describe('GeminiContentModel', () => {
    it('rejects placeholder keys before creating a client', async () => {
        await expect(new GeminiContentModel('YOUR_GEMINI_API_KEY', 'gemini-1.5-flash').generate([{ text: 'hi' }]))
            .rejects.toThrow(ConfigurationError);
    });
});

describe('ImageAnalysisService', () => {
    it('describes an image with a text and an inline image part', async () => {
        const model = fakeModel(async () => 'A pastel cat on a cushion.');
        const description = await service(model).describeImage(image('aGVsbG8='));

        expect(description).toBe('A pastel cat on a cushion.');
        const [parts, options] = model.generate.mock.calls[0];
        expect(parts[1]).toEqual({ inlineData: { data: 'aGVsbG8=', mimeType: 'image/png' } });
        expect(options).toEqual({ timeoutMs: 15_000 });
    });

    it('returns null when description fails', async () => {
        const model = fakeModel(async () => {
            throw new NetworkError('socket hang up');
        });
        await expect(service(model).describeImage(image('eA=='))).resolves.toBeNull();
        await expect(service().describeImage(image('eA=='))).resolves.toBeNull();
    });

    it('records a swipe evaluation in the session', async () => {
        const session = new EvaluationSession(() => 0);
        const model = fakeModel(async () => 'Soft colors and a calm subject.');
        const result = await service(model).evaluateSwipedImage(image('eA=='), 'liked', session, 'img-7');

        expect(result.analysisText).toBe('Soft colors and a calm subject.');
        expect(result.imageId).toBe('img-7');
        expect(session.snapshot()).toEqual([result]);
        expect(model.generate.mock.calls[0][1]).toEqual({ timeoutMs: 10_000 });
    });

    it('records a fallback evaluation when analysis fails', async () => {
        const session = new EvaluationSession(() => 0);
        const result = await service().evaluateSwipedImage(image('eA=='), 'disliked', session);

        expect(result.analysisText).toBe(fallbackEvaluationText('disliked'));
        expect(result.analysisText).toBe(
            'The user disliked this image. Detailed analysis is unavailable right now, but the rating still counts toward their preferences.',
        );
        expect(session.size).toBe(1);
    });

    it('describes batches in chunks of three and keeps input order', async () => {
        const sleep = vi.fn(async (_ms: number) => undefined);
        const model = fakeModel(async (parts) => {
            const data = imageData(parts);
            if (data === 'img-4') throw new NetworkError('flaky');
            return `description of ${data}`;
        });
        const images = ['img-0', 'img-1', 'img-2', 'img-3', 'img-4', 'img-5', 'img-6'].map(image);

        const results = await service(model, sleep).describeImages(images);

        expect(results).toEqual([
            'description of img-0',
            'description of img-1',
            'description of img-2',
            'description of img-3',
            null,
            'description of img-5',
            'description of img-6',
        ]);
        expect(sleep.mock.calls).toEqual([[500], [500]]);
    });

    it('analyzes preferences from the model response', async () => {
        const model = fakeModel(async () => [
            'Preferred features:',
            '- soft pastel colors',
            '- centered subjects',
            '**Avoided elements:**',
            '- harsh shadows',
            '3. Recommendations',
            '* try watercolor textures',
            'Aesthetic profile:',
            '• gentle and dreamy',
        ].join('\n'));

        const analysis = await service(model).analyzeUserPreferences([
            evaluation('liked', 'pastel sky'),
            evaluation('liked', 'pink flowers'),
            evaluation('disliked', 'dark alley'),
            evaluation('liked', 'cat portrait'),
        ]);

        expect(analysis.preferredFeatures).toEqual(['soft pastel colors', 'centered subjects']);
        expect(analysis.avoidedElements).toEqual(['harsh shadows']);
        expect(analysis.recommendations).toEqual(['try watercolor textures']);
        expect(analysis.totalEvaluations).toBe(4);
        expect(analysis.likeCount).toBe(3);
        expect(analysis.likeRate).toBe(75);
        expect(analysis.analyzedAt).toBe('2024-06-01T00:00:00.000Z');

        const prompt = model.generate.mock.calls[0][0][0];
        expect(prompt).toEqual({ text: expect.stringContaining('- pastel sky\n- pink flowers\n- cat portrait') });
    });

    it('refuses to analyze an empty history', async () => {
        await expect(service(fakeModel(async () => 'x')).analyzeUserPreferences([])).rejects.toThrow(InvalidInputError);
    });

    it('strips quotes from an optimized prompt and keeps the base prompt on empty output', async () => {
        const preferences = {
            preferredFeatures: ['pastel'],
            avoidedElements: [],
            recommendations: [],
            aestheticProfile: '',
            analyzedAt: '2024-06-01T00:00:00.000Z',
            totalEvaluations: 1,
            likeCount: 1,
            likeRate: 100,
        };

        await expect(service(fakeModel(async () => '"a softer pastel cat"')).optimizePrompt('a cat', preferences))
            .resolves.toBe('a softer pastel cat');
        await expect(service(fakeModel(async () => '""')).optimizePrompt('a cat', preferences))
            .resolves.toBe('a cat');
    });

    it('fails plain completions without a configured model', async () => {
        const analysis = service();
        expect(analysis.configured).toBe(false);
        await expect(analysis.complete('hello')).rejects.toThrow('GEMINI_API_KEY is not configured');
    });
});

describe('parsePreferenceSections', () => {
    it('keeps at most five items per section', () => {
        const text = ['Preferred features:', ...Array.from({ length: 7 }, (_, i) => `- item ${i}`)].join('\n');
        expect(parsePreferenceSections(text).preferred).toEqual(['item 0', 'item 1', 'item 2', 'item 3', 'item 4']);
    });
});

describe('toGeminiError', () => {
    it('classifies SDK failures', () => {
        expect(toGeminiError(new GoogleGenerativeAIFetchError('denied', 403, 'Forbidden'))).toBeInstanceOf(AuthenticationError);
        expect(toGeminiError(new GoogleGenerativeAIFetchError('busy', 503, 'Service Unavailable'))).toBeInstanceOf(NetworkError);

        const unreachable = toGeminiError(new GoogleGenerativeAIError('Error fetching from https://generativelanguage.googleapis.com: fetch failed'));
        expect(unreachable).toBeInstanceOf(NetworkError);
        expect(unreachable.retryable).toBe(true);
    });

    it('does not retry faults raised inside the process', () => {
        expect(toGeminiError(new RangeError('Invalid array length'))).toBeInstanceOf(InternalError);
    });
});
