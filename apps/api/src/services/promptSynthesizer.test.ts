import { describe, expect, it, vi } from 'vitest';
import {
    buildSynthesisInstruction,
    buildTemplatePrompt,
    ensureQualityKeywords,
    extractKeywords,
    findHeuristicPrompt,
    parsePromptResponse,
    PromptSynthesizer,
    type TextCompleter,
} from './promptSynthesizer.js';

const QUALITY_WORDS = ['high quality', 'detailed', 'masterpiece', 'best quality', '4k', '8k'];

type Reply = (prompt: string) => Promise<string>;

function completer(reply: Reply) {
    const fake = { complete: vi.fn<Reply>(reply) };
    return fake satisfies TextCompleter;
}

describe('parsePromptResponse', () => {
    it('reads every known field', () => {
        const parsed = parsePromptResponse([
            'Sure! Here you go:',
            '**PROMPT:** "a dreamy pastel cat in a garden"',
            'NEGATIVE: blurry, dark',
            'Reason: matches the soft palette',
            '- style: anime',
            '# Mood: calm',
        ].join('\n'));

        expect(parsed).toEqual({
            prompt: 'a dreamy pastel cat in a garden',
            negative: 'blurry, dark',
            reason: 'matches the soft palette',
            style: 'anime',
            mood: 'calm',
        });
    });

    it('keeps the first non-empty value of a field', () => {
        expect(parsePromptResponse('PROMPT:   \nprompt: first\nPROMPT: second')).toEqual({ prompt: 'first' });
    });

    it('returns null when no field is present', () => {
        expect(parsePromptResponse('just some chatter\nwith no fields')).toBeNull();
        expect(parsePromptResponse('')).toBeNull();
    });
});

describe('findHeuristicPrompt', () => {
    it('takes the first mid-length line with two quality keywords', () => {
        const text = 'Here is an idea.\nA beautiful detailed painting of a quiet harbor at dusk\nA beautiful detailed second line';
        expect(findHeuristicPrompt(text)).toBe('A beautiful detailed painting of a quiet harbor at dusk');
    });

    it('ignores lines that are too short or too long', () => {
        expect(findHeuristicPrompt('beautiful detailed')).toBeUndefined();
        expect(findHeuristicPrompt(`beautiful detailed ${'x'.repeat(200)}`)).toBeUndefined();
    });
});

describe('extractKeywords', () => {
    it('walks the categories in order and stops at eight', () => {
        expect(extractKeywords(['anime manga illustration painting watercolor sketch cartoon pastel pink red'])).toEqual([
            'anime', 'manga', 'illustration', 'painting', 'watercolor', 'sketch', 'cartoon', 'pastel',
        ]);
    });

    it('matches whole words only', () => {
        expect(extractKeywords(['a colored pencil drawing'])).toEqual([]);
    });
});

describe('ensureQualityKeywords', () => {
    it('appends the quality suffix only when missing', () => {
        expect(ensureQualityKeywords('A cat.')).toBe('A cat, high quality, detailed, masterpiece');
        expect(ensureQualityKeywords('A detailed cat')).toBe('A detailed cat');
        expect(ensureQualityKeywords('')).toBe('high quality, detailed, masterpiece');
    });
});

describe('buildTemplatePrompt', () => {
    it('uses an enthusiastic template for positive wording', () => {
        expect(buildTemplatePrompt(['I love how the shapes overlap'])).toBe(
            'Generate a stunning image in the spirit of what the user loved: "I love how the shapes overlap"',
        );
    });

    it('truncates the combined descriptions to 200 characters', () => {
        expect(buildTemplatePrompt(['x'.repeat(250)])).toBe(
            `Generate an image inspired by these user preferences: "${'x'.repeat(200)}"`,
        );
    });
});

describe('buildSynthesisInstruction', () => {
    it('labels each description and asks for the fixed fields', () => {
        const instruction = buildSynthesisInstruction(['misty forest', 'golden light']);
        expect(instruction).toContain('Image 1: misty forest\nImage 2: golden light');
        expect(instruction).toContain('PROMPT: <English image generation prompt>');
        expect(instruction).toContain('MOOD: <mood in a few words>');
    });
});

describe('PromptSynthesizer', () => {
    it('returns a generic prompt when nothing was liked', async () => {
        const remote = completer(async () => 'PROMPT: unused');
        const result = await new PromptSynthesizer(remote).synthesize([]);

        expect(result.prompt).toBe('Create a beautiful, highly detailed, photorealistic image with stunning artistic composition, high quality.');
        expect(result.rationale).toContain('No strong preference');
        expect(result.source).toBe('generic');
        expect(remote.complete).not.toHaveBeenCalled();
    });

    it('varies the generic prompt by input shape', async () => {
        const result = await new PromptSynthesizer().synthesize(['  '], { inputShape: 'simpleText' });
        expect(result.prompt).toBe('Generate something amazing, detailed, high quality.');
    });

    it('uses the structured remote response', async () => {
        const remote = completer(async () => 'PROMPT: a dreamy pastel cat in a garden\nNEGATIVE: blurry, dark\nREASON: matches the soft palette\nSTYLE: anime\nMOOD: calm');
        const result = await new PromptSynthesizer(remote).synthesize(['a pastel anime illustration of a cat']);

        expect(result).toEqual({
            prompt: 'a dreamy pastel cat in a garden, high quality, detailed, masterpiece',
            rationale: 'matches the soft palette',
            negativePrompt: 'blurry, dark',
            style: 'anime',
            mood: 'calm',
            source: 'remote',
        });
        expect(remote.complete.mock.calls[0][0]).toContain('Image 1: a pastel anime illustration of a cat');
    });

    it('falls back to the heuristic line when the response has no fields', async () => {
        const remote = completer(async () => 'Here is an idea.\nA beautiful detailed painting of a quiet harbor at dusk');
        const result = await new PromptSynthesizer(remote).synthesize(['harbor at dusk']);

        expect(result.prompt).toBe('A beautiful detailed painting of a quiet harbor at dusk');
        expect(result.rationale).toBe('Prompt composed by the language model from 1 liked image description(s).');
        expect(result.source).toBe('remote');
    });

    it('extracts keywords when no language model is configured', async () => {
        const result = await new PromptSynthesizer().synthesize([
            'a pastel anime illustration of a cat',
            'soft pink color palette',
        ]);

        expect(result.prompt).toBe('Create a beautiful artwork featuring anime, illustration, pastel, pink, cat, high quality, detailed, artistic style');
        expect(result.prompt).toContain('featuring');
        expect(result.prompt.endsWith('artistic style')).toBe(true);
        expect(result.rationale).toBe(
            'Remote prompt synthesis was unavailable (no language model is configured), so keywords were extracted from the liked image descriptions: anime, illustration, pastel, pink, cat.',
        );
        expect(result.source).toBe('keywords');
    });

    it('degrades on remote failures and always keeps a quality keyword', async () => {
        const failures: Reply[] = [
            async () => {
                throw new Error('network down');
            },
            async () => '   ',
            async () => 'nothing useful here',
        ];

        for (const reply of failures) {
            for (const liked of [['a pastel anime illustration of a cat'], ['geometric shapes overlapping']]) {
                const result = await new PromptSynthesizer(completer(reply)).synthesize(liked);
                expect(['keywords', 'template']).toContain(result.source);
                expect(result.prompt.length).toBeGreaterThan(0);
                expect(QUALITY_WORDS.some((word) => result.prompt.toLowerCase().includes(word))).toBe(true);
            }
        }
    });

    it('uses the template when no keyword matches', async () => {
        const remote = completer(async () => '   ');
        const result = await new PromptSynthesizer(remote).synthesize(['geometric shapes overlapping']);

        expect(result.prompt).toBe('Generate an image inspired by these user preferences: "geometric shapes overlapping", high quality, detailed, masterpiece');
        expect(result.rationale).toBe(
            'Remote prompt synthesis was unavailable (the language model returned no usable prompt) and no known keywords were found, so the liked descriptions were used directly.',
        );
        expect(result.source).toBe('template');
    });
});
