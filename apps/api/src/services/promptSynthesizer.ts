// ============================================================================
// Prompt Synthesizer - Liked descriptions -> generation prompt + rationale
// ============================================================================

import type { InputShape } from '@prefcanvas/shared';
import { errorMessage } from './errors.js';
import { containsWord, loadKeywordLists, type KeywordLists } from './keywords.js';

export interface TextCompleter {
    complete(prompt: string): Promise<string>;
}

export type PromptSource = 'generic' | 'remote' | 'keywords' | 'template';

export interface PromptSynthesis {
    prompt: string;
    rationale: string;
    negativePrompt?: string;
    style?: string;
    mood?: string;
    source: PromptSource;
}

export interface ParsedPromptResponse {
    prompt?: string;
    negative?: string;
    reason?: string;
    style?: string;
    mood?: string;
}

const RESPONSE_FIELDS = ['prompt', 'negative', 'reason', 'style', 'mood'] as const;
const FIELD_LINE = /^(prompt|negative|reason|style|mood)\s*:\s*(.*)$/i;

const MAX_KEYWORDS = 8;
const MAX_HINT_LENGTH = 200;
const QUALITY_SUFFIX = 'high quality, detailed, masterpiece';

const GENERIC_PROMPTS: Record<InputShape, string> = {
    simpleText: 'Generate something amazing, detailed, high quality.',
    structuredImagen: 'Generate something amazing, detailed, high quality, photorealistic.',
    nativeCloud: 'Create a beautiful, highly detailed, photorealistic image with stunning artistic composition, high quality.',
    flagOnly: 'Generate something amazing, detailed, high quality.',
};

function isResponseField(value: string): value is (typeof RESPONSE_FIELDS)[number] {
    return RESPONSE_FIELDS.some((field) => field === value);
}

function cleanLine(line: string): string {
    return line
        .replace(/\*\*|__/g, '')
        .trim()
        .replace(/^([-*•>#]+\s*)+/, '')
        .trim();
}

function unquote(value: string): string {
    return value.trim().replace(/^["'`]+|["'`]+$/g, '').trim();
}

/**
 * Reads `FIELD: value` lines. Field names are case-insensitive, the first
 * non-empty occurrence of a field wins and every other line is ignored.
 * Returns null when no field was found at all.
 */
export function parsePromptResponse(text: string): ParsedPromptResponse | null {
    const parsed: ParsedPromptResponse = {};
    let found = false;

    for (const rawLine of (text || '').split(/\r?\n/)) {
        const match = cleanLine(rawLine).match(FIELD_LINE);
        if (!match) continue;
        const field = match[1].toLowerCase();
        const value = unquote(match[2]);
        if (!value || !isResponseField(field) || parsed[field] !== undefined) continue;
        parsed[field] = value;
        found = true;
    }

    return found ? parsed : null;
}

/** First line that reads like a prompt: 20-200 chars with two or more quality keywords. */
export function findHeuristicPrompt(text: string, keywords: readonly string[] = loadKeywordLists().promptLineKeywords): string | undefined {
    for (const rawLine of (text || '').split(/\r?\n/)) {
        const line = cleanLine(rawLine);
        if (line.length < 20 || line.length > 200) continue;
        const lower = line.toLowerCase();
        const hits = keywords.filter((keyword) => lower.includes(keyword)).length;
        if (hits >= 2) return line;
    }
    return undefined;
}

export function extractKeywords(descriptions: readonly string[], lists: KeywordLists = loadKeywordLists()): string[] {
    const combined = descriptions.join(' ').toLowerCase();
    const found: string[] = [];
    const categories = [
        lists.categories.art,
        lists.categories.color,
        lists.categories.mood,
        lists.categories.theme,
        lists.categories.technique,
    ];

    for (const category of categories) {
        for (const keyword of category) {
            if (found.length >= MAX_KEYWORDS) return found;
            if (!found.includes(keyword) && containsWord(combined, keyword)) {
                found.push(keyword);
            }
        }
    }
    return found;
}

export function ensureQualityKeywords(prompt: string, family: readonly string[] = loadKeywordLists().qualityFamily): string {
    const lower = prompt.toLowerCase();
    if (family.some((keyword) => lower.includes(keyword))) return prompt;
    const trimmed = prompt.trim().replace(/[\s,.;:]+$/, '');
    return trimmed ? `${trimmed}, ${QUALITY_SUFFIX}` : QUALITY_SUFFIX;
}

export function buildTemplatePrompt(descriptions: readonly string[], lists: KeywordLists = loadKeywordLists()): string {
    const combined = descriptions.map((d) => d.trim()).filter(Boolean).join('. ');
    const hints = combined.length > MAX_HINT_LENGTH ? combined.slice(0, MAX_HINT_LENGTH).trim() : combined;
    const positive = lists.positiveSentiment.some((word) => containsWord(combined.toLowerCase(), word));
    return positive
        ? `Generate a stunning image in the spirit of what the user loved: "${hints}"`
        : `Generate an image inspired by these user preferences: "${hints}"`;
}

export function buildSynthesisInstruction(descriptions: readonly string[]): string {
    const labeled = descriptions.map((description, index) => `Image ${index + 1}: ${description}`).join('\n');
    return `The user liked images with the following characteristics:

${labeled}

Analyze these characteristics and write one English prompt for generating a new image that matches the user's taste.
Be concrete about art style, color palette, composition and atmosphere.

Answer using exactly these lines and nothing else:
PROMPT: <English image generation prompt>
NEGATIVE: <comma separated things to avoid>
REASON: <one sentence on why this prompt fits the user's preferences>
STYLE: <art style in a few words>
MOOD: <mood in a few words>`;
}

export class PromptSynthesizer {
    private readonly lists: KeywordLists;

    constructor(private readonly completer?: TextCompleter, lists?: KeywordLists) {
        this.lists = lists ?? loadKeywordLists();
    }

    genericPrompt(inputShape: InputShape = 'nativeCloud'): PromptSynthesis {
        return {
            prompt: ensureQualityKeywords(GENERIC_PROMPTS[inputShape], this.lists.qualityFamily),
            rationale: 'No strong preference was found among the evaluated images, so a generic high-quality art prompt was used.',
            source: 'generic',
        };
    }

    /** Never throws; every path yields a non-empty prompt. */
    async synthesize(likedDescriptions: readonly string[], options: { inputShape?: InputShape } = {}): Promise<PromptSynthesis> {
        const descriptions = likedDescriptions.map((d) => d.trim()).filter(Boolean);
        if (!descriptions.length) return this.genericPrompt(options.inputShape);

        let remoteFailure: string;
        try {
            const remote = await this.synthesizeRemotely(descriptions);
            if (remote) return remote;
            remoteFailure = 'the language model returned no usable prompt';
        } catch (error) {
            remoteFailure = errorMessage(error);
            console.warn('[PromptSynth] remote synthesis failed:', remoteFailure);
        }

        return this.synthesizeLocally(descriptions, remoteFailure);
    }

    private async synthesizeRemotely(descriptions: string[]): Promise<PromptSynthesis | null> {
        if (!this.completer) throw new Error('no language model is configured');

        const text = await this.completer.complete(buildSynthesisInstruction(descriptions));
        if (!text.trim()) return null;

        const parsed = parsePromptResponse(text);
        const prompt = parsed?.prompt ?? findHeuristicPrompt(text, this.lists.promptLineKeywords);
        if (!prompt) return null;

        console.info('[PromptSynth] remote prompt accepted', { structured: Boolean(parsed?.prompt) });
        return {
            prompt: ensureQualityKeywords(prompt, this.lists.qualityFamily),
            rationale: parsed?.reason
                || `Prompt composed by the language model from ${descriptions.length} liked image description(s).`,
            negativePrompt: parsed?.negative,
            style: parsed?.style,
            mood: parsed?.mood,
            source: 'remote',
        };
    }

    private synthesizeLocally(descriptions: string[], remoteFailure: string): PromptSynthesis {
        const keywords = extractKeywords(descriptions, this.lists);
        if (keywords.length) {
            const keywordText = keywords.join(', ');
            return {
                prompt: ensureQualityKeywords(
                    `Create a beautiful artwork featuring ${keywordText}, high quality, detailed, artistic style`,
                    this.lists.qualityFamily,
                ),
                rationale: `Remote prompt synthesis was unavailable (${remoteFailure}), so keywords were extracted from the liked image descriptions: ${keywordText}.`,
                source: 'keywords',
            };
        }

        return {
            prompt: ensureQualityKeywords(buildTemplatePrompt(descriptions, this.lists), this.lists.qualityFamily),
            rationale: `Remote prompt synthesis was unavailable (${remoteFailure}) and no known keywords were found, so the liked descriptions were used directly.`,
            source: 'template',
        };
    }
}
