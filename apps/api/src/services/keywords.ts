import fs from 'fs';
import { z } from 'zod';

const KeywordListSchema = z.array(z.string().trim().toLowerCase().min(1));

const KeywordFileSchema = z.object({
    categories: z.object({
        art: KeywordListSchema,
        color: KeywordListSchema,
        mood: KeywordListSchema,
        theme: KeywordListSchema,
        technique: KeywordListSchema,
    }),
    promptLineKeywords: KeywordListSchema,
    qualityFamily: KeywordListSchema,
    positiveSentiment: KeywordListSchema,
    proceduralStyles: z.object({
        pastel: KeywordListSchema,
        night: KeywordListSchema,
        nature: KeywordListSchema,
        ocean: KeywordListSchema,
    }),
});

export type KeywordLists = z.infer<typeof KeywordFileSchema>;

const KEYWORD_FILE = new URL('../data/prompt-keywords.json', import.meta.url);

let cached: KeywordLists | null = null;

export function loadKeywordLists(): KeywordLists {
    if (!cached) {
        cached = KeywordFileSchema.parse(JSON.parse(fs.readFileSync(KEYWORD_FILE, 'utf8')));
    }
    return cached;
}

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Whole-word (or whole-phrase) match, so "red" does not hit "colored". */
export function containsWord(haystack: string, keyword: string): boolean {
    return new RegExp(`(^|[^a-z0-9])${escapeRegExp(keyword)}($|[^a-z0-9])`, 'i').test(haystack);
}
