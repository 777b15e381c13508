import { describe, expect, it } from 'vitest';
import type { EvaluationResult, SwipeOutcome } from '@prefcanvas/shared';
import { extractLikedDescriptions, type SwipeRecord } from './preferences.js';

describe('extractLikedDescriptions', () => {
    it('keeps liked, non-empty descriptions in input order', () => {
        const swipes: SwipeOutcome[] = [
            { imageId: 'a', direction: 'liked', analysisText: 'a pastel anime illustration of a cat' },
            { imageId: 'b', direction: 'disliked', analysisText: 'a gloomy parking lot' },
            { imageId: 'c', direction: 'liked', analysisText: '   ' },
            { imageId: 'd', direction: 'liked' },
            { imageId: 'e', direction: 'liked', analysisText: ' soft pink color palette ' },
        ];

        expect(extractLikedDescriptions(swipes)).toEqual([
            'a pastel anime illustration of a cat',
            'soft pink color palette',
        ]);
    });

    it('accepts maps and plain records keyed by image id', () => {
        const map = new Map<string, SwipeRecord>([
            ['one', { direction: 'liked', description: 'misty forest' }],
            ['two', { direction: 'disliked', description: 'neon city' }],
        ]);
        const record: Record<string, SwipeRecord> = {
            three: { direction: 'liked', description: null },
            four: { direction: 'liked', description: 'ocean at dawn' },
        };

        expect(extractLikedDescriptions(map, record)).toEqual(['misty forest', 'ocean at dawn']);
    });

    it('reads evaluation results', () => {
        const evaluations: EvaluationResult[] = [
            { id: '1', direction: 'liked', analysisText: 'warm sunset colors', timestamp: '2024-01-01T00:00:00.000Z' },
        ];
        expect(extractLikedDescriptions(evaluations)).toEqual(['warm sunset colors']);
    });

    it('returns an empty list when nothing was liked', () => {
        expect(extractLikedDescriptions([])).toEqual([]);
        expect(extractLikedDescriptions([{ imageId: 'x', direction: 'disliked', analysisText: 'dark' }])).toEqual([]);
    });
});
