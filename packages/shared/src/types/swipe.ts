// ============================================================================
// Swipe Types - Swipe outcomes and per-image evaluation results
// ============================================================================

import { z } from 'zod';

export const SwipeDirectionSchema = z.enum(['liked', 'disliked']);

export type SwipeDirection = z.infer<typeof SwipeDirectionSchema>;

// Recorded when the user swipes a card; immutable afterwards.
export const SwipeOutcomeSchema = z.object({
    imageId: z.string().min(1),
    direction: SwipeDirectionSchema,
    analysisText: z.string().optional(),
});

export type SwipeOutcome = z.infer<typeof SwipeOutcomeSchema>;

export const EvaluationResultSchema = z.object({
    id: z.string(),
    imageId: z.string().optional(),
    direction: SwipeDirectionSchema,
    analysisText: z.string(),
    timestamp: z.string().datetime(),
});

export type EvaluationResult = z.infer<typeof EvaluationResultSchema>;

export const InlineImageSchema = z.object({
    data: z.string().min(1).describe('Base64 encoded image bytes'),
    mimeType: z.string().regex(/^image\//, 'mimeType must be an image type').default('image/jpeg'),
});

export type InlineImage = z.infer<typeof InlineImageSchema>;

export interface UserPreferenceAnalysis {
    preferredFeatures: string[];
    avoidedElements: string[];
    recommendations: string[];
    aestheticProfile: string;
    analyzedAt: string;
    totalEvaluations: number;
    likeCount: number;
    /** Percentage of liked evaluations, 0-100. */
    likeRate: number;
}
