import type { EvaluationResult, SwipeDirection, SwipeOutcome } from '@prefcanvas/shared';

export type SwipeRecord = { direction: SwipeDirection; description?: string | null };

export type PreferenceSource =
    | ReadonlyMap<string, SwipeRecord>
    | Readonly<Record<string, SwipeRecord>>
    | ReadonlyArray<SwipeOutcome | EvaluationResult>;

function isEntryList(source: PreferenceSource): source is ReadonlyArray<SwipeOutcome | EvaluationResult> {
    return Array.isArray(source);
}

function isRecordMap(source: PreferenceSource): source is ReadonlyMap<string, SwipeRecord> {
    return source instanceof Map;
}

function recordsOf(source: PreferenceSource): SwipeRecord[] {
    if (isEntryList(source)) {
        return source.map((entry) => ({ direction: entry.direction, description: entry.analysisText }));
    }
    if (isRecordMap(source)) {
        return Array.from(source.values());
    }
    return Object.values(source);
}

/**
 * Descriptions attached to liked entries, in input order. No likes yields an
 * empty list; callers fall back to a generic prompt.
 */
export function extractLikedDescriptions(...sources: PreferenceSource[]): string[] {
    const liked: string[] = [];
    for (const source of sources) {
        for (const record of recordsOf(source)) {
            if (record.direction !== 'liked') continue;
            const description = (record.description || '').trim();
            if (description) liked.push(description);
        }
    }
    return liked;
}
