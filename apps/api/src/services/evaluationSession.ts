// ============================================================================
// Evaluation Session - Ordered history of evaluations for the current batch
// ============================================================================

import type { EvaluationResult, SwipeDirection } from '@prefcanvas/shared';
import { v4 as uuidv4 } from 'uuid';
import { extractLikedDescriptions } from './preferences.js';

export class EvaluationSession {
    private evaluations: EvaluationResult[] = [];
    private lastTimestampMs = 0;

    constructor(private readonly now: () => number = Date.now) {}

    /** Creates an evaluation stamped no earlier than the previous one. */
    create(input: { direction: SwipeDirection; analysisText: string; imageId?: string }): EvaluationResult {
        const timestampMs = Math.max(this.now(), this.lastTimestampMs);
        return {
            id: uuidv4(),
            imageId: input.imageId,
            direction: input.direction,
            analysisText: input.analysisText,
            timestamp: new Date(timestampMs).toISOString(),
        };
    }

    record(evaluation: EvaluationResult): EvaluationResult {
        const timestampMs = Math.max(Date.parse(evaluation.timestamp), this.lastTimestampMs);
        const stored = Object.freeze({ ...evaluation, timestamp: new Date(timestampMs).toISOString() });
        this.lastTimestampMs = timestampMs;
        this.evaluations.push(stored);
        return stored;
    }

    snapshot(): EvaluationResult[] {
        return [...this.evaluations];
    }

    likedDescriptions(): string[] {
        return extractLikedDescriptions(this.evaluations);
    }

    get size(): number {
        return this.evaluations.length;
    }

    // A new image batch starts a new session.
    reset() {
        this.evaluations = [];
        this.lastTimestampMs = 0;
    }
}
