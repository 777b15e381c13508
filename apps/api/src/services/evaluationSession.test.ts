import { describe, expect, it } from 'vitest';
import { EvaluationSession } from './evaluationSession.js';

describe('EvaluationSession', () => {
    it('records evaluations in order and lists liked descriptions', () => {
        let now = Date.parse('2024-05-01T10:00:00.000Z');
        const session = new EvaluationSession(() => now);

        session.record(session.create({ direction: 'liked', analysisText: 'pastel sky', imageId: 'img-1' }));
        now += 1000;
        session.record(session.create({ direction: 'disliked', analysisText: 'grey office' }));

        const snapshot = session.snapshot();
        expect(snapshot.map((e) => e.imageId)).toEqual(['img-1', undefined]);
        expect(snapshot[1].timestamp).toBe('2024-05-01T10:00:01.000Z');
        expect(session.likedDescriptions()).toEqual(['pastel sky']);
        expect(session.size).toBe(2);
    });

    it('never lets timestamps go backwards', () => {
        let now = Date.parse('2024-05-01T10:00:05.000Z');
        const session = new EvaluationSession(() => now);

        session.record(session.create({ direction: 'liked', analysisText: 'first' }));
        now = Date.parse('2024-05-01T09:00:00.000Z');
        const second = session.record(session.create({ direction: 'liked', analysisText: 'second' }));
        const third = session.record({
            id: 'external',
            direction: 'liked',
            analysisText: 'third',
            timestamp: '2023-01-01T00:00:00.000Z',
        });

        expect(second.timestamp).toBe('2024-05-01T10:00:05.000Z');
        expect(third.timestamp).toBe('2024-05-01T10:00:05.000Z');
    });

    it('stores frozen copies and hands out snapshots', () => {
        const session = new EvaluationSession(() => 0);
        const stored = session.record(session.create({ direction: 'liked', analysisText: 'x' }));

        expect(Object.isFrozen(stored)).toBe(true);
        session.snapshot().pop();
        expect(session.size).toBe(1);
    });

    it('reset clears the history', () => {
        const session = new EvaluationSession(() => 0);
        session.record(session.create({ direction: 'liked', analysisText: 'x' }));
        session.reset();

        expect(session.snapshot()).toEqual([]);
        expect(session.likedDescriptions()).toEqual([]);
    });
});
