import { InMemorySessionStore } from '../../src/core/session_store';
import {
    Adaptation,
    AdaptationKind,
    CognitiveState,
    LearningMode,
    SessionStatus
} from '../../src/types';
import { SessionRecord } from '../../src/types/session';
import { UnknownSessionError, ValidationError } from '../../src/utils/errors';

function makeSession(sessionId: string = 'session-1'): SessionRecord {
    return {
        sessionId,
        userId: 'user-1',
        lessonId: 'lesson-1',
        signalLevel: 0.5,
        mode: LearningMode.FOCUSED,
        cognitiveState: CognitiveState.OPTIMAL,
        status: SessionStatus.ACTIVE,
        trajectory: [{ timestamp: 1000, level: 0.5 }],
        adaptationHistory: [],
        performanceMetrics: {},
        parameters: { contentDensity: 0.5, contentTypes: ['theory'] },
        createdAt: 1000,
        lastActivityAt: 1000,
    };
}

function makeAdaptation(adaptationId: string, timestamp: number): Adaptation {
    return {
        adaptationId,
        sessionId: 'session-1',
        kind: AdaptationKind.MODE_CHANGE,
        triggerLevel: 0.7,
        parameters: { contentDensity: 0.7 },
        effectivenessScore: 0,
        timestamp,
        transition: { from: LearningMode.FOCUSED, to: LearningMode.INTENSIVE },
    };
}

describe('InMemorySessionStore', () => {
    let store: InMemorySessionStore;

    beforeEach(() => {
        store = new InMemorySessionStore();
        store.insert(makeSession());
    });

    it('rejects duplicate session ids', () => {
        expect(() => store.insert(makeSession())).toThrow(ValidationError);
    });

    it('throws UnknownSessionError for unknown ids', () => {
        expect(() => store.snapshot('missing')).toThrow(UnknownSessionError);
        expect(() => store.appendSample('missing', { timestamp: 1, level: 0.1 })).toThrow(UnknownSessionError);
    });

    it('appends trajectory samples in timestamp order', () => {
        store.appendSample('session-1', { timestamp: 2000, level: 0.6 });
        store.appendSample('session-1', { timestamp: 2000, level: 0.65 });
        expect(() => store.appendSample('session-1', { timestamp: 1500, level: 0.7 })).toThrow(ValidationError);
        expect(store.snapshot('session-1').trajectory.map(sample => sample.level)).toEqual([0.5, 0.6, 0.65]);
    });

    it('keeps adaptation history non-decreasing and frozen', () => {
        store.appendAdaptation('session-1', makeAdaptation('a1', 2000));
        expect(() => store.appendAdaptation('session-1', makeAdaptation('a2', 1999))).toThrow(ValidationError);

        const stored = store.get('session-1')?.adaptationHistory[0];
        expect(stored).toBeDefined();
        expect(Object.isFrozen(stored)).toBe(true);
    });

    it('back-fills only the effectiveness score', () => {
        store.appendAdaptation('session-1', makeAdaptation('a1', 2000));
        const updated = store.backfillEffectiveness('session-1', 'a1', 0.75);

        expect(updated.effectivenessScore).toBe(0.75);
        expect(updated.triggerLevel).toBe(0.7);
        expect(store.snapshot('session-1').adaptationHistory[0].effectivenessScore).toBe(0.75);
        expect(() => store.backfillEffectiveness('session-1', 'missing', 0.5)).toThrow(ValidationError);
    });

    it('returns snapshots that do not alias the live record', () => {
        store.appendAdaptation('session-1', makeAdaptation('a1', 2000));
        const snapshot = store.snapshot('session-1');

        snapshot.trajectory.push({ timestamp: 9999, level: 1 });
        snapshot.performanceMetrics.ticks = 5;
        const contentTypes = snapshot.parameters.contentTypes;
        if (Array.isArray(contentTypes)) {
            contentTypes.push('practical');
        }
        snapshot.adaptationHistory[0].parameters.contentDensity = 0;

        const fresh = store.snapshot('session-1');
        expect(fresh.trajectory).toHaveLength(1);
        expect(fresh.performanceMetrics).toEqual({});
        expect(fresh.parameters.contentTypes).toEqual(['theory']);
        expect(fresh.adaptationHistory[0].parameters.contentDensity).toBe(0.7);
    });

    it('updates metrics through an update function', () => {
        expect(store.updateMetric('session-1', 'ticks', previous => (previous ?? 0) + 1)).toBe(1);
        expect(store.updateMetric('session-1', 'ticks', previous => (previous ?? 0) + 1)).toBe(2);
        expect(store.snapshot('session-1').performanceMetrics.ticks).toBe(2);
    });

    it('patches mutable fields', () => {
        store.update('session-1', { mode: LearningMode.INTENSIVE, signalLevel: 0.7 });
        const snapshot = store.snapshot('session-1');
        expect(snapshot.mode).toBe(LearningMode.INTENSIVE);
        expect(snapshot.signalLevel).toBe(0.7);
        expect(snapshot.userId).toBe('user-1');
    });

    it('lists and removes sessions', () => {
        store.insert(makeSession('session-2'));
        expect(store.ids()).toEqual(['session-1', 'session-2']);
        expect(store.size()).toBe(2);

        const removed = store.remove('session-1');
        expect(removed?.sessionId).toBe('session-1');
        expect(store.has('session-1')).toBe(false);
        expect(store.remove('session-1')).toBeUndefined();
    });
});
