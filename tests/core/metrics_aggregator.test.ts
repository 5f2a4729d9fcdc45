import { MetricsAggregator } from '../../src/core/metrics_aggregator';
import { AdaptationKind } from '../../src/types';

describe('MetricsAggregator', () => {
    let now: number;
    let metrics: MetricsAggregator;

    beforeEach(() => {
        now = 1000;
        metrics = new MetricsAggregator(() => now);
    });

    it('starts empty', () => {
        expect(metrics.snapshot()).toEqual({
            activeSessions: 0,
            adaptationsPerMinute: 0,
            breakthroughEvents: 0,
            avgEffectiveness: 0,
            perSessionAdaptationRate: 0,
            totals: {
                sessionsStarted: 0,
                sessionsEnded: 0,
                adaptations: 0,
                adaptationsByKind: {
                    [AdaptationKind.MODE_CHANGE]: 0,
                    [AdaptationKind.COGNITIVE_CHANGE]: 0,
                    [AdaptationKind.OPTIMIZATION]: 0,
                    [AdaptationKind.BREAKTHROUGH]: 0,
                },
            },
        });
    });

    it('tracks active sessions', () => {
        metrics.sessionStarted();
        metrics.sessionStarted();
        metrics.sessionEnded();
        const snapshot = metrics.snapshot();

        expect(snapshot.activeSessions).toBe(1);
        expect(snapshot.totals.sessionsStarted).toBe(2);
        expect(snapshot.totals.sessionsEnded).toBe(1);
    });

    it('averages trailing-minute adaptations over active sessions', () => {
        metrics.sessionStarted();
        metrics.sessionStarted();
        metrics.adaptationEmitted(AdaptationKind.MODE_CHANGE);
        metrics.adaptationEmitted(AdaptationKind.OPTIMIZATION);

        const snapshot = metrics.snapshot();
        expect(snapshot.adaptationsPerMinute).toBe(1);
        expect(snapshot.totals.adaptations).toBe(2);
        expect(snapshot.totals.adaptationsByKind[AdaptationKind.MODE_CHANGE]).toBe(1);
        expect(snapshot.totals.adaptationsByKind[AdaptationKind.OPTIMIZATION]).toBe(1);
        // EMA over the observed rates 0.5 then 1
        expect(snapshot.perSessionAdaptationRate).toBeCloseTo(0.55, 10);
    });

    it('drops adaptations older than one minute from the rate', () => {
        metrics.sessionStarted();
        metrics.adaptationEmitted(AdaptationKind.MODE_CHANGE);
        expect(metrics.snapshot().adaptationsPerMinute).toBe(1);

        now = 61001;
        const snapshot = metrics.snapshot();
        expect(snapshot.adaptationsPerMinute).toBe(0);
        expect(snapshot.totals.adaptations).toBe(1);
    });

    it('counts breakthroughs and averages effectiveness', () => {
        metrics.breakthroughEmitted();
        metrics.effectivenessObserved(0.4);
        metrics.effectivenessObserved(0.8);

        const snapshot = metrics.snapshot();
        expect(snapshot.breakthroughEvents).toBe(1);
        expect(snapshot.avgEffectiveness).toBeCloseTo(0.6, 10);
    });

    it('never reports negative active sessions', () => {
        metrics.sessionEnded();
        expect(metrics.snapshot().activeSessions).toBe(0);
    });
});
