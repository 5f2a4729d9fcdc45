/**
 * Cross-session metrics
 * Counts only; no per-session detail is kept beyond the trailing window.
 */

import { AdaptationKind, MetricsSnapshot } from '../types';
import { ema } from './optimizer';

const WINDOW_MS = 60 * 1000;

export class MetricsAggregator {
    private sessionsStarted = 0;
    private sessionsEnded = 0;
    private activeSessions = 0;
    private adaptations = 0;
    private breakthroughs = 0;
    private adaptationsByKind: Record<AdaptationKind, number> = {
        [AdaptationKind.MODE_CHANGE]: 0,
        [AdaptationKind.COGNITIVE_CHANGE]: 0,
        [AdaptationKind.OPTIMIZATION]: 0,
        [AdaptationKind.BREAKTHROUGH]: 0,
    };
    private recentAdaptations: number[] = [];    // timestamps within the trailing window
    private effectivenessSum = 0;
    private effectivenessCount = 0;
    private perSessionRate: number | undefined;

    constructor(private readonly clock: () => number = Date.now) {}

    sessionStarted() {
        this.sessionsStarted++;
        this.activeSessions++;
    }

    sessionEnded() {
        this.sessionsEnded++;
        this.activeSessions = Math.max(0, this.activeSessions - 1);
    }

    adaptationEmitted(kind: AdaptationKind, timestamp: number = this.clock()) {
        this.adaptations++;
        this.adaptationsByKind[kind]++;
        this.recentAdaptations.push(timestamp);
        this.perSessionRate = ema(this.perSessionRate, this.currentRate());
    }

    breakthroughEmitted() {
        this.breakthroughs++;
    }

    effectivenessObserved(value: number) {
        this.effectivenessSum += value;
        this.effectivenessCount++;
    }

    /**
     * Adaptations in the trailing minute, averaged over active sessions
     */
    private currentRate(): number {
        const cutoff = this.clock() - WINDOW_MS;
        this.recentAdaptations = this.recentAdaptations.filter(ts => ts > cutoff);
        return this.recentAdaptations.length / Math.max(1, this.activeSessions);
    }

    snapshot(): MetricsSnapshot {
        return {
            activeSessions: this.activeSessions,
            adaptationsPerMinute: this.currentRate(),
            breakthroughEvents: this.breakthroughs,
            avgEffectiveness: this.effectivenessCount > 0 ? this.effectivenessSum / this.effectivenessCount : 0,
            perSessionAdaptationRate: this.perSessionRate ?? 0,
            totals: {
                sessionsStarted: this.sessionsStarted,
                sessionsEnded: this.sessionsEnded,
                adaptations: this.adaptations,
                adaptationsByKind: { ...this.adaptationsByKind },
            },
        };
    }
}
