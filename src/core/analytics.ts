/**
 * Session analytics over live and archived sessions
 */

import { LearningMode } from '../types';
import { SessionSnapshot } from '../types/session';
import { ArchivedSessionSummary } from '../storage/sqlite';

export interface SessionAnalytics {
    totalSessions: number;
    activeSessions: number;
    endedSessions: number;
    completionRate: number;            // completed / total
    averageSignalLevel: number;
    averagePerformance: number;        // final_performance over completed sessions
    modeDistribution: Partial<Record<LearningMode, number>>;   // share of sessions per (final) mode
}

interface AnalyticsEntry {
    level: number;
    mode: LearningMode;
    completed: boolean;
    finalPerformance: number | null;
}

/**
 * @returns null when there is no session to report on
 */
export function computeSessionAnalytics(
    live: SessionSnapshot[],
    archived: ArchivedSessionSummary[]
): SessionAnalytics | null {
    const entries: AnalyticsEntry[] = [
        ...live.map(session => ({
            level: session.signalLevel,
            mode: session.mode,
            completed: false,
            finalPerformance: null,
        })),
        ...archived.map(summary => ({
            level: summary.finalLevel,
            mode: summary.finalMode,
            completed: summary.endReason === 'completed',
            finalPerformance: summary.finalPerformance,
        })),
    ];

    if (entries.length === 0) {
        return null;
    }

    const total = entries.length;
    const completed = entries.filter(entry => entry.completed);

    const modeDistribution: Partial<Record<LearningMode, number>> = {};
    for (const entry of entries) {
        modeDistribution[entry.mode] = (modeDistribution[entry.mode] ?? 0) + 1;
    }
    for (const mode of Object.values(LearningMode)) {
        const count = modeDistribution[mode];
        if (count !== undefined) {
            modeDistribution[mode] = count / total;
        }
    }

    return {
        totalSessions: total,
        activeSessions: live.length,
        endedSessions: archived.length,
        completionRate: completed.length / total,
        averageSignalLevel: entries.reduce((sum, entry) => sum + entry.level, 0) / total,
        averagePerformance: completed.length > 0
            ? completed.reduce((sum, entry) => sum + (entry.finalPerformance ?? 0), 0) / completed.length
            : 0,
        modeDistribution,
    };
}
