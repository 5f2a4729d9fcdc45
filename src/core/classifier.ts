/**
 * Signal classifier
 * Pure functions: signal level -> learning mode, (level, activities) -> cognitive state
 */

import { ActivityBreakdown, CognitiveState, LearningMode } from '../types';
import { clamp01 } from '../utils/helpers';

export const MODE_THRESHOLDS = {
    focused: 0.3,
    intensive: 0.6,
    breakthrough: 0.8,
} as const;

export const LOAD_WEIGHTS = {
    level: 0.4,
    executive: 0.3,
    memory: 0.2,
    sensory: 0.1,
} as const;

export const LOAD_THRESHOLDS = {
    overloaded: 0.8,
    fatigued: 0.2,
    underutilized: 0.3,
} as const;

const DEFAULT_ACTIVITY = 0.5;
const LOAD_PRECISION = 1e9;

export function assertNever(value: never): never {
    throw new Error(`Unhandled variant: ${String(value)}`);
}

/**
 * Boundary values belong to the higher tier (0.6 -> INTENSIVE).
 */
export function classifyMode(level: number): LearningMode {
    if (level >= MODE_THRESHOLDS.breakthrough) {
        return LearningMode.BREAKTHROUGH;
    } else if (level >= MODE_THRESHOLDS.intensive) {
        return LearningMode.INTENSIVE;
    } else if (level >= MODE_THRESHOLDS.focused) {
        return LearningMode.FOCUSED;
    }
    return LearningMode.EXPLORATION;
}

function activityTerm(activities: ActivityBreakdown, key: string): number {
    const value = activities[key];
    if (typeof value !== 'number' || Number.isNaN(value)) {
        return DEFAULT_ACTIVITY;
    }
    return clamp01(value);
}

/**
 * Weighted load in [0, 1], rounded to LOAD_PRECISION so that sums landing on
 * a threshold compare equal to it (0.4 * 1 + 0.3 * 1 + 0.2 * 0.5 is 0.8).
 */
export function computeLoadScore(level: number, activities: ActivityBreakdown = {}): number {
    const raw = LOAD_WEIGHTS.level * level
        + LOAD_WEIGHTS.executive * activityTerm(activities, 'executive')
        + LOAD_WEIGHTS.memory * activityTerm(activities, 'memory')
        + LOAD_WEIGHTS.sensory * activityTerm(activities, 'sensory');
    return Math.round(raw * LOAD_PRECISION) / LOAD_PRECISION;
}

/**
 * FATIGUED is evaluated before UNDERUTILIZED: the two buckets overlap at <= 0.2.
 */
export function classifyCognitiveState(level: number, activities: ActivityBreakdown = {}): CognitiveState {
    const score = computeLoadScore(level, activities);

    if (score >= LOAD_THRESHOLDS.overloaded) {
        return CognitiveState.OVERLOADED;
    }
    if (score <= LOAD_THRESHOLDS.fatigued) {
        return CognitiveState.FATIGUED;
    }
    if (score <= LOAD_THRESHOLDS.underutilized) {
        return CognitiveState.UNDERUTILIZED;
    }
    return CognitiveState.OPTIMAL;
}

/**
 * Rank used to order modes (EXPLORATION = 0 ... BREAKTHROUGH = 3)
 */
export function modeRank(mode: LearningMode): number {
    switch (mode) {
        case LearningMode.EXPLORATION:
            return 0;
        case LearningMode.FOCUSED:
            return 1;
        case LearningMode.INTENSIVE:
            return 2;
        case LearningMode.BREAKTHROUGH:
            return 3;
        default:
            return assertNever(mode);
    }
}
