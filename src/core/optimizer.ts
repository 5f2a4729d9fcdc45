/**
 * Periodic session review
 * Estimates effectiveness from the recent trajectory and derives parameter
 * nudges. Never changes the mode; that is driven by signal updates only.
 */

import { Adaptation, CognitiveState, ParameterSet } from '../types';
import { SessionSnapshot } from '../types/session';
import { TUNABLE_PARAMETERS, TunableParameter } from './strategy_table';
import { clamp01, linearSlope, meanAndStdDev } from '../utils/helpers';

export const NUDGE_STEP = 0.1;
export const SLOPE_TOLERANCE = 0.02;
export const STABILITY_FLOOR = 0.8;

export type OptimizationReason = 'reengage' | 'accelerate' | 'stabilize';

export interface EffectivenessEstimate {
    engagement: number;     // Mean level over the window
    slope: number;          // Level change per sample
    stability: number;      // 1 - stddev
    effectiveness: number;
    sampleCount: number;
}

export interface OptimizationAdjustment {
    reason: OptimizationReason;
    changes: Partial<Record<TunableParameter, number>>;
}

/**
 * Extension point for back-filling effectiveness on past adaptations.
 * Returns a score in [0, 1], or null to leave the record untouched.
 */
export interface EffectivenessScorer {
    score(adaptation: Adaptation, session: SessionSnapshot): number | null | Promise<number | null>;
}

export function estimateEffectiveness(levels: number[]): EffectivenessEstimate {
    const { mean, stdDev } = meanAndStdDev(levels);
    const slope = linearSlope(levels);
    const stability = clamp01(1 - stdDev);
    const trend = clamp01(0.5 + 5 * slope);
    const effectiveness = clamp01(0.5 * mean + 0.3 * stability + 0.2 * trend);

    return {
        engagement: mean,
        slope,
        stability,
        effectiveness,
        sampleCount: levels.length,
    };
}

function readNumber(parameters: ParameterSet, key: TunableParameter): number | undefined {
    const value = parameters[key];
    return typeof value === 'number' ? value : undefined;
}

/**
 * Apply +/- deltas to the tunable parameters; drops changes that the clamp swallows
 */
function nudge(
    parameters: ParameterSet,
    deltas: Partial<Record<TunableParameter, number>>
): Partial<Record<TunableParameter, number>> {
    const changes: Partial<Record<TunableParameter, number>> = {};
    for (const key of TUNABLE_PARAMETERS) {
        const delta = deltas[key];
        const current = readNumber(parameters, key);
        if (delta === undefined || current === undefined) continue;
        const next = Math.round(clamp01(current + delta) * 100) / 100;
        if (next !== current) {
            changes[key] = next;
        }
    }
    return changes;
}

/**
 * Derive zero or more adjustments. Each adjustment builds on the parameters
 * produced by the previous one.
 */
export function deriveAdjustments(
    estimate: EffectivenessEstimate,
    cognitiveState: CognitiveState,
    parameters: ParameterSet
): OptimizationAdjustment[] {
    if (estimate.sampleCount < 2) {
        return [];
    }

    const adjustments: OptimizationAdjustment[] = [];
    let working: ParameterSet = { ...parameters };

    const push = (reason: OptimizationReason, deltas: Partial<Record<TunableParameter, number>>) => {
        const changes = nudge(working, deltas);
        if (Object.keys(changes).length > 0) {
            adjustments.push({ reason, changes });
            working = { ...working, ...changes };
        }
    };

    if (estimate.slope < -SLOPE_TOLERANCE) {
        push('reengage', { interactionFrequency: NUDGE_STEP, contentDensity: -NUDGE_STEP });
    } else if (
        estimate.slope > SLOPE_TOLERANCE &&
        (cognitiveState === CognitiveState.UNDERUTILIZED || cognitiveState === CognitiveState.OPTIMAL)
    ) {
        push('accelerate', { contentDensity: NUDGE_STEP, guidanceLevel: -NUDGE_STEP });
    }

    if (estimate.stability < STABILITY_FLOOR) {
        push('stabilize', { guidanceLevel: NUDGE_STEP });
    }

    return adjustments;
}

/**
 * Exponential moving average seeded with the first observation
 */
export function ema(previous: number | undefined, observed: number, alpha: number = 0.1): number {
    if (previous === undefined) {
        return observed;
    }
    return (1 - alpha) * previous + alpha * observed;
}

/**
 * Flatten adjustment changes into a parameter set for an adaptation record
 */
export function changesToParameters(changes: OptimizationAdjustment['changes']): ParameterSet {
    const parameters: ParameterSet = {};
    for (const key of TUNABLE_PARAMETERS) {
        const value = changes[key];
        if (value !== undefined) {
            parameters[key] = value;
        }
    }
    return parameters;
}
