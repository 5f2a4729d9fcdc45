/**
 * Adaptation strategy tables
 * Mode -> parameter set, cognitive state -> action. Tables are data; the
 * engine only talks to AdaptationStrategy.
 */

import { CognitiveState, LearningMode, ParameterSet } from '../types';

export type ContentType =
    | 'theory'
    | 'practical'
    | 'challenge'
    | 'assessment'
    | 'guided_walkthrough';

export type CognitiveActionName = 'reduce_load' | 'maintain' | 'increase_complexity' | 'offer_recovery';

export interface ModeStrategy {
    contentDensity: number;
    interactionFrequency: number;
    guidanceLevel: number;
    handsOnRatio: number;
    contentTypes: ContentType[];
    sessionDurationMinutes: number;
}

export interface CognitiveAction {
    action: CognitiveActionName;
    difficultyDelta: -1 | 0 | 1;
    shortBreakMinutes: number;
    longBreakMinutes: number;
}

export type ModeStrategyTable = Record<LearningMode, ModeStrategy>;
export type CognitiveActionTable = Record<CognitiveState, CognitiveAction>;

/**
 * Numeric parameters that periodic optimization may nudge
 */
export const TUNABLE_PARAMETERS = ['contentDensity', 'interactionFrequency', 'guidanceLevel', 'handsOnRatio'] as const;
export type TunableParameter = typeof TUNABLE_PARAMETERS[number];

export const DEFAULT_MODE_STRATEGIES = {
    [LearningMode.EXPLORATION]: {
        contentDensity: 0.3,
        interactionFrequency: 0.4,
        guidanceLevel: 0.8,
        handsOnRatio: 0.3,
        contentTypes: ['theory', 'guided_walkthrough'],
        sessionDurationMinutes: 20,
    },
    [LearningMode.FOCUSED]: {
        contentDensity: 0.5,
        interactionFrequency: 0.5,
        guidanceLevel: 0.6,
        handsOnRatio: 0.5,
        contentTypes: ['practical', 'theory', 'assessment'],
        sessionDurationMinutes: 30,
    },
    [LearningMode.INTENSIVE]: {
        contentDensity: 0.7,
        interactionFrequency: 0.7,
        guidanceLevel: 0.4,
        handsOnRatio: 0.7,
        contentTypes: ['challenge', 'practical', 'assessment'],
        sessionDurationMinutes: 45,
    },
    [LearningMode.BREAKTHROUGH]: {
        contentDensity: 0.9,
        interactionFrequency: 0.8,
        guidanceLevel: 0.2,
        handsOnRatio: 0.8,
        contentTypes: ['challenge', 'assessment'],
        sessionDurationMinutes: 60,
    },
} satisfies ModeStrategyTable;

export const DEFAULT_COGNITIVE_ACTIONS = {
    [CognitiveState.OVERLOADED]: { action: 'reduce_load', difficultyDelta: -1, shortBreakMinutes: 10, longBreakMinutes: 30 },
    [CognitiveState.OPTIMAL]: { action: 'maintain', difficultyDelta: 0, shortBreakMinutes: 15, longBreakMinutes: 60 },
    [CognitiveState.UNDERUTILIZED]: { action: 'increase_complexity', difficultyDelta: 1, shortBreakMinutes: 25, longBreakMinutes: 90 },
    [CognitiveState.FATIGUED]: { action: 'offer_recovery', difficultyDelta: -1, shortBreakMinutes: 5, longBreakMinutes: 20 },
} satisfies CognitiveActionTable;

export interface AdaptationStrategyTables {
    modes?: ModeStrategyTable;
    cognitive?: CognitiveActionTable;
}

export class AdaptationStrategy {
    private readonly modes: ModeStrategyTable;
    private readonly cognitive: CognitiveActionTable;

    constructor(tables: AdaptationStrategyTables = {}) {
        this.modes = tables.modes ?? DEFAULT_MODE_STRATEGIES;
        this.cognitive = tables.cognitive ?? DEFAULT_COGNITIVE_ACTIONS;
    }

    forMode(mode: LearningMode): ModeStrategy {
        return this.modes[mode];
    }

    forCognitiveState(state: CognitiveState): CognitiveAction {
        return this.cognitive[state];
    }

    /**
     * Flattened parameter set for an adaptation record
     */
    modeParameters(mode: LearningMode): ParameterSet {
        const strategy = this.forMode(mode);
        return {
            contentDensity: strategy.contentDensity,
            interactionFrequency: strategy.interactionFrequency,
            guidanceLevel: strategy.guidanceLevel,
            handsOnRatio: strategy.handsOnRatio,
            contentTypes: [...strategy.contentTypes],
            sessionDurationMinutes: strategy.sessionDurationMinutes,
        };
    }

    cognitiveParameters(state: CognitiveState): ParameterSet {
        const action = this.forCognitiveState(state);
        return {
            action: action.action,
            difficultyDelta: action.difficultyDelta,
            shortBreakMinutes: action.shortBreakMinutes,
            longBreakMinutes: action.longBreakMinutes,
        };
    }

    /**
     * Full parameter set for a session entering (mode, state)
     */
    initialParameters(mode: LearningMode, state: CognitiveState, level: number): ParameterSet {
        return {
            ...this.modeParameters(mode),
            ...this.cognitiveParameters(state),
            targetDifficulty: optimalDifficulty(level),
        };
    }
}

/**
 * Content difficulty tracking the signal with a small challenge margin
 */
export function optimalDifficulty(level: number): number {
    const base = level * 0.8;
    const challenge = 0.1 + level * 0.2;
    return Math.min(1, base + challenge);
}
