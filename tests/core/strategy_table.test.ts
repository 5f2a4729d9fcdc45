import {
    AdaptationStrategy,
    DEFAULT_COGNITIVE_ACTIONS,
    DEFAULT_MODE_STRATEGIES,
    ModeStrategyTable,
    optimalDifficulty
} from '../../src/core/strategy_table';
import { CognitiveState, LearningMode } from '../../src/types';

describe('AdaptationStrategy', () => {
    const strategy = new AdaptationStrategy();

    it('has an entry for every mode and cognitive state', () => {
        for (const mode of Object.values(LearningMode)) {
            expect(strategy.forMode(mode)).toBeDefined();
        }
        for (const state of Object.values(CognitiveState)) {
            expect(strategy.forCognitiveState(state)).toBeDefined();
        }
    });

    it('flattens a mode strategy into a parameter set', () => {
        expect(strategy.modeParameters(LearningMode.FOCUSED)).toEqual({
            contentDensity: 0.5,
            interactionFrequency: 0.5,
            guidanceLevel: 0.6,
            handsOnRatio: 0.5,
            contentTypes: ['practical', 'theory', 'assessment'],
            sessionDurationMinutes: 30,
        });
    });

    it('copies content types so callers cannot change the table', () => {
        const parameters = strategy.modeParameters(LearningMode.BREAKTHROUGH);
        const contentTypes = parameters.contentTypes;
        if (Array.isArray(contentTypes)) {
            contentTypes.push('theory');
        }
        expect(DEFAULT_MODE_STRATEGIES[LearningMode.BREAKTHROUGH].contentTypes).toEqual(['challenge', 'assessment']);
    });

    it('maps cognitive states to actions', () => {
        expect(strategy.forCognitiveState(CognitiveState.OVERLOADED).action).toBe('reduce_load');
        expect(strategy.forCognitiveState(CognitiveState.OPTIMAL).action).toBe('maintain');
        expect(strategy.forCognitiveState(CognitiveState.UNDERUTILIZED).action).toBe('increase_complexity');
        expect(strategy.forCognitiveState(CognitiveState.FATIGUED).action).toBe('offer_recovery');
        expect(strategy.cognitiveParameters(CognitiveState.FATIGUED)).toEqual({
            action: 'offer_recovery',
            difficultyDelta: -1,
            shortBreakMinutes: 5,
            longBreakMinutes: 20,
        });
    });

    it('builds the initial parameter set from mode, state and level', () => {
        const parameters = strategy.initialParameters(LearningMode.FOCUSED, CognitiveState.OPTIMAL, 0.5);
        expect(parameters.contentDensity).toBe(0.5);
        expect(parameters.action).toBe('maintain');
        expect(parameters.targetDifficulty).toBeCloseTo(0.6, 10);
    });

    it('accepts replacement tables', () => {
        const modes: ModeStrategyTable = {
            ...DEFAULT_MODE_STRATEGIES,
            [LearningMode.EXPLORATION]: {
                ...DEFAULT_MODE_STRATEGIES[LearningMode.EXPLORATION],
                contentDensity: 0.1,
            },
        };
        const custom = new AdaptationStrategy({ modes, cognitive: DEFAULT_COGNITIVE_ACTIONS });
        expect(custom.forMode(LearningMode.EXPLORATION).contentDensity).toBe(0.1);
        expect(custom.forMode(LearningMode.FOCUSED).contentDensity).toBe(0.5);
    });
});

describe('optimalDifficulty', () => {
    it('adds a challenge margin and caps at 1', () => {
        expect(optimalDifficulty(0)).toBeCloseTo(0.1, 10);
        expect(optimalDifficulty(0.5)).toBeCloseTo(0.6, 10);
        expect(optimalDifficulty(1)).toBe(1);
    });
});
