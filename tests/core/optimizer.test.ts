import {
    changesToParameters,
    deriveAdjustments,
    ema,
    estimateEffectiveness
} from '../../src/core/optimizer';
import { AdaptationStrategy } from '../../src/core/strategy_table';
import { CognitiveState, LearningMode } from '../../src/types';

const focused = new AdaptationStrategy().modeParameters(LearningMode.FOCUSED);

describe('estimateEffectiveness', () => {
    it('scores a flat trajectory', () => {
        const estimate = estimateEffectiveness([0.5, 0.5]);
        expect(estimate.engagement).toBe(0.5);
        expect(estimate.slope).toBe(0);
        expect(estimate.stability).toBe(1);
        expect(estimate.effectiveness).toBeCloseTo(0.65, 10);
        expect(estimate.sampleCount).toBe(2);
    });

    it('caps the trend term for steep slopes', () => {
        const estimate = estimateEffectiveness([0, 1]);
        expect(estimate.slope).toBe(1);
        expect(estimate.stability).toBe(0.5);
        expect(estimate.effectiveness).toBeCloseTo(0.6, 10);
    });
});

describe('deriveAdjustments', () => {
    it('needs at least two samples', () => {
        expect(deriveAdjustments(estimateEffectiveness([0.9]), CognitiveState.OPTIMAL, focused)).toEqual([]);
    });

    it('leaves a steady session alone', () => {
        expect(deriveAdjustments(estimateEffectiveness([0.5, 0.5, 0.5]), CognitiveState.OPTIMAL, focused)).toEqual([]);
    });

    it('re-engages a declining session', () => {
        const adjustments = deriveAdjustments(estimateEffectiveness([0.9, 0.7, 0.5]), CognitiveState.OPTIMAL, focused);
        expect(adjustments).toEqual([
            { reason: 'reengage', changes: { contentDensity: 0.4, interactionFrequency: 0.6 } },
        ]);
    });

    it('accelerates a rising session that has headroom', () => {
        const adjustments = deriveAdjustments(estimateEffectiveness([0.3, 0.5, 0.7]), CognitiveState.OPTIMAL, focused);
        expect(adjustments).toEqual([
            { reason: 'accelerate', changes: { contentDensity: 0.6, guidanceLevel: 0.5 } },
        ]);
    });

    it('does not accelerate an overloaded session', () => {
        expect(deriveAdjustments(estimateEffectiveness([0.3, 0.5, 0.7]), CognitiveState.OVERLOADED, focused)).toEqual([]);
    });

    it('stabilizes on top of the previous adjustment', () => {
        const adjustments = deriveAdjustments(
            estimateEffectiveness([0.1, 0.9, 0.1, 0.9]),
            CognitiveState.OPTIMAL,
            focused
        );
        expect(adjustments).toEqual([
            { reason: 'accelerate', changes: { contentDensity: 0.6, guidanceLevel: 0.5 } },
            { reason: 'stabilize', changes: { guidanceLevel: 0.6 } },
        ]);
    });

    it('drops nudges the clamp swallows', () => {
        const adjustments = deriveAdjustments(
            estimateEffectiveness([0.1, 0.9, 0.1, 0.9]),
            CognitiveState.OVERLOADED,
            { ...focused, guidanceLevel: 1 }
        );
        expect(adjustments).toEqual([]);
    });
});

describe('ema', () => {
    it('seeds with the first observation', () => {
        expect(ema(undefined, 0.5)).toBe(0.5);
    });

    it('weights the previous value by 0.9', () => {
        expect(ema(1, 0)).toBeCloseTo(0.9, 10);
        expect(ema(0.5, 1)).toBeCloseTo(0.55, 10);
    });
});

describe('changesToParameters', () => {
    it('keeps only the changed parameters', () => {
        expect(changesToParameters({ contentDensity: 0.4 })).toEqual({ contentDensity: 0.4 });
        expect(changesToParameters({})).toEqual({});
    });
});
