/**
 * Zod Schema definitions - wire and configuration validation
 */

import { z } from 'zod';
import { AdaptationKind, OutboundEventType, LearningMode, CognitiveState } from '../types';

/**
 * Inbound signal event
 * Level must be a number; range is not checked here because
 * out-of-range levels are clamped by the engine.
 */
export const SignalUpdateSchema = z.object({
    id: z.string().min(1).optional(),
    sessionId: z.string().min(1),
    level: z.number(),
    activities: z.record(z.number()).default({}),
    timestamp: z.number().nonnegative(),
});

export type SignalUpdateInput = z.input<typeof SignalUpdateSchema>;

export const ParameterValueSchema = z.union([z.number(), z.string(), z.boolean(), z.array(z.string())]);

export const ParameterSetSchema = z.record(ParameterValueSchema);

/**
 * Archived session payloads (JSON columns)
 */
export const TrajectorySchema = z.array(z.object({
    timestamp: z.number(),
    level: z.number(),
}));

export const AdaptationHistorySchema = z.array(z.object({
    adaptationId: z.string(),
    sessionId: z.string(),
    kind: z.nativeEnum(AdaptationKind),
    triggerLevel: z.number(),
    parameters: ParameterSetSchema,
    effectivenessScore: z.number(),
    timestamp: z.number(),
    transition: z.object({ from: z.string(), to: z.string() }).optional(),
    reason: z.string().optional(),
}));

export const MetricRecordSchema = z.record(z.number());

export const AdaptationEmittedSchema = z.object({
    type: z.literal(OutboundEventType.ADAPTATION_EMITTED),
    adaptationId: z.string().uuid(),
    sessionId: z.string().min(1),
    kind: z.nativeEnum(AdaptationKind),
    parameters: ParameterSetSchema,
    triggerLevel: z.number().min(0).max(1),
    timestamp: z.number(),
});

export const BreakthroughDetectedSchema = z.object({
    type: z.literal(OutboundEventType.BREAKTHROUGH_DETECTED),
    sessionId: z.string().min(1),
    triggerLevel: z.number().min(0).max(1),
    timestamp: z.number(),
});

export const SessionStartedSchema = z.object({
    type: z.literal(OutboundEventType.SESSION_STARTED),
    sessionId: z.string().min(1),
    userId: z.string().min(1),
    lessonId: z.string().min(1),
    mode: z.nativeEnum(LearningMode),
    cognitiveState: z.nativeEnum(CognitiveState),
    timestamp: z.number(),
});

export const SessionEndedSchema = z.object({
    type: z.literal(OutboundEventType.SESSION_ENDED),
    sessionId: z.string().min(1),
    userId: z.string().min(1),
    reason: z.enum(['completed', 'abandoned', 'timeout', 'shutdown']),
    timestamp: z.number(),
});

export const OutboundEventSchema = z.discriminatedUnion('type', [
    AdaptationEmittedSchema,
    BreakthroughDetectedSchema,
    SessionStartedSchema,
    SessionEndedSchema,
]);

/**
 * Engine configuration (plain fields only; strategy, scorer and clock are objects)
 */
export const EngineConfigSchema = z.object({
    engineId: z.string().trim().min(1, 'engineId is required'),
    storage: z.object({
        sqlitePath: z.string().trim().min(1, 'storage.sqlitePath is required'),
    }),
    scheduler: z.object({
        tickIntervalMs: z.number().int().positive().default(10_000),
        tickTimeoutMs: z.number().int().positive().default(5_000),
        deliverTimeoutMs: z.number().int().positive().default(5_000),
        maxBackoffMs: z.number().int().positive().default(5 * 60 * 1000),
        monitorIntervalMs: z.number().int().positive().default(60 * 1000),
    }).default({}),
    session: z.object({
        idleTimeoutMs: z.number().int().positive().default(4 * 60 * 60 * 1000),
        trajectoryWindow: z.number().int().min(2).default(10),
    }).default({}),
    breakthrough: z.object({
        threshold: z.number().min(0).max(1).default(0.85),
        cooldownMs: z.number().int().nonnegative().default(60 * 1000),
    }).default({}),
    dedupe: z.object({
        maxTrackedIds: z.number().int().positive().default(1000),
    }).default({}),
});

export type ResolvedEngineConfig = z.output<typeof EngineConfigSchema>;
