/**
 * Adaptive Session Core - Type Definitions
 */

import type { AdaptationStrategy } from '../core/strategy_table';
import type { EffectivenessScorer } from '../core/optimizer';

// --- Enums ---

export enum LearningMode {
    EXPLORATION = 'EXPLORATION',
    FOCUSED = 'FOCUSED',
    INTENSIVE = 'INTENSIVE',
    BREAKTHROUGH = 'BREAKTHROUGH',
}

export enum CognitiveState {
    OVERLOADED = 'OVERLOADED',
    OPTIMAL = 'OPTIMAL',
    UNDERUTILIZED = 'UNDERUTILIZED',
    FATIGUED = 'FATIGUED',
}

export enum AdaptationKind {
    MODE_CHANGE = 'mode-change',
    COGNITIVE_CHANGE = 'cognitive-change',
    OPTIMIZATION = 'optimization',
    BREAKTHROUGH = 'breakthrough',
}

export enum SessionStatus {
    ACTIVE = 'ACTIVE',
    ENDED = 'ENDED',
}

export enum OutboundEventType {
    ADAPTATION_EMITTED = 'ADAPTATION_EMITTED',
    BREAKTHROUGH_DETECTED = 'BREAKTHROUGH_DETECTED',
    SESSION_STARTED = 'SESSION_STARTED',
    SESSION_ENDED = 'SESSION_ENDED',
}

export type EndReason = 'completed' | 'abandoned' | 'timeout' | 'shutdown';

// --- Signals ---

/**
 * Activity breakdown reported alongside a signal level.
 * Known keys: executive, memory, sensory (each 0..1).
 */
export type ActivityBreakdown = Record<string, number>;

export interface TrajectorySample {
    timestamp: number;
    level: number;
}

/**
 * Inbound signal event, delivered by the external feed
 */
export interface SignalUpdate {
    id?: string;              // Optional event id, used for duplicate suppression
    sessionId: string;
    level: number;
    activities: ActivityBreakdown;
    timestamp: number;        // Unix Timestamp (ms)
}

// --- Adaptations ---

export type ParameterValue = number | string | boolean | string[];
export type ParameterSet = Record<string, ParameterValue>;

export interface Adaptation {
    adaptationId: string;
    sessionId: string;
    kind: AdaptationKind;
    triggerLevel: number;
    parameters: ParameterSet;
    effectivenessScore: number;
    timestamp: number;
    transition?: { from: string; to: string };
    reason?: string;
}

// --- Outbound events ---

export interface AdaptationEmitted {
    type: OutboundEventType.ADAPTATION_EMITTED;
    adaptationId: string;
    sessionId: string;
    kind: AdaptationKind;
    parameters: ParameterSet;
    triggerLevel: number;
    timestamp: number;
}

export interface BreakthroughDetected {
    type: OutboundEventType.BREAKTHROUGH_DETECTED;
    sessionId: string;
    triggerLevel: number;
    timestamp: number;
}

export interface SessionStarted {
    type: OutboundEventType.SESSION_STARTED;
    sessionId: string;
    userId: string;
    lessonId: string;
    mode: LearningMode;
    cognitiveState: CognitiveState;
    timestamp: number;
}

export interface SessionEnded {
    type: OutboundEventType.SESSION_ENDED;
    sessionId: string;
    userId: string;
    reason: EndReason;
    timestamp: number;
}

export type OutboundEvent = AdaptationEmitted | BreakthroughDetected | SessionStarted | SessionEnded;

/**
 * Listener map for the outbound channel (eventemitter3 typed events)
 */
export type OutboundEvents = {
    [OutboundEventType.ADAPTATION_EMITTED]: (event: AdaptationEmitted) => void;
    [OutboundEventType.BREAKTHROUGH_DETECTED]: (event: BreakthroughDetected) => void;
    [OutboundEventType.SESSION_STARTED]: (event: SessionStarted) => void;
    [OutboundEventType.SESSION_ENDED]: (event: SessionEnded) => void;
};

// --- Metrics ---

export interface MetricsSnapshot {
    activeSessions: number;
    adaptationsPerMinute: number;
    breakthroughEvents: number;
    avgEffectiveness: number;
    perSessionAdaptationRate: number;
    totals: {
        sessionsStarted: number;
        sessionsEnded: number;
        adaptations: number;
        adaptationsByKind: Record<AdaptationKind, number>;
    };
}

// --- Configuration ---

export interface AdaptiveStorageConfig {
    sqlitePath: string;
}

export interface AdaptiveSchedulerConfig {
    tickIntervalMs?: number;    // Default: 10s
    tickTimeoutMs?: number;     // Default: 5s
    maxBackoffMs?: number;      // Default: 5 minutes
    monitorIntervalMs?: number; // Default: 1 minute
}

export interface AdaptiveSessionConfig {
    idleTimeoutMs?: number;     // Default: 4 hours
    trajectoryWindow?: number;  // Default: 10 samples
}

export interface AdaptiveBreakthroughConfig {
    threshold?: number;         // Default: 0.85
    cooldownMs?: number;        // Default: 60s
}

export interface AdaptiveDedupeConfig {
    maxTrackedIds?: number;     // Default: 1000
}

export interface AdaptiveEngineConfig {
    engineId: string;
    storage: AdaptiveStorageConfig;
    scheduler?: AdaptiveSchedulerConfig;
    session?: AdaptiveSessionConfig;
    breakthrough?: AdaptiveBreakthroughConfig;
    dedupe?: AdaptiveDedupeConfig;
    strategy?: AdaptationStrategy;
    effectivenessScorer?: EffectivenessScorer;
    clock?: () => number;
}
