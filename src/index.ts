/**
 * Adaptive Session Core - Main Entry Point
 * @version 1.0.0
 */

export { AdaptiveEngine } from './adaptive_engine';
export * from './types';
export { BusManager } from './core/bus';
export type { BusMiddleware, BusOptions, OutboundEventLog, SignalHandler } from './core/bus';
export type { SignalUpdateInput } from './utils/schemas';

// Export Error Types
export {
    AdaptiveEngineError,
    InvalidInputError,
    UnknownSessionError,
    TransientProcessingError,
    ValidationError,
    StorageError,
    ConfigurationError
} from './utils/errors';

// Classification & strategy
export {
    classifyMode,
    classifyCognitiveState,
    computeLoadScore,
    MODE_THRESHOLDS,
    LOAD_WEIGHTS,
    LOAD_THRESHOLDS
} from './core/classifier';

export {
    AdaptationStrategy,
    DEFAULT_MODE_STRATEGIES,
    DEFAULT_COGNITIVE_ACTIONS,
    TUNABLE_PARAMETERS,
    optimalDifficulty
} from './core/strategy_table';

export type {
    ModeStrategy,
    ModeStrategyTable,
    CognitiveAction,
    CognitiveActionTable,
    ContentType,
    TunableParameter
} from './core/strategy_table';

export { BreakthroughDetector } from './core/breakthrough_detector';
export type { BreakthroughDetectorConfig, BreakthroughOpportunity } from './core/breakthrough_detector';

export { estimateEffectiveness, deriveAdjustments } from './core/optimizer';
export type {
    EffectivenessEstimate,
    EffectivenessScorer,
    OptimizationAdjustment,
    OptimizationReason
} from './core/optimizer';

// Sessions
export type {
    SessionRecord,
    SessionSnapshot,
    SessionStore,
    CompletionData
} from './types/session';

export { InMemorySessionStore } from './core/session_store';
export { SessionEngine } from './core/session_engine';
export type {
    SessionArchive,
    SessionDiagnostics,
    SessionEngineDeps,
    SessionEngineOptions,
    TickReport
} from './core/session_engine';

export { MetricsAggregator } from './core/metrics_aggregator';
export { computeSessionAnalytics } from './core/analytics';
export type { SessionAnalytics } from './core/analytics';

export { PeriodicTask } from './core/scheduler';
export { SerialQueue, QueueClosedError } from './core/serial_queue';

// Storage
export { SQLiteStorage } from './storage/sqlite';
export type { ArchivedSessionSummary, AdaptationLogEntry, BreakthroughLogEntry } from './storage/sqlite';
