/**
 * Session type definitions
 */

import {
    Adaptation,
    CognitiveState,
    EndReason,
    LearningMode,
    ParameterSet,
    SessionStatus,
    TrajectorySample
} from './index';

/**
 * Live session record, owned by the session store
 */
export interface SessionRecord {
    sessionId: string;
    userId: string;
    lessonId: string;
    signalLevel: number;
    mode: LearningMode;
    cognitiveState: CognitiveState;
    status: SessionStatus;
    trajectory: TrajectorySample[];
    adaptationHistory: Adaptation[];
    performanceMetrics: Record<string, number>;
    parameters: ParameterSet;     // Currently active parameter set
    createdAt: number;
    lastActivityAt: number;
    endedAt?: number;
    endReason?: EndReason;
}

/**
 * Read-only copy handed to callers; never the live record
 */
export type SessionSnapshot = Readonly<SessionRecord>;

/**
 * Completion data supplied when a session is ended
 */
export interface CompletionData {
    reason?: EndReason;
    finalScore?: number;
}

/**
 * Session store interface
 */
export interface SessionStore {
    insert(session: SessionRecord): void;
    has(sessionId: string): boolean;
    get(sessionId: string): SessionRecord | undefined;
    remove(sessionId: string): SessionRecord | undefined;
    ids(): string[];
    size(): number;
    snapshot(sessionId: string): SessionSnapshot;

    appendSample(sessionId: string, sample: TrajectorySample): void;
    appendAdaptation(sessionId: string, adaptation: Adaptation): void;
    /**
     * Replace the effectiveness score of a historical adaptation.
     * The only permitted rewrite of adaptation history.
     */
    backfillEffectiveness(sessionId: string, adaptationId: string, score: number): Adaptation;
    updateMetric(sessionId: string, name: string, update: (previous: number | undefined) => number): number;
    update(sessionId: string, patch: Partial<Pick<SessionRecord,
        'signalLevel' | 'mode' | 'cognitiveState' | 'status' | 'parameters' | 'lastActivityAt' | 'endedAt' | 'endReason'>>): void;
}
