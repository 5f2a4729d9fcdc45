/**
 * Session engine
 * Orchestrates the session lifecycle: classification on signal updates,
 * periodic optimization ticks, breakthrough detection and final metrics.
 * Every mutation of one session runs on that session's serial queue.
 */

import { LRUCache } from 'lru-cache';
import {
    ActivityBreakdown,
    Adaptation,
    AdaptationKind,
    CognitiveState,
    LearningMode,
    OutboundEvent,
    OutboundEventType,
    ParameterSet,
    SessionStatus,
    SignalUpdate
} from '../types';
import { CompletionData, SessionRecord, SessionSnapshot, SessionStore } from '../types/session';
import { BusManager } from './bus';
import { MetricsAggregator } from './metrics_aggregator';
import { AdaptationStrategy, optimalDifficulty } from './strategy_table';
import { BreakthroughDetector } from './breakthrough_detector';
import { classifyCognitiveState, classifyMode, modeRank } from './classifier';
import {
    EffectivenessEstimate,
    EffectivenessScorer,
    OptimizationAdjustment,
    changesToParameters,
    deriveAdjustments,
    ema,
    estimateEffectiveness
} from './optimizer';
import { PeriodicTask } from './scheduler';
import { QueueClosedError, SerialQueue } from './serial_queue';
import { InvalidInputError, StorageError, TransientProcessingError, UnknownSessionError } from '../utils/errors';
import { clamp01, describeError, generateId, isNumericLevel, meanAndStdDev, withTimeout } from '../utils/helpers';

/**
 * Destination for ended sessions (implemented by SQLiteStorage)
 */
export interface SessionArchive {
    archiveSession(session: SessionSnapshot): void;
}

export interface SessionEngineOptions {
    tickIntervalMs?: number;
    tickTimeoutMs?: number;
    deliverTimeoutMs?: number;
    maxBackoffMs?: number;
    idleTimeoutMs?: number;
    trajectoryWindow?: number;
    maxEndedTracked?: number;
}

export interface SessionEngineDeps {
    store: SessionStore;
    bus: BusManager;
    metrics: MetricsAggregator;
    strategy?: AdaptationStrategy;
    detector?: BreakthroughDetector;
    archive?: SessionArchive;
    scorer?: EffectivenessScorer;
    clock?: () => number;
    options?: SessionEngineOptions;
}

export interface TickReport {
    sessionId: string;
    estimate: EffectivenessEstimate;
    adjustments: OptimizationAdjustment[];
    adaptations: Adaptation[];
    backfilled: number;
    timestamp: number;
}

export interface SessionDiagnostics {
    pendingTasks: number;
    runningTasks: number;
    peakConcurrency: number;
    consecutiveTickFailures: number;
}

interface SessionRuntime {
    queue: SerialQueue;
    ticker: PeriodicTask;
    unsubscribe: () => void;
    scored: Set<string>;
    ending?: Promise<SessionSnapshot>;
}

/**
 * Set once a tick has outlived tickTimeoutMs; the evaluation stops scoring
 */
interface TickGuard {
    abandoned: boolean;
}

const DEFAULT_OPTIONS: Required<SessionEngineOptions> = {
    tickIntervalMs: 10 * 1000,
    tickTimeoutMs: 5 * 1000,
    deliverTimeoutMs: 5 * 1000,
    maxBackoffMs: 5 * 60 * 1000,
    idleTimeoutMs: 4 * 60 * 60 * 1000,
    trajectoryWindow: 10,
    maxEndedTracked: 10000,
};

const ADAPTATION_PENALTY = 0.1;

export class SessionEngine {
    private store: SessionStore;
    private bus: BusManager;
    private metrics: MetricsAggregator;
    private strategy: AdaptationStrategy;
    private detector: BreakthroughDetector;
    private archive?: SessionArchive;
    private scorer?: EffectivenessScorer;
    private clock: () => number;
    private options: Required<SessionEngineOptions>;

    private runtimes: Map<string, SessionRuntime> = new Map();
    private endedSessions: LRUCache<string, number>;   // sessionId -> endedAt

    constructor(deps: SessionEngineDeps) {
        this.store = deps.store;
        this.bus = deps.bus;
        this.metrics = deps.metrics;
        this.strategy = deps.strategy ?? new AdaptationStrategy();
        this.detector = deps.detector ?? new BreakthroughDetector();
        this.archive = deps.archive;
        this.scorer = deps.scorer;
        this.clock = deps.clock ?? Date.now;
        this.options = { ...DEFAULT_OPTIONS, ...deps.options };
        this.endedSessions = new LRUCache<string, number>({ max: this.options.maxEndedTracked });
    }

    // ---------- Lifecycle ----------

    /**
     * Start a session for a user and lesson
     * @returns the new session id
     * @throws {InvalidInputError} for empty ids or a non-numeric initial signal
     */
    async start(
        userId: string,
        lessonId: string,
        initialSignal: number,
        activities: ActivityBreakdown = {}
    ): Promise<string> {
        if (!userId || userId.trim() === '') {
            throw new InvalidInputError('userId is required', 'userId');
        }
        if (!lessonId || lessonId.trim() === '') {
            throw new InvalidInputError('lessonId is required', 'lessonId');
        }
        if (!isNumericLevel(initialSignal)) {
            throw new InvalidInputError(`Initial signal must be a number, got ${String(initialSignal)}`, 'initialSignal');
        }

        const sessionId = generateId();
        const level = this.clampLevel(initialSignal, sessionId);
        const now = this.clock();
        const mode = classifyMode(level);
        const cognitiveState = classifyCognitiveState(level, activities);

        const record: SessionRecord = {
            sessionId,
            userId,
            lessonId,
            signalLevel: level,
            mode,
            cognitiveState,
            status: SessionStatus.ACTIVE,
            trajectory: [{ timestamp: now, level }],
            adaptationHistory: [],
            performanceMetrics: {},
            parameters: this.strategy.initialParameters(mode, cognitiveState, level),
            createdAt: now,
            lastActivityAt: now,
        };
        this.store.insert(record);

        const ticker = new PeriodicTask(
            `tick:${sessionId}`,
            () => this.periodicTick(sessionId),
            { intervalMs: this.options.tickIntervalMs, maxBackoffMs: this.options.maxBackoffMs }
        );
        const runtime: SessionRuntime = {
            queue: new SerialQueue(`session:${sessionId}`),
            ticker,
            unsubscribe: this.bus.subscribeSignals(sessionId, update => this.handleBusSignal(update)),
            scored: new Set(),
        };
        this.runtimes.set(sessionId, runtime);
        ticker.start();

        this.metrics.sessionStarted();
        console.log(`[SessionEngine] Session ${sessionId} started (user ${userId}, lesson ${lessonId}) in ${mode}/${cognitiveState}`);

        await this.deliver({
            type: OutboundEventType.SESSION_STARTED,
            sessionId,
            userId,
            lessonId,
            mode,
            cognitiveState,
            timestamp: now,
        });
        return sessionId;
    }

    /**
     * End a session. Concurrent calls share one completion; once the session
     * has ended, further calls resolve null.
     * @throws {UnknownSessionError} if the id was never a session of this engine
     */
    async end(sessionId: string, completion: CompletionData = {}): Promise<SessionSnapshot | null> {
        const { finalScore } = completion;
        if (finalScore !== undefined && (!isNumericLevel(finalScore) || finalScore < 0 || finalScore > 1)) {
            throw new InvalidInputError(`finalScore must be within [0, 1], got ${String(finalScore)}`, 'finalScore');
        }

        const runtime = this.runtimes.get(sessionId);
        if (runtime) {
            if (!runtime.ending) {
                runtime.ending = this.finish(sessionId, runtime, completion);
            }
            return runtime.ending;
        }
        if (this.endedSessions.has(sessionId)) {
            return null;
        }
        throw new UnknownSessionError(sessionId);
    }

    private async finish(sessionId: string, runtime: SessionRuntime, completion: CompletionData): Promise<SessionSnapshot> {
        runtime.ticker.stop();
        runtime.unsubscribe();
        runtime.queue.close();

        // Let the handler in progress finish; queued tasks are skipped
        await runtime.queue.onIdle();
        await runtime.ticker.settled();

        const now = this.clock();
        const reason = completion.reason ?? 'completed';
        this.store.update(sessionId, { status: SessionStatus.ENDED, endedAt: now, endReason: reason });
        this.applyFinalMetrics(sessionId, now, completion.finalScore);

        const snapshot = this.store.snapshot(sessionId);
        this.detector.reset(sessionId);
        this.archiveSnapshot(snapshot);

        this.store.remove(sessionId);
        this.runtimes.delete(sessionId);
        this.endedSessions.set(sessionId, now);
        this.metrics.sessionEnded();
        console.log(`[SessionEngine] Session ${sessionId} ended (${reason}) after ${snapshot.adaptationHistory.length} adaptations`);

        await this.deliver({
            type: OutboundEventType.SESSION_ENDED,
            sessionId,
            userId: snapshot.userId,
            reason,
            timestamp: now,
        });
        return snapshot;
    }

    private applyFinalMetrics(sessionId: string, now: number, finalScore?: number) {
        const session = this.requireSession(sessionId);
        const { stdDev } = meanAndStdDev(session.trajectory.map(sample => sample.level));
        const adaptationCount = session.adaptationHistory.length;

        this.store.updateMetric(sessionId, 'session_duration_minutes', () => (now - session.createdAt) / 60000);
        this.store.updateMetric(sessionId, 'signal_stability', () => clamp01(1 - stdDev));

        if (finalScore !== undefined) {
            this.store.updateMetric(sessionId, 'final_performance', () => finalScore);
            this.store.updateMetric(
                sessionId,
                'adaptation_effectiveness',
                () => clamp01(finalScore * (1 - ADAPTATION_PENALTY * adaptationCount))
            );
        }
    }

    private archiveSnapshot(snapshot: SessionSnapshot) {
        if (!this.archive) return;
        try {
            this.archive.archiveSession(snapshot);
        } catch (error) {
            const wrapped = new StorageError(
                `Failed to archive session ${snapshot.sessionId}: ${describeError(error)}`,
                'archiveSession'
            );
            console.error(`[SessionEngine] ${wrapped.message}`);
        }
    }

    // ---------- Signal handling ----------

    /**
     * Apply one signal update
     * @returns true when applied; false for an unknown or ended session, or a stale update
     * @throws {InvalidInputError} for a non-numeric level
     */
    async onSignalUpdate(
        sessionId: string,
        level: number,
        activities: ActivityBreakdown = {},
        timestamp: number = this.clock()
    ): Promise<boolean> {
        if (!isNumericLevel(level)) {
            throw new InvalidInputError(`Signal level must be a number, got ${String(level)}`, 'level');
        }

        const runtime = this.runtimes.get(sessionId);
        if (!runtime || runtime.queue.isClosed()) {
            return false;
        }

        try {
            return await runtime.queue.run(() => this.applySignal(sessionId, level, activities, timestamp));
        } catch (error) {
            if (error instanceof QueueClosedError) {
                return false;
            }
            throw error;
        }
    }

    private handleBusSignal(update: SignalUpdate) {
        this.onSignalUpdate(update.sessionId, update.level, update.activities, update.timestamp)
            .catch(error => {
                console.error(`[SessionEngine] Failed to apply signal for session ${update.sessionId}:`, describeError(error));
            });
    }

    private async applySignal(
        sessionId: string,
        rawLevel: number,
        activities: ActivityBreakdown,
        timestamp: number
    ): Promise<boolean> {
        const session = this.store.get(sessionId);
        if (!session || session.status !== SessionStatus.ACTIVE) {
            return false;
        }

        const latest = session.trajectory[session.trajectory.length - 1];
        if (latest && timestamp < latest.timestamp) {
            console.warn(`[SessionEngine] Stale signal for session ${sessionId} at ${timestamp} dropped (latest ${latest.timestamp})`);
            return false;
        }

        const level = this.clampLevel(rawLevel, sessionId);
        this.store.appendSample(sessionId, { timestamp, level });
        this.store.update(sessionId, { signalLevel: level, lastActivityAt: this.clock() });

        const pending: OutboundEvent[] = [];

        const mode = classifyMode(level);
        if (mode !== session.mode) {
            pending.push(this.changeMode(session, mode, level));
        }

        const cognitiveState = classifyCognitiveState(level, activities);
        if (cognitiveState !== session.cognitiveState) {
            pending.push(this.changeCognitiveState(session, cognitiveState, level));
        }

        if (this.detector.isEligibleLevel(level)) {
            const opportunity = this.detector.evaluate(sessionId, level, timestamp);
            if (opportunity) {
                const parameters: ParameterSet = {
                    advancedContent: true,
                    targetDifficulty: optimalDifficulty(level),
                };
                const adaptation = this.recordAdaptation(sessionId, AdaptationKind.BREAKTHROUGH, level, parameters);
                this.store.update(sessionId, { parameters: { ...session.parameters, ...parameters } });
                this.metrics.breakthroughEmitted();
                console.log(`[SessionEngine] Breakthrough in session ${sessionId} at level ${level}`);

                pending.push({
                    type: OutboundEventType.BREAKTHROUGH_DETECTED,
                    sessionId,
                    triggerLevel: opportunity.triggerLevel,
                    timestamp: opportunity.timestamp,
                });
                pending.push(toAdaptationEvent(adaptation));
            }
        }

        for (const event of pending) {
            await this.deliver(event);
        }
        return true;
    }

    private changeMode(session: SessionRecord, mode: LearningMode, level: number): OutboundEvent {
        const parameters: ParameterSet = {
            ...this.strategy.modeParameters(mode),
            targetDifficulty: optimalDifficulty(level),
        };
        const adaptation = this.recordAdaptation(session.sessionId, AdaptationKind.MODE_CHANGE, level, parameters, {
            transition: { from: session.mode, to: mode },
            reason: modeRank(mode) > modeRank(session.mode) ? 'escalate' : 'de-escalate',
        });
        this.store.update(session.sessionId, { mode, parameters: { ...session.parameters, ...parameters } });
        return toAdaptationEvent(adaptation);
    }

    private changeCognitiveState(session: SessionRecord, state: CognitiveState, level: number): OutboundEvent {
        const parameters = this.strategy.cognitiveParameters(state);
        const adaptation = this.recordAdaptation(session.sessionId, AdaptationKind.COGNITIVE_CHANGE, level, parameters, {
            transition: { from: session.cognitiveState, to: state },
        });
        this.store.update(session.sessionId, { cognitiveState: state, parameters: { ...session.parameters, ...parameters } });
        return toAdaptationEvent(adaptation);
    }

    // ---------- Periodic optimization ----------

    /**
     * Re-evaluate one session from its recent trajectory
     * @returns null for an unknown or ended session
     * @throws {TransientProcessingError} when the evaluation exceeds tickTimeoutMs
     */
    async periodicTick(sessionId: string): Promise<TickReport | null> {
        const runtime = this.runtimes.get(sessionId);
        if (!runtime || runtime.queue.isClosed()) {
            return null;
        }

        try {
            return await this.runBoundedTick(sessionId, runtime);
        } catch (error) {
            if (error instanceof QueueClosedError) {
                return null;
            }
            throw error;
        }
    }

    /**
     * The caller gets its answer within tickTimeoutMs of the tick starting,
     * but the queue slot is held until the evaluation itself settles, so an
     * abandoned tick never overlaps the next task of the session or its end.
     */
    private runBoundedTick(sessionId: string, runtime: SessionRuntime): Promise<TickReport | null> {
        const guard: TickGuard = { abandoned: false };
        return new Promise<TickReport | null>((resolve, reject) => {
            runtime.queue.run(async () => {
                const evaluation = this.evaluateTick(sessionId, runtime, guard);
                try {
                    resolve(await withTimeout(evaluation, this.options.tickTimeoutMs, `tick for session ${sessionId}`));
                } catch (error) {
                    guard.abandoned = true;
                    reject(error);
                    await Promise.allSettled([evaluation]);
                }
            }).catch(reject);
        });
    }

    private async evaluateTick(sessionId: string, runtime: SessionRuntime, guard: TickGuard): Promise<TickReport | null> {
        const session = this.store.get(sessionId);
        if (!session || session.status !== SessionStatus.ACTIVE) {
            return null;
        }

        const levels = session.trajectory.slice(-this.options.trajectoryWindow).map(sample => sample.level);
        const estimate = estimateEffectiveness(levels);
        const adjustments = deriveAdjustments(estimate, session.cognitiveState, session.parameters);

        const adaptations: Adaptation[] = [];
        for (const adjustment of adjustments) {
            const parameters = changesToParameters(adjustment.changes);
            adaptations.push(this.recordAdaptation(
                sessionId,
                AdaptationKind.OPTIMIZATION,
                session.signalLevel,
                parameters,
                { reason: adjustment.reason }
            ));
            this.store.update(sessionId, { parameters: { ...session.parameters, ...parameters } });
        }

        this.store.updateMetric(sessionId, 'engagement', previous => ema(previous, estimate.engagement));
        this.store.updateMetric(sessionId, 'stability', previous => ema(previous, estimate.stability));
        this.store.updateMetric(sessionId, 'effectiveness', previous => ema(previous, estimate.effectiveness));
        this.store.updateMetric(sessionId, 'ticks', previous => (previous ?? 0) + 1);
        this.metrics.effectivenessObserved(estimate.effectiveness);

        for (const adaptation of adaptations) {
            await this.deliver(toAdaptationEvent(adaptation));
        }

        const backfilled = await this.runScorer(sessionId, runtime, guard);

        return {
            sessionId,
            estimate,
            adjustments,
            adaptations,
            backfilled,
            timestamp: this.clock(),
        };
    }

    /**
     * Ask the scorer about adaptations it has not scored yet
     * @returns number of records back-filled
     */
    private async runScorer(sessionId: string, runtime: SessionRuntime, guard: TickGuard): Promise<number> {
        const scorer = this.scorer;
        if (!scorer) return 0;

        const snapshot = this.store.snapshot(sessionId);
        let backfilled = 0;
        for (const adaptation of snapshot.adaptationHistory) {
            if (guard.abandoned) break;
            if (runtime.scored.has(adaptation.adaptationId)) continue;

            const score = await withTimeout(
                Promise.resolve(scorer.score(adaptation, snapshot)),
                this.options.tickTimeoutMs,
                `effectiveness scorer for session ${sessionId}`
            );
            if (guard.abandoned) break;
            if (score === null) continue;

            this.store.backfillEffectiveness(sessionId, adaptation.adaptationId, clamp01(score));
            runtime.scored.add(adaptation.adaptationId);
            backfilled++;
        }
        return backfilled;
    }

    /**
     * Replace the effectiveness score of a past adaptation
     * @throws {UnknownSessionError} if the session is not active
     */
    async backfillEffectiveness(sessionId: string, adaptationId: string, score: number): Promise<Adaptation> {
        if (!isNumericLevel(score) || score < 0 || score > 1) {
            throw new InvalidInputError(`Effectiveness score must be within [0, 1], got ${String(score)}`, 'score');
        }
        const runtime = this.runtimes.get(sessionId);
        if (!runtime || runtime.queue.isClosed()) {
            throw new UnknownSessionError(sessionId);
        }

        try {
            return await runtime.queue.run(() => {
                const updated = this.store.backfillEffectiveness(sessionId, adaptationId, score);
                runtime.scored.add(adaptationId);
                return updated;
            });
        } catch (error) {
            if (error instanceof QueueClosedError) {
                throw new UnknownSessionError(sessionId);
            }
            throw error;
        }
    }

    // ---------- Queries ----------

    /**
     * Deep copy of the live session record
     * @throws {UnknownSessionError}
     */
    getSnapshot(sessionId: string): SessionSnapshot {
        return this.store.snapshot(sessionId);
    }

    activeSessionIds(): string[] {
        return Array.from(this.runtimes.entries())
            .filter(([, runtime]) => !runtime.ending)
            .map(([sessionId]) => sessionId);
    }

    getDiagnostics(sessionId: string): SessionDiagnostics {
        const runtime = this.runtimes.get(sessionId);
        if (!runtime) {
            throw new UnknownSessionError(sessionId);
        }
        const stats = runtime.queue.stats();
        return {
            pendingTasks: stats.pending,
            runningTasks: stats.running,
            peakConcurrency: stats.peakConcurrency,
            consecutiveTickFailures: runtime.ticker.getConsecutiveFailures(),
        };
    }

    /**
     * Resolves once every task queued so far for the session has settled
     */
    async whenIdle(sessionId: string): Promise<void> {
        const runtime = this.runtimes.get(sessionId);
        if (runtime) {
            await runtime.queue.onIdle();
        }
    }

    // ---------- Housekeeping ----------

    /**
     * End sessions with no activity within idleTimeoutMs
     * @returns ids of the sessions ended
     */
    async sweepIdleSessions(now: number = this.clock()): Promise<string[]> {
        const cutoff = now - this.options.idleTimeoutMs;
        const idle = this.activeSessionIds().filter(sessionId => {
            const session = this.store.get(sessionId);
            return session !== undefined && session.lastActivityAt <= cutoff;
        });

        const ended: string[] = [];
        await Promise.all(idle.map(async sessionId => {
            try {
                const snapshot = await this.end(sessionId, { reason: 'timeout' });
                if (snapshot) {
                    ended.push(sessionId);
                }
            } catch (error) {
                console.error(`[SessionEngine] Failed to end idle session ${sessionId}:`, describeError(error));
            }
        }));

        if (ended.length > 0) {
            console.log(`[SessionEngine] Ended ${ended.length} idle session(s)`);
        }
        return ended;
    }

    /**
     * End every active session with reason 'shutdown'
     */
    async shutdown(): Promise<SessionSnapshot[]> {
        const snapshots = await Promise.all(
            Array.from(this.runtimes.keys()).map(sessionId => this.end(sessionId, { reason: 'shutdown' }))
        );
        return snapshots.filter((snapshot): snapshot is SessionSnapshot => snapshot !== null);
    }

    // ---------- Internals ----------

    private clampLevel(level: number, sessionId: string): number {
        const clamped = clamp01(level);
        if (clamped !== level) {
            console.warn(`[SessionEngine] Level ${level} out of range for session ${sessionId}, clamped to ${clamped}`);
        }
        return clamped;
    }

    private requireSession(sessionId: string): SessionRecord {
        const session = this.store.get(sessionId);
        if (!session) {
            throw new UnknownSessionError(sessionId);
        }
        return session;
    }

    private recordAdaptation(
        sessionId: string,
        kind: AdaptationKind,
        triggerLevel: number,
        parameters: ParameterSet,
        extra: Pick<Adaptation, 'transition' | 'reason'> = {}
    ): Adaptation {
        const session = this.requireSession(sessionId);
        const last = session.adaptationHistory[session.adaptationHistory.length - 1];
        const timestamp = last ? Math.max(this.clock(), last.timestamp) : this.clock();

        const adaptation: Adaptation = {
            adaptationId: generateId(),
            sessionId,
            kind,
            triggerLevel,
            parameters,
            effectivenessScore: 0,
            timestamp,
            ...extra,
        };
        this.store.appendAdaptation(sessionId, adaptation);
        this.metrics.adaptationEmitted(kind, timestamp);
        return adaptation;
    }

    /**
     * Outbound delivery failures never propagate into session handling.
     * A delivery still pending after deliverTimeoutMs is abandoned.
     */
    private async deliver(event: OutboundEvent): Promise<void> {
        try {
            await withTimeout(
                this.bus.publishOutbound(event),
                this.options.deliverTimeoutMs,
                `deliver ${event.type}`
            );
        } catch (error) {
            const wrapped = new TransientProcessingError(
                `Failed to deliver ${event.type} for session ${event.sessionId}: ${describeError(error)}`,
                'deliver'
            );
            console.error(`[SessionEngine] ${wrapped.message}`);
        }
    }
}

function toAdaptationEvent(adaptation: Adaptation): OutboundEvent {
    return {
        type: OutboundEventType.ADAPTATION_EMITTED,
        adaptationId: adaptation.adaptationId,
        sessionId: adaptation.sessionId,
        kind: adaptation.kind,
        parameters: adaptation.parameters,
        triggerLevel: adaptation.triggerLevel,
        timestamp: adaptation.timestamp,
    };
}
