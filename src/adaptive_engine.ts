import { ActivityBreakdown, AdaptiveEngineConfig, MetricsSnapshot } from './types';
import { CompletionData, SessionSnapshot } from './types/session';
import { BusManager } from './core/bus';
import { SQLiteStorage, AdaptationLogEntry, BreakthroughLogEntry } from './storage/sqlite';
import { InMemorySessionStore } from './core/session_store';
import { SessionEngine, SessionDiagnostics, TickReport } from './core/session_engine';
import { MetricsAggregator } from './core/metrics_aggregator';
import { AdaptationStrategy } from './core/strategy_table';
import { BreakthroughDetector } from './core/breakthrough_detector';
import { PeriodicTask } from './core/scheduler';
import { computeSessionAnalytics, SessionAnalytics } from './core/analytics';
import { ConfigurationError } from './utils/errors';
import { EngineConfigSchema, ResolvedEngineConfig, SignalUpdateInput } from './utils/schemas';
import { describeError } from './utils/helpers';

export class AdaptiveEngine {
    public bus: BusManager;
    public storage: SQLiteStorage;
    public sessions: SessionEngine;
    public metrics: MetricsAggregator;
    private config: ResolvedEngineConfig;
    private store: InMemorySessionStore;
    private monitor: PeriodicTask;

    constructor(config: AdaptiveEngineConfig) {
        // Validate configuration before initialization
        this.config = this.validateConfig(config);
        const clock = config.clock ?? Date.now;

        // Storage first: the bus logs outbound events into it
        this.storage = new SQLiteStorage(this.config.storage.sqlitePath);
        this.bus = new BusManager({ logs: this.storage, maxTrackedIds: this.config.dedupe.maxTrackedIds });
        this.metrics = new MetricsAggregator(clock);
        this.store = new InMemorySessionStore();

        this.sessions = new SessionEngine({
            store: this.store,
            bus: this.bus,
            metrics: this.metrics,
            strategy: config.strategy ?? new AdaptationStrategy(),
            detector: new BreakthroughDetector(this.config.breakthrough),
            archive: this.storage,
            scorer: config.effectivenessScorer,
            clock,
            options: {
                tickIntervalMs: this.config.scheduler.tickIntervalMs,
                tickTimeoutMs: this.config.scheduler.tickTimeoutMs,
                deliverTimeoutMs: this.config.scheduler.deliverTimeoutMs,
                maxBackoffMs: this.config.scheduler.maxBackoffMs,
                idleTimeoutMs: this.config.session.idleTimeoutMs,
                trajectoryWindow: this.config.session.trajectoryWindow,
            },
        });

        // Idle monitor (session timeouts)
        this.monitor = new PeriodicTask(
            'idle-monitor',
            () => this.sessions.sweepIdleSessions(),
            { intervalMs: this.config.scheduler.monitorIntervalMs, maxBackoffMs: this.config.scheduler.maxBackoffMs }
        );
    }

    /**
     * Validate configuration and apply defaults
     * @throws {ConfigurationError} naming the offending field
     */
    private validateConfig(config: AdaptiveEngineConfig): ResolvedEngineConfig {
        const parsed = EngineConfigSchema.safeParse(config);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            const field = issue.path.join('.');
            const message = issue.message.includes(field) ? issue.message : `${field}: ${issue.message}`;
            throw new ConfigurationError(message, field);
        }
        return parsed.data;
    }

    getEngineId(): string {
        return this.config.engineId;
    }

    start() {
        this.monitor.start();
        console.log(`[AdaptiveEngine] ${this.config.engineId} started.`);
    }

    /**
     * End every active session, then release resources
     */
    async stop() {
        const errors: string[] = [];

        this.monitor.stop();
        try {
            await this.monitor.settled();
        } catch (error) {
            errors.push(describeError(error));
        }

        try {
            const ended = await this.sessions.shutdown();
            if (ended.length > 0) {
                console.log(`[AdaptiveEngine] Ended ${ended.length} session(s) on shutdown`);
            }
        } catch (error) {
            errors.push(describeError(error));
        }

        try {
            this.bus.removeAllListeners();
        } catch (error) {
            errors.push(describeError(error));
        }

        try {
            this.storage.close();
        } catch (error) {
            errors.push(describeError(error));
        }

        if (errors.length > 0) {
            console.warn('[AdaptiveEngine] Some resources failed to close:', errors);
        }

        console.log(`[AdaptiveEngine] ${this.config.engineId} stopped`);
    }

    // ========== Sessions ==========

    async startSession(
        userId: string,
        lessonId: string,
        initialSignal: number,
        activities?: ActivityBreakdown
    ): Promise<string> {
        return this.sessions.start(userId, lessonId, initialSignal, activities);
    }

    async endSession(sessionId: string, completion?: CompletionData): Promise<SessionSnapshot | null> {
        return this.sessions.end(sessionId, completion);
    }

    /**
     * Publish a signal update on the bus, as the external feed would
     * @returns true if an active session received it
     */
    async pushSignal(update: SignalUpdateInput): Promise<boolean> {
        return this.bus.publishSignal(update);
    }

    getSnapshot(sessionId: string): SessionSnapshot {
        return this.sessions.getSnapshot(sessionId);
    }

    async tick(sessionId: string): Promise<TickReport | null> {
        return this.sessions.periodicTick(sessionId);
    }

    getDiagnostics(sessionId: string): SessionDiagnostics {
        return this.sessions.getDiagnostics(sessionId);
    }

    getActiveSessions(): string[] {
        return this.sessions.activeSessionIds();
    }

    // ========== Metrics & history ==========

    getMetrics(): MetricsSnapshot {
        return this.metrics.snapshot();
    }

    /**
     * Analytics over live and archived sessions
     * @param userId optional filter
     * @returns null when there is no data
     */
    getSessionAnalytics(userId?: string): SessionAnalytics | null {
        const live = this.sessions.activeSessionIds()
            .map(sessionId => this.sessions.getSnapshot(sessionId))
            .filter(session => userId === undefined || session.userId === userId);
        return computeSessionAnalytics(live, this.storage.getArchivedSummaries(userId));
    }

    getArchivedSession(sessionId: string): SessionSnapshot | null {
        return this.storage.getArchivedSession(sessionId);
    }

    getAdaptationLog(sessionId: string, limit: number = 100): AdaptationLogEntry[] {
        return this.storage.getAdaptationLog(sessionId, limit);
    }

    getBreakthroughLog(sessionId: string, limit: number = 100): BreakthroughLogEntry[] {
        return this.storage.getBreakthroughLog(sessionId, limit);
    }
}
