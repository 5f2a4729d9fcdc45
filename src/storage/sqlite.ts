import Database from 'better-sqlite3';
import path from 'path';
import { z } from 'zod';
import {
    AdaptationKind,
    CognitiveState,
    EndReason,
    LearningMode,
    OutboundEvent,
    OutboundEventType,
    SessionStatus
} from '../types';
import { SessionSnapshot } from '../types/session';
import { OutboundEventLog } from '../core/bus';
import { assertNever } from '../core/classifier';
import {
    AdaptationHistorySchema,
    MetricRecordSchema,
    ParameterSetSchema,
    TrajectorySchema
} from '../utils/schemas';
import { StorageError } from '../utils/errors';

const END_REASONS = ['completed', 'abandoned', 'timeout', 'shutdown'] as const;

const SessionRowSchema = z.object({
    session_id: z.string(),
    user_id: z.string(),
    lesson_id: z.string(),
    created_at: z.number(),
    last_activity_at: z.number(),
    ended_at: z.number(),
    end_reason: z.enum(END_REASONS),
    final_mode: z.nativeEnum(LearningMode),
    final_cognitive_state: z.nativeEnum(CognitiveState),
    final_level: z.number(),
    trajectory_json: z.string(),
    adaptations_json: z.string(),
    metrics_json: z.string(),
    parameters_json: z.string(),
});

const SummaryRowSchema = SessionRowSchema.pick({
    session_id: true,
    user_id: true,
    lesson_id: true,
    created_at: true,
    ended_at: true,
    end_reason: true,
    final_mode: true,
    final_level: true,
    metrics_json: true,
});

const AdaptationLogRowSchema = z.object({
    adaptation_id: z.string(),
    session_id: z.string(),
    kind: z.nativeEnum(AdaptationKind),
    trigger_level: z.number(),
    parameters_json: z.string(),
    ts: z.number(),
});

const BreakthroughLogRowSchema = z.object({
    session_id: z.string(),
    trigger_level: z.number(),
    ts: z.number(),
});

export interface ArchivedSessionSummary {
    sessionId: string;
    userId: string;
    lessonId: string;
    createdAt: number;
    endedAt: number;
    endReason: EndReason;
    finalMode: LearningMode;
    finalLevel: number;
    finalPerformance: number | null;
}

export interface AdaptationLogEntry {
    adaptationId: string;
    sessionId: string;
    kind: AdaptationKind;
    triggerLevel: number;
    parameters: z.infer<typeof ParameterSetSchema>;
    timestamp: number;
}

export interface BreakthroughLogEntry {
    sessionId: string;
    triggerLevel: number;
    timestamp: number;
}

export class SQLiteStorage implements OutboundEventLog {
    private db: Database.Database;

    constructor(dbPath: string) {
        this.db = SQLiteStorage.open(dbPath === ':memory:' ? dbPath : path.resolve(dbPath));
        this.db.pragma('journal_mode = WAL');
        this.init();
    }

    private static open(resolvedPath: string): Database.Database {
        try {
            return new Database(resolvedPath);
        } catch (error) {
            throw new StorageError(
                `Failed to open SQLite database at ${resolvedPath}: ${error instanceof Error ? error.message : String(error)}`,
                'open'
            );
        }
    }

    private init() {
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS sessions (
                session_id TEXT PRIMARY KEY,
                user_id TEXT NOT NULL,
                lesson_id TEXT NOT NULL,
                created_at INTEGER NOT NULL,
                last_activity_at INTEGER NOT NULL,
                ended_at INTEGER NOT NULL,
                end_reason TEXT NOT NULL,
                final_mode TEXT NOT NULL,
                final_cognitive_state TEXT NOT NULL,
                final_level REAL NOT NULL,
                trajectory_json TEXT DEFAULT '[]',
                adaptations_json TEXT DEFAULT '[]',
                metrics_json TEXT DEFAULT '{}',
                parameters_json TEXT DEFAULT '{}'
            );
        `);
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS adaptation_log (
                adaptation_id TEXT PRIMARY KEY,
                session_id TEXT NOT NULL,
                kind TEXT NOT NULL,
                trigger_level REAL NOT NULL,
                parameters_json TEXT NOT NULL,
                ts INTEGER NOT NULL
            );
        `);
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS breakthrough_log (
                id INTEGER PRIMARY KEY AUTOINCREMENT,
                session_id TEXT NOT NULL,
                trigger_level REAL NOT NULL,
                ts INTEGER NOT NULL
            );
        `);
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS lifecycle_log (
                id INTEGER PRIMARY KEY AUTOINCREMENT,
                session_id TEXT NOT NULL,
                event_type TEXT NOT NULL,
                payload_json TEXT NOT NULL,
                ts INTEGER NOT NULL
            );
        `);
        // Indexes for fast queries
        this.db.exec(`
            CREATE INDEX IF NOT EXISTS idx_sessions_user ON sessions(user_id);
            CREATE INDEX IF NOT EXISTS idx_sessions_ended ON sessions(ended_at);
            CREATE INDEX IF NOT EXISTS idx_adaptation_log_session ON adaptation_log(session_id, ts);
            CREATE INDEX IF NOT EXISTS idx_breakthrough_log_session ON breakthrough_log(session_id, ts);
            CREATE INDEX IF NOT EXISTS idx_lifecycle_log_session ON lifecycle_log(session_id);
        `);
    }

    // ---------- Session archive ----------

    archiveSession(session: SessionSnapshot) {
        if (session.endedAt === undefined || session.endReason === undefined) {
            throw new StorageError(`Session ${session.sessionId} has not ended`, 'archiveSession');
        }
        this.db.prepare(`
            INSERT OR REPLACE INTO sessions (
                session_id, user_id, lesson_id, created_at, last_activity_at, ended_at, end_reason,
                final_mode, final_cognitive_state, final_level,
                trajectory_json, adaptations_json, metrics_json, parameters_json
            ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        `).run(
            session.sessionId,
            session.userId,
            session.lessonId,
            session.createdAt,
            session.lastActivityAt,
            session.endedAt,
            session.endReason,
            session.mode,
            session.cognitiveState,
            session.signalLevel,
            JSON.stringify(session.trajectory),
            JSON.stringify(session.adaptationHistory),
            JSON.stringify(session.performanceMetrics),
            JSON.stringify(session.parameters)
        );
    }

    getArchivedSession(sessionId: string): SessionSnapshot | null {
        const row = this.db.prepare('SELECT * FROM sessions WHERE session_id = ?').get(sessionId);
        if (!row) {
            return null;
        }
        const parsed = SessionRowSchema.parse(row);
        return {
            sessionId: parsed.session_id,
            userId: parsed.user_id,
            lessonId: parsed.lesson_id,
            signalLevel: parsed.final_level,
            mode: parsed.final_mode,
            cognitiveState: parsed.final_cognitive_state,
            status: SessionStatus.ENDED,
            trajectory: TrajectorySchema.parse(JSON.parse(parsed.trajectory_json)),
            adaptationHistory: AdaptationHistorySchema.parse(JSON.parse(parsed.adaptations_json)),
            performanceMetrics: MetricRecordSchema.parse(JSON.parse(parsed.metrics_json)),
            parameters: ParameterSetSchema.parse(JSON.parse(parsed.parameters_json)),
            createdAt: parsed.created_at,
            lastActivityAt: parsed.last_activity_at,
            endedAt: parsed.ended_at,
            endReason: parsed.end_reason,
        };
    }

    /**
     * Archived session summaries, newest first
     * @param userId optional filter
     */
    getArchivedSummaries(userId?: string): ArchivedSessionSummary[] {
        const columns = 'session_id, user_id, lesson_id, created_at, ended_at, end_reason, final_mode, final_level, metrics_json';
        const rows = userId
            ? this.db.prepare(`SELECT ${columns} FROM sessions WHERE user_id = ? ORDER BY ended_at DESC`).all(userId)
            : this.db.prepare(`SELECT ${columns} FROM sessions ORDER BY ended_at DESC`).all();

        return rows.map(row => {
            const parsed = SummaryRowSchema.parse(row);
            const metrics = MetricRecordSchema.parse(JSON.parse(parsed.metrics_json));
            return {
                sessionId: parsed.session_id,
                userId: parsed.user_id,
                lessonId: parsed.lesson_id,
                createdAt: parsed.created_at,
                endedAt: parsed.ended_at,
                endReason: parsed.end_reason,
                finalMode: parsed.final_mode,
                finalLevel: parsed.final_level,
                finalPerformance: metrics.final_performance ?? null,
            };
        });
    }

    // ---------- Outbound event logs ----------

    logOutbound(event: OutboundEvent) {
        switch (event.type) {
            case OutboundEventType.ADAPTATION_EMITTED:
                this.db.prepare(`
                    INSERT OR REPLACE INTO adaptation_log (adaptation_id, session_id, kind, trigger_level, parameters_json, ts)
                    VALUES (?, ?, ?, ?, ?, ?)
                `).run(
                    event.adaptationId,
                    event.sessionId,
                    event.kind,
                    event.triggerLevel,
                    JSON.stringify(event.parameters),
                    event.timestamp
                );
                break;
            case OutboundEventType.BREAKTHROUGH_DETECTED:
                this.db.prepare(`
                    INSERT INTO breakthrough_log (session_id, trigger_level, ts) VALUES (?, ?, ?)
                `).run(event.sessionId, event.triggerLevel, event.timestamp);
                break;
            case OutboundEventType.SESSION_STARTED:
            case OutboundEventType.SESSION_ENDED:
                this.db.prepare(`
                    INSERT INTO lifecycle_log (session_id, event_type, payload_json, ts) VALUES (?, ?, ?, ?)
                `).run(event.sessionId, event.type, JSON.stringify(event), event.timestamp);
                break;
            default:
                assertNever(event);
        }
    }

    getAdaptationLog(sessionId: string, limit: number = 100): AdaptationLogEntry[] {
        const rows = this.db.prepare(`
            SELECT * FROM adaptation_log WHERE session_id = ? ORDER BY ts ASC, rowid ASC LIMIT ?
        `).all(sessionId, limit);

        return rows.map(row => {
            const parsed = AdaptationLogRowSchema.parse(row);
            return {
                adaptationId: parsed.adaptation_id,
                sessionId: parsed.session_id,
                kind: parsed.kind,
                triggerLevel: parsed.trigger_level,
                parameters: ParameterSetSchema.parse(JSON.parse(parsed.parameters_json)),
                timestamp: parsed.ts,
            };
        });
    }

    getBreakthroughLog(sessionId: string, limit: number = 100): BreakthroughLogEntry[] {
        const rows = this.db.prepare(`
            SELECT session_id, trigger_level, ts FROM breakthrough_log WHERE session_id = ? ORDER BY ts ASC, id ASC LIMIT ?
        `).all(sessionId, limit);

        return rows.map(row => {
            const parsed = BreakthroughLogRowSchema.parse(row);
            return { sessionId: parsed.session_id, triggerLevel: parsed.trigger_level, timestamp: parsed.ts };
        });
    }

    countLifecycleEvents(sessionId: string): number {
        const row = this.db.prepare('SELECT COUNT(*) AS count FROM lifecycle_log WHERE session_id = ?').get(sessionId);
        return z.object({ count: z.number() }).parse(row).count;
    }

    close() {
        this.db.close();
    }
}
