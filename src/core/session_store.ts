/**
 * In-memory session store
 * Owns the live session records; every mutation goes through here.
 */

import { Adaptation, TrajectorySample } from '../types';
import { SessionRecord, SessionSnapshot, SessionStore } from '../types/session';
import { UnknownSessionError, ValidationError } from '../utils/errors';

export class InMemorySessionStore implements SessionStore {
    private sessions: Map<string, SessionRecord> = new Map();

    insert(session: SessionRecord): void {
        if (this.sessions.has(session.sessionId)) {
            throw new ValidationError(`Session already exists: ${session.sessionId}`);
        }
        this.sessions.set(session.sessionId, session);
    }

    has(sessionId: string): boolean {
        return this.sessions.has(sessionId);
    }

    get(sessionId: string): SessionRecord | undefined {
        return this.sessions.get(sessionId);
    }

    remove(sessionId: string): SessionRecord | undefined {
        const session = this.sessions.get(sessionId);
        this.sessions.delete(sessionId);
        return session;
    }

    ids(): string[] {
        return Array.from(this.sessions.keys());
    }

    size(): number {
        return this.sessions.size;
    }

    snapshot(sessionId: string): SessionSnapshot {
        return copySession(this.require(sessionId));
    }

    appendSample(sessionId: string, sample: TrajectorySample): void {
        const session = this.require(sessionId);
        const last = session.trajectory[session.trajectory.length - 1];
        if (last && sample.timestamp < last.timestamp) {
            throw new ValidationError(
                `Trajectory sample at ${sample.timestamp} is older than latest sample ${last.timestamp}`
            );
        }
        session.trajectory.push({ ...sample });
    }

    appendAdaptation(sessionId: string, adaptation: Adaptation): void {
        const session = this.require(sessionId);
        const last = session.adaptationHistory[session.adaptationHistory.length - 1];
        if (last && adaptation.timestamp < last.timestamp) {
            throw new ValidationError(
                `Adaptation at ${adaptation.timestamp} is older than latest adaptation ${last.timestamp}`
            );
        }
        session.adaptationHistory.push(Object.freeze({ ...adaptation }));
    }

    backfillEffectiveness(sessionId: string, adaptationId: string, score: number): Adaptation {
        const session = this.require(sessionId);
        const index = session.adaptationHistory.findIndex(a => a.adaptationId === adaptationId);
        if (index === -1) {
            throw new ValidationError(`Unknown adaptation ${adaptationId} for session ${sessionId}`);
        }
        const updated = Object.freeze({ ...session.adaptationHistory[index], effectivenessScore: score });
        session.adaptationHistory[index] = updated;
        return updated;
    }

    updateMetric(sessionId: string, name: string, update: (previous: number | undefined) => number): number {
        const session = this.require(sessionId);
        const next = update(session.performanceMetrics[name]);
        session.performanceMetrics[name] = next;
        return next;
    }

    update(sessionId: string, patch: Parameters<SessionStore['update']>[1]): void {
        const session = this.require(sessionId);
        Object.assign(session, patch);
    }

    private require(sessionId: string): SessionRecord {
        const session = this.sessions.get(sessionId);
        if (!session) {
            throw new UnknownSessionError(sessionId);
        }
        return session;
    }
}

export function copySession(session: SessionRecord): SessionSnapshot {
    return {
        ...session,
        trajectory: session.trajectory.map(sample => ({ ...sample })),
        adaptationHistory: session.adaptationHistory.map(copyAdaptation),
        performanceMetrics: { ...session.performanceMetrics },
        parameters: copyParameters(session.parameters),
    };
}

function copyAdaptation(adaptation: Adaptation): Adaptation {
    return {
        ...adaptation,
        parameters: copyParameters(adaptation.parameters),
        transition: adaptation.transition ? { ...adaptation.transition } : undefined,
    };
}

function copyParameters(parameters: SessionRecord['parameters']): SessionRecord['parameters'] {
    const copy: SessionRecord['parameters'] = {};
    for (const [key, value] of Object.entries(parameters)) {
        copy[key] = Array.isArray(value) ? [...value] : value;
    }
    return copy;
}
