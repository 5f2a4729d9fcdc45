/**
 * Breakthrough detector
 * Rate-limited rule flagging rare high-signal moments per session
 */

export interface BreakthroughDetectorConfig {
    threshold?: number;   // Level must be strictly above this
    cooldownMs?: number;  // Session wall-clock between two firings
}

export interface BreakthroughOpportunity {
    sessionId: string;
    triggerLevel: number;
    timestamp: number;
}

export class BreakthroughDetector {
    private readonly threshold: number;
    private readonly cooldownMs: number;
    private lastFiredAt: Map<string, number> = new Map(); // sessionId -> timestamp of last firing

    constructor(config: BreakthroughDetectorConfig = {}) {
        this.threshold = config.threshold ?? 0.85;
        this.cooldownMs = config.cooldownMs ?? 60 * 1000;
    }

    getThreshold(): number {
        return this.threshold;
    }

    isEligibleLevel(level: number): boolean {
        return level > this.threshold;
    }

    isCoolingDown(sessionId: string, timestamp: number): boolean {
        const last = this.lastFiredAt.get(sessionId);
        return last !== undefined && timestamp - last < this.cooldownMs;
    }

    /**
     * Returns an opportunity and starts the cool-down, or null
     */
    evaluate(sessionId: string, level: number, timestamp: number): BreakthroughOpportunity | null {
        if (!this.isEligibleLevel(level)) {
            return null;
        }

        if (this.isCoolingDown(sessionId, timestamp)) {
            console.log(`[BreakthroughDetector] Cooldown active for session ${sessionId}, skipping`);
            return null;
        }

        this.lastFiredAt.set(sessionId, timestamp);
        return { sessionId, triggerLevel: level, timestamp };
    }

    reset(sessionId: string): void {
        this.lastFiredAt.delete(sessionId);
    }
}
