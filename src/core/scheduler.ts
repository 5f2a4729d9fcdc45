/**
 * Periodic task scheduling
 * A cancellable setTimeout chain bound to an owner's lifetime, with
 * exponential backoff on consecutive failures.
 */

import { describeError } from '../utils/helpers';

export interface PeriodicTaskOptions {
    intervalMs: number;
    maxBackoffMs?: number;
    onError?: (error: unknown, consecutiveFailures: number) => void;
}

export class PeriodicTask {
    private timer: NodeJS.Timeout | null = null;
    private stopped = true;
    private consecutiveFailures = 0;
    private inFlight: Promise<void> | null = null;
    private readonly intervalMs: number;
    private readonly maxBackoffMs: number;

    constructor(
        private readonly name: string,
        private readonly task: () => Promise<unknown>,
        private readonly options: PeriodicTaskOptions
    ) {
        this.intervalMs = options.intervalMs;
        this.maxBackoffMs = Math.max(options.maxBackoffMs ?? options.intervalMs * 32, options.intervalMs);
    }

    start() {
        if (!this.stopped) return;
        this.stopped = false;
        this.schedule(this.intervalMs);
    }

    /**
     * No run starts after stop(); a run already in progress is left to finish
     */
    stop() {
        this.stopped = true;
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
    }

    isRunning(): boolean {
        return !this.stopped;
    }

    getConsecutiveFailures(): number {
        return this.consecutiveFailures;
    }

    /**
     * Delay before the next run given the current failure streak
     */
    nextDelay(): number {
        if (this.consecutiveFailures === 0) {
            return this.intervalMs;
        }
        return Math.min(this.intervalMs * 2 ** this.consecutiveFailures, this.maxBackoffMs);
    }

    /**
     * Resolves when the run in progress (if any) has finished
     */
    async settled(): Promise<void> {
        if (this.inFlight) {
            await this.inFlight;
        }
    }

    private schedule(delayMs: number) {
        if (this.stopped) return;
        this.timer = setTimeout(() => {
            this.timer = null;
            this.inFlight = this.runOnce().finally(() => {
                this.inFlight = null;
            });
        }, delayMs);
    }

    private async runOnce(): Promise<void> {
        if (this.stopped) return;

        try {
            await this.task();
            this.consecutiveFailures = 0;
        } catch (error) {
            this.consecutiveFailures++;
            console.error(
                `[PeriodicTask] ${this.name} failed (${this.consecutiveFailures} consecutive): ${describeError(error)}`
            );
            try {
                this.options.onError?.(error, this.consecutiveFailures);
            } catch (hookError) {
                console.error(`[PeriodicTask] ${this.name} error hook failed:`, hookError);
            }
        }

        const delay = this.nextDelay();
        if (this.consecutiveFailures > 0 && !this.stopped) {
            console.warn(`[PeriodicTask] ${this.name} backing off for ${delay}ms`);
        }
        this.schedule(delay);
    }
}
