/**
 * Per-session serial executor
 * Tasks run strictly one at a time in submission order. Once closed, tasks
 * that have not started yet are skipped.
 */

export class QueueClosedError extends Error {
    constructor(name: string) {
        super(`Queue ${name} is closed`);
        this.name = 'QueueClosedError';
    }
}

export class SerialQueue {
    private tail: Promise<void> = Promise.resolve();
    private pending = 0;
    private running = 0;
    private peak = 0;
    private closed = false;

    constructor(private readonly name: string) {}

    /**
     * Submit a task. Resolves with its result, or rejects with its error.
     * A task submitted after close() rejects with QueueClosedError.
     */
    run<T>(task: () => Promise<T> | T): Promise<T> {
        if (this.closed) {
            return Promise.reject(new QueueClosedError(this.name));
        }

        this.pending++;
        const result = this.tail.then(async () => {
            this.pending--;
            if (this.closed) {
                throw new QueueClosedError(this.name);
            }
            this.running++;
            this.peak = Math.max(this.peak, this.running);
            try {
                return await task();
            } finally {
                this.running--;
            }
        });

        // The chain itself never rejects; callers observe errors through `result`
        this.tail = result.then(() => undefined, () => undefined);
        return result;
    }

    /**
     * Stop accepting work; queued tasks that have not started are skipped
     */
    close(): void {
        this.closed = true;
    }

    isClosed(): boolean {
        return this.closed;
    }

    /**
     * Resolves once every submitted task has settled
     */
    onIdle(): Promise<void> {
        return this.tail;
    }

    stats(): { pending: number; running: number; peakConcurrency: number } {
        return { pending: this.pending, running: this.running, peakConcurrency: this.peak };
    }
}
