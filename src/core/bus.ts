import EventEmitter from 'eventemitter3';
import { LRUCache } from 'lru-cache';
import {
    SignalUpdate,
    OutboundEvent,
    OutboundEvents,
    OutboundEventType
} from '../types';
import { SignalUpdateSchema, OutboundEventSchema } from '../utils/schemas';
import { InvalidInputError, ValidationError } from '../utils/errors';
import { assertNever } from './classifier';

export type BusMiddleware<T> = (packet: T, next: () => Promise<void>) => Promise<void>;

export type SignalHandler = (update: SignalUpdate) => void;

/**
 * Sink for outbound event logging (implemented by SQLiteStorage)
 */
export interface OutboundEventLog {
    logOutbound(event: OutboundEvent): void | Promise<void>;
}

export interface BusOptions {
    logs?: OutboundEventLog;
    maxTrackedIds?: number;
}

class DedupeOverlay {
    private seenEventIds: LRUCache<string, number>;

    constructor(maxTrackedIds: number) {
        this.seenEventIds = new LRUCache<string, number>({ max: maxTrackedIds });
    }

    async monitorInbound(update: SignalUpdate, next: () => Promise<void>) {
        if (update.id) {
            if (this.seenEventIds.has(update.id)) {
                console.warn(`[DedupeOverlay] Duplicate signal ${update.id} for session ${update.sessionId} dropped`);
                return;
            }
            this.seenEventIds.set(update.id, update.timestamp);
        }
        await next();
    }
}

export class BusManager {
    public inbound: EventEmitter;                 // event name = sessionId
    public outbound: EventEmitter<OutboundEvents>;

    private inboundMiddlewares: BusMiddleware<SignalUpdate>[] = [];
    private outboundMiddlewares: BusMiddleware<OutboundEvent>[] = [];
    private logs?: OutboundEventLog;
    private dedupeOverlay: DedupeOverlay;

    constructor(options: BusOptions = {}) {
        this.inbound = new EventEmitter();
        this.outbound = new EventEmitter<OutboundEvents>();
        this.logs = options.logs;
        this.dedupeOverlay = new DedupeOverlay(options.maxTrackedIds ?? 1000);

        // Register duplicate suppression by default
        this.useInbound((update, next) => this.dedupeOverlay.monitorInbound(update, next));
    }

    useInbound(middleware: BusMiddleware<SignalUpdate>) {
        this.inboundMiddlewares.push(middleware);
    }

    useOutbound(middleware: BusMiddleware<OutboundEvent>) {
        this.outboundMiddlewares.push(middleware);
    }

    /**
     * Subscribe to signal updates of one session
     * @returns unsubscribe function
     */
    subscribeSignals(sessionId: string, handler: SignalHandler): () => void {
        this.inbound.on(sessionId, handler);
        return () => {
            this.inbound.off(sessionId, handler);
        };
    }

    signalSubscriberCount(sessionId: string): number {
        return this.inbound.listenerCount(sessionId);
    }

    /**
     * Publish a signal update from the external feed (untrusted input)
     * @returns true if the update reached a subscriber
     * @throws {InvalidInputError} when the update is malformed (e.g. non-numeric level)
     */
    async publishSignal(input: unknown): Promise<boolean> {
        // 1. Validation
        const parsed = SignalUpdateSchema.safeParse(input);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            throw new InvalidInputError(`Invalid signal update: ${issue.message}`, issue.path.join('.'));
        }
        const update: SignalUpdate = parsed.data;

        // 2. Middleware Execution
        const completed = await this.runChain(this.inboundMiddlewares, update);
        if (!completed) {
            return false;
        }

        // 3. Emit
        return this.inbound.emit(update.sessionId, update);
    }

    async publishOutbound(event: OutboundEvent) {
        // 1. Validation
        const parsed = OutboundEventSchema.safeParse(event);
        if (!parsed.success) {
            throw new ValidationError(`Invalid outbound event ${event.type}`, parsed.error.issues);
        }

        // 2. Middleware Execution
        const completed = await this.runChain(this.outboundMiddlewares, event);
        if (!completed) {
            return;
        }

        // 3. Internal Logging (after middleware, before event dispatch)
        if (this.logs) {
            try {
                await this.logs.logOutbound(event);
            } catch (error) {
                console.error('[BusManager] Failed to log outbound event:', error);
            }
        }

        // 4. Emit
        this.dispatch(event);
    }

    private dispatch(event: OutboundEvent) {
        switch (event.type) {
            case OutboundEventType.ADAPTATION_EMITTED:
                this.outbound.emit(event.type, event);
                break;
            case OutboundEventType.BREAKTHROUGH_DETECTED:
                this.outbound.emit(event.type, event);
                break;
            case OutboundEventType.SESSION_STARTED:
                this.outbound.emit(event.type, event);
                break;
            case OutboundEventType.SESSION_ENDED:
                this.outbound.emit(event.type, event);
                break;
            default:
                assertNever(event);
        }
    }

    private async runChain<T>(middlewares: BusMiddleware<T>[], packet: T): Promise<boolean> {
        let index = 0;
        let completed = false;
        const next = async () => {
            if (index < middlewares.length) {
                await middlewares[index++](packet, next);
            } else {
                completed = true;
            }
        };
        await next();
        return completed;
    }

    removeAllListeners() {
        this.inbound.removeAllListeners();
        this.outbound.removeAllListeners();
    }
}
