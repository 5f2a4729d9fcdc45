/**
 * Adaptive Session Core - Error Types
 * Unified error handling for the session engine
 */

export class AdaptiveEngineError extends Error {
    public readonly code: string;
    public readonly statusCode: number;

    constructor(message: string, code: string, statusCode: number = 500) {
        super(message);
        this.name = this.constructor.name;
        this.code = code;
        this.statusCode = statusCode;

        // Maintains proper stack trace for where our error was thrown (only available on V8)
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }
}

export class InvalidInputError extends AdaptiveEngineError {
    constructor(message: string, public field?: string) {
        super(message, 'INVALID_INPUT', 400);
    }
}

export class UnknownSessionError extends AdaptiveEngineError {
    constructor(public sessionId: string) {
        super(`Unknown session: ${sessionId}`, 'UNKNOWN_SESSION', 404);
    }
}

export class TransientProcessingError extends AdaptiveEngineError {
    constructor(message: string, public operation?: string) {
        super(message, 'TRANSIENT_PROCESSING_FAILURE', 503);
    }
}

export class ValidationError extends AdaptiveEngineError {
    constructor(message: string, public details?: unknown) {
        super(message, 'VALIDATION_ERROR', 400);
    }
}

export class StorageError extends AdaptiveEngineError {
    constructor(message: string, public operation?: string) {
        super(message, 'STORAGE_ERROR', 500);
    }
}

export class ConfigurationError extends AdaptiveEngineError {
    constructor(message: string, public field?: string) {
        super(message, 'CONFIGURATION_ERROR', 400);
    }
}
