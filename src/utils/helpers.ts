/**
 * Utility functions
 */

import { v4 as uuidv4 } from 'uuid';
import { TransientProcessingError } from './errors';

/**
 * Generate a UUID
 */
export function generateId(): string {
    return uuidv4();
}

/**
 * Clamp a value into [0, 1]
 */
export function clamp01(value: number): number {
    if (value < 0) return 0;
    if (value > 1) return 1;
    return value;
}

/**
 * True for any number that is not NaN (infinities are clamped later)
 */
export function isNumericLevel(value: unknown): value is number {
    return typeof value === 'number' && !Number.isNaN(value);
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Delay helper
 */
export function delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Race a promise against a timer. The timer is always cleared.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            reject(new TransientProcessingError(`${operation} timed out after ${timeoutMs}ms`, operation));
        }, timeoutMs);
    });

    try {
        return await Promise.race([promise, timeout]);
    } finally {
        if (timer) {
            clearTimeout(timer);
        }
    }
}

/**
 * Mean and population standard deviation
 */
export function meanAndStdDev(values: number[]): { mean: number; stdDev: number } {
    if (values.length === 0) {
        return { mean: 0, stdDev: 0 };
    }
    const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
    const variance = values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / values.length;
    return { mean, stdDev: Math.sqrt(variance) };
}

/**
 * Least-squares slope of values against their index
 */
export function linearSlope(values: number[]): number {
    const n = values.length;
    if (n < 2) return 0;

    const meanX = (n - 1) / 2;
    const meanY = values.reduce((sum, v) => sum + v, 0) / n;

    let numerator = 0;
    let denominator = 0;
    for (let i = 0; i < n; i++) {
        numerator += (i - meanX) * (values[i] - meanY);
        denominator += (i - meanX) ** 2;
    }
    return numerator / denominator;
}
