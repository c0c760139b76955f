import { logger } from '../config/logger';

export interface RetryOptions {
    maxAttempts?: number;
    baseDelay?: number;
    maxDelay?: number;
    backoffMultiplier?: number;
    operationName?: string;
    /** Overrides the built-in transport error classification */
    shouldRetry?: (error: unknown) => boolean;
}

export interface IRetryUtil {
    executeWithRetry<T>(operation: () => Promise<T>, options?: RetryOptions): Promise<T>;
}

interface ErrorShape {
    code?: string;
    status?: number;
    message: string;
}

function describeError(error: unknown): ErrorShape {
    if (typeof error !== 'object' || error === null) {
        return { message: String(error) };
    }

    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    const status = 'status' in error && typeof error.status === 'number' ? error.status : undefined;
    const message = 'message' in error && typeof error.message === 'string' ? error.message : '';

    return { code, status, message };
}

/**
 * Retry Utility
 *
 * Provides retry logic with exponential backoff for calls to external
 * collaborators (the LLM API in particular).
 */
export class RetryUtil {
    /**
     * Execute function with retry logic
     */
    static async executeWithRetry<T>(
        operation: () => Promise<T>,
        options: RetryOptions = {}
    ): Promise<T> {
        const {
            maxAttempts = 3,
            baseDelay = 1000,
            maxDelay = 10000,
            backoffMultiplier = 2,
            operationName = 'operation',
            shouldRetry = (error: unknown) => RetryUtil.isRetryableError(error)
        } = options;

        let lastError: unknown = null;

        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            try {
                logger.debug({
                    operation: operationName,
                    attempt,
                    maxAttempts
                }, `Executing ${operationName} (attempt ${attempt}/${maxAttempts})`);

                const result = await operation();

                if (attempt > 1) {
                    logger.info({
                        operation: operationName,
                        attempt,
                        maxAttempts
                    }, `${operationName} succeeded on attempt ${attempt}`);
                }

                return result;

            } catch (error: unknown) {
                lastError = error;
                const retryable = shouldRetry(error);

                logger.warn({
                    operation: operationName,
                    attempt,
                    maxAttempts,
                    error: describeError(error).message,
                    isRetryable: retryable
                }, `${operationName} failed on attempt ${attempt}`);

                // Don't retry on last attempt
                if (attempt === maxAttempts) {
                    break;
                }

                if (!retryable) {
                    logger.error({
                        operation: operationName,
                        error: describeError(error).message
                    }, `${operationName} failed with non-retryable error`);
                    break;
                }

                const delay = Math.min(
                    baseDelay * Math.pow(backoffMultiplier, attempt - 1),
                    maxDelay
                );

                logger.info({
                    operation: operationName,
                    attempt,
                    delay
                }, `Retrying ${operationName} in ${delay}ms`);

                await RetryUtil.sleep(delay);
            }
        }

        logger.error({
            operation: operationName,
            maxAttempts,
            error: lastError === null ? undefined : describeError(lastError).message
        }, `${operationName} failed after ${maxAttempts} attempts`);

        throw lastError ?? new Error(`${operationName} failed after ${maxAttempts} attempts`);
    }

    /**
     * Check if error is a transient transport failure
     */
    static isRetryableError(error: unknown): boolean {
        const { code, status, message } = describeError(error);
        const text = message.toLowerCase();

        // Network errors
        if (code === 'ECONNRESET' || code === 'ENOTFOUND' || code === 'ECONNREFUSED') {
            return true;
        }

        // Timeout errors
        if (code === 'ETIMEDOUT' || text.includes('timeout') || text.includes('timed out')) {
            return true;
        }

        // OpenAI-compatible API errors
        if (status === 429 || status === 500 || status === 502 || status === 503) {
            return true;
        }

        if (text.includes('rate limit') || text.includes('quota')) {
            return true;
        }

        if (text.includes('connection') || text.includes('network')) {
            return true;
        }

        return false;
    }

    private static sleep(ms: number): Promise<void> {
        return new Promise(resolve => setTimeout(resolve, ms));
    }
}
