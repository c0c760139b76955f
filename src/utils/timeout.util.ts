/**
 * Rejection raised when an external call outlives its budget.
 * Carries the ETIMEDOUT code so RetryUtil classifies it as transient.
 */
export class TimeoutError extends Error {
    readonly code = 'ETIMEDOUT';

    constructor(readonly operationName: string, readonly timeoutMs: number) {
        super(`${operationName} timed out after ${timeoutMs}ms`);
        this.name = 'TimeoutError';
    }
}

export async function withTimeout<T>(
    operation: Promise<T>,
    timeoutMs: number,
    operationName: string
): Promise<T> {
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new TimeoutError(operationName, timeoutMs)), timeoutMs);
    });

    try {
        return await Promise.race([operation, timeout]);
    } finally {
        clearTimeout(timer);
    }
}
