import { Logger, RemoteOperationError, describeError } from '../utils';
import { FailureClassifier, classifyFailure, toPermanentError } from './failureClassifier';

/**
 * Fixed retry policy shared by every remote operation
 */
export const RETRY_POLICY = Object.freeze({
    maxAttempts: 3,
    initialDelay: 1000,
    maxDelay: 10000
});

export type Wait = (ms: number) => Promise<void>;

export const sleep: Wait = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Delay before the attempt following `attempt` (1-based), exponential and capped
 */
export function retryDelay(attempt: number): number {
    return Math.min(
        RETRY_POLICY.initialDelay * Math.pow(2, attempt - 1),
        RETRY_POLICY.maxDelay
    );
}

/**
 * Runs remote operations with bounded retry on transient failures.
 * Permanent failures are raised immediately without consuming the budget.
 */
export class RetryWrapper {
    constructor(
        private readonly classify: FailureClassifier = classifyFailure,
        private readonly wait: Wait = sleep
    ) {}

    public async run<T>(operationName: string, operation: () => Promise<T>): Promise<T> {
        const { maxAttempts } = RETRY_POLICY;

        for (let attempt = 1; ; attempt++) {
            try {
                return await operation();
            } catch (error) {
                if (this.classify(error) === 'permanent') {
                    throw toPermanentError(error, operationName);
                }

                if (attempt >= maxAttempts) {
                    Logger.error(`${operationName} failed after ${attempt} attempts: ${describeError(error)}`);
                    throw new RemoteOperationError(operationName, attempt, error);
                }

                const delay = retryDelay(attempt);
                Logger.warn(`${operationName} failed (attempt ${attempt}/${maxAttempts}): ${describeError(error)}. Retrying in ${delay}ms...`);
                await this.wait(delay);
            }
        }
    }
}
