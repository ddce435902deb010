/**
 * Base class for every error raised by the storage provider
 */
export class StorageError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'StorageError';
    }
}

/**
 * Malformed query (unsupported scheme, missing path or host)
 */
export class QueryValidationError extends StorageError {
    constructor(
        public readonly query: string,
        public readonly reason: string
    ) {
        super(`Invalid query '${query}': ${reason}`);
        this.name = 'QueryValidationError';
    }
}

/**
 * Invalid provider settings
 */
export class ConfigurationError extends StorageError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ConfigurationError';
    }
}

/**
 * A remote failure that is expected to go away on retry
 */
export class TransientRemoteError extends StorageError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'TransientRemoteError';
    }
}

export type PermanentFailureKind =
    | 'authentication'
    | 'not-found'
    | 'permission'
    | 'invalid-path'
    | 'unsupported'
    | 'protocol';

/**
 * A remote failure that retrying cannot fix
 */
export class PermanentRemoteError extends StorageError {
    constructor(
        public readonly kind: PermanentFailureKind,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'PermanentRemoteError';
    }
}

/**
 * Transient failures used up the whole retry budget
 */
export class RemoteOperationError extends StorageError {
    constructor(
        public readonly operation: string,
        public readonly attempts: number,
        cause: unknown
    ) {
        super(`${operation} failed after ${attempts} attempts: ${describeError(cause)}`, { cause });
        this.name = 'RemoteOperationError';
    }
}

/**
 * Failure in the local staging area
 */
export class LocalResourceError extends StorageError {
    constructor(
        public readonly localPath: string,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'LocalResourceError';
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
