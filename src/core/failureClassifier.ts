import { FTPError } from 'basic-ftp';
import {
    ConfigurationError,
    LocalResourceError,
    PermanentFailureKind,
    PermanentRemoteError,
    QueryValidationError,
    RemoteOperationError,
    TransientRemoteError,
    describeError
} from '../utils';

export type FailureClass = 'transient' | 'permanent';

/**
 * Decides whether a failed remote operation is worth retrying
 */
export type FailureClassifier = (error: unknown) => FailureClass;

const CONNECTION_ERROR_CODES = [
    'ECONNRESET',
    'ECONNREFUSED',
    'ECONNABORTED',
    'ETIMEDOUT',
    'ENOTFOUND',
    'ENETUNREACH',
    'EHOSTUNREACH',
    'EPIPE',
    'EAI_AGAIN'
];

const CONNECTION_ERROR_PATTERNS = [
    'timeout',
    'socket',
    'connection closed',
    'client is closed',
    'user closed',
    'server sent fin'
];

function getErrorCode(error: unknown): unknown {
    if (typeof error === 'object' && error !== null && 'code' in error) {
        return error.code;
    }
    return undefined;
}

/**
 * 530 with "maximum" is the server refusing more connections, not a login failure
 */
export function isRateLimitError(error: unknown): boolean {
    return error instanceof FTPError
        && error.code === 530
        && error.message.toLowerCase().includes('maximum');
}

/**
 * Failures that mean the control connection is gone or unusable
 */
export function isConnectionError(error: unknown): boolean {
    if (error instanceof FTPError) {
        // 421: service not available, closing control connection
        return error.code === 421 || isRateLimitError(error);
    }

    const code = getErrorCode(error);
    if (typeof code === 'string' && CONNECTION_ERROR_CODES.includes(code)) {
        return true;
    }

    if (!(error instanceof Error)) {
        return false;
    }
    const message = error.message.toLowerCase();
    return CONNECTION_ERROR_CODES.some(c => message.includes(c.toLowerCase()))
        || CONNECTION_ERROR_PATTERNS.some(p => message.includes(p));
}

export const classifyFailure: FailureClassifier = (error: unknown): FailureClass => {
    if (error instanceof TransientRemoteError) {
        return 'transient';
    }
    if (
        error instanceof PermanentRemoteError
        || error instanceof QueryValidationError
        || error instanceof LocalResourceError
        || error instanceof ConfigurationError
        || error instanceof RemoteOperationError
    ) {
        return 'permanent';
    }
    if (error instanceof FTPError) {
        // 4xx replies are transient negative completions by definition
        if (error.code >= 400 && error.code < 500) {
            return 'transient';
        }
        return isRateLimitError(error) ? 'transient' : 'permanent';
    }
    return isConnectionError(error) ? 'transient' : 'permanent';
};

function permanentKindForReply(error: FTPError): PermanentFailureKind {
    switch (error.code) {
        case 530:
        case 532:
            return 'authentication';
        case 550:
            return /permission|denied|not allowed/i.test(error.message) ? 'permission' : 'not-found';
        case 501:
        case 553:
            return 'invalid-path';
        case 500:
        case 502:
        case 504:
            return 'unsupported';
        default:
            return 'protocol';
    }
}

/**
 * Programming errors raised by our own code rather than by the transport
 */
function isProgrammingError(error: unknown): error is Error {
    return error instanceof TypeError
        || error instanceof RangeError
        || error instanceof ReferenceError
        || error instanceof SyntaxError;
}

/**
 * Normalize a permanent failure into the provider's error types.
 * Errors that are already typed, and programming errors, pass through unchanged.
 */
export function toPermanentError(error: unknown, operation: string): Error {
    if (isProgrammingError(error)) {
        return error;
    }
    if (
        error instanceof PermanentRemoteError
        || error instanceof QueryValidationError
        || error instanceof LocalResourceError
        || error instanceof ConfigurationError
        || error instanceof RemoteOperationError
    ) {
        return error;
    }

    const kind = error instanceof FTPError ? permanentKindForReply(error) : 'protocol';
    return new PermanentRemoteError(kind, `${operation} failed: ${describeError(error)}`, { cause: error });
}
