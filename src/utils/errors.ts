/**
 * ================================================================================
 * ERRORS - Error Kinds and AWS Error Classification
 * ================================================================================
 *
 * Every failure that crosses a module boundary is an AppError carrying one of
 * the ErrorKind values below. Commands print a one-line summary; the full
 * cause chain goes to the debug log.
 *
 * KINDS:
 * • Throttled / ServiceUnavailable - retried by the retry engine
 * • CircuitOpen - surfaced immediately with a retry-after hint
 * • AmbiguousIdentifier - intercepted by the CLI and handed to the picker
 * • Cancelled - printed as "cancelled"
 */

import type { Instance } from '../types';

export type ErrorKind =
    | 'Cancelled'
    | 'Timeout'
    | 'NotFound'
    | 'AmbiguousIdentifier'
    | 'Throttled'
    | 'ServiceUnavailable'
    | 'Validation'
    | 'PermissionDenied'
    | 'CircuitOpen'
    | 'MemoryLimitExceeded'
    | 'PluginMissing'
    | 'Internal';

export class AppError extends Error {
    readonly kind: ErrorKind;

    constructor(kind: ErrorKind, message: string, cause?: unknown) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = 'AppError';
        this.kind = kind;
    }
}

/**
 * Raised when an identifier matches more than one instance.
 * //? allowInteractive tells the CLI it may offer a picker over `instances`
 */
export class AmbiguousIdentifierError extends AppError {
    readonly instances: Instance[];
    readonly allowInteractive: boolean;

    constructor(identifier: string, instances: Instance[], allowInteractive = true) {
        super('AmbiguousIdentifier', `multiple instances (${instances.length}) match identifier: ${identifier}`);
        this.name = 'AmbiguousIdentifierError';
        this.instances = instances;
        this.allowInteractive = allowInteractive;
    }
}

export class RateLimitError extends AppError {
    readonly waitMs: number;
    readonly reason: string;

    constructor(waitMs: number, reason: string) {
        super('Throttled', `rate limit exceeded: ${reason} (retry after ${Math.ceil(waitMs)}ms)`);
        this.name = 'RateLimitError';
        this.waitMs = waitMs;
        this.reason = reason;
    }
}

export class CircuitOpenError extends AppError {
    readonly retryAfterMs: number;

    constructor(message: string, retryAfterMs: number) {
        super('CircuitOpen', message);
        this.name = 'CircuitOpenError';
        this.retryAfterMs = retryAfterMs;
    }
}

export class MemoryLimitError extends AppError {
    readonly wouldUse: number;
    readonly limit: number;

    constructor(wouldUse: number, limit: number) {
        super('MemoryLimitExceeded', `memory limit exceeded: would use ${wouldUse} bytes, limit is ${limit} bytes`);
        this.name = 'MemoryLimitError';
        this.wouldUse = wouldUse;
        this.limit = limit;
    }
}

export class RetryExhaustedError extends AppError {
    readonly attempts: number;

    constructor(attempts: number, lastError: unknown) {
        super(errorKind(lastError), `operation failed after ${attempts} attempts: ${errorMessage(lastError)}`, lastError);
        this.name = 'RetryExhaustedError';
        this.attempts = attempts;
    }
}

/**
 * ================================================================
 * CLASSIFICATION
 * ================================================================
 */

const THROTTLING_CODES = new Set([
    'Throttling',
    'ThrottlingException',
    'ThrottledException',
    'RequestLimitExceeded',
    'RequestThrottled',
    'RequestThrottledException',
    'TooManyRequestsException',
    'SlowDown',
]);

const UNAVAILABLE_CODES = new Set([
    'ServiceUnavailable',
    'ServiceUnavailableException',
    'InternalError',
    'InternalFailure',
    'RequestTimeout',
    'RequestTimeoutException',
]);

const PERMISSION_CODES = new Set([
    'AccessDenied',
    'AccessDeniedException',
    'UnauthorizedOperation',
    'UnrecognizedClientException',
    'ExpiredToken',
    'ExpiredTokenException',
    'InvalidClientTokenId',
]);

const NOT_FOUND_CODES = new Set([
    'InvalidInstanceID.NotFound',
    'ResourceNotFoundException',
    'InvalidLaunchTemplateId.NotFound',
    'InvalidSubnetID.NotFound',
    'TargetNotConnected',
]);

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

/**
 * Extract the service error code from an AWS SDK v3 exception (its `name`),
 * or from a `code` property on plain errors.
 */
export function errorCode(err: unknown): string | undefined {
    if (!isRecord(err)) return undefined;
    const code = err.code ?? err.Code;
    if (typeof code === 'string') return code;
    const name = err.name;
    if (typeof name === 'string' && name !== 'Error' && name !== 'AppError') return name;
    return undefined;
}

function httpStatus(err: unknown): number | undefined {
    if (!isRecord(err)) return undefined;
    const metadata = err.$metadata;
    if (isRecord(metadata) && typeof metadata.httpStatusCode === 'number') {
        return metadata.httpStatusCode;
    }
    return undefined;
}

export function errorMessage(err: unknown): string {
    if (err instanceof Error) return err.message || err.name;
    if (typeof err === 'string') return err;
    try {
        return JSON.stringify(err);
    } catch {
        return String(err);
    }
}

/**
 * Map any thrown value to an ErrorKind.
 */
export function errorKind(err: unknown): ErrorKind {
    if (err instanceof AppError) return err.kind;

    const code = errorCode(err);
    if (code === 'AbortError') return 'Cancelled';
    if (code && THROTTLING_CODES.has(code)) return 'Throttled';
    if (code && UNAVAILABLE_CODES.has(code)) return 'ServiceUnavailable';
    if (code && PERMISSION_CODES.has(code)) return 'PermissionDenied';
    if (code && NOT_FOUND_CODES.has(code)) return 'NotFound';
    if (code && (code === 'ValidationError' || code === 'ValidationException' || code.startsWith('InvalidParameter'))) {
        return 'Validation';
    }

    const status = httpStatus(err);
    if (status === 429) return 'Throttled';
    if (status === 403) return 'PermissionDenied';
    if (status === 404) return 'NotFound';
    if (status !== undefined && status >= 500) return 'ServiceUnavailable';

    return 'Internal';
}

export function cancelledError(message = 'operation cancelled'): AppError {
    return new AppError('Cancelled', message);
}

export function isCancelled(err: unknown): boolean {
    return errorKind(err) === 'Cancelled';
}

/**
 * One-line summary shown to the operator.
 */
export function summarizeError(err: unknown): string {
    if (isCancelled(err)) return 'cancelled';
    if (err instanceof CircuitOpenError) {
        return `${err.message} (retry in ${Math.ceil(err.retryAfterMs / 1000)}s)`;
    }
    return errorMessage(err).split('\n')[0];
}
