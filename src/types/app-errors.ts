/**
 * @fileoverview Canonical error taxonomy and the error class surfaced by the session core.
 * @module types/app-errors
 * @version 1.0.0
 */

/**
 * Unified error codes for every failure the core can surface.
 */
export enum AppErrorCode {
    // Transport
    NETWORK_UNREACHABLE = 'NETWORK_UNREACHABLE',
    DNS_FAILURE = 'DNS_FAILURE',
    TIMEOUT = 'TIMEOUT',

    // Server
    SERVER_BUSY = 'SERVER_BUSY',
    SERVER_ERROR = 'SERVER_ERROR',
    RESOURCE_NOT_FOUND = 'RESOURCE_NOT_FOUND',
    CLIENT_ERROR = 'CLIENT_ERROR',

    // Authentication
    AUTH_REQUIRED = 'AUTH_REQUIRED',
    AUTH_EXPIRED = 'AUTH_EXPIRED',
    AUTH_INVALID_CREDENTIALS = 'AUTH_INVALID_CREDENTIALS',
    ACCESS_DENIED = 'ACCESS_DENIED',

    // Trust / discovery
    CERTIFICATE_PIN_MISMATCH = 'CERTIFICATE_PIN_MISMATCH',
    SERVER_SSL_ERROR = 'SERVER_SSL_ERROR',
    NO_REACHABLE_ENDPOINT = 'NO_REACHABLE_ENDPOINT',
    INVALID_SERVER_ADDRESS = 'INVALID_SERVER_ADDRESS',

    // Local
    STORAGE_CORRUPTED = 'STORAGE_CORRUPTED',
    CANCELLED = 'CANCELLED',

    UNKNOWN = 'UNKNOWN',
}

/**
 * Diagnostic context carried by every surfaced error.
 * Never holds token or password values.
 */
export interface ErrorDiagnostics {
    /** Hostname of the server the failing call targeted */
    hostname?: string;
    /** Number of dispatch attempts made before the error surfaced */
    attempts?: number;
    /** Last HTTP status observed, if any response arrived */
    httpStatus?: number;
    /** Whether a later attempt might succeed */
    retryable?: boolean;
    /** Server-requested delay (Retry-After), in milliseconds */
    retryAfterMs?: number;
    /** Underlying error */
    cause?: unknown;
}

/**
 * Plain error shape for event payloads and persistence.
 */
export interface AppError {
    code: AppErrorCode;
    message: string;
    recoverable: boolean;
    context?: Record<string, unknown>;
}

/**
 * Error class for every failure surfaced by the session core.
 */
export class ServerApiError extends Error {
    public readonly code: AppErrorCode;
    public readonly httpStatus: number | undefined;
    public readonly retryable: boolean;
    public readonly hostname: string | undefined;
    public readonly attempts: number;
    public readonly retryAfterMs: number | undefined;

    constructor(code: AppErrorCode, message: string, diagnostics: ErrorDiagnostics = {}) {
        super(message, diagnostics.cause !== undefined ? { cause: diagnostics.cause } : undefined);
        this.name = 'ServerApiError';
        this.code = code;
        this.httpStatus = diagnostics.httpStatus;
        this.retryable = diagnostics.retryable ?? false;
        this.hostname = diagnostics.hostname;
        this.attempts = diagnostics.attempts ?? 0;
        this.retryAfterMs = diagnostics.retryAfterMs;
    }

    /**
     * Copy of this error with updated diagnostics.
     * Used when a retry loop finishes and stamps its attempt count.
     */
    public withDiagnostics(diagnostics: ErrorDiagnostics): ServerApiError {
        return new ServerApiError(this.code, this.message, {
            hostname: diagnostics.hostname ?? this.hostname,
            attempts: diagnostics.attempts ?? this.attempts,
            httpStatus: diagnostics.httpStatus ?? this.httpStatus,
            retryable: diagnostics.retryable ?? this.retryable,
            retryAfterMs: diagnostics.retryAfterMs ?? this.retryAfterMs,
            cause: this.cause,
        });
    }

    public toAppError(): AppError {
        const context: Record<string, unknown> = { attempts: this.attempts };
        if (this.hostname !== undefined) context['hostname'] = this.hostname;
        if (this.httpStatus !== undefined) context['httpStatus'] = this.httpStatus;
        return {
            code: this.code,
            message: this.message,
            recoverable: this.retryable,
            context,
        };
    }
}

/**
 * Type guard for ServerApiError.
 */
export function isServerApiError(error: unknown): error is ServerApiError {
    return error instanceof ServerApiError;
}

/**
 * Build a CANCELLED error.
 */
export function createCancelledError(hostname?: string): ServerApiError {
    return new ServerApiError(AppErrorCode.CANCELLED, 'Operation cancelled', {
        hostname,
        retryable: false,
    });
}
