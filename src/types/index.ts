/**
 * @fileoverview Shared types for the session core.
 */

export {
    AppErrorCode,
    ServerApiError,
    isServerApiError,
    createCancelledError,
} from './app-errors';
export type { AppError, ErrorDiagnostics } from './app-errors';
