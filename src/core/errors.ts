/**
 * Safe Errors
 *
 * Every failure raised by the core carries a stable code so the CLI and
 * library callers can branch on the kind of failure instead of its message.
 */

/**
 * Stable error identifiers
 */
export enum ErrorCode {
    CONFIG_NOT_FOUND = 'SAFE_CONFIG_NOT_FOUND',
    INVALID_CONFIG = 'SAFE_INVALID_CONFIG',
    PATH_RESOLUTION = 'SAFE_PATH_RESOLUTION',
    ALREADY_PROTECTED = 'SAFE_ALREADY_PROTECTED',
    NOT_PROTECTED = 'SAFE_NOT_PROTECTED',
    FILE_NOT_FOUND = 'SAFE_FILE_NOT_FOUND',
    DECRYPT_FAILED = 'SAFE_DECRYPT_FAILED',
    ENCRYPT_FAILED = 'SAFE_ENCRYPT_FAILED',
    UNSUPPORTED_FORMAT = 'SAFE_UNSUPPORTED_FORMAT',
    COMMIT_FAILED = 'SAFE_COMMIT_FAILED',
    EDITOR_FAILED = 'SAFE_EDITOR_FAILED',
    COMMAND_FAILED = 'SAFE_COMMAND_FAILED',
    IO_ERROR = 'SAFE_IO_ERROR',
}

/**
 * Options for constructing a SafeError
 */
export interface SafeErrorOptions {
    code: ErrorCode;
    message: string;
    /** File the failure relates to, when there is one */
    path?: string;
    cause?: unknown;
}

/**
 * Base error for everything the core throws.
 *
 * Usage:
 *   throw new SafeError({
 *     code: ErrorCode.NOT_PROTECTED,
 *     message: 'notes.md.gpg.asc is not protected',
 *     path: 'notes.md.gpg.asc',
 *   });
 */
export class SafeError extends Error {
    readonly code: ErrorCode;
    readonly path?: string;

    constructor(options: SafeErrorOptions) {
        super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
        this.name = 'SafeError';
        this.code = options.code;
        this.path = options.path;

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, SafeError);
        }
    }
}

/**
 * Type guard, optionally narrowing to a specific code
 */
export function isSafeError(error: unknown, code?: ErrorCode): error is SafeError {
    if (!(error instanceof SafeError)) {
        return false;
    }
    return code === undefined || error.code === code;
}

/**
 * Extracts a printable message from anything thrown
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * True for Node filesystem errors with the given errno code
 */
export function hasErrnoCode(error: unknown, code: string): boolean {
    return error instanceof Error && 'code' in error && error.code === code;
}
