/**
 * Shared error handling utilities to avoid duplicating
 * the `err instanceof Error ? err.message : String(err)` pattern.
 */

/** Extract a human-readable message from an unknown thrown value. */
export function getErrorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}

/** Browser or page failure while rendering a post. */
export class CaptureError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'CaptureError';
    }
}

/** Bucket or upload failure in the artifact store. */
export class StorageError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'StorageError';
    }
}
