/**
 * Errors surfaced to intake clients.
 * Each one carries the HTTP status the API answers with.
 */

export type IntakeErrorCode =
    | 'INVALID_TOKEN'
    | 'FILE_TOO_LARGE'
    | 'TOO_MANY_FILES'
    | 'VALIDATION'
    | 'INVALID_RANGE'
    | 'SESSION_NOT_FOUND'
    | 'BATCH_NOT_FOUND'
    | 'BATCH_FINISHED'
    | 'REMOTE_STORE';

export class IntakeError extends Error {
    constructor(
        message: string,
        public readonly code: IntakeErrorCode,
        public readonly statusCode: number
    ) {
        super(message);
        this.name = 'IntakeError';
    }
}

export class InvalidTokenError extends IntakeError {
    constructor() {
        super('Invalid token', 'INVALID_TOKEN', 403);
        this.name = 'InvalidTokenError';
    }
}

export class FileTooLargeError extends IntakeError {
    constructor(sizeBytes: number, maxBytes: number) {
        super(`File of ${sizeBytes} bytes exceeds the ${maxBytes} bytes limit`, 'FILE_TOO_LARGE', 413);
        this.name = 'FileTooLargeError';
    }
}

export class TooManyFilesError extends IntakeError {
    constructor(count: number, max: number) {
        super(`Batch has ${count} files, at most ${max} are allowed`, 'TOO_MANY_FILES', 413);
        this.name = 'TooManyFilesError';
    }
}

export class ValidationError extends IntakeError {
    constructor(message: string) {
        super(message, 'VALIDATION', 400);
        this.name = 'ValidationError';
    }
}

export class InvalidRangeError extends IntakeError {
    constructor(message: string) {
        super(message, 'INVALID_RANGE', 416);
        this.name = 'InvalidRangeError';
    }
}

export class SessionNotFoundError extends IntakeError {
    constructor(sessionId: string) {
        super(`Upload session ${sessionId} not found`, 'SESSION_NOT_FOUND', 404);
        this.name = 'SessionNotFoundError';
    }
}

export class BatchNotFoundError extends IntakeError {
    constructor(batchId: string) {
        super(`Batch ${batchId} not found`, 'BATCH_NOT_FOUND', 404);
        this.name = 'BatchNotFoundError';
    }
}

export class BatchFinishedError extends IntakeError {
    constructor(batchId: string) {
        super(`Batch ${batchId} is already finished`, 'BATCH_FINISHED', 409);
        this.name = 'BatchFinishedError';
    }
}

/**
 * Transient failure of the remote store, the client retries
 */
export class RemoteStoreError extends IntakeError {
    constructor(message: string, public readonly cause?: unknown) {
        super(message, 'REMOTE_STORE', 502);
        this.name = 'RemoteStoreError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
