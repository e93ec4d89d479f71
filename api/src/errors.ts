import { TranslationBackendError } from '@booktrans/core';

export type JobErrorCode =
    | 'validation'
    | 'insufficient_balance'
    | 'not_found'
    | 'job_already_running'
    | 'external_service'
    | 'internal';

/**
 * Base class for every failure the orchestrator reports to a requester.
 * `code` is stable and goes over the wire; `message` is for humans.
 */
export class JobError extends Error {
    constructor(readonly code: JobErrorCode, message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Bad file type or size at intake. No job is created. */
export class ValidationError extends JobError {
    constructor(message: string) {
        super('validation', message);
    }
}

export class InsufficientBalanceError extends JobError {
    readonly deficit: number;

    constructor(readonly cost: number, readonly balance: number, readonly pages: number) {
        super('insufficient_balance', `Insufficient balance: cost ${cost}, balance ${balance}`);
        this.deficit = cost - balance;
    }
}

/** Unknown job, someone else's job, or a job no longer pending. */
export class NotFoundError extends JobError {
    constructor(message = 'Job not found') {
        super('not_found', message);
    }
}

export class JobAlreadyRunningError extends JobError {
    constructor(readonly runningJobId: string) {
        super('job_already_running', 'Another job is already running for this requester');
    }
}

export class ExternalServiceError extends JobError {
    constructor(message: string, cause?: unknown) {
        super('external_service', message, { cause });
    }
}

export class InternalError extends JobError {
    constructor(message: string, cause?: unknown) {
        super('internal', message, { cause });
    }
}

export function messageOf(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Map a failure caught at the job boundary onto the taxonomy. Both kinds fail
 * the job the same way; the code only tells the requester whose fault it was.
 */
export function classifyFailure(error: unknown): ExternalServiceError | InternalError {
    if (error instanceof ExternalServiceError || error instanceof InternalError) {
        return error;
    }
    if (error instanceof TranslationBackendError) {
        return new ExternalServiceError(`Translation service failed: ${error.message}`, error);
    }
    return new InternalError(messageOf(error), error);
}
