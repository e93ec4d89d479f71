import { logger } from '@booktrans/core';
import type { ProgressOptions, ProgressTracker } from '@booktrans/core';
import type { JobManager } from './jobManager';

/**
 * Forwards a running job's chunk progress to the manager, which records it
 * and fans it out to the job's subscribers.
 */
export class SseProgressTracker implements ProgressTracker {
    private total = 0;
    private current = 0;
    private title = '';

    constructor(private readonly manager: JobManager, private readonly jobId: string) {}

    start(options: ProgressOptions): void {
        this.total = options.total ?? 0;
        this.current = 0;
        this.title = options.title ?? '';
        logger.debug(`Job ${this.jobId}: ${this.total} chunks to translate`);
    }

    update(current: number, message?: string): void {
        this.current = current;
        this.manager.reportProgress(this.jobId, this.current, this.total, message);
    }

    finish(message?: string): void {
        logger.info(`Job ${this.jobId} (${this.title}) translated: ${message || 'done'}`);
    }

    fail(message?: string): void {
        logger.warn(`Job ${this.jobId} (${this.title}) stopped at ${this.current}/${this.total}: ${message || 'failed'}`);
    }
}

export function createSseTracker(manager: JobManager, jobId: string): ProgressTracker {
    return new SseProgressTracker(manager, jobId);
}
