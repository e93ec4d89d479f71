import { promises as fs } from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import {
    logger,
    pipelineService,
    DEFAULT_CHUNK_SIZE,
    MAX_CONCURRENT,
} from '@booktrans/core';
import type { OutputFormat, PipelineService } from '@booktrans/core';
import { KeyedMutex } from './lib/keyedMutex';
import { calcCost } from './pricing';
import type { AccountLedger } from './ledger';
import { createSseTracker } from './sseTracker';
import {
    ExternalServiceError,
    InsufficientBalanceError,
    InternalError,
    JobAlreadyRunningError,
    JobError,
    NotFoundError,
    ValidationError,
    classifyFailure,
    messageOf,
} from './errors';
import {
    ALLOWED_EXTENSIONS,
    MAX_FILE_SIZE_MB,
    OUTPUT_FORMAT,
    RATE_PER_50_PAGES,
    RESULT_TTL_MINUTES,
    TMP_DIR,
} from './config';
import type {
    CancelResult,
    Job,
    JobEvent,
    JobListener,
    JobOutput,
    JobResult,
    JobSnapshot,
    SubmitResult,
} from './types';

export interface JobManagerOptions {
    ledger: AccountLedger;
    pipeline?: PipelineService;
    tmpDir?: string;
    maxFileSizeMb?: number;
    allowedExtensions?: readonly string[];
    outputFormat?: OutputFormat;
    ratePer50Pages?: number;
    resultTtlMinutes?: number;
    chunkSize?: number;
    concurrency?: number;
}

interface ActiveRun {
    jobId: string;
    controller: AbortController;
    // set once translation is over; a cancel can no longer stop the job
    settling: boolean;
}

type Terminal =
    | { status: 'completed'; result: JobResult }
    | { status: 'failed'; error: JobError }
    | { status: 'cancelled'; completed: number; total: number };

function toSnapshot(job: Job): JobSnapshot {
    const { sourcePath: _sourcePath, workDir: _workDir, ...rest } = job;
    return { ...rest, progress: { ...job.progress } };
}

/**
 * Per-requester job state machine:
 * pending_confirmation → running → (cancelling) → completed | failed | cancelled.
 *
 * Every read and write of a requester's jobs and cancellation entry runs under
 * that requester's lock. A requester has at most one running job. The balance
 * is debited once, after the output has been assembled; failed and cancelled
 * jobs never touch it.
 */
export class JobManager {
    private jobs: Map<string, Job> = new Map();
    private cancellations: Map<string, ActiveRun> = new Map();
    private runs: Map<string, Promise<void>> = new Map();
    private listeners: Map<string, Set<JobListener>> = new Map();
    private terminalEvents: Map<string, JobEvent> = new Map();
    private outputs: Map<string, JobOutput> = new Map();
    private expiryTimers: Map<string, NodeJS.Timeout> = new Map();
    private formats: Map<string, OutputFormat> = new Map();
    private readonly locks = new KeyedMutex();

    private readonly ledger: AccountLedger;
    private readonly pipeline: PipelineService;
    private readonly tmpDir: string;
    private readonly maxFileBytes: number;
    private readonly allowedExtensions: readonly string[];
    private readonly outputFormat: OutputFormat;
    private readonly rate: number;
    private readonly resultTtlMs: number;
    private readonly chunkSize: number;
    private readonly concurrency: number;

    constructor(options: JobManagerOptions) {
        this.ledger = options.ledger;
        this.pipeline = options.pipeline ?? pipelineService;
        this.tmpDir = options.tmpDir ?? TMP_DIR;
        this.maxFileBytes = (options.maxFileSizeMb ?? MAX_FILE_SIZE_MB) * 1024 * 1024;
        this.allowedExtensions = options.allowedExtensions ?? ALLOWED_EXTENSIONS;
        this.outputFormat = options.outputFormat ?? OUTPUT_FORMAT;
        this.rate = options.ratePer50Pages ?? RATE_PER_50_PAGES;
        this.resultTtlMs = (options.resultTtlMinutes ?? RESULT_TTL_MINUTES) * 60 * 1000;
        this.chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
        this.concurrency = options.concurrency ?? MAX_CONCURRENT;
    }

    /**
     * Intake: validate, stage the file, price it and record a pending job.
     * Earlier pending jobs of the same requester are abandoned. Without an
     * explicit `format` the requester's saved preference applies.
     */
    async submit(requesterId: string, content: Buffer, filename: string, format?: OutputFormat): Promise<SubmitResult> {
        this.validateUpload(content, filename);

        return this.locks.runExclusive(requesterId, async () => {
            const abandoned = await this.abandonPending(requesterId);
            if (abandoned > 0) {
                logger.info(`Requester ${requesterId}: ${abandoned} pending job(s) superseded by a new upload`);
            }

            const id = uuidv4();
            const workDir = path.join(this.tmpDir, id);
            const sourcePath = path.join(workDir, path.basename(filename));
            try {
                await fs.mkdir(workDir, { recursive: true });
                await fs.writeFile(sourcePath, content);
            } catch (error) {
                await this.cleanup(workDir);
                throw new InternalError(`Could not stage upload: ${messageOf(error)}`, error);
            }

            const pages = await this.countPages(sourcePath, workDir);
            const cost = calcCost(pages, this.rate);
            const balance = await this.ledger.getBalance(requesterId);
            if (balance < cost) {
                await this.cleanup(workDir);
                logger.info(`Requester ${requesterId}: ${filename} costs ${cost}, balance ${balance}, rejected`);
                throw new InsufficientBalanceError(cost, balance, pages);
            }

            const now = Date.now();
            this.jobs.set(id, {
                id,
                requesterId,
                filename: path.basename(filename),
                sourcePath,
                workDir,
                pages,
                cost,
                format: format ?? this.formatFor(requesterId),
                status: 'pending_confirmation',
                progress: { done: 0, total: 0 },
                createdAt: now,
                updatedAt: now,
            });
            logger.info(`Job ${id} pending for ${requesterId}: ${filename}, ${pages} pages, cost ${cost}`);
            return { jobId: id, estimatedCost: cost, estimatedUnits: pages, balance };
        });
    }

    /**
     * Promote the requester's pending job to running and start it in the
     * background. Returns as soon as the job is running.
     */
    async confirm(requesterId: string, jobId: string): Promise<JobSnapshot> {
        return this.locks.runExclusive(requesterId, () => {
            const job = this.jobs.get(jobId);
            if (!job || job.requesterId !== requesterId || job.status !== 'pending_confirmation') {
                logger.warn(`Requester ${requesterId}: confirm for unknown or consumed job ${jobId}`);
                throw new NotFoundError('No pending job with this id');
            }
            const active = this.cancellations.get(requesterId);
            if (active) {
                throw new JobAlreadyRunningError(active.jobId);
            }

            const controller = new AbortController();
            this.cancellations.set(requesterId, { jobId, controller, settling: false });
            const running = this.updateJob(jobId, { status: 'running' }) ?? job;
            this.emit(jobId, { type: 'status', status: 'running' });
            logger.info(`Job ${jobId} confirmed by ${requesterId}`);

            this.runs.set(jobId, this.runJob(running, controller.signal));
            return toSnapshot(running);
        });
    }

    /** Ask the requester's running job to stop at its next chunk completion. */
    async cancel(requesterId: string): Promise<CancelResult> {
        return this.locks.runExclusive<CancelResult>(requesterId, () => {
            const active = this.cancellations.get(requesterId);
            if (!active) {
                return 'nothing_active';
            }
            if (active.settling) {
                logger.info(`Cancellation for job ${active.jobId} arrived after translation finished`);
            } else if (!active.controller.signal.aborted) {
                active.controller.abort();
                const job = this.jobs.get(active.jobId);
                if (job?.status === 'running') {
                    this.updateJob(job.id, { status: 'cancelling' });
                    this.emit(job.id, { type: 'status', status: 'cancelling' });
                }
                logger.info(`Cancellation requested for job ${active.jobId}`);
            }
            return 'acknowledged';
        });
    }

    /** Drop every pending job of the requester. Returns how many were dropped. */
    async cancelPending(requesterId: string): Promise<number> {
        return this.locks.runExclusive(requesterId, () => this.abandonPending(requesterId));
    }

    /** Output format used for the requester's future jobs. */
    setFormat(requesterId: string, format: OutputFormat): void {
        this.formats.set(requesterId, format);
        logger.info(`Requester ${requesterId}: output format set to ${format}`);
    }

    formatFor(requesterId: string): OutputFormat {
        return this.formats.get(requesterId) ?? this.outputFormat;
    }

    getJob(jobId: string): JobSnapshot | undefined {
        const job = this.jobs.get(jobId);
        return job ? toSnapshot(job) : undefined;
    }

    /** Resolves once the job's background run, cleanup included, is over. */
    async whenSettled(jobId: string): Promise<JobSnapshot | undefined> {
        await this.runs.get(jobId);
        return this.getJob(jobId);
    }

    download(jobId: string, requesterId: string): JobOutput {
        const job = this.jobs.get(jobId);
        const output = this.outputs.get(jobId);
        if (!job || job.requesterId !== requesterId || !output) {
            throw new NotFoundError('No finished output for this job');
        }
        return output;
    }

    /**
     * Listen to a job's events. The listener first gets the current status; a
     * job that has already finished replays its terminal event.
     */
    subscribe(jobId: string, listener: JobListener): () => void {
        const job = this.jobs.get(jobId);
        if (!job) {
            throw new NotFoundError();
        }
        this.deliver(jobId, listener, { type: 'status', status: job.status });

        const terminal = this.terminalEvents.get(jobId);
        if (terminal) {
            this.deliver(jobId, listener, terminal);
            return () => undefined;
        }

        const set = this.listeners.get(jobId) ?? new Set<JobListener>();
        set.add(listener);
        this.listeners.set(jobId, set);
        return () => {
            set.delete(listener);
        };
    }

    /** Called by the job's progress reporter after each completed chunk. */
    reportProgress(jobId: string, done: number, total: number, message?: string): void {
        this.updateJob(jobId, { progress: { done, total } });
        this.emit(jobId, { type: 'progress', done, total, ...(message ? { message } : {}) });
    }

    /** Stop expiry timers. Jobs still running are left to finish. */
    dispose(): void {
        for (const timer of this.expiryTimers.values()) {
            clearTimeout(timer);
        }
        this.expiryTimers.clear();
    }

    private validateUpload(content: Buffer, filename: string): void {
        const ext = path.extname(filename).toLowerCase();
        if (!this.allowedExtensions.includes(ext)) {
            throw new ValidationError(
                `Unsupported file type "${ext || filename}". Allowed: ${this.allowedExtensions.join(', ')}`
            );
        }
        if (content.length === 0) {
            throw new ValidationError('The file is empty');
        }
        if (content.length > this.maxFileBytes) {
            throw new ValidationError(`The file exceeds ${this.maxFileBytes / (1024 * 1024)} MB`);
        }
    }

    private async countPages(sourcePath: string, workDir: string): Promise<number> {
        try {
            return await this.pipeline.extractor.countPages(sourcePath);
        } catch (error) {
            await this.cleanup(workDir);
            throw new ExternalServiceError(`Could not read the document: ${messageOf(error)}`, error);
        }
    }

    // Caller holds the requester's lock.
    private async abandonPending(requesterId: string): Promise<number> {
        const pending = [...this.jobs.values()].filter(
            (job) => job.requesterId === requesterId && job.status === 'pending_confirmation'
        );
        for (const job of pending) {
            this.emit(job.id, { type: 'abandoned' });
            this.listeners.delete(job.id);
            this.jobs.delete(job.id);
            await this.cleanup(job.workDir);
            logger.info(`Job ${job.id} abandoned while pending`);
        }
        return pending.length;
    }

    private async runJob(job: Job, signal: AbortSignal): Promise<void> {
        const terminal = await this.execute(job, signal).catch((error: unknown): Terminal => {
            const failure = classifyFailure(error);
            logger.error(`Job ${job.id} failed: ${failure.message}`);
            return { status: 'failed', error: failure };
        });
        const active = this.cancellations.get(job.requesterId);
        if (active?.jobId === job.id) {
            active.settling = true;
        }

        await this.cleanup(job.workDir);
        // Terminal status and the freed slot change together.
        await this.locks.runExclusive(job.requesterId, () => {
            if (this.cancellations.get(job.requesterId)?.jobId === job.id) {
                this.cancellations.delete(job.requesterId);
            }
            this.settle(job.id, terminal);
        });
    }

    private async execute(job: Job, signal: AbortSignal): Promise<Terminal> {
        const tracker = createSseTracker(this, job.id);

        const doc = await this.pipeline.extractor.extract(job.sourcePath).catch((error: unknown) => {
            throw new ExternalServiceError(`Could not extract text: ${messageOf(error)}`, error);
        });
        if (!doc.text.trim()) {
            throw new ExternalServiceError('No text could be extracted from the document');
        }

        const title = await this.pipeline.translateTitle(doc.title);

        let started = false;
        const outcome = await this.pipeline.translateDocument(doc.text, {
            chunkSize: this.chunkSize,
            concurrency: this.concurrency,
            signal,
            onProgress: (done, total) => {
                if (!started) {
                    tracker.start({ style: 'none', title: job.filename, total });
                    started = true;
                }
                tracker.update(done);
            },
        });
        if (outcome.status === 'cancelled') {
            tracker.fail(`cancelled after ${outcome.completed}/${outcome.total} chunks`);
            return outcome;
        }

        const outputPath = await this.pipeline.assembler.assemble({
            text: outcome.text,
            title,
            format: job.format,
            outputDir: path.join(job.workDir, 'out'),
            sourceFilename: job.filename,
        }).catch((error: unknown) => {
            throw new ExternalServiceError(`Could not assemble output: ${messageOf(error)}`, error);
        });
        const content = await fs.readFile(outputPath);

        const balanceAfter = await this.ledger.debit(
            job.requesterId,
            job.cost,
            `Translation of ${job.filename} (${job.pages} pages)`
        );
        const result: JobResult = {
            filename: path.basename(outputPath),
            bytes: content.length,
            charged: job.cost,
            balanceAfter,
        };
        this.outputs.set(job.id, { filename: result.filename, content });
        tracker.finish(`${outcome.chunkCount} chunks, ${outcome.imageCount} images`);
        return { status: 'completed', result };
    }

    private settle(jobId: string, terminal: Terminal): void {
        let event: JobEvent;
        switch (terminal.status) {
            case 'completed':
                this.updateJob(jobId, { status: 'completed', result: terminal.result });
                event = { type: 'done', result: terminal.result };
                break;
            case 'failed':
                this.updateJob(jobId, { status: 'failed', error: terminal.error.message });
                event = { type: 'error', error: terminal.error.message, code: terminal.error.code };
                break;
            case 'cancelled':
                this.updateJob(jobId, { status: 'cancelled' });
                event = { type: 'cancelled', completed: terminal.completed, total: terminal.total };
                break;
        }
        logger.info(`Job ${jobId} ${terminal.status}`);

        this.emit(jobId, { type: 'status', status: terminal.status });
        this.emit(jobId, event);
        this.terminalEvents.set(jobId, event);
        this.listeners.delete(jobId);
        this.scheduleExpiry(jobId);
    }

    private updateJob(id: string, updates: Partial<Job>): Job | undefined {
        const job = this.jobs.get(id);
        if (!job) return undefined;
        const merged: Job = { ...job, ...updates, updatedAt: Date.now() };
        this.jobs.set(id, merged);
        return merged;
    }

    private emit(jobId: string, event: JobEvent): void {
        const set = this.listeners.get(jobId);
        if (!set) return;
        for (const listener of set) {
            this.deliver(jobId, listener, event);
        }
    }

    private deliver(jobId: string, listener: JobListener, event: JobEvent): void {
        try {
            listener(event);
        } catch (error) {
            logger.warn(`Job ${jobId}: listener failed on ${event.type} event: ${messageOf(error)}`);
        }
    }

    private async cleanup(workDir: string): Promise<void> {
        try {
            await fs.rm(workDir, { recursive: true, force: true });
        } catch (error) {
            logger.error(`Failed to remove ${workDir}: ${messageOf(error)}`);
        }
    }

    private scheduleExpiry(jobId: string): void {
        const timer = setTimeout(() => {
            this.jobs.delete(jobId);
            this.runs.delete(jobId);
            this.outputs.delete(jobId);
            this.terminalEvents.delete(jobId);
            this.expiryTimers.delete(jobId);
            logger.debug(`Job ${jobId} expired`);
        }, this.resultTtlMs);
        timer.unref();
        this.expiryTimers.set(jobId, timer);
    }
}
