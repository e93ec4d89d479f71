import type { OutputFormat } from '@booktrans/core';

export type JobStatus =
    | 'pending_confirmation'
    | 'running'
    | 'cancelling'
    | 'completed'
    | 'failed'
    | 'cancelled';

export interface JobResult {
    filename: string;
    bytes: number;
    charged: number;
    balanceAfter: number;
}

export interface Job {
    id: string;
    requesterId: string;
    filename: string;
    sourcePath: string;
    workDir: string;
    pages: number;
    cost: number;
    format: OutputFormat;
    status: JobStatus;
    progress: { done: number; total: number };
    result?: JobResult;
    error?: string;
    createdAt: number;
    updatedAt: number;
}

/** What a requester may see of a job; scratch paths stay server-side. */
export type JobSnapshot = Omit<Job, 'sourcePath' | 'workDir'>;

export interface SubmitResult {
    jobId: string;
    estimatedCost: number;
    estimatedUnits: number;
    balance: number;
}

export type CancelResult = 'acknowledged' | 'nothing_active';

export interface JobOutput {
    filename: string;
    content: Buffer;
}

export type JobEvent =
    | { type: 'status'; status: JobStatus }
    | { type: 'progress'; done: number; total: number; message?: string }
    | { type: 'done'; result: JobResult }
    | { type: 'error'; error: string; code: string }
    | { type: 'cancelled'; completed: number; total: number }
    | { type: 'abandoned' };

export type JobListener = (event: JobEvent) => void;
