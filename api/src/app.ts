import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import * as path from 'path';
import { z } from 'zod';
import { logger, logStream, OUTPUT_FORMATS } from '@booktrans/core';
import { JobManager } from './jobManager';
import type { AccountLedger } from './ledger';
import { pagesAffordable } from './pricing';
import { InsufficientBalanceError, JobError, NotFoundError, ValidationError } from './errors';
import { ADMIN_TOKEN, MAX_FILE_SIZE_MB, RATE_PER_50_PAGES } from './config';
import type { JobEvent } from './types';

const SubmitBodySchema = z.object({
    filename: z.string().min(1),
    contentBase64: z.string().min(1),
    format: z.enum(OUTPUT_FORMATS).optional(),
});

const FormatBodySchema = z.object({
    format: z.enum(OUTPUT_FORMATS),
});

const CreditBodySchema = z.object({
    requesterId: z.string().min(1),
    amount: z.number().int().positive(),
});

export interface AppDependencies {
    manager: JobManager;
    ledger: AccountLedger;
    adminToken?: string;
    ratePer50Pages?: number;
    maxFileSizeMb?: number;
}

type Handler = (req: Request, res: Response) => Promise<void> | void;

// Express 4 does not forward rejected promises to the error middleware.
function route(handler: Handler) {
    return (req: Request, res: Response, next: NextFunction) => {
        Promise.resolve()
            .then(() => handler(req, res))
            .catch(next);
    };
}

function requesterOf(req: Request): string {
    const requesterId = req.header('x-requester-id')?.trim();
    if (!requesterId) {
        throw new ValidationError('Missing x-requester-id header');
    }
    return requesterId;
}

function parseBody<T>(schema: z.ZodType<T>, body: unknown): T {
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`);
        throw new ValidationError(`Invalid request: ${issues.join('; ')}`);
    }
    return parsed.data;
}

function isTerminalEvent(event: JobEvent): boolean {
    return event.type === 'done' || event.type === 'error' || event.type === 'cancelled' || event.type === 'abandoned';
}

const STATUS_BY_CODE: Record<JobError['code'], number> = {
    validation: 400,
    insufficient_balance: 402,
    not_found: 404,
    job_already_running: 409,
    external_service: 500,
    internal: 500,
};

class ForbiddenError extends Error {}

function httpStatusOf(error: unknown): number | undefined {
    if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
        return error.status;
    }
    return undefined;
}

export function createApp(deps: AppDependencies): express.Express {
    const { manager, ledger } = deps;
    const adminToken = deps.adminToken ?? ADMIN_TOKEN;
    const rate = deps.ratePer50Pages ?? RATE_PER_50_PAGES;
    // base64 inflates the payload by a third
    const bodyLimitMb = Math.ceil(((deps.maxFileSizeMb ?? MAX_FILE_SIZE_MB) * 4) / 3) + 1;

    const app = express();
    app.use(cors());
    app.use(express.json({ limit: `${bodyLimitMb}mb` }));

    app.use((req, _res, next) => {
        logStream.write(`REQ ${req.method} ${req.originalUrl}`);
        next();
    });

    // Health
    app.get('/api/health', (_req: Request, res: Response) => {
        res.json({ ok: true });
    });

    app.get('/api/balance', route(async (req, res) => {
        const requesterId = requesterOf(req);
        const balance = await ledger.getBalance(requesterId);
        res.json({ requesterId, balance, pagesAffordable: pagesAffordable(balance, rate), ratePer50Pages: rate });
    }));

    app.get('/api/format', route((req, res) => {
        const requesterId = requesterOf(req);
        res.json({ requesterId, format: manager.formatFor(requesterId) });
    }));

    app.put('/api/format', route((req, res) => {
        const requesterId = requesterOf(req);
        const { format } = parseBody(FormatBodySchema, req.body);
        manager.setFormat(requesterId, format);
        res.json({ requesterId, format });
    }));

    app.post('/api/jobs', route(async (req, res) => {
        const requesterId = requesterOf(req);
        const { filename, contentBase64, format } = parseBody(SubmitBodySchema, req.body);
        const result = await manager.submit(requesterId, Buffer.from(contentBase64, 'base64'), filename, format);
        res.status(201).json(result);
    }));

    app.post('/api/jobs/cancel', route(async (req, res) => {
        const status = await manager.cancel(requesterOf(req));
        res.json({ status });
    }));

    app.delete('/api/jobs/pending', route(async (req, res) => {
        const abandoned = await manager.cancelPending(requesterOf(req));
        res.json({ abandoned });
    }));

    app.post('/api/jobs/:id/confirm', route(async (req, res) => {
        const job = await manager.confirm(requesterOf(req), req.params.id);
        res.status(202).json(job);
    }));

    app.get('/api/jobs/:id', route((req, res) => {
        const requesterId = requesterOf(req);
        const job = manager.getJob(req.params.id);
        if (!job || job.requesterId !== requesterId) {
            throw new NotFoundError();
        }
        res.json(job);
    }));

    // Server-Sent Events stream of one job
    app.get('/api/jobs/:id/events', route((req, res) => {
        const requesterId = requesterOf(req);
        const job = manager.getJob(req.params.id);
        if (!job || job.requesterId !== requesterId) {
            throw new NotFoundError();
        }

        res.setHeader('Content-Type', 'text/event-stream');
        res.setHeader('Cache-Control', 'no-cache');
        res.setHeader('Connection', 'keep-alive');
        res.flushHeaders();

        const unsubscribe = manager.subscribe(job.id, (event) => {
            res.write(`data: ${JSON.stringify(event)}\n\n`);
            if (isTerminalEvent(event)) {
                res.end();
            }
        });
        res.on('close', unsubscribe);
    }));

    app.get('/api/jobs/:id/download', route((req, res) => {
        const { filename, content } = manager.download(req.params.id, requesterOf(req));
        res.type(path.extname(filename));
        res.attachment(filename);
        res.send(content);
    }));

    app.post('/api/admin/credit', route(async (req, res) => {
        if (!adminToken || req.header('x-admin-token') !== adminToken) {
            throw new ForbiddenError('Invalid admin token');
        }
        const { requesterId, amount } = parseBody(CreditBodySchema, req.body);
        const balance = await ledger.credit(requesterId, amount, 'Admin top-up');
        res.json({ requesterId, balance });
    }));

    app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
        if (error instanceof InsufficientBalanceError) {
            res.status(402).json({
                error: error.code,
                message: error.message,
                cost: error.cost,
                balance: error.balance,
                deficit: error.deficit,
                pages: error.pages,
            });
            return;
        }
        if (error instanceof JobError) {
            res.status(STATUS_BY_CODE[error.code]).json({ error: error.code, message: error.message });
            return;
        }
        if (error instanceof ForbiddenError) {
            res.status(403).json({ error: 'forbidden', message: error.message });
            return;
        }
        // body-parser failures carry their own 4xx status
        const status = httpStatusOf(error);
        if (status !== undefined && status >= 400 && status < 500) {
            res.status(status).json({ error: 'bad_request', message: error instanceof Error ? error.message : 'Bad request' });
            return;
        }
        logger.error(`Unhandled API error: ${error instanceof Error ? error.stack : String(error)}`);
        res.status(500).json({ error: 'internal', message: 'Internal error' });
    });

    return app;
}
