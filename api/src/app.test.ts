import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { once } from 'events';
import { promises as fs } from 'fs';
import type { Server } from 'http';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { PipelineService } from '@booktrans/core';
import type { TextTranslator } from '@booktrans/core';
import { createApp } from './app';
import { JobManager } from './jobManager';
import { InMemoryLedger } from './ledger';

const upper: TextTranslator = { translate: async (text) => text.toUpperCase() };

const SubmittedSchema = z.object({
  jobId: z.string(),
  estimatedCost: z.number(),
  estimatedUnits: z.number(),
  balance: z.number(),
});

async function submitted(res: Response) {
  return SubmittedSchema.parse(await res.json());
}

function base64(text: string): string {
  return Buffer.from(text, 'utf-8').toString('base64');
}

describe('HTTP API', () => {
  let tmpDir: string;
  let ledger: InMemoryLedger;
  let manager: JobManager;
  let server: Server;
  let baseUrl: string;

  async function startServer(translator: TextTranslator = upper) {
    manager = new JobManager({
      ledger,
      pipeline: new PipelineService({ translator }),
      tmpDir,
      ratePer50Pages: 20,
      outputFormat: 'txt',
    });
    const app = createApp({ manager, ledger, adminToken: 'test-secret', ratePer50Pages: 20 });
    server = app.listen(0);
    await once(server, 'listening');
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server has no TCP address');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  }

  function call(method: string, route: string, body?: unknown, headers: Record<string, string> = {}) {
    return fetch(`${baseUrl}${route}`, {
      method,
      headers: { 'content-type': 'application/json', 'x-requester-id': 'alice', ...headers },
      ...(body === undefined ? {} : { body: JSON.stringify(body) }),
    });
  }

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'api-'));
    ledger = new InMemoryLedger({ alice: 30 });
  });

  afterEach(async () => {
    manager.dispose();
    server.closeAllConnections();
    server.close();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('answers the health check', async () => {
    await startServer();

    const res = await fetch(`${baseUrl}/api/health`);

    expect(res.status).toBe(200);
    await expect(res.json()).resolves.toEqual({ ok: true });
  });

  it('reports balance and affordable pages', async () => {
    await startServer();

    const res = await call('GET', '/api/balance');

    await expect(res.json()).resolves.toEqual({ requesterId: 'alice', balance: 30, pagesAffordable: 75, ratePer50Pages: 20 });
  });

  it('requires a requester id', async () => {
    await startServer();

    const res = await fetch(`${baseUrl}/api/balance`);

    expect(res.status).toBe(400);
    await expect(res.json()).resolves.toEqual({ error: 'validation', message: 'Missing x-requester-id header' });
  });

  it('runs a job from upload to download', async () => {
    await startServer();

    const res = await call('POST', '/api/jobs', { filename: 'notes.md', contentBase64: base64('Hello ![x](x.png)') });
    expect(res.status).toBe(201);
    const { jobId, estimatedCost, estimatedUnits, balance } = await submitted(res);
    expect({ estimatedCost, estimatedUnits, balance }).toEqual({ estimatedCost: 1, estimatedUnits: 1, balance: 30 });

    const confirmed = await call('POST', `/api/jobs/${jobId}/confirm`);
    expect(confirmed.status).toBe(202);
    await manager.whenSettled(jobId);

    const snapshot = await call('GET', `/api/jobs/${jobId}`);
    await expect(snapshot.json()).resolves.toMatchObject({ id: jobId, status: 'completed', result: { charged: 1, balanceAfter: 29 } });

    const download = await call('GET', `/api/jobs/${jobId}/download`);
    expect(download.status).toBe(200);
    expect(download.headers.get('content-disposition')).toContain('notes.txt');
    await expect(download.text()).resolves.toBe('HELLO ![x](x.png)\n');

    const events = await call('GET', `/api/jobs/${jobId}/events`);
    expect(events.headers.get('content-type')).toContain('text/event-stream');
    const frames = (await events.text()).split('\n\n').filter(Boolean);
    expect(frames[0]).toBe('data: {"type":"status","status":"completed"}');
    expect(frames).toHaveLength(2);
    expect(JSON.parse(frames[1].slice('data: '.length))).toMatchObject({ type: 'done', result: { charged: 1 } });
  });

  it('stores the output format preference per requester', async () => {
    await startServer();

    await expect((await call('GET', '/api/format')).json()).resolves.toEqual({ requesterId: 'alice', format: 'txt' });

    const saved = await call('PUT', '/api/format', { format: 'md' });
    await expect(saved.json()).resolves.toEqual({ requesterId: 'alice', format: 'md' });
    await expect((await call('GET', '/api/format')).json()).resolves.toEqual({ requesterId: 'alice', format: 'md' });
    await expect((await call('GET', '/api/format', undefined, { 'x-requester-id': 'bob' })).json())
      .resolves.toEqual({ requesterId: 'bob', format: 'txt' });

    const { jobId } = await submitted(await call('POST', '/api/jobs', { filename: 'notes.md', contentBase64: base64('Hi') }));
    await expect((await call('GET', `/api/jobs/${jobId}`)).json()).resolves.toMatchObject({ format: 'md' });
  });

  it('rejects an unknown output format with 400', async () => {
    await startServer();

    expect((await call('PUT', '/api/format', { format: 'pdf' })).status).toBe(400);
    const res = await call('POST', '/api/jobs', { filename: 'a.md', contentBase64: base64('text'), format: 'epub' });
    expect(res.status).toBe(400);
  });

  it('answers 402 with the deficit when the balance is short', async () => {
    ledger = new InMemoryLedger({ alice: 40 });
    await startServer();

    const res = await call('POST', '/api/jobs', { filename: 'big.txt', contentBase64: base64('y'.repeat(240_000)) });

    expect(res.status).toBe(402);
    await expect(res.json()).resolves.toMatchObject({ error: 'insufficient_balance', cost: 48, balance: 40, deficit: 8, pages: 120 });
  });

  it('rejects an invalid body and an unsupported file type with 400', async () => {
    await startServer();

    const missing = await call('POST', '/api/jobs', { filename: 'a.md' });
    expect(missing.status).toBe(400);
    await expect(missing.json()).resolves.toMatchObject({ error: 'validation' });

    const pdf = await call('POST', '/api/jobs', { filename: 'a.pdf', contentBase64: base64('text') });
    expect(pdf.status).toBe(400);
  });

  it('answers 404 for an unknown job and for another requester', async () => {
    await startServer();
    const { jobId } = await submitted(await call('POST', '/api/jobs', { filename: 'a.md', contentBase64: base64('text') }));

    expect((await call('POST', '/api/jobs/nope/confirm')).status).toBe(404);
    expect((await call('GET', `/api/jobs/${jobId}`, undefined, { 'x-requester-id': 'bob' })).status).toBe(404);
    expect((await call('POST', `/api/jobs/${jobId}/confirm`, undefined, { 'x-requester-id': 'bob' })).status).toBe(404);
  });

  it('answers 409 while another job is running, and cancels it', async () => {
    let release: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    await startServer({
      translate: async (text) => {
        await held;
        return text;
      },
    });

    const first = await submitted(await call('POST', '/api/jobs', { filename: 'a.md', contentBase64: base64('one') }));
    await call('POST', `/api/jobs/${first.jobId}/confirm`);
    const second = await submitted(await call('POST', '/api/jobs', { filename: 'b.md', contentBase64: base64('two') }));

    const conflict = await call('POST', `/api/jobs/${second.jobId}/confirm`);
    expect(conflict.status).toBe(409);

    const cancel = await call('POST', '/api/jobs/cancel');
    await expect(cancel.json()).resolves.toEqual({ status: 'acknowledged' });
    release();
    await expect(manager.whenSettled(first.jobId)).resolves.toMatchObject({ status: 'cancelled' });

    const pending = await call('DELETE', '/api/jobs/pending');
    await expect(pending.json()).resolves.toEqual({ abandoned: 1 });
    await expect(ledger.getBalance('alice')).resolves.toBe(30);
  });

  it('reports nothing active when there is nothing to cancel', async () => {
    await startServer();

    const res = await call('POST', '/api/jobs/cancel');

    await expect(res.json()).resolves.toEqual({ status: 'nothing_active' });
  });

  it('credits an account only with the admin token', async () => {
    await startServer();

    const denied = await call('POST', '/api/admin/credit', { requesterId: 'bob', amount: 10 }, { 'x-admin-token': 'wrong' });
    expect(denied.status).toBe(403);

    const granted = await call('POST', '/api/admin/credit', { requesterId: 'bob', amount: 10 }, { 'x-admin-token': 'test-secret' });
    expect(granted.status).toBe(200);
    await expect(granted.json()).resolves.toEqual({ requesterId: 'bob', balance: 10 });
  });
});
