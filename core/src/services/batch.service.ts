import logger from '../lib/logger';
import { Semaphore } from '../lib/semaphore';
import { MAX_CONCURRENT } from '../config';
import type { BatchOptions, BatchOutcome, TextTranslator } from '../types';

interface BatchState {
    done: number;
    cancelled: boolean;
    failed: boolean;
    error?: unknown;
}

/**
 * Translate every chunk with at most `concurrency` calls in flight.
 *
 * Results land in their original slot whatever order the calls finish in.
 * The cancellation signal is checked when a chunk completes: from then on no
 * new chunk is admitted, calls already in flight run to completion and their
 * results are dropped. The first failure stops admission the same way and is
 * rethrown once the in-flight calls have settled.
 */
export async function translateAll(chunks: readonly string[], options: BatchOptions): Promise<BatchOutcome> {
    const { translator, concurrency = MAX_CONCURRENT, onProgress, signal } = options;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
        throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
    }

    const total = chunks.length;
    const results = new Array<string>(total).fill('');
    const gate = new Semaphore(concurrency);
    const counter = new Semaphore(1);
    const state: BatchState = { done: 0, cancelled: false, failed: false };
    const halted = () => state.cancelled || state.failed;

    const processChunk = async (chunk: string, index: number): Promise<void> => {
        const release = await gate.acquire();
        try {
            if (halted()) return;
            logger.debug(`Translating chunk ${index + 1}/${total} (${chunk.length} chars)`);
            const translated = await translator.translate(chunk);

            await counter.runExclusive(async () => {
                if (halted()) return;
                if (signal?.aborted) {
                    state.cancelled = true;
                    logger.info(`Cancellation observed after ${state.done}/${total} chunks`);
                    return;
                }
                results[index] = translated;
                state.done += 1;
                await onProgress?.(state.done, total);
            });
        } catch (error) {
            if (!state.failed) {
                state.failed = true;
                state.error = error;
                logger.error(`Chunk ${index + 1}/${total} failed: ${error instanceof Error ? error.message : String(error)}`);
            }
        } finally {
            release();
        }
    };

    await Promise.all(chunks.map(processChunk));

    if (state.failed) {
        throw state.error;
    }
    if (state.cancelled) {
        return { status: 'cancelled', completed: state.done, total };
    }
    return { status: 'completed', chunks: results };
}

/**
 * One unsplit call for short strings such as a title. Falls back to the input
 * when the call fails.
 */
export async function translateOne(text: string, translator: TextTranslator): Promise<string> {
    if (!text.trim()) return text;
    try {
        const translated = (await translator.translate(text)).trim().replace(/^["']+|["']+$/g, '').trim();
        return translated || text;
    } catch (error) {
        logger.warn(`Single translation failed, keeping original: ${error instanceof Error ? error.message : String(error)}`);
        return text;
    }
}
