/**
 * Type definitions for the core package
 */
import type { OutputFormat, ProgressStyle } from './config';

export type { OutputFormat, ProgressStyle };

// Progress UI types (used by lib/ui.ts)
export interface ProgressOptions {
    style: ProgressStyle;
    title?: string;
    total?: number;
    showTimeElapsed?: boolean;
}

export interface ProgressTracker {
    start(options: ProgressOptions): void;
    update(current: number, message?: string): void;
    finish(message?: string): void;
    fail(message?: string): void;
}

/**
 * Anything that can translate one unit of text. The backend client implements
 * it; tests substitute in-process fakes.
 */
export interface TextTranslator {
    translate(text: string): Promise<string>;
}

/**
 * Invoked once per completed chunk with the running count. Calls are serialized.
 */
export type ProgressCallback = (done: number, total: number) => void | Promise<void>;

/**
 * Index `i` holds the text replaced by placeholder `i`: an image reference, or a
 * literal that already looked like a placeholder.
 */
export type PlaceholderTable = readonly string[];

export interface ProtectedText {
    text: string;
    table: PlaceholderTable;
}

export interface BatchOptions {
    translator: TextTranslator;
    concurrency?: number;
    onProgress?: ProgressCallback;
    signal?: AbortSignal;
}

export interface CancelledOutcome {
    status: 'cancelled';
    completed: number;
    total: number;
}

export type BatchOutcome =
    | { status: 'completed'; chunks: string[] }
    | CancelledOutcome;

export type DocumentOutcome =
    | { status: 'completed'; text: string; chunkCount: number; imageCount: number }
    | CancelledOutcome;

export interface DocumentTranslationOptions {
    chunkSize?: number;
    concurrency?: number;
    onProgress?: ProgressCallback;
    signal?: AbortSignal;
}

/**
 * OpenAI-compatible chat completion wire types (the subset we use).
 */
export interface ChatMessage {
    role: 'system' | 'user' | 'assistant';
    content: string;
}

export interface ChatCompletionRequest {
    model: string;
    messages: ChatMessage[];
    temperature?: number;
}

export interface ChatCompletionResponse {
    id?: string;
    model?: string;
    choices: Array<{
        index: number;
        message?: { role: string; content: string | null };
        finish_reason?: string | null;
    }>;
}
