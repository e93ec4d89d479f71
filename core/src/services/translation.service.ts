/**
 * Translation backend client.
 * One chat-completions request per unit of text, with a hard timeout and
 * retries for transient failures.
 */

import axios from 'axios';
import logger from '../lib/logger';
import type { ChatCompletionRequest, ChatCompletionResponse, TextTranslator } from '../types';
import {
    TRANSLATE_API_URL,
    TRANSLATE_API_KEY,
    TEXT_MODEL,
    TRANSLATION_TEMPERATURE,
    REQUEST_TIMEOUT,
    MAX_RETRIES,
    RETRY_BASE_DELAY_MS,
    RETRY_MAX_DELAY_MS,
    SYSTEM_PROMPT
} from '../config';

const sleep = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

export interface TranslationServiceOptions {
    apiUrl: string;
    apiKey: string;
    model: string;
    systemPrompt: string;
    timeoutSeconds: number;
    maxRetries: number;
    retryBaseDelayMs: number;
}

export class TranslationBackendError extends Error {
    constructor(message: string, readonly attempts: number, readonly status?: number) {
        super(message);
        this.name = 'TranslationBackendError';
    }
}

/**
 * No response at all (network, timeout), rate limiting and server errors are
 * worth another attempt; anything else is the request's fault.
 */
export function isTransientError(error: unknown): boolean {
    if (!axios.isAxiosError(error)) return false;
    const status = error.response?.status;
    if (status === undefined) return true;
    return status === 429 || status >= 500;
}

export class TranslationService implements TextTranslator {
    private readonly options: TranslationServiceOptions;

    constructor(options: Partial<TranslationServiceOptions> = {}) {
        this.options = {
            apiUrl: TRANSLATE_API_URL,
            apiKey: TRANSLATE_API_KEY,
            model: TEXT_MODEL,
            systemPrompt: SYSTEM_PROMPT,
            timeoutSeconds: REQUEST_TIMEOUT,
            maxRetries: MAX_RETRIES,
            retryBaseDelayMs: RETRY_BASE_DELAY_MS,
            ...options,
        };
        logger.debug(`Initialized TranslationService with API URL: ${this.options.apiUrl}`);
    }

    public async translate(text: string): Promise<string> {
        const payload: ChatCompletionRequest = {
            model: this.options.model,
            messages: [
                { role: 'system', content: this.options.systemPrompt },
                { role: 'user', content: text },
            ],
            temperature: TRANSLATION_TEMPERATURE,
        };
        return this.makeRequest(payload);
    }

    private async makeRequest(payload: ChatCompletionRequest): Promise<string> {
        const { apiUrl, apiKey, timeoutSeconds, maxRetries, retryBaseDelayMs } = this.options;
        let attempts = 0;

        while (true) {
            if (attempts > 0) {
                const backoffMs = Math.min(retryBaseDelayMs * Math.pow(2, attempts), RETRY_MAX_DELAY_MS);
                logger.info(`Retry attempt ${attempts + 1}/${maxRetries}, waiting ${backoffMs}ms...`);
                await sleep(backoffMs);
            }

            try {
                logger.debug(`Making request to ${apiUrl} with model ${payload.model}`);
                const response = await axios.post<ChatCompletionResponse>(apiUrl, payload, {
                    headers: {
                        'Content-Type': 'application/json',
                        ...(apiKey ? { Authorization: `Bearer ${apiKey}` } : {}),
                    },
                    timeout: timeoutSeconds * 1000,
                });
                return response.data.choices[0]?.message?.content ?? '';
            } catch (error) {
                attempts++;
                const status = axios.isAxiosError(error) ? error.response?.status : undefined;
                const message = error instanceof Error ? error.message : String(error);
                logger.error(`Error making request (attempt ${attempts}/${maxRetries}): ${message}`);
                if (!isTransientError(error) || attempts >= maxRetries) {
                    throw new TranslationBackendError(`Translation request failed after ${attempts} attempt(s): ${message}`, attempts, status);
                }
            }
        }
    }
}

export default new TranslationService();
