/**
 * Constants and configuration values for the core package.
 */
import * as dotenv from 'dotenv';
import * as path from 'path';

// Load environment variables
dotenv.config();

// Translation backend (OpenAI-compatible chat completions endpoint)
export const TRANSLATE_API_URL = process.env.TRANSLATE_API_URL || 'https://api.openai.com/v1/chat/completions';
export const TRANSLATE_API_KEY = process.env.OPENAI_API_KEY || '';
export const TEXT_MODEL = process.env.TEXT_MODEL || 'gpt-4o-mini';
export const TRANSLATION_TEMPERATURE = 0.3;
export const REQUEST_TIMEOUT = Number(process.env.REQUEST_TIMEOUT || 120); // seconds, per translation call
export const MAX_RETRIES = Number(process.env.MAX_RETRIES || 3); // attempts per call, first one included
export const RETRY_BASE_DELAY_MS = Number(process.env.RETRY_BASE_DELAY_MS || 1000);
export const RETRY_MAX_DELAY_MS = 10000;

// Languages
export const SOURCE_LANGUAGE = process.env.SOURCE_LANGUAGE || 'English';
export const TARGET_LANGUAGE = process.env.TARGET_LANGUAGE || 'Russian';
export const TARGET_LANGUAGE_CODE = process.env.TARGET_LANGUAGE_CODE || 'ru';

// Chunking: configured size is a floor-clamped soft limit in characters
export const MIN_CHUNK_SIZE = 8000;
export const DEFAULT_CHUNK_SIZE = Math.max(Number(process.env.CHUNK_SIZE || 3000), MIN_CHUNK_SIZE);
export const MAX_CONCURRENT = Math.max(1, Number(process.env.MAX_CONCURRENT || 10)); // parallel translation calls

// Document estimates
export const CHARS_PER_PAGE = 2000;

export const SYSTEM_PROMPT = `You are a professional book translator. Translate the text from ${SOURCE_LANGUAGE} to ${TARGET_LANGUAGE}.
Rules:
1. Keep ALL Markdown markup: headings (#), lists (-), tables (|), emphasis (**bold**, *italic*), links, code blocks.
2. Do not add anything of your own.
3. Translate only the text; leave markup and code untouched.
4. Transliterate or keep proper names and technical terms as the context requires.
5. Keep paragraphs and line breaks as in the original.
6. Placeholders like <<IMG_N>> are images. Leave them UNCHANGED at the same positions in the text.`;

// Progress display configuration
export const PROGRESS_STYLES = ['simple', 'bar', 'spinner', 'none'] as const;
export type ProgressStyle = typeof PROGRESS_STYLES[number];
export const DEFAULT_PROGRESS_STYLE: ProgressStyle = 'bar';
export const SPINNER_CHARS = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
export const PROGRESS_BAR_LENGTH = 40;
export const PROGRESS_REFRESH_RATE = 0.1; // seconds

// Output
export const OUTPUT_FORMATS = ['md', 'txt'] as const;
export type OutputFormat = typeof OUTPUT_FORMATS[number];
export const DEFAULT_OUTPUT_FORMAT: OutputFormat = 'md';

// File paths
export const DEFAULT_OUTPUT_DIR = 'results';
export const LOG_DIR = process.env.LOG_DIR || 'logs';
export const LOG_FILE = path.join(LOG_DIR, 'booktrans.log');
export const ERROR_LOG_FILE = path.join(LOG_DIR, 'error.log');
