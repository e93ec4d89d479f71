import * as dotenv from 'dotenv';
import * as os from 'os';
import * as path from 'path';
import { DEFAULT_OUTPUT_FORMAT, OUTPUT_FORMATS } from '@booktrans/core';
import type { OutputFormat } from '@booktrans/core';

// Load environment variables from .env file
dotenv.config();

function parseOutputFormat(value: string | undefined): OutputFormat {
    return OUTPUT_FORMATS.find((format) => format === value) ?? DEFAULT_OUTPUT_FORMAT;
}

// Server
export const PORT = Number(process.env.PORT || 3001);
export const TMP_DIR = process.env.TMP_DIR || path.join(os.tmpdir(), 'booktrans');

// Intake limits
export const MAX_FILE_SIZE_MB = Number(process.env.MAX_FILE_SIZE_MB || 50);
export const ALLOWED_EXTENSIONS = (process.env.ALLOWED_EXTENSIONS || '.md,.markdown,.txt')
    .split(',')
    .map((ext) => ext.trim().toLowerCase())
    .filter(Boolean);

// Billing
export const RATE_PER_50_PAGES = Number(process.env.RATE_PER_50_PAGES || 20);

// Jobs
export const OUTPUT_FORMAT = parseOutputFormat(process.env.OUTPUT_FORMAT);
export const RESULT_TTL_MINUTES = Number(process.env.RESULT_TTL_MINUTES || 60);

// Admin top-ups are disabled while this is empty
export const ADMIN_TOKEN = process.env.ADMIN_TOKEN || '';
