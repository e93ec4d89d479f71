import { promises as fs } from 'fs';
import * as path from 'path';
import logger from '../lib/logger';
import { CHARS_PER_PAGE, TARGET_LANGUAGE_CODE } from '../config';
import type { OutputFormat } from '../types';

export interface ExtractedDocument {
    text: string;
    pages: number;
    title: string;
}

/**
 * Turns a source file into translatable Markdown. Binary formats (PDF, EPUB)
 * plug in behind this interface.
 */
export interface DocumentExtractor {
    countPages(filePath: string): Promise<number>;
    extract(filePath: string): Promise<ExtractedDocument>;
}

export interface AssembleInput {
    text: string;
    title: string;
    format: OutputFormat;
    outputDir: string;
    sourceFilename: string;
}

/**
 * Packages translated text into a deliverable file and returns its path.
 */
export interface OutputAssembler {
    assemble(input: AssembleInput): Promise<string>;
}

export function estimatePages(text: string): number {
    return Math.max(1, Math.floor(text.length / CHARS_PER_PAGE));
}

export function titleFromFilename(filename: string): string {
    return path.parse(filename).name.replace(/[_-]/g, ' ').trim();
}

export function findTitle(markdown: string, filename: string): string {
    const heading = markdown.split('\n').find((line) => /^#\s+\S/.test(line));
    return heading ? heading.replace(/^#\s+/, '').trim() : titleFromFilename(filename);
}

export class MarkdownDocumentExtractor implements DocumentExtractor {
    async countPages(filePath: string): Promise<number> {
        const text = await fs.readFile(filePath, 'utf-8');
        return estimatePages(text);
    }

    async extract(filePath: string): Promise<ExtractedDocument> {
        logger.info(`Extracting document: ${filePath}`);
        const text = (await fs.readFile(filePath, 'utf-8')).replace(/\r\n/g, '\n');
        const title = findTitle(text, path.basename(filePath));
        logger.info(`Extraction complete: ${text.length} characters, title=${JSON.stringify(title)}`);
        return { text, pages: estimatePages(text), title };
    }
}

export function outputFilename(sourceFilename: string, format: OutputFormat): string {
    return `${TARGET_LANGUAGE_CODE.toUpperCase()}_${path.parse(sourceFilename).name}.${format}`;
}

export class MarkdownOutputAssembler implements OutputAssembler {
    async assemble({ text, title, format, outputDir, sourceFilename }: AssembleInput): Promise<string> {
        const content = format === 'md'
            ? `% ${title}\n\n${text}\n`
            : `${text}\n`;
        await fs.mkdir(outputDir, { recursive: true });
        const filePath = path.join(outputDir, outputFilename(sourceFilename, format));
        await fs.writeFile(filePath, content, 'utf-8');
        logger.info(`Saved result to ${filePath}`);
        return filePath;
    }
}

export const markdownExtractor = new MarkdownDocumentExtractor();
export const markdownAssembler = new MarkdownOutputAssembler();
