import * as path from 'path';
import logger from '../lib/logger';
import { countImages, protectImages, restoreImages } from '../lib/imagePlaceholders';
import { splitIntoChunks } from '../lib/chunker';
import { translateAll, translateOne } from './batch.service';
import translationService from './translation.service';
import { markdownAssembler, markdownExtractor } from './document.service';
import type { DocumentExtractor, OutputAssembler } from './document.service';
import { DEFAULT_CHUNK_SIZE, DEFAULT_OUTPUT_DIR, DEFAULT_OUTPUT_FORMAT, MAX_CONCURRENT } from '../config';
import type { DocumentOutcome, DocumentTranslationOptions, OutputFormat, TextTranslator } from '../types';

export interface PipelineDependencies {
    translator: TextTranslator;
    extractor: DocumentExtractor;
    assembler: OutputAssembler;
}

export type FileTranslationResult =
    | { status: 'completed'; outputPath: string; title: string; chunkCount: number; imageCount: number; pages: number }
    | { status: 'cancelled'; completed: number; total: number };

export class PipelineService {
    private readonly deps: PipelineDependencies;

    constructor(deps: Partial<PipelineDependencies> = {}) {
        this.deps = {
            translator: translationService,
            extractor: markdownExtractor,
            assembler: markdownAssembler,
            ...deps,
        };
    }

    get extractor(): DocumentExtractor {
        return this.deps.extractor;
    }

    get assembler(): OutputAssembler {
        return this.deps.assembler;
    }

    /**
     * Protect images, split, translate in parallel, reassemble in order and
     * restore images.
     */
    async translateDocument(markdown: string, options: DocumentTranslationOptions = {}): Promise<DocumentOutcome> {
        const { chunkSize = DEFAULT_CHUNK_SIZE, concurrency = MAX_CONCURRENT, onProgress, signal } = options;

        const { text: protectedText, table } = protectImages(markdown);
        const imageCount = countImages(markdown);
        logger.info(`Protected ${imageCount} images from translation`);

        const chunks = splitIntoChunks(protectedText, chunkSize);
        logger.info(`Translating ${chunks.length} chunks (max ${concurrency} parallel)`);

        const outcome = await translateAll(chunks, {
            translator: this.deps.translator,
            concurrency,
            onProgress,
            signal,
        });
        if (outcome.status === 'cancelled') {
            return outcome;
        }

        const text = restoreImages(outcome.chunks.join('\n\n'), table);
        logger.info(`Restored ${table.length} placeholders after translation`);
        return { status: 'completed', text, chunkCount: chunks.length, imageCount };
    }

    async translateTitle(title: string): Promise<string> {
        const translated = await translateOne(title, this.deps.translator);
        logger.info(`Title: ${JSON.stringify(title)} -> ${JSON.stringify(translated)}`);
        return translated;
    }

    /**
     * Local end-to-end run over a file: extract, translate, write the output.
     */
    async translateFile(args: {
        input: string;
        output?: string;
        format?: OutputFormat;
    } & DocumentTranslationOptions): Promise<FileTranslationResult> {
        const { input, output, format = DEFAULT_OUTPUT_FORMAT, ...translateOptions } = args;
        logger.info(`Starting translate pipeline for file: ${input}`);

        const doc = await this.deps.extractor.extract(input);
        if (!doc.text.trim()) {
            throw new Error(`No text could be extracted from ${input}`);
        }

        const title = await this.translateTitle(doc.title);
        const outcome = await this.translateDocument(doc.text, translateOptions);
        if (outcome.status === 'cancelled') {
            return outcome;
        }

        const outputPath = await this.deps.assembler.assemble({
            text: outcome.text,
            title,
            format,
            outputDir: this.getOutputDir(output),
            sourceFilename: path.basename(input),
        });
        return {
            status: 'completed',
            outputPath,
            title,
            chunkCount: outcome.chunkCount,
            imageCount: outcome.imageCount,
            pages: doc.pages,
        };
    }

    private getOutputDir(outputDir?: string): string {
        return path.resolve(process.cwd(), outputDir || DEFAULT_OUTPUT_DIR);
    }
}

export default new PipelineService();
