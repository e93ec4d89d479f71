export { default as logger, logStream } from './lib/logger';
export { default as pipelineService, PipelineService } from './services/pipeline.service';
export type { PipelineDependencies, FileTranslationResult } from './services/pipeline.service';
export { default as translationService, TranslationService, TranslationBackendError, isTransientError } from './services/translation.service';
export type { TranslationServiceOptions } from './services/translation.service';
export { translateAll, translateOne } from './services/batch.service';
export {
    markdownExtractor,
    markdownAssembler,
    MarkdownDocumentExtractor,
    MarkdownOutputAssembler,
    estimatePages,
    findTitle,
    titleFromFilename,
    outputFilename,
} from './services/document.service';
export type { AssembleInput, DocumentExtractor, ExtractedDocument, OutputAssembler } from './services/document.service';
export { protectImages, restoreImages, placeholderFor, countImages } from './lib/imagePlaceholders';
export { splitIntoChunks, describeChunks } from './lib/chunker';
export type { ChunkInfo } from './lib/chunker';
export { Semaphore } from './lib/semaphore';
export { createProgressTracker, percentOf } from './lib/ui';
export { DEFAULT_CHUNK_SIZE, MAX_CONCURRENT, OUTPUT_FORMATS, DEFAULT_OUTPUT_FORMAT, TARGET_LANGUAGE_CODE } from './config';
// Re-export common types for consumers (e.g., api package)
export type {
    OutputFormat,
    ProgressStyle,
    ProgressOptions,
    ProgressTracker,
    ProgressCallback,
    TextTranslator,
    BatchOptions,
    BatchOutcome,
    CancelledOutcome,
    DocumentOutcome,
    DocumentTranslationOptions,
    PlaceholderTable,
    ProtectedText,
} from './types';
