/**
 * Main entry point for the booktrans CLI
 * Subcommand-based CLI structure using yargs
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { promises as fs } from 'fs';
import logger from './lib/logger';
import { createProgressTracker, printMessage, printResult } from './lib/ui';
import { countImages, protectImages } from './lib/imagePlaceholders';
import { describeChunks, splitIntoChunks } from './lib/chunker';
import pipelineService from './services/pipeline.service';
import {
    DEFAULT_CHUNK_SIZE,
    DEFAULT_OUTPUT_DIR,
    DEFAULT_OUTPUT_FORMAT,
    DEFAULT_PROGRESS_STYLE,
    MAX_CONCURRENT,
    OUTPUT_FORMATS,
    PROGRESS_STYLES
} from './config';

yargs(hideBin(process.argv))
    .scriptName('booktrans')
    .usage('$0 <command> [options]')
    .command(
        'translate <file>',
        'Translate a Markdown or text document',
        (y) => y
            .positional('file', {
                describe: 'Document to translate',
                type: 'string',
                demandOption: true
            })
            .option('debug', {
                describe: 'Enable debug logging',
                type: 'boolean',
                default: false
            })
            .option('output', {
                describe: 'Output directory for the translated document',
                type: 'string',
                default: DEFAULT_OUTPUT_DIR
            })
            .option('format', {
                describe: 'Output format',
                choices: OUTPUT_FORMATS,
                default: DEFAULT_OUTPUT_FORMAT
            })
            .option('chunk-size', {
                describe: 'Soft limit for one translation unit, in characters',
                type: 'number',
                default: DEFAULT_CHUNK_SIZE
            })
            .option('concurrency', {
                describe: 'Maximum parallel translation requests',
                type: 'number',
                default: MAX_CONCURRENT
            })
            .option('progress', {
                describe: 'Progress display style',
                choices: PROGRESS_STYLES,
                default: DEFAULT_PROGRESS_STYLE
            })
            .example('$0 translate book.md', 'Translate book.md into results/')
            .example('$0 translate book.md --format txt --concurrency 4', 'Plain-text output, four parallel requests'),
        async (argv) => {
            if (argv.debug) {
                logger.level = 'debug';
            }
            const tracker = createProgressTracker();
            const controller = new AbortController();
            process.once('SIGINT', () => {
                printMessage('\nCancelling after the chunks in flight...', 'warning');
                controller.abort();
            });

            let started = false;
            try {
                const result = await pipelineService.translateFile({
                    input: argv.file,
                    output: argv.output,
                    format: argv.format,
                    chunkSize: argv['chunk-size'],
                    concurrency: argv.concurrency,
                    signal: controller.signal,
                    onProgress: (done, total) => {
                        if (!started) {
                            tracker.start({ style: argv.progress, title: 'Translating', total, showTimeElapsed: true });
                            started = true;
                        }
                        tracker.update(done);
                    }
                });

                if (result.status === 'cancelled') {
                    tracker.fail(`Cancelled after ${result.completed}/${result.total} chunks`);
                    process.exit(130);
                }
                tracker.finish('Translation complete');
                printResult(result.title, [
                    `Pages (estimated): ${result.pages}`,
                    `Chunks: ${result.chunkCount}`,
                    `Images kept: ${result.imageCount}`,
                    `Saved to: ${result.outputPath}`,
                ].join('\n'));
                process.exit(0);
            } catch (error) {
                tracker.fail();
                logger.error(`Error: ${error}`);
                console.error(`Error: ${error}`);
                process.exit(1);
            }
        }
    )
    .command(
        'chunks <file>',
        'Show how a document would be split, without calling the translator',
        (y) => y
            .positional('file', {
                describe: 'Document to inspect',
                type: 'string',
                demandOption: true
            })
            .option('chunk-size', {
                describe: 'Soft limit for one translation unit, in characters',
                type: 'number',
                default: DEFAULT_CHUNK_SIZE
            }),
        async (argv) => {
            try {
                const text = await fs.readFile(argv.file, 'utf-8');
                const { text: protectedText } = protectImages(text);
                const chunks = describeChunks(splitIntoChunks(protectedText, argv['chunk-size']));
                const lines = chunks.map((c) =>
                    `#${c.index + 1}  ${c.chars} chars, ${c.lines} lines${c.heading ? `  (${c.heading})` : ''}`
                );
                printResult(`${chunks.length} chunks, ${countImages(text)} images`, lines.join('\n') || '(empty document)');
                process.exit(0);
            } catch (error) {
                logger.error(`Error: ${error}`);
                console.error(`Error: ${error}`);
                process.exit(1);
            }
        }
    )
    .demandCommand(1, 'You must provide a valid command')
    .strict()
    .help()
    .alias('h', 'help')
    .version()
    .alias('v', 'version')
    .parse();
