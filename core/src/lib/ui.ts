/**
 * UI components for progress tracking and display
 */

import ora from 'ora';
import type { Ora } from 'ora';
import * as cliProgress from 'cli-progress';
import chalk from 'chalk';
import type { ProgressStyle, ProgressOptions, ProgressTracker } from '../types';
import {
    SPINNER_CHARS,
    PROGRESS_BAR_LENGTH,
    PROGRESS_REFRESH_RATE
} from '../config';

/**
 * Check if the terminal is interactive
 */
function isInteractiveTerminal(): boolean {
    return Boolean(process.stdout.isTTY);
}

/**
 * Format seconds as mm:ss
 */
export function formatTime(seconds: number | null): string {
    if (seconds === null) {
        return '??:??';
    }
    const mins = Math.floor(seconds / 60);
    const secs = Math.floor(seconds % 60);
    return `${mins.toString().padStart(2, '0')}:${secs.toString().padStart(2, '0')}`;
}

export function percentOf(current: number, total: number): number {
    if (total <= 0) return 100;
    return Math.min(100, Math.floor((current / total) * 100));
}

/**
 * Implementation of the ProgressTracker interface
 */
class ProgressTrackerImpl implements ProgressTracker {
    private style: ProgressStyle = 'none';
    private title = '';
    private total = 100;
    private current = 0;
    private startTime = Date.now();
    private lastUpdateTime = this.startTime;
    private readonly interactive: boolean;
    private spinner: Ora | null = null;
    private progressBar: cliProgress.SingleBar | null = null;
    private showTimeElapsed = false;

    constructor(interactive: boolean = isInteractiveTerminal()) {
        this.interactive = interactive;
    }

    /**
     * Start the progress tracker
     */
    start(options: ProgressOptions): void {
        this.style = options.style;
        this.title = options.title || 'Processing';
        this.total = options.total || 100;
        this.current = 0;
        this.startTime = Date.now();
        this.lastUpdateTime = this.startTime;
        this.showTimeElapsed = options.showTimeElapsed || false;

        // Don't show progress if not interactive or style is none
        if (!this.interactive || this.style === 'none') {
            return;
        }

        this.cleanup();

        switch (this.style) {
            case 'spinner':
                this.spinner = ora({
                    text: `${this.title}...`,
                    spinner: {
                        frames: SPINNER_CHARS
                    }
                }).start();
                break;
            case 'bar': {
                let barFormat = `${this.title} |${chalk.cyan('{bar}')}| {percentage}% | {value}/{total} chunks`;
                if (this.showTimeElapsed) {
                    barFormat += ' | {duration_formatted}';
                }
                barFormat += ' | ETA {eta_formatted}';

                this.progressBar = new cliProgress.SingleBar({
                    format: barFormat,
                    barCompleteChar: '█',
                    barIncompleteChar: '░',
                    hideCursor: true,
                    clearOnComplete: false,
                    barsize: PROGRESS_BAR_LENGTH
                });
                this.progressBar.start(this.total, 0);
                break;
            }
            case 'simple':
                process.stdout.write(`${this.title}: 0% complete\n`);
                break;
        }
    }

    /**
     * Update the progress tracker
     */
    update(current: number, message?: string): void {
        this.current = current;
        const now = Date.now();
        const timeDiff = (now - this.lastUpdateTime) / 1000;
        const isLast = current >= this.total;

        // Throttle redraws, but never skip the final tick
        if (!isLast && timeDiff < PROGRESS_REFRESH_RATE && this.lastUpdateTime !== this.startTime) {
            return;
        }
        this.lastUpdateTime = now;

        if (!this.interactive || this.style === 'none') {
            return;
        }

        const percentage = percentOf(current, this.total);
        const elapsed = (now - this.startTime) / 1000;

        switch (this.style) {
            case 'spinner':
                if (this.spinner) {
                    let text = `${this.title} | ${percentage}% (${current}/${this.total})`;
                    if (this.showTimeElapsed) {
                        text += ` | ${formatTime(elapsed)}`;
                    }
                    if (message) {
                        text += ` | ${message}`;
                    }
                    this.spinner.text = text;
                }
                break;
            case 'bar':
                this.progressBar?.update(current);
                break;
            case 'simple': {
                let status = `\r${this.title}: ${percentage}% complete (${current}/${this.total})`;
                if (this.showTimeElapsed) {
                    status += ` | Time: ${formatTime(elapsed)}`;
                }
                process.stdout.write(status);
                break;
            }
        }
    }

    /**
     * Finish the progress tracker
     */
    finish(message?: string): void {
        this.stopWith(message || `${this.title} complete`, 'succeed');
    }

    fail(message?: string): void {
        this.stopWith(message || `${this.title} failed`, 'fail');
    }

    private stopWith(message: string, outcome: 'succeed' | 'fail'): void {
        if (!this.interactive || this.style === 'none') {
            return;
        }

        let finalMessage = message;
        if (this.showTimeElapsed) {
            finalMessage += ` in ${formatTime((Date.now() - this.startTime) / 1000)}`;
        }

        switch (this.style) {
            case 'spinner':
                if (this.spinner) {
                    if (outcome === 'succeed') {
                        this.spinner.succeed(finalMessage);
                    } else {
                        this.spinner.fail(finalMessage);
                    }
                    this.spinner = null;
                }
                break;
            case 'bar':
                if (this.progressBar) {
                    this.progressBar.stop();
                    process.stdout.write(`${finalMessage}\n`);
                    this.progressBar = null;
                }
                break;
            case 'simple':
                process.stdout.write(`\r${finalMessage}${' '.repeat(20)}\n`);
                break;
        }
    }

    /**
     * Clean up any existing progress displays
     */
    private cleanup(): void {
        if (this.spinner) {
            this.spinner.stop();
            this.spinner = null;
        }

        if (this.progressBar) {
            this.progressBar.stop();
            this.progressBar = null;
        }
    }
}

/**
 * Create a new progress tracker
 */
export function createProgressTracker(interactive?: boolean): ProgressTracker {
    return new ProgressTrackerImpl(interactive);
}

/**
 * Create a styled message using chalk
 */
export function styleMessage(message: string, style: 'info' | 'success' | 'warning' | 'error'): string {
    switch (style) {
        case 'info':
            return chalk.blue(message);
        case 'success':
            return chalk.green(message);
        case 'warning':
            return chalk.yellow(message);
        case 'error':
            return chalk.red(message);
        default:
            return message;
    }
}

/**
 * Print a styled message to the console
 */
export function printMessage(message: string, style: 'info' | 'success' | 'warning' | 'error'): void {
    console.log(styleMessage(message, style));
}

/**
 * Print a result to the console with nice formatting
 */
export function printResult(title: string, content: string): void {
    console.log('\n' + chalk.bold.cyan(title));
    console.log(chalk.gray('─'.repeat(process.stdout.columns || 80)));
    console.log(content);
    console.log(chalk.gray('─'.repeat(process.stdout.columns || 80)) + '\n');
}
