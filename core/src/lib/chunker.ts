/**
 * Line-based Markdown chunker.
 *
 * Chunks stay under a soft character limit. A heading that would overflow the
 * current chunk opens the next one instead; any other overflowing line is
 * appended and closes the chunk, so no line is ever split or orphaned.
 */

export interface ChunkInfo {
    index: number;
    chars: number;
    lines: number;
    heading?: string;
}

function isHeading(line: string): boolean {
    return line.startsWith('#');
}

export function splitIntoChunks(text: string, maxSize: number): string[] {
    if (!Number.isInteger(maxSize) || maxSize < 1) {
        throw new RangeError(`maxSize must be a positive integer, got ${maxSize}`);
    }

    const chunks: string[] = [];
    let current: string[] = [];
    let currentLen = 0;

    for (const line of text.split('\n')) {
        const lineLen = line.length + 1;

        if (currentLen + lineLen > maxSize && current.length > 0) {
            if (isHeading(line)) {
                chunks.push(current.join('\n'));
                current = [line];
                currentLen = lineLen;
            } else {
                current.push(line);
                chunks.push(current.join('\n'));
                current = [];
                currentLen = 0;
            }
        } else {
            current.push(line);
            currentLen += lineLen;
        }
    }

    if (current.length > 0) {
        chunks.push(current.join('\n'));
    }

    return chunks.filter((chunk) => chunk.trim().length > 0);
}

export function describeChunks(chunks: readonly string[]): ChunkInfo[] {
    return chunks.map((chunk, index) => {
        const lines = chunk.split('\n');
        const heading = lines.find(isHeading);
        return {
            index,
            chars: chunk.length,
            lines: lines.length,
            ...(heading ? { heading: heading.replace(/^#+\s*/, '') } : {}),
        };
    });
}
