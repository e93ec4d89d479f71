import type { PlaceholderTable, ProtectedText } from '../types';

/**
 * Markdown image syntax: ![alt text](path/to/image.png)
 */
const IMAGE_REGEX = /!\[[^\]]*\]\([^)]+\)/g;

// Images, plus any text that already looks like a placeholder. The latter gets
// a slot of its own so restoring maps it back to itself.
const PROTECTED_REGEX = /!\[[^\]]*\]\([^)]+\)|<<IMG_\d+>>/g;

const PLACEHOLDER_REGEX = /<<IMG_(\d+)>>/g;

export function placeholderFor(index: number): string {
    return `<<IMG_${index}>>`;
}

/**
 * Replace every Markdown image with a positional placeholder so the
 * translator cannot rewrite paths or alt text.
 *
 * @example
 * protectImages('See ![map](img/map.png) below');
 * // { text: 'See <<IMG_0>> below', table: ['![map](img/map.png)'] }
 */
export function protectImages(markdown: string): ProtectedText {
    const table: string[] = [];
    const text = markdown.replace(PROTECTED_REGEX, (match) => {
        const placeholder = placeholderFor(table.length);
        table.push(match);
        return placeholder;
    });
    return { text, table };
}

/**
 * Put the original image references back in one pass, so restored text is
 * never scanned again. The translator may move or repeat placeholders;
 * unknown indices are left as they are.
 */
export function restoreImages(text: string, table: PlaceholderTable): string {
    return text.replace(PLACEHOLDER_REGEX, (match, index: string) => table[Number(index)] ?? match);
}

export function countImages(markdown: string): number {
    return markdown.match(IMAGE_REGEX)?.length ?? 0;
}
