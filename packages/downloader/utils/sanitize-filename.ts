import { FALLBACK_EPISODE_FILENAME } from '@podcast-dl/config';

/** UTF-8 byte budget for the title part, leaving room for `.<ext>` under the usual 255-byte name limit */
export const MAX_FILENAME_BYTES = 200;

// Path separators, reserved characters on common filesystems, and control characters
const UNSAFE_CHARACTERS = /[/\\:*?"<>|\u0000-\u001f\u007f]/g;

function trimEdges(value: string): string {
    return value
        .replace(/^\s+/, '')
        .replace(/[\s.]+$/, ''); // Trailing dots and spaces are rejected on Windows
}

// Whole code points only, so surrogate pairs and multi-byte sequences are never split
function truncateToByteLength(value: string, maxBytes: number): string {
    let result = '';
    let bytes = 0;
    for (const codePoint of value) {
        const size = Buffer.byteLength(codePoint, 'utf8');
        if (bytes + size > maxBytes) {
            break;
        }
        result += codePoint;
        bytes += size;
    }
    return result;
}

/**
 * Map an episode title to a name that is safe as a single path component.
 * Idempotent, and never returns an empty string.
 */
export function sanitizeFilename(title: string): string {
    const cleaned = trimEdges(
        title
            .normalize('NFC')
            .replace(/\s+/g, ' ')
            .replace(UNSAFE_CHARACTERS, '_')
    );

    const truncated = trimEdges(truncateToByteLength(cleaned, MAX_FILENAME_BYTES));

    return truncated || FALLBACK_EPISODE_FILENAME;
}
