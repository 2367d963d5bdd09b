/* ===================================================================
 * decoder/ — Tolerant URL and HTML character-reference decoding.
 * Neither function throws; bad input comes back as close to the
 * original as possible.
 * =================================================================== */

import { scratchDocument } from '@modules/parser';

const PERCENT_BYTE = /%([0-9a-f]{2})/gi;

/**
 * Percent-decode a string. Malformed UTF-8 sequences fall back to
 * byte-wise Latin-1 decoding of each `%XX`; stray `%` signs stay as-is.
 */
export function decodeUrl(value: string): string {
    try {
        return decodeURIComponent(value);
    } catch {
        return value.replace(PERCENT_BYTE, (_, hex: string) => String.fromCharCode(parseInt(hex, 16)));
    }
}

/**
 * Decode HTML character references (`&#97;`, `&#x61;`, `&amp;`, …)
 * the way a parser does inside a <textarea>: markup stays literal text.
 */
export function decodeHtmlEntities(value: string): string {
    if (!value.includes('&')) return value;
    try {
        const textarea = scratchDocument().createElement('textarea');
        textarea.innerHTML = value;
        return textarea.value;
    } catch (err) {
        console.warn('[decoder] Entity decoding failed, using raw value:', err);
        return value;
    }
}
