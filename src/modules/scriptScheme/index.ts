/* ===================================================================
 * scriptScheme/ — Detect attribute values that execute script.
 *
 * A value is checked verbatim, URL-decoded and entity-decoded. This
 * does not catch double percent-encoding, unicode escapes or control
 * characters inside the scheme name.
 * =================================================================== */

import { decodeHtmlEntities, decodeUrl } from '@modules/decoder';

export const SCRIPT_SCHEMES: readonly string[] = ['javascript', 'vbscript'];
export const SCRIPT_TYPES: readonly string[] = ['text/javascript', 'text/vbscript'];

const normalize = (value: string): string => value.toLowerCase().trim();

/** Verbatim, URL-decoded and entity-decoded forms, each lowercased and trimmed. */
export function valueForms(value: string): string[] {
    return [value, decodeUrl(value), decodeHtmlEntities(value)].map(normalize);
}

export function isScriptValue(value: string): boolean {
    return valueForms(value).some(form => SCRIPT_SCHEMES.some(scheme => form.startsWith(scheme)));
}

export function isScriptType(value: string): boolean {
    return SCRIPT_TYPES.includes(normalize(value));
}
