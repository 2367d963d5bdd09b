/* ===================================================================
 * Public entry point.
 * =================================================================== */

export { sanitizeHtml, createSanitizer, SanitizerError } from '@lib/sanitize';
export {
    DEFAULT_CONFIG, DEFAULT_TAGS, DEFAULT_ATTRIBUTES, DEFAULT_SCRIPTABLE_ATTRIBUTES,
    REQUIRED_TAGS, FORBIDDEN_TAGS, createConfig, configFromEnv, resolveWhitelist,
} from '@modules/config';
export { MarkupParseError } from '@modules/parser';
export { decodeUrl, decodeHtmlEntities } from '@modules/decoder';
export { isScriptValue, isScriptType, SCRIPT_SCHEMES, SCRIPT_TYPES } from '@modules/scriptScheme';
export type * from '@shared/types';
