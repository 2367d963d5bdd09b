/* ===================================================================
 * config/ — Whitelist defaults and override resolution.
 *
 * built-in → defaults.json (tags, attributes, scriptable attributes)
 * custom   → replaces a built-in list
 * extra    → appended to a built-in list
 *
 * Configs are frozen values. Build one at startup and pass it around;
 * there is no global to reconfigure while calls are in flight.
 * =================================================================== */

import defaults from './defaults.json';
import type {
    FailureMode, SanitizerConfig, SanitizerOptions, WhitelistSource,
} from '@shared/types';

export const DEFAULT_TAGS: readonly string[] = Object.freeze([...defaults.tags]);
export const DEFAULT_ATTRIBUTES: readonly string[] = Object.freeze([...defaults.attributes]);
export const DEFAULT_SCRIPTABLE_ATTRIBUTES: readonly string[] = Object.freeze([...defaults.scriptableAttributes]);

/** Node names the parser always produces; stripping them would break the tree. */
export const REQUIRED_TAGS: readonly string[] = Object.freeze(['#document-fragment', '#text']);

/**
 * Never kept, whatever the caller whitelists. Their raw text does not survive
 * a serialize/parse round trip unchanged, and a browser with scripting on
 * reads <noscript> differently from the parser used here.
 */
export const FORBIDDEN_TAGS: readonly string[] = Object.freeze(['noscript', 'plaintext']);

const FAILURE_MODES: readonly FailureMode[] = ['drop', 'throw'];

// ─── Resolution ─────────────────────────────────────────────────────

/**
 * Pick the working list: custom wins, then built-in + supplemental,
 * then the built-in list alone.
 */
export function resolveWhitelist(source: WhitelistSource | undefined, builtIn: readonly string[]): string[] {
    if (source?.custom && source.custom.length > 0) {
        return [...source.custom];
    }
    if (source?.supplemental && source.supplemental.length > 0) {
        return [...builtIn, ...source.supplemental];
    }
    return [...builtIn];
}

export function createConfig(options: SanitizerOptions = {}): SanitizerConfig {
    return Object.freeze({
        tags: Object.freeze(resolveWhitelist(options.tags, DEFAULT_TAGS)),
        attributes: Object.freeze(resolveWhitelist(options.attributes, DEFAULT_ATTRIBUTES)),
        scriptableAttributes: Object.freeze(
            resolveWhitelist(options.scriptableAttributes, DEFAULT_SCRIPTABLE_ATTRIBUTES),
        ),
        requiredTags: REQUIRED_TAGS,
        forbiddenTags: FORBIDDEN_TAGS,
        failureMode: options.failureMode ?? 'drop',
    });
}

export const DEFAULT_CONFIG: SanitizerConfig = createConfig();

// ─── Environment ────────────────────────────────────────────────────

function splitList(raw: string | undefined): string[] | undefined {
    if (!raw) return undefined;
    const items = raw.split(',').map(s => s.trim()).filter(Boolean);
    return items.length > 0 ? items : undefined;
}

function isFailureMode(value: string): value is FailureMode {
    return FAILURE_MODES.some(mode => mode === value);
}

function readFailureMode(raw: string | undefined): FailureMode {
    const value = raw?.trim().toLowerCase();
    if (!value) return 'drop';
    if (isFailureMode(value)) return value;
    console.warn(`[config] Unknown SANITIZER_FAILURE_MODE "${raw}", using "drop"`);
    return 'drop';
}

/**
 * Build a config from SANITIZER_* environment variables.
 * Lists are comma-separated; unset or blank variables fall back to defaults.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): SanitizerConfig {
    return createConfig({
        tags: {
            custom: splitList(env.SANITIZER_TAGS),
            supplemental: splitList(env.SANITIZER_EXTRA_TAGS),
        },
        attributes: {
            custom: splitList(env.SANITIZER_ATTRIBUTES),
            supplemental: splitList(env.SANITIZER_EXTRA_ATTRIBUTES),
        },
        scriptableAttributes: {
            custom: splitList(env.SANITIZER_SCRIPTABLE_ATTRIBUTES),
            supplemental: splitList(env.SANITIZER_EXTRA_SCRIPTABLE_ATTRIBUTES),
        },
        failureMode: readFailureMode(env.SANITIZER_FAILURE_MODE),
    });
}
