/* ===================================================================
 * Shared types — the stable data contract for all modules.
 * Every module imports from here; never define ad-hoc whitelist shapes.
 * =================================================================== */

// ─── Whitelists ─────────────────────────────────────────────────────
/** Lowercased names; membership is case-insensitive by construction. */
export type Whitelist = ReadonlySet<string>;

export interface WhitelistSource {
    custom?: readonly string[];        // replaces the built-in list
    supplemental?: readonly string[];  // appended to the built-in list
}

// ─── Configuration ──────────────────────────────────────────────────
export type FailureMode = 'drop' | 'throw';

export interface SanitizerOptions {
    tags?: WhitelistSource;
    attributes?: WhitelistSource;
    scriptableAttributes?: WhitelistSource;
    failureMode?: FailureMode;
}

export interface SanitizerConfig {
    readonly tags: readonly string[];
    readonly attributes: readonly string[];
    readonly scriptableAttributes: readonly string[];
    readonly requiredTags: readonly string[];
    readonly forbiddenTags: readonly string[];
    readonly failureMode: FailureMode;
}

// ─── Sanitizer entry points ─────────────────────────────────────────
/**
 * Either no lists (everything comes from the config) or explicit
 * tag + attribute lists with optional scriptable attributes.
 */
export type WhitelistArgs =
    | []
    | [
        whitelistedTags: Iterable<string> | null | undefined,
        whitelistedAttributes: Iterable<string>,
        scriptableAttributes?: Iterable<string>,
    ];

export interface Sanitizer {
    readonly config: SanitizerConfig;
    sanitize(dirtyInput: string, ...lists: WhitelistArgs): string;
}

export interface EffectiveWhitelists {
    tags: Whitelist;
    attributes: Whitelist;
    scriptableAttributes: Whitelist;
}
