/* ===================================================================
 * HTML Sanitiser — whitelist-based.
 * Removes non-whitelisted nodes (with their subtrees) and attributes,
 * then drops attributes whose values would run script.
 * =================================================================== */

import { DEFAULT_CONFIG } from '@modules/config';
import {
    descendantsAndSelf, isElement, parseMarkup, removeNode, tagName,
} from '@modules/parser';
import { isScriptType, isScriptValue } from '@modules/scriptScheme';
import type {
    EffectiveWhitelists, Sanitizer, SanitizerConfig, Whitelist, WhitelistArgs,
} from '@shared/types';

export class SanitizerError extends Error {
    constructor(cause: unknown) {
        super('HTML sanitization failed', { cause });
        this.name = 'SanitizerError';
    }
}

function toWhitelist(...lists: (readonly string[])[]): Set<string> {
    const set = new Set<string>();
    for (const list of lists) {
        for (const name of list) set.add(name.toLowerCase());
    }
    return set;
}

function tagWhitelist(tags: readonly string[], config: SanitizerConfig): Whitelist {
    const set = toWhitelist(tags, config.requiredTags);
    for (const name of config.forbiddenTags) set.delete(name.toLowerCase());
    return set;
}

type ResolvedLists = [
    tags: string[] | null,
    attributes: string[],
    scriptable: string[],
];

// Lists are copied once: a caller may hand over a one-shot iterator.
function resolveLists(config: SanitizerConfig, lists: WhitelistArgs): ResolvedLists {
    if (lists.length === 0) {
        return [[...config.tags], [...config.attributes], [...config.scriptableAttributes]];
    }
    const [tags, attributes, scriptable] = lists;
    return [
        tags == null ? null : [...tags],
        [...attributes],
        [...(scriptable ?? config.scriptableAttributes)],
    ];
}

/**
 * Sanitise markup against the default whitelists, or against explicit
 * lists. Without a tag whitelist the input is returned untouched.
 */
export function sanitizeHtml(dirtyInput: string, ...lists: WhitelistArgs): string {
    return defaultSanitizer.sanitize(dirtyInput, ...lists);
}

/**
 * Bind a config: omitted lists come from it instead of the defaults.
 */
export function createSanitizer(config: SanitizerConfig): Sanitizer {
    return {
        config,
        sanitize(dirtyInput: string, ...lists: WhitelistArgs): string {
            const [tags, attributes, scriptable] = resolveLists(config, lists);

            if (tags == null) {
                console.warn('[sanitizer] No tag whitelist given; returning input unchanged');
                return dirtyInput;
            }
            if (tags.length === 0) return dirtyInput;

            const whitelists: EffectiveWhitelists = {
                tags: tagWhitelist(tags, config),
                attributes: toWhitelist(attributes),
                scriptableAttributes: toWhitelist(scriptable),
            };

            try {
                return sanitizeMarkup(dirtyInput, whitelists);
            } catch (err) {
                if (config.failureMode === 'throw') {
                    throw new SanitizerError(err);
                }
                console.error('[sanitizer] Sanitization failed, dropping input:', err);
                return '';
            }
        },
    };
}

const defaultSanitizer = createSanitizer(DEFAULT_CONFIG);

// ─── Passes ─────────────────────────────────────────────────────────

function sanitizeMarkup(dirtyInput: string, whitelists: EffectiveWhitelists): string {
    const doc = parseMarkup(dirtyInput);

    // Tags first: everything not whitelisted goes, subtree included.
    descendantsAndSelf(doc.root)
        .filter(node => !whitelists.tags.has(tagName(node)))
        .forEach(removeNode);

    // Elements declaring a script type go entirely, unless script checks are off.
    if (whitelists.scriptableAttributes.size > 0) {
        descendantsAndSelf(doc.root)
            .filter(node => isElement(node) && isScriptType(node.getAttribute('type') ?? ''))
            .forEach(removeNode);
    }

    descendantsAndSelf(doc.root).filter(isElement).forEach(el => cleanAttributes(el, whitelists));

    return doc.serialize();
}

function cleanAttributes(el: Element, whitelists: EffectiveWhitelists): void {
    for (const attr of Array.from(el.attributes)) {
        const name = attr.name.toLowerCase();
        if (!whitelists.attributes.has(name)) {
            el.removeAttributeNode(attr);
        } else if (whitelists.scriptableAttributes.has(name) && isScriptValue(attr.value)) {
            el.removeAttributeNode(attr);
        }
    }
}
