/* ===================================================================
 * parser/ — jsdom-backed markup tree.
 *
 * Input is parsed into a <template>'s content fragment, so nothing runs
 * and no <html>/<body> wrapper is synthesized. The fragment is the root
 * node of the tree and serializes back through template.innerHTML.
 * =================================================================== */

import { JSDOM } from 'jsdom';

const ELEMENT_NODE = 1;

export class MarkupParseError extends Error {
    constructor(cause: unknown) {
        super('Markup could not be parsed', { cause });
        this.name = 'MarkupParseError';
    }
}

export interface ParsedMarkup {
    root: DocumentFragment;
    serialize(): string;
}

let scratch: Document | null = null;

/**
 * Shared document used only as an element factory. Trees built from it
 * never share nodes between calls.
 */
export function scratchDocument(): Document {
    if (!scratch) {
        scratch = new JSDOM('<!DOCTYPE html>').window.document;
    }
    return scratch;
}

export function parseMarkup(markup: string): ParsedMarkup {
    try {
        const template = scratchDocument().createElement('template');
        template.innerHTML = markup;
        return {
            root: template.content,
            serialize: () => template.innerHTML,
        };
    } catch (err) {
        throw new MarkupParseError(err);
    }
}

// ─── Tree helpers ───────────────────────────────────────────────────

export function isElement(node: Node): node is Element {
    return node.nodeType === ELEMENT_NODE;
}

function isTemplate(node: Node): node is HTMLTemplateElement {
    return isElement(node) && node.localName === 'template';
}

/** Lowercased node name: `p`, `svg`, `#text`, `#comment`, `#document-fragment`. */
export function tagName(node: Node): string {
    return node.nodeName.toLowerCase();
}

/**
 * The node and all its descendants in document order.
 * Template contents are walked as children of their template.
 */
export function descendantsAndSelf(node: Node): Node[] {
    const out: Node[] = [];
    const visit = (current: Node): void => {
        out.push(current);
        if (isTemplate(current)) {
            visit(current.content);
        }
        current.childNodes.forEach(visit);
    };
    visit(node);
    return out;
}

/** Detach a node and its subtree. A no-op once the node is already detached. */
export function removeNode(node: Node): void {
    node.parentNode?.removeChild(node);
}
