/**
 * Shared plumbing for the inline grammars
 */

import type { InlineNode, InlineRange, PlainTextNode } from './inlineTypes';
import type { InlineSession } from './inlineSession';

/**
 * Names of the structured grammars, as listed in the dispatch table
 */
export type GrammarName =
    | 'latex-fragment'
    | 'timestamp'
    | 'entity'
    | 'macro'
    | 'statistics-cookie'
    | 'footnote-reference'
    | 'link'
    | 'plain-link'
    | 'radio-target'
    | 'target'
    | 'export-snippet'
    | 'verbatim'
    | 'code'
    | 'line-break'
    | 'emphasis'
    | 'subscript'
    | 'superscript';

/**
 * What a grammar trial sees besides the text
 */
export interface GrammarContext {
    readonly session: InlineSession;
    /** Offset of text[0] in the top-level input */
    readonly baseOffset: number;
    /**
     * Parse a nested body with a restricted grammar (literal text is always allowed).
     * @param baseOffset - Offset of body[0] in the top-level input
     */
    parseNested(body: string, baseOffset: number, grammar: readonly GrammarName[]): InlineNode[];
}

/**
 * A grammar trial: returns the node starting at text[pos], or null.
 * A failing trial consumes nothing; the node's range tells the dispatcher where to resume.
 */
export type InlineTrial = (text: string, pos: number, ctx: GrammarContext) => InlineNode | null;

// =============================================================================
// Restricted Grammars
// =============================================================================

/** Body of bold/italic/underline/strike-through */
export const EMPHASIS_BODY_GRAMMAR: readonly GrammarName[] = ['emphasis'];

/** Label of a bracket link */
export const LINK_LABEL_GRAMMAR: readonly GrammarName[] = [
    'emphasis', 'latex-fragment', 'entity', 'code', 'subscript', 'superscript',
];

/** Inline footnote definition */
export const FOOTNOTE_DEFINITION_GRAMMAR: readonly GrammarName[] = [
    'link', 'plain-link', 'target', 'emphasis', 'latex-fragment', 'entity',
    'code', 'subscript', 'superscript',
];

/** Body of _{...} and ^{...} */
export const SCRIPT_BODY_GRAMMAR: readonly GrammarName[] = ['emphasis', 'entity'];

// =============================================================================
// Helpers
// =============================================================================

/**
 * Range of text[start, end) in top-level offsets
 */
export function spanOf(ctx: GrammarContext, start: number, end: number): InlineRange {
    return { start: ctx.baseOffset + start, end: ctx.baseOffset + end };
}

export function createPlainText(value: string, range: InlineRange): PlainTextNode {
    return {
        type: 'plain-text',
        range,
        properties: { value },
    };
}

export function isWhitespace(char: string | undefined): boolean {
    return char !== undefined && /^\s$/.test(char);
}

export function isLetter(char: string | undefined): boolean {
    return char !== undefined && /^[a-zA-Z]$/.test(char);
}

export function isNewline(char: string | undefined): boolean {
    return char === '\n' || char === '\r';
}
