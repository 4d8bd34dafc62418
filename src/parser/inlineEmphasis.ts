/**
 * Emphasis markup: *bold*, /italic/, _underline_, +strike-through+,
 * plus the two literal spans ~code~ and =verbatim= that share its boundary rules
 */

import { InlineInvariantError } from './inlineErrors';
import {
    EMPHASIS_BODY_GRAMMAR,
    createPlainText,
    isNewline,
    isWhitespace,
    spanOf,
    type GrammarContext,
} from './inlineGrammar';
import type {
    CodeNode,
    EmphasisKind,
    EmphasisNode,
    InlineNode,
    VerbatimNode,
} from './inlineTypes';

/**
 * Emphasis marker -> kind
 */
export const EMPHASIS_MARKERS: Readonly<Record<string, EmphasisKind>> = {
    '*': 'bold',
    '/': 'italic',
    '_': 'underline',
    '+': 'strike-through',
};

/**
 * Characters that can follow a closing marker (besides whitespace and end of input)
 */
const POST_EMPHASIS_SET = new Set(['.', ',', '!', '?', '"', "'", ')', '-', ':', ';', '[', '}']);

/**
 * Result of scanning a delimited span
 */
export interface EmphasisScan {
    /** Index of the closing delimiter */
    close: number;
    /** Character scanned right before the closing delimiter */
    previous: string;
}

/**
 * Scan a span opened by text[pos] === delimiter.
 *
 * The body runs to the first occurrence of the delimiter on the same line.
 * The previously seen character is carried as a local accumulator and
 * returned with the result.
 */
export function scanEmphasis(text: string, pos: number, delimiter: string): EmphasisScan | null {
    if (text[pos] !== delimiter) return null;

    // No leading space inside markers
    const first = text[pos + 1];
    if (first === undefined || isWhitespace(first)) return null;

    let previous = '';
    let i = pos + 1;
    while (i < text.length && text[i] !== delimiter) {
        if (isNewline(text[i])) return null;
        previous = text[i];
        i++;
    }

    if (i >= text.length || i === pos + 1) return null;

    // No trailing space inside markers
    if (isWhitespace(previous)) return null;

    const after = text[i + 1];
    if (after !== undefined && !isWhitespace(after) && !POST_EMPHASIS_SET.has(after)) {
        return null;
    }

    return { close: i, previous };
}

/**
 * Flat emphasis: a single plain-text child holding the span text
 */
function tryParseFlatEmphasis(text: string, pos: number, ctx: GrammarContext): EmphasisNode | null {
    const kind = EMPHASIS_MARKERS[text[pos]];
    if (!kind) return null;

    const scan = scanEmphasis(text, pos, text[pos]);
    if (!scan) return null;

    return {
        type: 'emphasis',
        range: spanOf(ctx, pos, scan.close + 1),
        properties: { kind },
        children: [createPlainText(text.slice(pos + 1, scan.close), spanOf(ctx, pos + 1, scan.close))],
    };
}

/**
 * Re-parse the body of a flat emphasis with the {emphasis, literal} grammar.
 * Emphasis found in the body is resolved the same way, giving multi-level nesting.
 */
export function resolveNestedEmphasis(node: EmphasisNode, ctx: GrammarContext): EmphasisNode {
    const [body] = node.children;
    if (node.children.length !== 1 || body.type !== 'plain-text') {
        throw new InlineInvariantError('nested emphasis resolution', body?.type ?? 'empty');
    }

    const children = ctx.parseNested(body.properties.value, body.range.start, EMPHASIS_BODY_GRAMMAR);

    for (const child of children) {
        if (child.type !== 'plain-text' && child.type !== 'emphasis') {
            const error = new InlineInvariantError('nested emphasis resolution', child.type);
            ctx.session.logger.error('Emphasis body produced an unexpected node', error, {
                range: child.range,
            });
            throw error;
        }
    }

    // No nested markup: keep the flat node
    const [only] = children;
    if (children.length === 1 && only.type === 'plain-text' && only.properties.value === body.properties.value) {
        return node;
    }

    return { ...node, children };
}

/**
 * Bold, italic, underline or strike-through, with nested markup resolved
 */
export function tryParseEmphasis(text: string, pos: number, ctx: GrammarContext): InlineNode | null {
    const flat = tryParseFlatEmphasis(text, pos, ctx);
    return flat ? resolveNestedEmphasis(flat, ctx) : null;
}

/**
 * ~code~
 */
export function tryParseCode(text: string, pos: number, ctx: GrammarContext): CodeNode | null {
    const scan = text[pos] === '~' ? scanEmphasis(text, pos, '~') : null;
    if (!scan) return null;

    return {
        type: 'code',
        range: spanOf(ctx, pos, scan.close + 1),
        properties: { value: text.slice(pos + 1, scan.close) },
    };
}

/**
 * =verbatim=
 */
export function tryParseVerbatim(text: string, pos: number, ctx: GrammarContext): VerbatimNode | null {
    const scan = text[pos] === '=' ? scanEmphasis(text, pos, '=') : null;
    if (!scan) return null;

    return {
        type: 'verbatim',
        range: spanOf(ctx, pos, scan.close + 1),
        properties: { value: text.slice(pos + 1, scan.close) },
    };
}
