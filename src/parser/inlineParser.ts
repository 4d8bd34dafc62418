/**
 * Inline parser: dispatch table, literal fallback and normalization
 *
 * The dispatcher walks the input left to right. At each position it tries the
 * grammars in table order and takes the first node produced; when none
 * matches, literal text is consumed instead. Restricted grammars used for
 * nested bodies are subsets of the same table, kept in table order.
 */

import { createPlainText, spanOf, type GrammarContext, type GrammarName, type InlineTrial } from './inlineGrammar';
import { tryParseCode, tryParseEmphasis, tryParseVerbatim } from './inlineEmphasis';
import {
    tryParseEntity,
    tryParseExportSnippet,
    tryParseLatexFragment,
    tryParseLineBreak,
    tryParseMacro,
    tryParseRadioTarget,
    tryParseStatisticsCookie,
    tryParseSubscript,
    tryParseSuperscript,
    tryParseTarget,
} from './inlineAtoms';
import { tryParseBracketLink, tryParseFootnoteReference, tryParsePlainLink } from './inlineLinks';
import { RE_TIMESTAMP_KEYWORD, tryParseTimestamp } from './inlineTimestamp';
import { InlineSession } from './inlineSession';
import { isPlainText, type InlineNode } from './inlineTypes';

// =============================================================================
// Dispatch Table
// =============================================================================

interface DispatchEntry {
    readonly name: GrammarName;
    readonly trial: InlineTrial;
}

/**
 * Grammars in precedence order. Earlier entries win on shared prefixes:
 * '[' tries timestamp, then cookie, then footnote, then link;
 * '<' tries timestamp, then radio target, then target;
 * '\' tries LaTeX, then entity.
 */
const DISPATCH_TABLE: readonly DispatchEntry[] = [
    { name: 'latex-fragment', trial: tryParseLatexFragment },
    { name: 'timestamp', trial: tryParseTimestamp },
    { name: 'entity', trial: tryParseEntity },
    { name: 'macro', trial: tryParseMacro },
    { name: 'statistics-cookie', trial: tryParseStatisticsCookie },
    { name: 'footnote-reference', trial: tryParseFootnoteReference },
    { name: 'link', trial: tryParseBracketLink },
    { name: 'plain-link', trial: tryParsePlainLink },
    { name: 'radio-target', trial: tryParseRadioTarget },
    { name: 'target', trial: tryParseTarget },
    { name: 'export-snippet', trial: tryParseExportSnippet },
    { name: 'verbatim', trial: tryParseVerbatim },
    { name: 'code', trial: tryParseCode },
    { name: 'line-break', trial: tryParseLineBreak },
    { name: 'emphasis', trial: tryParseEmphasis },
    { name: 'subscript', trial: tryParseSubscript },
    { name: 'superscript', trial: tryParseSuperscript },
];

/**
 * Names of the dispatch table entries, in precedence order
 */
export function getDispatchOrder(): GrammarName[] {
    return DISPATCH_TABLE.map(entry => entry.name);
}

// Cache of restricted tables, keyed by the grammar list instance
const restrictedTables = new WeakMap<readonly GrammarName[], readonly DispatchEntry[]>();

function tableFor(grammar: readonly GrammarName[] | null): readonly DispatchEntry[] {
    if (!grammar) return DISPATCH_TABLE;

    let table = restrictedTables.get(grammar);
    if (!table) {
        const allowed = new Set(grammar);
        table = DISPATCH_TABLE.filter(entry => allowed.has(entry.name));
        restrictedTables.set(grammar, table);
    }
    return table;
}

// =============================================================================
// Literal Fallback
// =============================================================================

/**
 * Characters that may open a construct
 */
const STOP_CHARS = new Set(['$', '\\', '<', '[', '{', '@', '=', '~', '*', '/', '_', '+', '^', '\n', '\r']);

const RE_PROTOCOL_START = /[a-zA-Z]+:\/\//y;

function isAlphanumeric(char: string): boolean {
    return /^[a-zA-Z0-9]$/.test(char);
}

/**
 * Whether a keyword or bare link may start at a word boundary at i
 */
function startsWordConstruct(text: string, i: number): boolean {
    if (isAlphanumeric(text[i - 1])) return false;

    RE_TIMESTAMP_KEYWORD.lastIndex = i;
    if (RE_TIMESTAMP_KEYWORD.test(text)) return true;

    RE_PROTOCOL_START.lastIndex = i;
    return RE_PROTOCOL_START.test(text);
}

/**
 * Index where the literal run starting at pos ends.
 * Returns pos when the very first character could open a construct.
 */
export function scanLiteral(text: string, pos: number): number {
    let i = pos;
    while (i < text.length) {
        if (STOP_CHARS.has(text[i])) break;
        if (i > pos && startsWordConstruct(text, i)) break;
        i++;
    }
    return i;
}

// =============================================================================
// Normalization
// =============================================================================

/**
 * Merge consecutive plain-text nodes, joining values and ranges
 */
export function mergePlainText(nodes: readonly InlineNode[]): InlineNode[] {
    const result: InlineNode[] = [];

    for (const node of nodes) {
        const last = result[result.length - 1];
        if (isPlainText(node) && last !== undefined && isPlainText(last)) {
            result[result.length - 1] = createPlainText(last.properties.value + node.properties.value, {
                start: last.range.start,
                end: node.range.end,
            });
        } else {
            result.push(node);
        }
    }

    return result;
}

// =============================================================================
// Dispatcher
// =============================================================================

/**
 * Parse text into a normalized node sequence
 * @param baseOffset - Offset of text[0] in the top-level input
 * @param grammar - Allowed grammars, or null for the full table
 */
function parseSequence(
    text: string,
    session: InlineSession,
    baseOffset: number,
    grammar: readonly GrammarName[] | null
): InlineNode[] {
    const table = tableFor(grammar);
    const ctx: GrammarContext = {
        session,
        baseOffset,
        parseNested: (body, offset, nested) => parseSequence(body, session, offset, nested),
    };

    const nodes: InlineNode[] = [];
    let pos = 0;

    while (pos < text.length) {
        let matched: InlineNode | null = null;
        for (const entry of table) {
            matched = entry.trial(text, pos, ctx);
            if (matched) break;
        }

        if (matched) {
            nodes.push(matched);
            pos = matched.range.end - baseOffset;
            continue;
        }

        // Nothing matched: take the literal run, or one character when the scan cannot advance
        const end = Math.max(scanLiteral(text, pos), pos + 1);
        nodes.push(createPlainText(text.slice(pos, end), spanOf(ctx, pos, end)));
        pos = end;
    }

    return mergePlainText(nodes);
}

/**
 * Parse one line or paragraph fragment of org text into inline nodes
 *
 * Never throws for user input: anything that is not a recognized construct
 * is returned as plain text.
 *
 * @param session - Parse session; a fresh one is used when omitted
 */
export function parseInline(text: string, session: InlineSession = new InlineSession()): InlineNode[] {
    if (text === '') return [];

    const nodes = parseSequence(text, session, 0, null);
    session.logger.debug('Parsed inline text', { length: text.length, nodes: nodes.length });
    return nodes;
}
