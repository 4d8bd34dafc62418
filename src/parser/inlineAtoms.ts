/**
 * Small inline grammars: LaTeX fragments, entities, macros, statistics cookies,
 * targets, export snippets, line breaks, subscripts and superscripts
 */

import {
    SCRIPT_BODY_GRAMMAR,
    createPlainText,
    isNewline,
    spanOf,
    type GrammarContext,
} from './inlineGrammar';
import type {
    EntityNode,
    ExportSnippetNode,
    InlineNode,
    LatexFragmentNode,
    LineBreakNode,
    MacroNode,
    PlainTextNode,
    RadioTargetNode,
    StatisticsCookieNode,
    SubscriptNode,
    SuperscriptNode,
    TargetNode,
} from './inlineTypes';

// =============================================================================
// Pre-compiled Regex Patterns
// =============================================================================

const RE_ENTITY_NAME = /^[a-zA-Z]+/;
const RE_MACRO = /^\{\{\{([a-zA-Z][\w-]*)(?:\(([^)\n]*)\))?\}\}\}/;
const RE_STATISTICS_COOKIE = /^\[([\d/%]+)\]/;
const RE_COOKIE_ABSOLUTE = /^(\d+)\/(\d+)/;
const RE_COOKIE_PERCENT = /^(\d+)%/;
const RE_TARGET = /^<<([^>\n]+)>>/;
const RE_RADIO_TARGET = /^<<<([^>\n]+)>>>/;
const RE_EXPORT_SNIPPET = /^@@([a-zA-Z0-9-]+):([^\n]*?)@@/;
const RE_SCRIPT_BODY = /^[^\s}]+/;

// =============================================================================
// LaTeX Fragments
// =============================================================================

function latexFragment(
    ctx: GrammarContext,
    start: number,
    end: number,
    mode: 'inline' | 'displayed',
    value: string
): LatexFragmentNode {
    return {
        type: 'latex-fragment',
        range: spanOf(ctx, start, end),
        properties: { mode, value },
    };
}

/**
 * $...$, $$...$$, \(...\) and \[...\]
 */
export function tryParseLatexFragment(text: string, pos: number, ctx: GrammarContext): LatexFragmentNode | null {
    if (text[pos] === '$') {
        const displayed = text[pos + 1] === '$';
        const bodyStart = pos + (displayed ? 2 : 1);

        let i = bodyStart;
        while (i < text.length && text[i] !== '$' && !isNewline(text[i])) {
            i++;
        }
        if (i === bodyStart || text[i] !== '$') return null;

        const value = text.slice(bodyStart, i);
        if (!displayed) {
            return latexFragment(ctx, pos, i + 1, 'inline', value);
        }
        return text[i + 1] === '$' ? latexFragment(ctx, pos, i + 2, 'displayed', value) : null;
    }

    if (text[pos] === '\\') {
        const opener = text[pos + 1];
        if (opener !== '(' && opener !== '[') return null;

        const closer = opener === '(' ? '\\)' : '\\]';
        const end = text.indexOf(closer, pos + 2);
        if (end <= pos + 2) return null;

        return latexFragment(ctx, pos, end + 2, opener === '(' ? 'inline' : 'displayed', text.slice(pos + 2, end));
    }

    return null;
}

// =============================================================================
// Entities
// =============================================================================

/**
 * \name - resolved through the session's lookup.
 * An unknown name becomes plain text holding the name, backslash dropped.
 */
export function tryParseEntity(text: string, pos: number, ctx: GrammarContext): EntityNode | PlainTextNode | null {
    if (text[pos] !== '\\') return null;

    const match = text.slice(pos + 1).match(RE_ENTITY_NAME);
    if (!match) return null;

    const name = match[0];
    const range = spanOf(ctx, pos, pos + 1 + name.length);
    const glyph = ctx.session.entityLookup(name);

    if (!glyph) {
        ctx.session.logger.debug('Unknown entity, keeping name as text', { name });
        return createPlainText(name, range);
    }

    return {
        type: 'entity',
        range,
        properties: {
            name,
            latex: glyph.latex,
            html: glyph.html,
            utf8: glyph.utf8,
        },
    };
}

// =============================================================================
// Macros and Cookies
// =============================================================================

/**
 * {{{name(arg1, arg2)}}} or {{{name}}}
 */
export function tryParseMacro(text: string, pos: number, ctx: GrammarContext): MacroNode | null {
    if (!text.startsWith('{{{', pos)) return null;

    const match = text.slice(pos).match(RE_MACRO);
    if (!match) return null;

    const argText = match[2];
    const args = argText ? argText.split(',').map(s => s.trim()) : [];

    return {
        type: 'macro',
        range: spanOf(ctx, pos, pos + match[0].length),
        properties: {
            name: match[1],
            arguments: args,
        },
    };
}

/**
 * [2/5] or [40%].
 * The brackets may hold only digits, '/' and '%'; a leading current/max wins
 * over a leading percent, and anything after the matched prefix is ignored.
 * Numbers beyond the safe integer range fail the cookie.
 */
export function tryParseStatisticsCookie(text: string, pos: number, ctx: GrammarContext): StatisticsCookieNode | null {
    if (text[pos] !== '[') return null;

    const match = text.slice(pos).match(RE_STATISTICS_COOKIE);
    if (!match) return null;

    const range = spanOf(ctx, pos, pos + match[0].length);
    const absolute = match[1].match(RE_COOKIE_ABSOLUTE);
    if (absolute) {
        const current = parseInt(absolute[1], 10);
        const max = parseInt(absolute[2], 10);
        if (!Number.isSafeInteger(current) || !Number.isSafeInteger(max)) return null;
        return {
            type: 'statistics-cookie',
            range,
            properties: {
                cookie: {
                    kind: 'absolute',
                    current,
                    max,
                },
            },
        };
    }

    const percent = match[1].match(RE_COOKIE_PERCENT);
    if (percent) {
        const value = parseInt(percent[1], 10);
        if (!Number.isSafeInteger(value)) return null;
        return {
            type: 'statistics-cookie',
            range,
            properties: { cookie: { kind: 'percent', percent: value } },
        };
    }

    return null;
}

// =============================================================================
// Targets and Snippets
// =============================================================================

/**
 * <<target>>
 */
export function tryParseTarget(text: string, pos: number, ctx: GrammarContext): TargetNode | null {
    if (!text.startsWith('<<', pos)) return null;

    const match = text.slice(pos).match(RE_TARGET);
    if (!match) return null;

    return {
        type: 'target',
        range: spanOf(ctx, pos, pos + match[0].length),
        properties: { value: match[1] },
    };
}

/**
 * <<<radio target>>>
 */
export function tryParseRadioTarget(text: string, pos: number, ctx: GrammarContext): RadioTargetNode | null {
    if (!text.startsWith('<<<', pos)) return null;

    const match = text.slice(pos).match(RE_RADIO_TARGET);
    if (!match) return null;

    return {
        type: 'radio-target',
        range: spanOf(ctx, pos, pos + match[0].length),
        properties: { value: match[1] },
    };
}

/**
 * @@backend:value@@
 */
export function tryParseExportSnippet(text: string, pos: number, ctx: GrammarContext): ExportSnippetNode | null {
    if (!text.startsWith('@@', pos)) return null;

    const match = text.slice(pos).match(RE_EXPORT_SNIPPET);
    if (!match) return null;

    return {
        type: 'export-snippet',
        range: spanOf(ctx, pos, pos + match[0].length),
        properties: {
            backend: match[1],
            value: match[2],
        },
    };
}

/**
 * A newline: \n, \r\n or \r
 */
export function tryParseLineBreak(text: string, pos: number, ctx: GrammarContext): LineBreakNode | null {
    if (!isNewline(text[pos])) return null;

    const length = text[pos] === '\r' && text[pos + 1] === '\n' ? 2 : 1;
    return {
        type: 'line-break',
        range: spanOf(ctx, pos, pos + length),
    };
}

// =============================================================================
// Subscript and Superscript
// =============================================================================

/**
 * Parse the braced body following a two-character opener (_{ or ^{)
 */
function parseScriptBody(
    text: string,
    pos: number,
    opener: string,
    ctx: GrammarContext
): { children: InlineNode[]; end: number } | null {
    if (!text.startsWith(opener, pos)) return null;

    const bodyStart = pos + opener.length;
    const match = text.slice(bodyStart).match(RE_SCRIPT_BODY);
    if (!match) return null;

    const bodyEnd = bodyStart + match[0].length;
    if (text[bodyEnd] !== '}') return null;

    return {
        children: ctx.parseNested(match[0], ctx.baseOffset + bodyStart, SCRIPT_BODY_GRAMMAR),
        end: bodyEnd + 1,
    };
}

/**
 * _{subscript}
 */
export function tryParseSubscript(text: string, pos: number, ctx: GrammarContext): SubscriptNode | null {
    const body = parseScriptBody(text, pos, '_{', ctx);
    if (!body) return null;

    return {
        type: 'subscript',
        range: spanOf(ctx, pos, body.end),
        children: body.children,
    };
}

/**
 * ^{superscript}
 */
export function tryParseSuperscript(text: string, pos: number, ctx: GrammarContext): SuperscriptNode | null {
    const body = parseScriptBody(text, pos, '^{', ctx);
    if (!body) return null;

    return {
        type: 'superscript',
        range: spanOf(ctx, pos, body.end),
        children: body.children,
    };
}
