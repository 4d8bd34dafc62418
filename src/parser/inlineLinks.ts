/**
 * Links ([[url][label]], protocol://rest) and footnote references
 */

import {
    FOOTNOTE_DEFINITION_GRAMMAR,
    LINK_LABEL_GRAMMAR,
    createPlainText,
    isLetter,
    isNewline,
    spanOf,
    type GrammarContext,
} from './inlineGrammar';
import type { FootnoteReferenceNode, InlineNode, LinkNode, LinkUrl } from './inlineTypes';

// protocol://rest - rest stops at whitespace and bracket/markup characters
const RE_PLAIN_LINK = /^([a-zA-Z]+):\/\/([^\s[\]<>{}()*$]+)/;

// protocol:rest inside brackets
const RE_COMPLEX_URL = /^([^:\s]+):([\s\S]+)$/;

/**
 * Classify the url part of a bracket link
 */
export function classifyUrl(url: string): LinkUrl {
    if (url[0] === '/' || url[0] === '.') {
        return { kind: 'file', path: url };
    }

    const match = url.match(RE_COMPLEX_URL);
    if (match) {
        return { kind: 'complex', protocol: match[1], link: match[2] };
    }

    return { kind: 'search', term: url };
}

/**
 * Index of the first ']' at or after start, -1 if a newline or the end comes first
 */
function findCloseBracket(text: string, start: number): number {
    for (let i = start; i < text.length; i++) {
        if (text[i] === ']') return i;
        if (isNewline(text[i])) return -1;
    }
    return -1;
}

/**
 * [[url]] or [[url][label]]
 */
export function tryParseBracketLink(text: string, pos: number, ctx: GrammarContext): LinkNode | null {
    if (!text.startsWith('[[', pos)) return null;

    const urlStart = pos + 2;
    const urlEnd = findCloseBracket(text, urlStart);
    if (urlEnd <= urlStart) return null;

    const url = text.slice(urlStart, urlEnd);
    let labelStart = urlEnd;
    if (text.startsWith('][', urlEnd)) {
        labelStart = urlEnd + 2;
    }

    const labelEnd = findCloseBracket(text, labelStart);
    if (labelEnd === -1 || !text.startsWith(']]', labelEnd)) return null;

    const label = text.slice(labelStart, labelEnd);
    let children: InlineNode[];
    if (label === '') {
        // No description: the url text is its own label
        children = [createPlainText(url, spanOf(ctx, urlStart, urlEnd))];
    } else {
        children = ctx.parseNested(label, ctx.baseOffset + labelStart, LINK_LABEL_GRAMMAR);
    }

    return {
        type: 'link',
        range: spanOf(ctx, pos, labelEnd + 2),
        properties: {
            url: classifyUrl(url),
            format: 'bracket',
        },
        children,
    };
}

/**
 * Bare protocol://rest at a word start
 */
export function tryParsePlainLink(text: string, pos: number, ctx: GrammarContext): LinkNode | null {
    if (!isLetter(text[pos]) || (pos > 0 && /[a-zA-Z0-9]/.test(text[pos - 1]))) {
        return null;
    }

    const match = text.slice(pos).match(RE_PLAIN_LINK);
    if (!match) return null;

    const [fullMatch, protocol, rest] = match;
    const range = spanOf(ctx, pos, pos + fullMatch.length);

    return {
        type: 'link',
        range,
        properties: {
            url: { kind: 'complex', protocol, link: `//${rest}` },
            format: 'plain',
        },
        children: [createPlainText(fullMatch, range)],
    };
}

/**
 * Parse an inline footnote definition, null when empty
 */
function parseDefinition(
    text: string,
    start: number,
    end: number,
    ctx: GrammarContext
): InlineNode[] | null {
    if (end <= start) return null;
    return ctx.parseNested(text.slice(start, end), ctx.baseOffset + start, FOOTNOTE_DEFINITION_GRAMMAR);
}

/**
 * [fn::definition], [fn:name] or [fn:name:definition]
 */
export function tryParseFootnoteReference(
    text: string,
    pos: number,
    ctx: GrammarContext
): FootnoteReferenceNode | null {
    if (!text.startsWith('[fn:', pos)) return null;

    // Anonymous: [fn::definition]
    if (text[pos + 4] === ':') {
        const bodyStart = pos + 5;
        const close = findCloseBracket(text, bodyStart);
        if (close <= bodyStart) return null;

        const definition = parseDefinition(text, bodyStart, close, ctx);
        return {
            type: 'footnote-reference',
            range: spanOf(ctx, pos, close + 1),
            properties: {
                name: ctx.session.nextAnonymousName(),
                anonymous: true,
                definition,
            },
        };
    }

    // Named: [fn:name] or [fn:name:definition]
    const nameStart = pos + 4;
    let nameEnd = nameStart;
    while (nameEnd < text.length && text[nameEnd] !== ':' && text[nameEnd] !== ']' && !isNewline(text[nameEnd])) {
        nameEnd++;
    }
    if (nameEnd === nameStart) return null;

    const bodyStart = text[nameEnd] === ':' ? nameEnd + 1 : nameEnd;
    const close = findCloseBracket(text, bodyStart);
    if (close === -1) return null;

    return {
        type: 'footnote-reference',
        range: spanOf(ctx, pos, close + 1),
        properties: {
            name: text.slice(nameStart, nameEnd),
            anonymous: false,
            definition: parseDefinition(text, bodyStart, close, ctx),
        },
    };
}
