/**
 * Tests for emphasis, code and verbatim spans
 */

import { describe, it, expect, afterEach } from 'vitest';
import { parseInline } from '../inlineParser';
import { InlineSession } from '../inlineSession';
import { resolveNestedEmphasis, scanEmphasis } from '../inlineEmphasis';
import { InlineInvariantError } from '../inlineErrors';
import type { GrammarContext } from '../inlineGrammar';
import type { EmphasisNode } from '../inlineTypes';
import { getLoggingService, type LogSink } from '../../utils/logger';

describe('scanEmphasis', () => {
    it('should find the closing delimiter and the character before it', () => {
        expect(scanEmphasis('*bold* rest', 0, '*')).toEqual({ close: 5, previous: 'd' });
    });

    it('should reject a space after the opening delimiter', () => {
        expect(scanEmphasis('* bold*', 0, '*')).toBeNull();
    });

    it('should reject a space before the closing delimiter', () => {
        expect(scanEmphasis('*bold *', 0, '*')).toBeNull();
    });

    it('should reject an empty body', () => {
        expect(scanEmphasis('** x', 0, '*')).toBeNull();
    });

    it('should not cross a newline', () => {
        expect(scanEmphasis('*bo\nld*', 0, '*')).toBeNull();
    });

    it('should accept punctuation after the closing delimiter', () => {
        for (const after of ['.', ',', '!', '?', '"', "'", ')', '-', ':', ';', '[', '}']) {
            expect(scanEmphasis(`*a*${after}`, 0, '*')).toEqual({ close: 2, previous: 'a' });
        }
    });

    it('should reject a letter after the closing delimiter', () => {
        expect(scanEmphasis('*bold*x', 0, '*')).toBeNull();
    });
});

describe('Emphasis parsing', () => {
    it('should parse bold', () => {
        expect(parseInline('*bold*')).toEqual([
            {
                type: 'emphasis',
                range: { start: 0, end: 6 },
                properties: { kind: 'bold' },
                children: [{ type: 'plain-text', range: { start: 1, end: 5 }, properties: { value: 'bold' } }],
            },
        ]);
    });

    it('should map each marker to its kind', () => {
        const kinds = ['*b*', '/i/', '_u_', '+s+'].map(text => {
            const [node] = parseInline(text);
            return node.type === 'emphasis' ? node.properties.kind : node.type;
        });
        expect(kinds).toEqual(['bold', 'italic', 'underline', 'strike-through']);
    });

    it('should leave malformed emphasis as plain text', () => {
        for (const text of ['* bold*', '*bold *', '*bold*x']) {
            expect(parseInline(text)).toEqual([
                { type: 'plain-text', range: { start: 0, end: text.length }, properties: { value: text } },
            ]);
        }
    });

    it('should end emphasis before trailing punctuation', () => {
        const nodes = parseInline('*bold*.');
        expect(nodes.map(n => n.type)).toEqual(['emphasis', 'plain-text']);
        expect(nodes[1]).toEqual({ type: 'plain-text', range: { start: 6, end: 7 }, properties: { value: '.' } });
    });

    it('should nest italic inside bold', () => {
        expect(parseInline('*bold /italic/ bold*')).toEqual([
            {
                type: 'emphasis',
                range: { start: 0, end: 20 },
                properties: { kind: 'bold' },
                children: [
                    { type: 'plain-text', range: { start: 1, end: 6 }, properties: { value: 'bold ' } },
                    {
                        type: 'emphasis',
                        range: { start: 6, end: 14 },
                        properties: { kind: 'italic' },
                        children: [
                            { type: 'plain-text', range: { start: 7, end: 13 }, properties: { value: 'italic' } },
                        ],
                    },
                    { type: 'plain-text', range: { start: 14, end: 19 }, properties: { value: ' bold' } },
                ],
            },
        ]);
    });

    it('should resolve several levels of nesting', () => {
        const [bold] = parseInline('*a /b _c_ b/ a*');
        expect(bold.type).toBe('emphasis');
        if (bold.type !== 'emphasis') return;

        const italic = bold.children[1];
        expect(italic.type === 'emphasis' && italic.properties.kind).toBe('italic');
        if (italic.type !== 'emphasis') return;

        expect(italic.children.map(n => n.type)).toEqual(['plain-text', 'emphasis', 'plain-text']);
        const underline = italic.children[1];
        expect(underline.type === 'emphasis' && underline.properties.kind).toBe('underline');
        expect(underline.range).toEqual({ start: 6, end: 9 });
    });

    it('should not parse other markup inside emphasis', () => {
        const [bold] = parseInline('*see \\alpha*');
        expect(bold).toEqual({
            type: 'emphasis',
            range: { start: 0, end: 12 },
            properties: { kind: 'bold' },
            children: [{ type: 'plain-text', range: { start: 1, end: 11 }, properties: { value: 'see \\alpha' } }],
        });
    });
});

describe('Code and verbatim', () => {
    it('should parse code without reparsing its body', () => {
        expect(parseInline('~*x*~')).toEqual([
            { type: 'code', range: { start: 0, end: 5 }, properties: { value: '*x*' } },
        ]);
    });

    it('should parse verbatim', () => {
        expect(parseInline('=v=')).toEqual([
            { type: 'verbatim', range: { start: 0, end: 3 }, properties: { value: 'v' } },
        ]);
    });

    it('should apply the emphasis boundary rules to code', () => {
        expect(parseInline('~ x~')).toEqual([
            { type: 'plain-text', range: { start: 0, end: 4 }, properties: { value: '~ x~' } },
        ]);
    });
});

describe('resolveNestedEmphasis', () => {
    let previousSink: LogSink | undefined;

    afterEach(() => {
        if (previousSink) {
            getLoggingService().setSink(previousSink);
            previousSink = undefined;
        }
        getLoggingService().clearErrors();
    });

    it('should throw on a node the emphasis grammar cannot produce', () => {
        previousSink = getLoggingService().setSink(() => undefined);
        getLoggingService().clearErrors();

        const ctx: GrammarContext = {
            session: new InlineSession(),
            baseOffset: 0,
            parseNested: () => [{ type: 'code', range: { start: 1, end: 4 }, properties: { value: 'x' } }],
        };
        const node: EmphasisNode = {
            type: 'emphasis',
            range: { start: 0, end: 5 },
            properties: { kind: 'bold' },
            children: [{ type: 'plain-text', range: { start: 1, end: 4 }, properties: { value: '~x~' } }],
        };

        expect(() => resolveNestedEmphasis(node, ctx)).toThrow(InlineInvariantError);
        expect(getLoggingService().getErrorCount()).toBe(1);
    });
});
