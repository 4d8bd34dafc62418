/**
 * Tests for LaTeX fragments, entities, macros, statistics cookies, targets,
 * export snippets, line breaks, subscripts and superscripts
 */

import { describe, it, expect } from 'vitest';
import { parseInline } from '../inlineParser';
import { InlineSession } from '../inlineSession';
import { createEntityLookup } from '../orgEntities';
import type { InlineNode } from '../inlineTypes';

function only(text: string, session?: InlineSession): InlineNode {
    const nodes = parseInline(text, session);
    expect(nodes).toHaveLength(1);
    return nodes[0];
}

describe('LaTeX fragments', () => {
    it('should parse $...$ as inline', () => {
        expect(only('$x^2$')).toEqual({
            type: 'latex-fragment',
            range: { start: 0, end: 5 },
            properties: { mode: 'inline', value: 'x^2' },
        });
    });

    it('should parse $$...$$ as displayed', () => {
        expect(only('$$a+b$$')).toEqual({
            type: 'latex-fragment',
            range: { start: 0, end: 7 },
            properties: { mode: 'displayed', value: 'a+b' },
        });
    });

    it('should parse \\(...\\) and \\[...\\]', () => {
        expect(only('\\(a\\)')).toMatchObject({ properties: { mode: 'inline', value: 'a' } });
        expect(only('\\[E=mc^2\\]')).toMatchObject({ properties: { mode: 'displayed', value: 'E=mc^2' } });
    });

    it('should reject empty bodies', () => {
        expect(parseInline('$$').some(n => n.type === 'latex-fragment')).toBe(false);
        expect(parseInline('\\(\\)').some(n => n.type === 'latex-fragment')).toBe(false);
    });

    it('should not cross a newline with $', () => {
        expect(parseInline('$a\nb$').some(n => n.type === 'latex-fragment')).toBe(false);
    });
});

describe('Entities', () => {
    it('should resolve a built-in entity', () => {
        expect(only('\\alpha')).toEqual({
            type: 'entity',
            range: { start: 0, end: 6 },
            properties: { name: 'alpha', latex: '\\alpha', html: '&alpha;', utf8: 'α' },
        });
    });

    it('should end the name at the first non-letter', () => {
        const nodes = parseInline('\\rightarrow2');
        expect(nodes.map(n => n.type)).toEqual(['entity', 'plain-text']);
        expect(nodes[0].range).toEqual({ start: 0, end: 11 });
    });

    it('should degrade an unknown name to plain text', () => {
        expect(parseInline('a \\nosuchentity b')).toEqual([
            { type: 'plain-text', range: { start: 0, end: 17 }, properties: { value: 'a nosuchentity b' } },
        ]);
    });

    it('should use the session lookup', () => {
        const session = new InlineSession({
            entityLookup: createEntityLookup({ check: { latex: '\\checkmark', html: '&#10003;', utf8: '✓' } }),
        });
        expect(only('\\check', session)).toMatchObject({ type: 'entity', properties: { utf8: '✓' } });
    });
});

describe('Macros', () => {
    it('should parse a macro with trimmed arguments', () => {
        expect(only('{{{kbd(C-c, C-x)}}}')).toEqual({
            type: 'macro',
            range: { start: 0, end: 19 },
            properties: { name: 'kbd', arguments: ['C-c', 'C-x'] },
        });
    });

    it('should parse a macro without arguments', () => {
        expect(only('{{{title}}}')).toMatchObject({ properties: { name: 'title', arguments: [] } });
        expect(only('{{{date()}}}')).toMatchObject({ properties: { name: 'date', arguments: [] } });
    });

    it('should keep a single blank argument', () => {
        expect(only('{{{f( )}}}')).toMatchObject({ properties: { name: 'f', arguments: [''] } });
    });

    it('should reject an unterminated macro', () => {
        expect(parseInline('{{{title}}').some(n => n.type === 'macro')).toBe(false);
    });
});

describe('Statistics cookies', () => {
    it('should parse a percent cookie', () => {
        expect(only('[50%]')).toEqual({
            type: 'statistics-cookie',
            range: { start: 0, end: 5 },
            properties: { cookie: { kind: 'percent', percent: 50 } },
        });
    });

    it('should parse an absolute cookie', () => {
        expect(only('[3/10]')).toMatchObject({ properties: { cookie: { kind: 'absolute', current: 3, max: 10 } } });
    });

    it('should prefer an absolute prefix over trailing characters', () => {
        expect(only('[3/10%]')).toMatchObject({ properties: { cookie: { kind: 'absolute', current: 3, max: 10 } } });
    });

    it('should reject cookies without a complete prefix', () => {
        expect(parseInline('[3/]').some(n => n.type === 'statistics-cookie')).toBe(false);
        expect(parseInline('[%]').some(n => n.type === 'statistics-cookie')).toBe(false);
        expect(parseInline('[abc]').some(n => n.type === 'statistics-cookie')).toBe(false);
    });

    it('should degrade numbers beyond the safe integer range to plain text', () => {
        expect(parseInline('[99999999999999999999/3]')).toEqual([
            { type: 'plain-text', range: { start: 0, end: 24 }, properties: { value: '[99999999999999999999/3]' } },
        ]);
        expect(parseInline('[99999999999999999999%]').some(n => n.type === 'statistics-cookie')).toBe(false);
        expect(only('[9007199254740991/1]')).toMatchObject({
            properties: { cookie: { kind: 'absolute', current: 9007199254740991, max: 1 } },
        });
    });
});

describe('Targets and snippets', () => {
    it('should parse a target', () => {
        expect(only('<<anchor>>')).toEqual({
            type: 'target',
            range: { start: 0, end: 10 },
            properties: { value: 'anchor' },
        });
    });

    it('should parse a radio target', () => {
        expect(only('<<<radio>>>')).toEqual({
            type: 'radio-target',
            range: { start: 0, end: 11 },
            properties: { value: 'radio' },
        });
    });

    it('should parse an export snippet', () => {
        expect(only('@@html:<b>@@')).toEqual({
            type: 'export-snippet',
            range: { start: 0, end: 12 },
            properties: { backend: 'html', value: '<b>' },
        });
    });
});

describe('Line breaks', () => {
    it('should produce one node per newline', () => {
        expect(parseInline('\n\r\n\r').map(n => n.range)).toEqual([
            { start: 0, end: 1 },
            { start: 1, end: 3 },
            { start: 3, end: 4 },
        ]);
    });
});

describe('Subscripts and superscripts', () => {
    it('should parse a subscript between text', () => {
        expect(parseInline('H_{2}O')).toEqual([
            { type: 'plain-text', range: { start: 0, end: 1 }, properties: { value: 'H' } },
            {
                type: 'subscript',
                range: { start: 1, end: 5 },
                children: [{ type: 'plain-text', range: { start: 3, end: 4 }, properties: { value: '2' } }],
            },
            { type: 'plain-text', range: { start: 5, end: 6 }, properties: { value: 'O' } },
        ]);
    });

    it('should parse entities inside a superscript', () => {
        const nodes = parseInline('x^{\\alpha}');
        expect(nodes[1]).toEqual({
            type: 'superscript',
            range: { start: 1, end: 10 },
            children: [
                {
                    type: 'entity',
                    range: { start: 3, end: 9 },
                    properties: { name: 'alpha', latex: '\\alpha', html: '&alpha;', utf8: 'α' },
                },
            ],
        });
    });

    it('should reject whitespace in the body', () => {
        expect(parseInline('x^{a b}').some(n => n.type === 'superscript')).toBe(false);
    });
});
