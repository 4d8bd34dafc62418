/**
 * Tests for the org entity table and entity lookups
 */

import { describe, it, expect } from 'vitest';
import {
    createEntityLookup,
    defaultEntityLookup,
    getAllEntityNames,
    getEntity,
    isValidEntity,
} from '../orgEntities';

describe('Org entity table', () => {
    it('defines Greek letters', () => {
        expect(getEntity('alpha')).toEqual({ latex: '\\alpha', html: '&alpha;', utf8: 'α' });
        expect(getEntity('pi')?.utf8).toBe('π');
    });

    it('defines arrows and symbols', () => {
        expect(getEntity('rightarrow')?.utf8).toBe('→');
        expect(getEntity('times')?.html).toBe('&times;');
        expect(getEntity('deg')?.latex).toBe('\\textdegree{}');
    });

    it('stores spacing entities as characters', () => {
        expect(getEntity('nbsp')?.utf8).toBe('\u00A0');
        expect(getEntity('rsquo')?.utf8).toBe('’');
    });

    it('does not resolve object prototype names', () => {
        expect(getEntity('toString')).toBeUndefined();
        expect(isValidEntity('constructor')).toBe(false);
    });

    it('lists every entity name', () => {
        const names = getAllEntityNames();
        expect(names).toContain('alpha');
        expect(names).toContain('nbsp');
        expect(names.every(isValidEntity)).toBe(true);
    });
});

describe('Entity lookups', () => {
    it('returns glyphs with their name', () => {
        expect(defaultEntityLookup('beta')).toEqual({ name: 'beta', latex: '\\beta', html: '&beta;', utf8: 'β' });
        expect(defaultEntityLookup('nosuchentity')).toBeUndefined();
        expect(defaultEntityLookup('constructor')).toBeUndefined();
    });

    it('lets extra definitions add and override entities', () => {
        const lookup = createEntityLookup({
            alpha: { latex: 'A', html: 'a', utf8: 'a' },
            tick: { latex: '\\checkmark', html: '&#10003;', utf8: '✓' },
        });
        expect(lookup('alpha')?.utf8).toBe('a');
        expect(lookup('tick')?.name).toBe('tick');
        expect(lookup('beta')?.utf8).toBe('β');
        expect(defaultEntityLookup('tick')).toBeUndefined();
    });
});
