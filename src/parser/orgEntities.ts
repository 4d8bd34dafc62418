/**
 * Org-mode entity definitions
 * Based on org-entities.el
 * Provides mappings from org entity names to LaTeX, HTML, and UTF-8 representations
 */

import entityTable from './data/entities.json';

export interface EntityDefinition {
    /** LaTeX representation */
    latex: string;
    /** HTML entity or character */
    html: string;
    /** UTF-8 character(s) */
    utf8: string;
}

/**
 * A resolved entity, as carried by entity nodes
 */
export interface EntityGlyph extends EntityDefinition {
    /** Entity name without backslash */
    name: string;
}

/**
 * Name -> glyph lookup consumed by the inline grammar.
 * Returns undefined for unknown names.
 */
export type EntityLookup = (name: string) => EntityGlyph | undefined;

/**
 * Complete org entity table
 */
export const ORG_ENTITIES: Readonly<Record<string, EntityDefinition>> = entityTable;

/**
 * Get entity definition by name
 */
export function getEntity(name: string): EntityDefinition | undefined {
    return Object.prototype.hasOwnProperty.call(ORG_ENTITIES, name) ? ORG_ENTITIES[name] : undefined;
}

/**
 * Check if a name is a valid entity
 */
export function isValidEntity(name: string): boolean {
    return getEntity(name) !== undefined;
}

/**
 * Get all entity names
 */
export function getAllEntityNames(): string[] {
    return Object.keys(ORG_ENTITIES);
}

/**
 * Build a lookup over the built-in table, with extra definitions taking precedence
 */
export function createEntityLookup(extra: Record<string, EntityDefinition> = {}): EntityLookup {
    const table = new Map<string, EntityDefinition>(Object.entries(ORG_ENTITIES));
    for (const [name, definition] of Object.entries(extra)) {
        table.set(name, definition);
    }
    return (name: string) => {
        const definition = table.get(name);
        return definition ? { name, ...definition } : undefined;
    };
}

/**
 * Lookup over the built-in table only
 */
export const defaultEntityLookup: EntityLookup = createEntityLookup();
