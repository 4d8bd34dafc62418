/**
 * Parse session: the state that outlives a single grammar call
 *
 * A session owns the anonymous-footnote counter and the collaborators the
 * grammar consults. Sessions are independent of each other; two documents
 * parsed with two sessions never share a counter.
 */

import type { InlineSettings } from '../config/settings';
import { parserLogger, type Logger } from '../utils/logger';
import { defaultDateTimeGrammar, type DateTimeGrammar } from './orgDateTime';
import { createEntityLookup, defaultEntityLookup, type EntityLookup } from './orgEntities';

export const DEFAULT_ANONYMOUS_PREFIX = '_anon_';

export interface InlineSessionOptions {
    /** Entity table; defaults to the built-in org entities */
    entityLookup?: EntityLookup;
    /** Date, time and repeater parsing used by timestamps */
    dateTime?: DateTimeGrammar;
    /** Prefix for generated footnote names (default _anon_) */
    anonymousPrefix?: string;
    logger?: Logger;
}

export class InlineSession {
    readonly entityLookup: EntityLookup;
    readonly dateTime: DateTimeGrammar;
    readonly anonymousPrefix: string;
    readonly logger: Logger;
    private anonymousCounter = 0;

    constructor(options: InlineSessionOptions = {}) {
        this.entityLookup = options.entityLookup ?? defaultEntityLookup;
        this.dateTime = options.dateTime ?? defaultDateTimeGrammar;
        this.anonymousPrefix = options.anonymousPrefix ?? DEFAULT_ANONYMOUS_PREFIX;
        this.logger = options.logger ?? parserLogger;
    }

    /**
     * Draw the next generated footnote name. Never reuses a value.
     */
    nextAnonymousName(): string {
        this.anonymousCounter++;
        return `${this.anonymousPrefix}${this.anonymousCounter}`;
    }

    /** Number of generated footnote names handed out so far */
    get anonymousCount(): number {
        return this.anonymousCounter;
    }
}

/**
 * Create a session configured from loaded settings
 */
export function createSessionFromSettings(settings: InlineSettings): InlineSession {
    return new InlineSession({
        entityLookup: createEntityLookup(settings.entities),
        anonymousPrefix: settings.anonymousFootnotePrefix,
    });
}
