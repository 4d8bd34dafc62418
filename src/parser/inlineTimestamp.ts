/**
 * Inline timestamps
 *
 *   <2018-10-16 Tue>                     active date
 *   [2018-10-16 Tue 21:20]               inactive date with time
 *   DEADLINE: <2008-02-10 Sun +1w>       cumulative repeater
 *   SCHEDULED: <2008-02-10 Sun ++1w>     catch-up repeater
 *   <2005-11-01 Tue .+1m>                restart repeater
 *   <2007-05-16 Wed 12:30 +1w>           time and repeater
 *   CLOCK: [2018-09-25 Tue 13:49]        running clock
 *   CLOCK: [2018-09-25 Tue 13:49]--[2018-09-25 Tue 13:51]   stopped clock
 *   <2004-08-23 Mon>--<2004-08-26 Thu>   range
 *
 * Not supported: time ranges within one timestamp (20:00-22:00), warning delays.
 */

import { spanOf, type GrammarContext } from './inlineGrammar';
import type { DateTimeGrammar } from './orgDateTime';
import type { Timestamp, TimestampNode, TimestampPoint } from './inlineTypes';

type TimestampKeyword = 'SCHEDULED:' | 'DEADLINE:' | 'CLOSED:' | 'CLOCK:';

const KEYWORDS: readonly TimestampKeyword[] = ['SCHEDULED:', 'DEADLINE:', 'CLOSED:', 'CLOCK:'];

/**
 * Matches a keyword at the current position (used by the literal scan too)
 */
export const RE_TIMESTAMP_KEYWORD = /SCHEDULED:|DEADLINE:|CLOSED:|CLOCK:/y;

// <YYYY or [YYYY
const RE_DATE_OPENER = /^[<[]\d{4}$/;

// date [dayname] [token] [token]
const RE_TIMESTAMP_BODY = /^(\S+)(?:[ \t]+([a-zA-Z]+))?(?:[ \t]+(\S+))?(?:[ \t]+(\S+))?$/;

interface ParsedTimestamp {
    timestamp: Timestamp;
    /** Index just past the closing bracket */
    end: number;
}

function skipBlanks(text: string, pos: number): number {
    let i = pos;
    while (text[i] === ' ' || text[i] === '\t') i++;
    return i;
}

/**
 * Resolve the body of a bracketed timestamp into a point
 */
export function parseTimestampBody(body: string, active: boolean, dateTime: DateTimeGrammar): TimestampPoint | null {
    const match = body.match(RE_TIMESTAMP_BODY);
    if (!match) return null;

    const [, dateText, , first, second] = match;
    const date = dateTime.parseDate(dateText);
    if (!date) return null;

    // Date only
    if (first === undefined) {
        return { date, time: null, repetition: null, active };
    }

    // One token: repeater if it starts with + or ., otherwise a time
    if (second === undefined) {
        if (first[0] === '+' || first[0] === '.') {
            const repeated = dateTime.parseRepeater(first, date, null, first[0]);
            if (!repeated) return null;
            return { date: repeated.date, time: repeated.time, repetition: repeated.repetition, active };
        }
        const time = dateTime.parseTime(first);
        return time ? { date, time, repetition: null, active } : null;
    }

    // Two tokens: time, then repeater
    const time = dateTime.parseTime(first);
    if (!time) return null;
    const repeated = dateTime.parseRepeater(second, date, time, second[0]);
    if (!repeated) return null;
    return { date: repeated.date, time: repeated.time, repetition: repeated.repetition, active };
}

/**
 * Parse <...> or [...] at pos
 */
function parseBracketed(text: string, pos: number, dateTime: DateTimeGrammar): { point: TimestampPoint; end: number } | null {
    const open = text[pos];
    if (open !== '<' && open !== '[') return null;

    const active = open === '<';
    const close = active ? '>' : ']';

    let i = pos + 1;
    while (i < text.length && text[i] !== close) {
        if (text[i] === '\n' || text[i] === '\r') return null;
        i++;
    }
    if (i >= text.length) return null;

    const point = parseTimestampBody(text.slice(pos + 1, i), active, dateTime);
    return point ? { point, end: i + 1 } : null;
}

function wrapPoint(keyword: TimestampKeyword | null, point: TimestampPoint): Timestamp {
    switch (keyword) {
        case 'SCHEDULED:':
            return { kind: 'scheduled', point };
        case 'DEADLINE:':
            return { kind: 'deadline', point };
        case 'CLOSED:':
            return { kind: 'closed', point };
        case 'CLOCK:':
            return { kind: 'clock', clock: { state: 'started', point } };
        default:
            return { kind: 'date', point };
    }
}

/**
 * A keyword-prefixed or bare timestamp, without ranges
 */
function parseGeneralTimestamp(text: string, pos: number, dateTime: DateTimeGrammar): ParsedTimestamp | null {
    const keyword = KEYWORDS.find(k => text.startsWith(k, pos)) ?? null;
    const bracketPos = keyword ? skipBlanks(text, pos + keyword.length) : pos;

    const parsed = parseBracketed(text, bracketPos, dateTime);
    if (!parsed) return null;

    return { timestamp: wrapPoint(keyword, parsed.point), end: parsed.end };
}

/**
 * The plain point of a parsed timestamp; keyword wrapping is dropped, clocks have none
 */
function extractPoint(timestamp: Timestamp): TimestampPoint | null {
    switch (timestamp.kind) {
        case 'date':
        case 'scheduled':
        case 'deadline':
        case 'closed':
            return timestamp.point;
        default:
            return null;
    }
}

/**
 * [CLOCK:] timestamp--timestamp
 */
function parseRange(text: string, pos: number, dateTime: DateTimeGrammar): ParsedTimestamp | null {
    const clock = text.startsWith('CLOCK:', pos);
    const firstPos = clock ? skipBlanks(text, pos + 'CLOCK:'.length) : pos;

    const first = parseGeneralTimestamp(text, firstPos, dateTime);
    if (!first || !text.startsWith('--', first.end)) return null;

    const second = parseGeneralTimestamp(text, first.end + 2, dateTime);
    if (!second) return null;

    const start = extractPoint(first.timestamp);
    const stop = extractPoint(second.timestamp);
    if (!start || !stop) return null;

    const range = { start, stop };
    return {
        timestamp: clock ? { kind: 'clock', clock: { state: 'stopped', range } } : { kind: 'range', range },
        end: second.end,
    };
}

/**
 * Timestamp trial: a range first, then a single timestamp
 */
export function tryParseTimestamp(text: string, pos: number, ctx: GrammarContext): TimestampNode | null {
    const dateTime = ctx.session.dateTime;
    const parsed = parseRange(text, pos, dateTime) ?? parseGeneralTimestamp(text, pos, dateTime);
    if (!parsed) {
        if (RE_DATE_OPENER.test(text.slice(pos, pos + 5))) {
            ctx.session.logger.child('Timestamp').debug('Rejected timestamp-like text', {
                offset: ctx.baseOffset + pos,
            });
        }
        return null;
    }

    return {
        type: 'timestamp',
        range: spanOf(ctx, pos, parsed.end),
        properties: { timestamp: parsed.timestamp },
    };
}
