/**
 * Date, time and repeater grammar used by inline timestamps
 * Pure functions - no shared state
 */

import { format, isValid, parse } from 'date-fns';
import type {
    CalendarDate,
    ClockTime,
    Repetition,
    RepetitionKind,
    RepetitionUnit,
    TimestampPoint,
} from './inlineTypes';

/**
 * Result of applying a repeater token
 */
export interface RepeaterResult {
    date: CalendarDate;
    time: ClockTime | null;
    repetition: Repetition;
}

/**
 * The date/time collaborator consumed by the timestamp grammar
 */
export interface DateTimeGrammar {
    /** Parse YYYY-MM-DD, null when malformed or not a calendar date */
    parseDate(text: string): CalendarDate | null;
    /** Parse H:MM or HH:MM */
    parseTime(text: string): ClockTime | null;
    /**
     * Parse a repeater token such as +1w, ++2d or .+1m
     * @param lead - The token's first character ('+' or '.')
     */
    parseRepeater(
        token: string,
        date: CalendarDate,
        time: ClockTime | null,
        lead: string
    ): RepeaterResult | null;
}

const RE_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const RE_TIME = /^(\d{1,2}):(\d{2})$/;
const RE_REPEATER = /^(\.\+|\+\+|\+)(\d+)([hdwmy])$/;

// date-fns needs a reference date; anything fixed will do
const REFERENCE_DATE = new Date(2000, 0, 1);

const REPETITION_KINDS: Record<string, RepetitionKind> = {
    '+': 'cumulative',
    '++': 'catch-up',
    '.+': 'restart',
};

const REPETITION_MARKERS: Record<RepetitionKind, string> = {
    'cumulative': '+',
    'catch-up': '++',
    'restart': '.+',
};

const REPETITION_UNITS: Record<string, RepetitionUnit> = {
    'h': 'hour',
    'd': 'day',
    'w': 'week',
    'm': 'month',
    'y': 'year',
};

const UNIT_LETTERS: Record<RepetitionUnit, string> = {
    'hour': 'h',
    'day': 'd',
    'week': 'w',
    'month': 'm',
    'year': 'y',
};

export function parseDate(text: string): CalendarDate | null {
    const match = text.match(RE_DATE);
    if (!match) return null;

    // date-fns rejects day/month overflow such as 2018-02-30
    const parsed = parse(text, 'yyyy-MM-dd', REFERENCE_DATE);
    if (!isValid(parsed)) return null;

    return {
        year: parseInt(match[1], 10),
        month: parseInt(match[2], 10),
        day: parseInt(match[3], 10),
    };
}

export function parseTime(text: string): ClockTime | null {
    const match = text.match(RE_TIME);
    if (!match) return null;

    const parsed = parse(text, 'H:mm', REFERENCE_DATE);
    if (!isValid(parsed)) return null;

    return {
        hour: parseInt(match[1], 10),
        minute: parseInt(match[2], 10),
    };
}

/**
 * Parse a repeater string into a repetition rule
 * The date and time pass through unchanged; the rule describes how they advance.
 */
export function parseRepeater(
    token: string,
    date: CalendarDate,
    time: ClockTime | null,
    lead: string
): RepeaterResult | null {
    if (token[0] !== lead) return null;

    const match = token.match(RE_REPEATER);
    if (!match) return null;

    const value = parseInt(match[2], 10);
    if (value === 0 || !Number.isSafeInteger(value)) return null;

    return {
        date,
        time,
        repetition: {
            kind: REPETITION_KINDS[match[1]],
            value,
            unit: REPETITION_UNITS[match[3]],
        },
    };
}

/**
 * Default date/time grammar
 */
export const defaultDateTimeGrammar: DateTimeGrammar = {
    parseDate,
    parseTime,
    parseRepeater,
};

// =============================================================================
// Formatting
// =============================================================================

/**
 * Convert a timestamp point to a local Date
 */
export function timestampPointToDate(point: TimestampPoint): Date {
    const { year, month, day } = point.date;
    // The Date constructor maps years 0-99 to 1900-1999
    const date = new Date(0);
    date.setFullYear(year, month - 1, day);
    date.setHours(point.time?.hour ?? 0, point.time?.minute ?? 0, 0, 0);
    return date;
}

/**
 * Format a repetition rule, e.g. .+2d
 */
export function formatRepetition(repetition: Repetition): string {
    return `${REPETITION_MARKERS[repetition.kind]}${repetition.value}${UNIT_LETTERS[repetition.unit]}`;
}

/**
 * Format a timestamp point in canonical org form
 * @returns Formatted timestamp like <2026-01-19 Mon 09:30 +1w>
 */
export function formatTimestampPoint(point: TimestampPoint): string {
    const open = point.active ? '<' : '[';
    const close = point.active ? '>' : ']';

    let result = `${open}${format(timestampPointToDate(point), 'yyyy-MM-dd EEE')}`;

    if (point.time) {
        result += ` ${String(point.time.hour).padStart(2, '0')}:${String(point.time.minute).padStart(2, '0')}`;
    }

    if (point.repetition) {
        result += ` ${formatRepetition(point.repetition)}`;
    }

    return result + close;
}
