/**
 * JSON wire format for inline node trees
 *
 *   { "version": 1, "nodes": [ { "type": "plain-text", "range": {...}, "properties": {...} }, ... ] }
 *
 * Decoding validates every node and rebuilds it field by field, so the
 * result holds only the fields the node types declare.
 */

import { InlineSerializationError } from './inlineErrors';
import type {
    CalendarDate,
    ClockItem,
    ClockTime,
    EmphasisKind,
    InlineNode,
    InlineRange,
    LinkUrl,
    Repetition,
    RepetitionKind,
    RepetitionUnit,
    StatisticsCookie,
    Timestamp,
    TimestampPoint,
    TimestampRange,
} from './inlineTypes';

export const INLINE_FORMAT_VERSION = 1;

interface SerializedInline {
    version: number;
    nodes: readonly InlineNode[];
}

/**
 * Encode nodes as JSON
 */
export function serializeInline(nodes: readonly InlineNode[], space?: number): string {
    const payload: SerializedInline = { version: INLINE_FORMAT_VERSION, nodes };
    return JSON.stringify(payload, null, space);
}

// =============================================================================
// Primitive Readers
// =============================================================================

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readObject(value: unknown, path: string): JsonObject {
    if (!isObject(value)) {
        throw new InlineSerializationError(path, 'expected an object');
    }
    return value;
}

function readArray(value: unknown, path: string): unknown[] {
    if (!Array.isArray(value)) {
        throw new InlineSerializationError(path, 'expected an array');
    }
    return value;
}

function readString(value: unknown, path: string): string {
    if (typeof value !== 'string') {
        throw new InlineSerializationError(path, 'expected a string');
    }
    return value;
}

function readBoolean(value: unknown, path: string): boolean {
    if (typeof value !== 'boolean') {
        throw new InlineSerializationError(path, 'expected a boolean');
    }
    return value;
}

function readInteger(value: unknown, path: string): number {
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
        throw new InlineSerializationError(path, 'expected a non-negative integer');
    }
    return value;
}

function readEnum<T extends string>(value: unknown, allowed: readonly T[], path: string): T {
    const found = allowed.find(candidate => candidate === value);
    if (found === undefined) {
        throw new InlineSerializationError(path, `expected one of ${allowed.join(', ')}`);
    }
    return found;
}

function readNullable<T>(value: unknown, path: string, read: (value: unknown, path: string) => T): T | null {
    return value === null ? null : read(value, path);
}

// =============================================================================
// Payload Readers
// =============================================================================

const EMPHASIS_KINDS: readonly EmphasisKind[] = ['bold', 'italic', 'underline', 'strike-through'];
const REPETITION_KINDS: readonly RepetitionKind[] = ['cumulative', 'catch-up', 'restart'];
const REPETITION_UNITS: readonly RepetitionUnit[] = ['hour', 'day', 'week', 'month', 'year'];

function readRange(value: unknown, path: string): InlineRange {
    const obj = readObject(value, path);
    const start = readInteger(obj.start, `${path}.start`);
    const end = readInteger(obj.end, `${path}.end`);
    if (end < start) {
        throw new InlineSerializationError(path, 'end precedes start');
    }
    return { start, end };
}

function readDate(value: unknown, path: string): CalendarDate {
    const obj = readObject(value, path);
    return {
        year: readInteger(obj.year, `${path}.year`),
        month: readInteger(obj.month, `${path}.month`),
        day: readInteger(obj.day, `${path}.day`),
    };
}

function readTime(value: unknown, path: string): ClockTime {
    const obj = readObject(value, path);
    return {
        hour: readInteger(obj.hour, `${path}.hour`),
        minute: readInteger(obj.minute, `${path}.minute`),
    };
}

function readRepetition(value: unknown, path: string): Repetition {
    const obj = readObject(value, path);
    return {
        kind: readEnum(obj.kind, REPETITION_KINDS, `${path}.kind`),
        value: readInteger(obj.value, `${path}.value`),
        unit: readEnum(obj.unit, REPETITION_UNITS, `${path}.unit`),
    };
}

function readPoint(value: unknown, path: string): TimestampPoint {
    const obj = readObject(value, path);
    return {
        date: readDate(obj.date, `${path}.date`),
        time: readNullable(obj.time, `${path}.time`, readTime),
        repetition: readNullable(obj.repetition, `${path}.repetition`, readRepetition),
        active: readBoolean(obj.active, `${path}.active`),
    };
}

function readTimestampRange(value: unknown, path: string): TimestampRange {
    const obj = readObject(value, path);
    return {
        start: readPoint(obj.start, `${path}.start`),
        stop: readPoint(obj.stop, `${path}.stop`),
    };
}

function readClock(value: unknown, path: string): ClockItem {
    const obj = readObject(value, path);
    const state = readEnum(obj.state, ['started', 'stopped'], `${path}.state`);
    return state === 'started'
        ? { state, point: readPoint(obj.point, `${path}.point`) }
        : { state, range: readTimestampRange(obj.range, `${path}.range`) };
}

function readTimestamp(value: unknown, path: string): Timestamp {
    const obj = readObject(value, path);
    const kind = readEnum(obj.kind, ['scheduled', 'deadline', 'date', 'closed', 'clock', 'range'], `${path}.kind`);
    switch (kind) {
        case 'clock':
            return { kind, clock: readClock(obj.clock, `${path}.clock`) };
        case 'range':
            return { kind, range: readTimestampRange(obj.range, `${path}.range`) };
        default:
            return { kind, point: readPoint(obj.point, `${path}.point`) };
    }
}

function readLinkUrl(value: unknown, path: string): LinkUrl {
    const obj = readObject(value, path);
    const kind = readEnum(obj.kind, ['file', 'search', 'complex'], `${path}.kind`);
    switch (kind) {
        case 'file':
            return { kind, path: readString(obj.path, `${path}.path`) };
        case 'search':
            return { kind, term: readString(obj.term, `${path}.term`) };
        case 'complex':
            return {
                kind,
                protocol: readString(obj.protocol, `${path}.protocol`),
                link: readString(obj.link, `${path}.link`),
            };
    }
}

function readCookie(value: unknown, path: string): StatisticsCookie {
    const obj = readObject(value, path);
    const kind = readEnum(obj.kind, ['percent', 'absolute'], `${path}.kind`);
    return kind === 'percent'
        ? { kind, percent: readInteger(obj.percent, `${path}.percent`) }
        : {
            kind,
            current: readInteger(obj.current, `${path}.current`),
            max: readInteger(obj.max, `${path}.max`),
        };
}

// =============================================================================
// Node Readers
// =============================================================================

const NODE_TYPES = [
    'emphasis', 'code', 'verbatim', 'plain-text', 'line-break', 'link', 'target',
    'radio-target', 'subscript', 'superscript', 'footnote-reference',
    'statistics-cookie', 'latex-fragment', 'macro', 'entity', 'timestamp',
    'export-snippet',
] as const;

function readNodes(value: unknown, path: string): InlineNode[] {
    return readArray(value, path).map((item, index) => readNode(item, `${path}[${index}]`));
}

function readNode(value: unknown, path: string): InlineNode {
    const obj = readObject(value, path);
    const type = readEnum(obj.type, NODE_TYPES, `${path}.type`);
    const range = readRange(obj.range, `${path}.range`);

    // line-break carries no properties
    if (type === 'line-break') {
        return { type, range };
    }

    const props = readObject(obj.properties ?? {}, `${path}.properties`);
    const at = (key: string): string => `${path}.properties.${key}`;

    switch (type) {
        case 'emphasis':
            return {
                type,
                range,
                properties: { kind: readEnum(props.kind, EMPHASIS_KINDS, at('kind')) },
                children: readNodes(obj.children, `${path}.children`),
            };
        case 'code':
        case 'verbatim':
        case 'plain-text':
        case 'target':
        case 'radio-target':
            return { type, range, properties: { value: readString(props.value, at('value')) } };
        case 'link':
            return {
                type,
                range,
                properties: {
                    url: readLinkUrl(props.url, at('url')),
                    format: readEnum(props.format, ['bracket', 'plain'], at('format')),
                },
                children: readNodes(obj.children, `${path}.children`),
            };
        case 'subscript':
        case 'superscript':
            return { type, range, children: readNodes(obj.children, `${path}.children`) };
        case 'footnote-reference':
            return {
                type,
                range,
                properties: {
                    name: readString(props.name, at('name')),
                    anonymous: readBoolean(props.anonymous, at('anonymous')),
                    definition: readNullable(props.definition, at('definition'), readNodes),
                },
            };
        case 'statistics-cookie':
            return { type, range, properties: { cookie: readCookie(props.cookie, at('cookie')) } };
        case 'latex-fragment':
            return {
                type,
                range,
                properties: {
                    mode: readEnum(props.mode, ['inline', 'displayed'], at('mode')),
                    value: readString(props.value, at('value')),
                },
            };
        case 'macro':
            return {
                type,
                range,
                properties: {
                    name: readString(props.name, at('name')),
                    arguments: readArray(props.arguments, at('arguments')).map((arg, index) =>
                        readString(arg, `${at('arguments')}[${index}]`)
                    ),
                },
            };
        case 'entity':
            return {
                type,
                range,
                properties: {
                    name: readString(props.name, at('name')),
                    latex: readString(props.latex, at('latex')),
                    html: readString(props.html, at('html')),
                    utf8: readString(props.utf8, at('utf8')),
                },
            };
        case 'timestamp':
            return { type, range, properties: { timestamp: readTimestamp(props.timestamp, at('timestamp')) } };
        case 'export-snippet':
            return {
                type,
                range,
                properties: {
                    backend: readString(props.backend, at('backend')),
                    value: readString(props.value, at('value')),
                },
            };
    }
}

/**
 * Decode nodes written by serializeInline
 * @throws InlineSerializationError on malformed JSON, an unknown version or a bad node
 */
export function deserializeInline(json: string): InlineNode[] {
    let data: unknown;
    try {
        data = JSON.parse(json);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new InlineSerializationError('$', `not valid JSON (${message})`);
    }

    const root = readObject(data, '$');
    if (root.version !== INLINE_FORMAT_VERSION) {
        throw new InlineSerializationError('$.version', `unsupported version ${String(root.version)}`);
    }

    return readNodes(root.nodes, '$.nodes');
}
