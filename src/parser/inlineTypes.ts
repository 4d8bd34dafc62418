/**
 * Inline node type definitions
 * Based on the org-element object taxonomy, reduced to what the inline grammar produces
 */

// =============================================================================
// Node Type Taxonomy
// =============================================================================

/**
 * Node types - inline, within one line or paragraph fragment
 */
export type InlineNodeType =
    | 'emphasis'
    | 'code'
    | 'verbatim'
    | 'plain-text'
    | 'line-break'
    | 'link'
    | 'target'
    | 'radio-target'
    | 'subscript'
    | 'superscript'
    | 'footnote-reference'
    | 'statistics-cookie'
    | 'latex-fragment'
    | 'macro'
    | 'entity'
    | 'timestamp'
    | 'export-snippet';

export type EmphasisKind = 'bold' | 'italic' | 'underline' | 'strike-through';

// =============================================================================
// Position and Range
// =============================================================================

/**
 * Character offset range in the parsed input
 */
export interface InlineRange {
    /** Start character offset (0-indexed, inclusive) */
    readonly start: number;
    /** End character offset (0-indexed, exclusive) */
    readonly end: number;
}

// =============================================================================
// Base Node
// =============================================================================

interface InlineNodeBase {
    readonly type: InlineNodeType;
    /** Source span, relative to the top-level input */
    readonly range: InlineRange;
}

// =============================================================================
// Timestamp Payloads
// =============================================================================

export interface CalendarDate {
    readonly year: number;
    /** 1-12 */
    readonly month: number;
    readonly day: number;
}

export interface ClockTime {
    readonly hour: number;
    readonly minute: number;
}

/**
 * Repeater kinds:
 * - cumulative (+): shift from the original date
 * - catch-up (++): shift until the date is in the future
 * - restart (.+): shift from today
 */
export type RepetitionKind = 'cumulative' | 'catch-up' | 'restart';

export type RepetitionUnit = 'hour' | 'day' | 'week' | 'month' | 'year';

export interface Repetition {
    readonly kind: RepetitionKind;
    readonly value: number;
    readonly unit: RepetitionUnit;
}

/**
 * One point in time as written in a timestamp
 */
export interface TimestampPoint {
    readonly date: CalendarDate;
    readonly time: ClockTime | null;
    readonly repetition: Repetition | null;
    /** <...> is active, [...] is inactive */
    readonly active: boolean;
}

export interface TimestampRange {
    readonly start: TimestampPoint;
    readonly stop: TimestampPoint;
}

export type ClockItem =
    | { readonly state: 'started'; readonly point: TimestampPoint }
    | { readonly state: 'stopped'; readonly range: TimestampRange };

export type Timestamp =
    | { readonly kind: 'scheduled'; readonly point: TimestampPoint }
    | { readonly kind: 'deadline'; readonly point: TimestampPoint }
    | { readonly kind: 'date'; readonly point: TimestampPoint }
    | { readonly kind: 'closed'; readonly point: TimestampPoint }
    | { readonly kind: 'clock'; readonly clock: ClockItem }
    | { readonly kind: 'range'; readonly range: TimestampRange };

// =============================================================================
// Link and Cookie Payloads
// =============================================================================

export type LinkUrl =
    | { readonly kind: 'file'; readonly path: string }
    | { readonly kind: 'search'; readonly term: string }
    | { readonly kind: 'complex'; readonly protocol: string; readonly link: string };

export type StatisticsCookie =
    | { readonly kind: 'percent'; readonly percent: number }
    | { readonly kind: 'absolute'; readonly current: number; readonly max: number };

// =============================================================================
// Specific Node Types
// =============================================================================

/**
 * Bold, italic, underline or strike-through span
 */
export interface EmphasisNode extends InlineNodeBase {
    readonly type: 'emphasis';
    readonly properties: { readonly kind: EmphasisKind };
    readonly children: readonly InlineNode[];
}

/**
 * Code node (~code~)
 */
export interface CodeNode extends InlineNodeBase {
    readonly type: 'code';
    readonly properties: { readonly value: string };
}

/**
 * Verbatim node (=verbatim=)
 */
export interface VerbatimNode extends InlineNodeBase {
    readonly type: 'verbatim';
    readonly properties: { readonly value: string };
}

export interface PlainTextNode extends InlineNodeBase {
    readonly type: 'plain-text';
    readonly properties: { readonly value: string };
}

export interface LineBreakNode extends InlineNodeBase {
    readonly type: 'line-break';
}

/**
 * Link node ([[url][label]] or protocol://rest)
 */
export interface LinkNode extends InlineNodeBase {
    readonly type: 'link';
    readonly properties: {
        readonly url: LinkUrl;
        /** bracket: [[...]], plain: bare protocol://... */
        readonly format: 'bracket' | 'plain';
    };
    /** Label objects */
    readonly children: readonly InlineNode[];
}

/**
 * Target node (<<target>>)
 */
export interface TargetNode extends InlineNodeBase {
    readonly type: 'target';
    readonly properties: { readonly value: string };
}

/**
 * Radio target node (<<<radio>>>)
 */
export interface RadioTargetNode extends InlineNodeBase {
    readonly type: 'radio-target';
    readonly properties: { readonly value: string };
}

export interface SubscriptNode extends InlineNodeBase {
    readonly type: 'subscript';
    readonly children: readonly InlineNode[];
}

export interface SuperscriptNode extends InlineNodeBase {
    readonly type: 'superscript';
    readonly children: readonly InlineNode[];
}

/**
 * Footnote reference ([fn:name], [fn:name:definition] or [fn::definition])
 */
export interface FootnoteReferenceNode extends InlineNodeBase {
    readonly type: 'footnote-reference';
    readonly properties: {
        /** User-given or generated name */
        readonly name: string;
        /** Whether the name was generated for an [fn::...] reference */
        readonly anonymous: boolean;
        /** Inline definition, null when absent */
        readonly definition: readonly InlineNode[] | null;
    };
}

/**
 * Statistics cookie node ([2/5] or [40%])
 */
export interface StatisticsCookieNode extends InlineNodeBase {
    readonly type: 'statistics-cookie';
    readonly properties: { readonly cookie: StatisticsCookie };
}

/**
 * LaTeX fragment node ($...$, $$...$$, \(...\), \[...\])
 */
export interface LatexFragmentNode extends InlineNodeBase {
    readonly type: 'latex-fragment';
    readonly properties: {
        readonly mode: 'inline' | 'displayed';
        /** Fragment body without delimiters */
        readonly value: string;
    };
}

/**
 * Macro node ({{{name(args)}}})
 */
export interface MacroNode extends InlineNodeBase {
    readonly type: 'macro';
    readonly properties: {
        readonly name: string;
        readonly arguments: readonly string[];
    };
}

/**
 * Entity node (\alpha, \rightarrow, etc.)
 */
export interface EntityNode extends InlineNodeBase {
    readonly type: 'entity';
    readonly properties: {
        /** Entity name without backslash */
        readonly name: string;
        readonly latex: string;
        readonly html: string;
        readonly utf8: string;
    };
}

export interface TimestampNode extends InlineNodeBase {
    readonly type: 'timestamp';
    readonly properties: { readonly timestamp: Timestamp };
}

/**
 * Export snippet node (@@backend:value@@)
 */
export interface ExportSnippetNode extends InlineNodeBase {
    readonly type: 'export-snippet';
    readonly properties: {
        readonly backend: string;
        readonly value: string;
    };
}

export type InlineNode =
    | EmphasisNode
    | CodeNode
    | VerbatimNode
    | PlainTextNode
    | LineBreakNode
    | LinkNode
    | TargetNode
    | RadioTargetNode
    | SubscriptNode
    | SuperscriptNode
    | FootnoteReferenceNode
    | StatisticsCookieNode
    | LatexFragmentNode
    | MacroNode
    | EntityNode
    | TimestampNode
    | ExportSnippetNode;

// =============================================================================
// Type Guards
// =============================================================================

export function isPlainText(node: InlineNode): node is PlainTextNode {
    return node.type === 'plain-text';
}

/**
 * Get the nested sequences a node owns (children, or a footnote definition)
 */
export function childSequences(node: InlineNode): readonly (readonly InlineNode[])[] {
    switch (node.type) {
        case 'emphasis':
        case 'link':
        case 'subscript':
        case 'superscript':
            return [node.children];
        case 'footnote-reference':
            return node.properties.definition ? [node.properties.definition] : [];
        default:
            return [];
    }
}
