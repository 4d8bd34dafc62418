/**
 * Text views of inline nodes: plain-text projection and org markup
 */

import { formatTimestampPoint } from './orgDateTime';
import { isPlainText } from './inlineTypes';
import type { EmphasisKind, InlineNode, LinkNode, LinkUrl, StatisticsCookie, Timestamp } from './inlineTypes';

// =============================================================================
// Plain-Text Projection
// =============================================================================

/**
 * Project nodes to the text a reader sees.
 * Code, displayed LaTeX, cookies, macros, timestamps, targets, export snippets
 * and line breaks project to nothing.
 */
export function toPlainText(input: InlineNode | readonly InlineNode[]): string {
    if (isNodeList(input)) {
        return input.map(node => toPlainText(node)).join('');
    }

    const node = input;
    switch (node.type) {
        case 'plain-text':
        case 'verbatim':
            return node.properties.value;
        case 'latex-fragment':
            return node.properties.mode === 'inline' ? node.properties.value : '';
        case 'entity':
            return node.properties.utf8;
        case 'emphasis':
        case 'link':
        case 'subscript':
        case 'superscript':
            return toPlainText(node.children);
        case 'footnote-reference':
            return node.properties.definition ? toPlainText(node.properties.definition) : '';
        default:
            return '';
    }
}

function isNodeList(input: InlineNode | readonly InlineNode[]): input is readonly InlineNode[] {
    return Array.isArray(input);
}

// =============================================================================
// Org Markup
// =============================================================================

const EMPHASIS_DELIMITERS: Record<EmphasisKind, string> = {
    'bold': '*',
    'italic': '/',
    'underline': '_',
    'strike-through': '+',
};

export function formatLinkUrl(url: LinkUrl): string {
    switch (url.kind) {
        case 'file':
            return url.path;
        case 'search':
            return url.term;
        case 'complex':
            return `${url.protocol}:${url.link}`;
    }
}

function serializeLink(link: LinkNode): string {
    const url = formatLinkUrl(link.properties.url);

    if (link.properties.format === 'plain') {
        return url;
    }

    const [only] = link.children;
    if (link.children.length === 1 && isPlainText(only) && only.properties.value === url) {
        return `[[${url}]]`;
    }

    return `[[${url}][${toOrgText(link.children)}]]`;
}

function serializeCookie(cookie: StatisticsCookie): string {
    return cookie.kind === 'percent' ? `[${cookie.percent}%]` : `[${cookie.current}/${cookie.max}]`;
}

/**
 * Format a timestamp payload in canonical form
 * @returns e.g. DEADLINE: <2008-02-10 Sun +1w>
 */
export function formatTimestamp(timestamp: Timestamp): string {
    switch (timestamp.kind) {
        case 'date':
            return formatTimestampPoint(timestamp.point);
        case 'scheduled':
            return `SCHEDULED: ${formatTimestampPoint(timestamp.point)}`;
        case 'deadline':
            return `DEADLINE: ${formatTimestampPoint(timestamp.point)}`;
        case 'closed':
            return `CLOSED: ${formatTimestampPoint(timestamp.point)}`;
        case 'range':
            return `${formatTimestampPoint(timestamp.range.start)}--${formatTimestampPoint(timestamp.range.stop)}`;
        case 'clock': {
            const clock = timestamp.clock;
            if (clock.state === 'started') {
                return `CLOCK: ${formatTimestampPoint(clock.point)}`;
            }
            return `CLOCK: ${formatTimestampPoint(clock.range.start)}--${formatTimestampPoint(clock.range.stop)}`;
        }
    }
}

/**
 * Serialize a single node back to org markup
 */
export function serializeInlineNode(node: InlineNode): string {
    switch (node.type) {
        case 'plain-text':
            return node.properties.value;
        case 'emphasis': {
            const marker = EMPHASIS_DELIMITERS[node.properties.kind];
            return marker + toOrgText(node.children) + marker;
        }
        case 'code':
            return '~' + node.properties.value + '~';
        case 'verbatim':
            return '=' + node.properties.value + '=';
        case 'line-break':
            return '\n';
        case 'link':
            return serializeLink(node);
        case 'target':
            return '<<' + node.properties.value + '>>';
        case 'radio-target':
            return '<<<' + node.properties.value + '>>>';
        case 'subscript':
            return '_{' + toOrgText(node.children) + '}';
        case 'superscript':
            return '^{' + toOrgText(node.children) + '}';
        case 'footnote-reference': {
            const { name, anonymous, definition } = node.properties;
            const body = definition ? toOrgText(definition) : '';
            if (anonymous) return `[fn::${body}]`;
            return definition ? `[fn:${name}:${body}]` : `[fn:${name}]`;
        }
        case 'statistics-cookie':
            return serializeCookie(node.properties.cookie);
        case 'latex-fragment':
            return node.properties.mode === 'inline'
                ? `\\(${node.properties.value}\\)`
                : `\\[${node.properties.value}\\]`;
        case 'macro': {
            const args = node.properties.arguments;
            if (args.length === 0) return `{{{${node.properties.name}}}}`;
            // () reads back as no arguments, so a single empty one needs a blank
            const argText = args.join(',') || ' ';
            return `{{{${node.properties.name}(${argText})}}}`;
        }
        case 'entity':
            return '\\' + node.properties.name;
        case 'timestamp':
            return formatTimestamp(node.properties.timestamp);
        case 'export-snippet':
            return `@@${node.properties.backend}:${node.properties.value}@@`;
    }
}

/**
 * Serialize nodes back to org markup
 *
 * Reparsing the result yields the same tree (ranges aside) for trees the
 * parser produced, except where an unknown entity fell back to plain text:
 * the backslash is gone, so the text may read back as other markup
 * ([\fn:1] becomes [fn:1]). Timestamps come out in canonical form.
 */
export function toOrgText(nodes: readonly InlineNode[]): string {
    return nodes.map(node => serializeInlineNode(node)).join('');
}
