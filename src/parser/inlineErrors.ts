/**
 * Errors raised by the inline parser
 *
 * Grammar trials never throw: a construct that does not match degrades to
 * literal text. These errors cover programming mistakes and bad wire data.
 */

/**
 * Base class for all inline parser errors
 */
export class InlineError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InlineError';
    }
}

/**
 * Thrown when a resolver meets a node shape the dispatcher should never produce
 */
export class InlineInvariantError extends InlineError {
    public readonly nodeType: string;

    constructor(context: string, nodeType: string) {
        super(`Invariant violated in ${context}: unexpected '${nodeType}' node`);
        this.name = 'InlineInvariantError';
        this.nodeType = nodeType;
    }
}

/**
 * Thrown when serialized inline nodes cannot be decoded
 */
export class InlineSerializationError extends InlineError {
    /** JSON path of the offending value, e.g. nodes[2].children[0] */
    public readonly path: string;

    constructor(path: string, message: string) {
        super(`Invalid inline node data at ${path}: ${message}`);
        this.name = 'InlineSerializationError';
        this.path = path;
    }
}
