import { formatElement } from './value';

export type DisjointSetErrorCode = 'ELEMENT_NOT_FOUND' | 'INVALID_ELEMENT';

/**
 * Base class for every error thrown by this library.
 * Messages read `Kind: detail`; `code` is stable for programmatic checks.
 */
export class DisjointSetError extends Error {
    readonly code: DisjointSetErrorCode;

    constructor(code: DisjointSetErrorCode, message: string) {
        super(message);
        this.name = new.target.name;
        this.code = code;
    }
}

/** An operation referenced an element that is not part of the set. */
export class ElementNotFoundError extends DisjointSetError {
    readonly element: unknown;

    constructor(element: unknown) {
        super('ELEMENT_NOT_FOUND', `NotFound: Element ${formatElement(element)} is not part of this DisjointSet.`);
        this.element = element;
    }
}

/**
 * An element outside the built-in universe (NaN, ±Infinity, plain objects, ...).
 * Only raised for sets ordered by the structural comparator.
 */
export class InvalidElementError extends DisjointSetError {
    constructor(element: unknown) {
        super(
            'INVALID_ELEMENT',
            `InvalidElement: ${describe(element)} is not a supported element. ` +
            'Use boolean, number, string, Tuple or Array, or pass a compare option.'
        );
    }
}

function describe(element: unknown): string {
    if (typeof element === 'number') return String(element);
    if (element === null) return 'null';
    if (Array.isArray(element)) return 'Array with unsupported entries';
    return typeof element;
}
