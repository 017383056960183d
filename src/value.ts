/**
 * @module value
 * @description
 * The built-in element universe of a DisjointSet, used when no custom
 * comparator is given.
 *
 * * Contracts:
 * - Numbers: No NaN / ±Infinity (they break the total order).
 * - No cycles: self-referential arrays overflow on compare.
 * - Immutability-by-contract: an element must not be mutated once stored.
 *   (`ReadonlyArray` is runtime-mutable in JS; use Tuple for stable composites.)
 */

export type Primitive = boolean | number | string;

/**
 * Recursive definition of allowed elements.
 * Closed under nesting, so grid cells (`new Tuple(x, y)`) or paths
 * (`['a', 'b']`) are valid elements.
 */
export type Value =
    | Primitive
    | Tuple<Value[]>
    | ReadonlyArray<Value>;

/** Total order over elements. Returns 0 iff both denote the same element. */
export type Comparator<T> = (a: T, b: T) => number;

// ============================================================================
// 1. COMPARATOR
// ============================================================================

function kindOf(v: Value): number {
    switch (typeof v) {
        case 'boolean': return 0;
        case 'number': return 1;
        case 'string': return 2;
        default: return v instanceof Tuple ? 4 : 3;
    }
}

/**
 * Structural total order across the `Value` universe.
 *
 * Order of kinds: booleans < numbers < strings < arrays < tuples.
 * Composites of the same kind compare by length, then element-wise.
 *
 * @returns Negative if a < b, positive if a > b, 0 if equal.
 */
export function compare(a: Value, b: Value): number {
    if (a === b) return 0;
    if (typeof a === 'number' && typeof b === 'number') return a - b;
    if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : (a > b ? 1 : 0);
    if (typeof a === 'boolean' && typeof b === 'boolean') return a ? 1 : -1;

    const kindA = kindOf(a);
    const kindB = kindOf(b);
    if (kindA !== kindB) return kindA - kindB;

    return compareSequences(asSequence(a), asSequence(b));
}

function asSequence(v: Value): ReadonlyArray<Value> {
    if (v instanceof Tuple) return v.raw;
    return typeof v === 'object' ? v : [v];
}

/** Length first, then element-wise. */
export function compareSequences(a: ReadonlyArray<Value>, b: ReadonlyArray<Value>): number {
    const len = a.length;
    if (len !== b.length) return len - b.length;
    for (let i = 0; i < len; i++) {
        const diff = compare(a[i], b[i]);
        if (diff !== 0) return diff;
    }
    return 0;
}

// ============================================================================
// 2. TUPLE
// ============================================================================

/**
 * Immutable composite element.
 * Two tuples with equal contents are the same element of a DisjointSet.
 */
export class Tuple<T extends Value[]> {
    readonly #values: ReadonlyArray<Value>;

    constructor(...values: T) {
        this.#values = Object.freeze([...values]);
    }

    get raw(): ReadonlyArray<Value> { return this.#values; }
    get length(): number { return this.#values.length; }

    equals(other: Tuple<Value[]>): boolean { return compare(this, other) === 0; }

    *[Symbol.iterator](): Iterator<Value> { yield* this.#values; }

    toString(): string { return `(${this.#values.map(formatValue).join(', ')})`; }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}

// ============================================================================
// 3. VALIDATION & FORMATTING
// ============================================================================

/**
 * Runtime guard for the `Value` universe.
 * Rejects non-finite numbers and anything that is not a primitive, Tuple or array.
 */
export function isValue(v: unknown): v is Value {
    switch (typeof v) {
        case 'boolean':
        case 'string':
            return true;
        case 'number':
            return Number.isFinite(v);
        default:
            if (v instanceof Tuple) return v.raw.every(isValue);
            return Array.isArray(v) && v.every(isValue);
    }
}

/** Human readable form: strings are quoted, arrays use brackets, tuples parentheses. */
export function formatValue(v: Value): string {
    if (typeof v === 'string') return JSON.stringify(v);
    if (typeof v !== 'object') return String(v);
    if (v instanceof Tuple) return v.toString();
    return `[${v.map(formatValue).join(', ')}]`;
}

/** `formatValue` for built-in values, `String()` for anything else. */
export function formatElement(x: unknown): string {
    return isValue(x) ? formatValue(x) : String(x);
}
