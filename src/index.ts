/**
 * @module persistent-disjoint-set
 * Value-semantics Union-Find over booleans, numbers, strings, Tuples and
 * arrays, or any element type given a comparator.
 */

import { DisjointSet, type DisjointSetOptions } from './disjoint-set';
import type { Comparator, Value } from './value';

export { DisjointSet } from './disjoint-set';
export type { ConnectedResult, DisjointSetOptions, FindResult } from './disjoint-set';
export { DisjointSetError, ElementNotFoundError, InvalidElementError } from './errors';
export type { DisjointSetErrorCode } from './errors';
export { PersistentMap } from './persistent-map';
export { Tuple, compare, compareSequences, formatElement, formatValue, isValue } from './value';
export type { Comparator, Primitive, Value } from './value';

/** Options for element types outside the structural universe. */
export type OrderedBy<T> = DisjointSetOptions<T> & { compare: Comparator<T> };

export function createDisjointSet<T>(elements: Iterable<T>, options: OrderedBy<T>): DisjointSet<T>;
export function createDisjointSet<T extends Value>(elements: Iterable<T>, options?: DisjointSetOptions<T>): DisjointSet<T>;
export function createDisjointSet<T>(elements: Iterable<T>, options?: DisjointSetOptions<T>): DisjointSet<T> {
    return DisjointSet.fromArray(elements, options);
}

export function emptyDisjointSet<T>(options: OrderedBy<T>): DisjointSet<T>;
export function emptyDisjointSet<T extends Value>(options?: DisjointSetOptions<T>): DisjointSet<T>;
export function emptyDisjointSet<T>(options?: DisjointSetOptions<T>): DisjointSet<T> {
    return DisjointSet.empty(options);
}

/** Elements of both sets; `b`'s components are replayed on top of `a`'s. */
export function mergeSets<T>(a: DisjointSet<T>, b: DisjointSet<T>): DisjointSet<T> {
    return a.merge(b);
}
