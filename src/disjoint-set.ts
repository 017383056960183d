/**
 * @module disjoint-set
 * @description
 * Persistent Union-Find (Disjoint Set) with union by rank and path compression.
 *
 * * Semantics:
 * - Value Semantics: no method mutates the receiver. "Updates" return a new
 *   DisjointSet; old versions stay valid and share structure with new ones.
 * - Element identity is the comparator (structural by default), so
 *   `new Tuple(0, 1)` and another `new Tuple(0, 1)` are one element.
 * - Enumerations follow insertion order. A reset element keeps its place.
 * - Methods that return elements return the stored instance.
 *
 * * Complexity (N = element count, α = inverse Ackermann):
 * - findRoot / union / connected: O(α(N) · log N) amortized when the returned
 *   set is threaded forward (the log factor is the persistent map).
 * - add: O(log N). remove / reset / component: O(N).
 * - components / toAdjacency: O(N log N) and O(Σ k²) respectively.
 */

import { ElementNotFoundError, InvalidElementError } from './errors';
import { PersistentMap } from './persistent-map';
import { compare as compareValues, formatElement, isValue, type Comparator } from './value';

export interface DisjointSetOptions<T> {
    /**
     * Element identity and ordering. Defaults to the structural `compare`,
     * which only admits booleans, finite numbers, strings, Tuples and arrays.
     * Every set derived from this one keeps the same comparator.
     */
    compare?: Comparator<T>;
}

export interface FindResult<T> {
    /** Representative of the component. */
    readonly root: T;
    /** The set with the traversed path relinked directly to `root`. */
    readonly set: DisjointSet<T>;
}

export interface ConnectedResult<T> {
    readonly connected: boolean;
    readonly set: DisjointSet<T>;
}

interface Forest<T> {
    readonly parent: PersistentMap<T, T>;
    /** Upper bound on subtree height. Only meaningful at roots. */
    readonly rank: PersistentMap<T, number>;
    /** Component size. Only meaningful at roots. */
    readonly size: PersistentMap<T, number>;
    /** Insertion number of each element. */
    readonly order: PersistentMap<T, number>;
    /** Elements by insertion number. */
    readonly inserted: PersistentMap<number, T>;
    readonly count: number;
    readonly nextOrder: number;
}

function structuralCompare(a: unknown, b: unknown): number {
    if (!isValue(a)) throw new InvalidElementError(a);
    if (!isValue(b)) throw new InvalidElementError(b);
    return compareValues(a, b);
}

const acceptAny = (): boolean => true;
const byNumber: Comparator<number> = (a, b) => a - b;

export class DisjointSet<T> {
    readonly #compare: Comparator<T>;
    readonly #validate: (x: T) => boolean;
    readonly #forest: Forest<T>;

    private constructor(compare: Comparator<T>, validate: (x: T) => boolean, forest: Forest<T>) {
        this.#compare = compare;
        this.#validate = validate;
        this.#forest = forest;
    }

    /**
     * Without a `compare` option only the structural universe is admitted,
     * checked on `add`. The typed factories `createDisjointSet` and
     * `emptyDisjointSet` enforce the same rule at compile time.
     */
    static empty<U>(options: DisjointSetOptions<U> = {}): DisjointSet<U> {
        const compare: Comparator<U> = options.compare ?? structuralCompare;
        const validate: (x: U) => boolean = options.compare ? acceptAny : isValue;
        return new DisjointSet<U>(compare, validate, {
            parent: PersistentMap.empty<U, U>(compare),
            rank: PersistentMap.empty<U, number>(compare),
            size: PersistentMap.empty<U, number>(compare),
            order: PersistentMap.empty<U, number>(compare),
            inserted: PersistentMap.empty<number, U>(byNumber),
            count: 0,
            nextOrder: 0,
        });
    }

    /**
     * Forest of singletons. Duplicates collapse into one element.
     * @throws InvalidElementError for NaN, ±Infinity or unsupported values
     *   when no `compare` option is given.
     */
    static fromArray<U>(elements: Iterable<U>, options: DisjointSetOptions<U> = {}): DisjointSet<U> {
        let set = DisjointSet.empty(options);
        for (const el of elements) set = set.add(el);
        return set;
    }

    #derive(changes: Partial<Forest<T>>): DisjointSet<T> {
        return new DisjointSet(this.#compare, this.#validate, { ...this.#forest, ...changes });
    }

    #required<V>(map: PersistentMap<T, V>, key: T): V {
        const v = map.get(key);
        if (v === undefined) throw new ElementNotFoundError(key);
        return v;
    }

    /** Elements in insertion order. */
    #elements(): T[] { return this.#forest.inserted.values(); }

    /**
     * Follows parent pointers without relinking anything.
     * `path` holds every node before the root, starting at `x`.
     */
    #walk(x: T): { root: T; path: T[] } {
        const { parent } = this.#forest;
        const path: T[] = [];
        let node = x;
        let next = this.#required(parent, node);
        while (this.#compare(next, node) !== 0) {
            path.push(node);
            node = next;
            next = this.#required(parent, node);
        }
        return { root: next, path };
    }

    #rootOf(x: T): T { return this.#walk(x).root; }

    // --- Size & Membership ---

    /** Number of components. */
    get count(): number { return this.#forest.count; }

    /** Number of elements. */
    get elementCount(): number { return this.#forest.parent.size; }

    isEmpty(): boolean { return this.#forest.parent.size === 0; }

    has(x: T): boolean { return this.#forest.parent.has(x); }

    /** Direct parent of `x` (itself for a root). */
    parentOf(x: T): T { return this.#required(this.#forest.parent, x); }

    rankOf(x: T): number { return this.#required(this.#forest.rank, x); }

    // --- Find / Union ---

    /**
     * Resolves the representative of `x` with path compression.
     * The returned `set` is the receiver itself when no node needed relinking.
     * @throws ElementNotFoundError if `x` is absent.
     */
    findRoot(x: T): FindResult<T> {
        const { root, path } = this.#walk(x);
        // The last node on the path already points at the root.
        if (path.length < 2) return { root, set: this };

        let parent = this.#forest.parent;
        for (const node of path) parent = parent.set(node, root);
        return { root, set: this.#derive({ parent }) };
    }

    /**
     * Merges the components of `a` and `b` by rank.
     *
     * The root of strictly smaller rank is attached under the other. On equal
     * ranks the root of `b` goes under the root of `a`, whose rank grows by one.
     * Already connected: only the path compression of both finds is applied.
     *
     * @throws ElementNotFoundError if `a` or `b` is absent.
     */
    union(a: T, b: T): DisjointSet<T> {
        const first = this.findRoot(a);
        const second = first.set.findRoot(b);
        if (this.#compare(first.root, second.root) === 0) return second.set;
        return second.set.#link(first.root, second.root);
    }

    #link(rootA: T, rootB: T): DisjointSet<T> {
        const { parent, rank, size, count } = this.#forest;
        const rankA = this.#required(rank, rootA);
        const rankB = this.#required(rank, rootB);
        const total = this.#required(size, rootA) + this.#required(size, rootB);

        const [winner, loser]: [T, T] = rankA < rankB ? [rootB, rootA] : [rootA, rootB];

        return this.#derive({
            parent: parent.set(loser, winner),
            rank: rankA === rankB ? rank.set(rootA, rankA + 1) : rank,
            size: size.set(winner, total),
            count: count - 1,
        });
    }

    /** @throws ElementNotFoundError if `a` or `b` is absent. */
    connected(a: T, b: T): ConnectedResult<T> {
        const first = this.findRoot(a);
        const second = first.set.findRoot(b);
        return { connected: this.#compare(first.root, second.root) === 0, set: second.set };
    }

    // --- Component Queries (read-only, no compression) ---

    /** @throws ElementNotFoundError if `x` is absent. */
    sizeOf(x: T): number { return this.#required(this.#forest.size, this.#rootOf(x)); }

    /** @throws ElementNotFoundError if `x` is absent. */
    isSingleton(x: T): boolean { return this.sizeOf(x) === 1; }

    /**
     * Groups every element by its root.
     * Components appear in order of their earliest member; members keep
     * insertion order.
     */
    components(): Map<T, T[]> {
        const groups = new Map<T, T[]>();
        for (const el of this.#elements()) {
            const root = this.#rootOf(el);
            const members = groups.get(root);
            if (members) members.push(el);
            else groups.set(root, [el]);
        }
        return groups;
    }

    /**
     * Members of the component containing `x`, in insertion order.
     * @throws ElementNotFoundError if `x` is absent.
     */
    component(x: T): T[] {
        const root = this.#rootOf(x);
        return this.#elements().filter(el => this.#compare(this.#rootOf(el), root) === 0);
    }

    /** All self-parented elements, in insertion order. */
    roots(): T[] {
        const { parent } = this.#forest;
        return this.#elements().filter(el => this.#compare(this.#required(parent, el), el) === 0);
    }

    /** Component sizes, largest first. */
    componentSizes(): number[] {
        return this.roots()
            .map(root => this.#required(this.#forest.size, root))
            .sort((a, b) => b - a);
    }

    largestComponentSize(): number {
        const sizes = this.componentSizes();
        return sizes.length === 0 ? 0 : sizes[0];
    }

    smallestComponentSize(): number {
        const sizes = this.componentSizes();
        return sizes.length === 0 ? 0 : sizes[sizes.length - 1];
    }

    /** True iff there is exactly one component (false for an empty set). */
    areAllConnected(): boolean { return this.#forest.count === 1; }

    /**
     * Clique adjacency: each element maps to the other members of its
     * component. Keys and neighbours keep insertion order.
     */
    toAdjacency(): Map<T, T[]> {
        const byRoot = this.components();
        const adjacency = new Map<T, T[]>();
        for (const el of this.#elements()) {
            const members = byRoot.get(this.#rootOf(el)) ?? [];
            adjacency.set(el, members.filter(m => this.#compare(m, el) !== 0));
        }
        return adjacency;
    }

    // --- Element Lifecycle ---

    /**
     * Inserts `x` as a new singleton at the end of the insertion order.
     * Returns the receiver if `x` is present.
     * @throws InvalidElementError for NaN, ±Infinity or unsupported values
     *   under the structural comparator.
     */
    add(x: T): DisjointSet<T> {
        if (!this.#validate(x)) throw new InvalidElementError(x);
        if (this.#forest.parent.has(x)) return this;
        return this.#insert(x, this.#forest.nextOrder);
    }

    #insert(x: T, seq: number): DisjointSet<T> {
        const { parent, rank, size, order, inserted, count, nextOrder } = this.#forest;
        return this.#derive({
            parent: parent.set(x, x),
            rank: rank.set(x, 0),
            size: size.set(x, 1),
            order: order.set(x, seq),
            inserted: inserted.set(seq, x),
            count: count + 1,
            nextOrder: Math.max(nextOrder, seq + 1),
        });
    }

    /**
     * Deletes `x` and keeps the rest of its component connected.
     *
     * - Singleton: the component disappears (`count - 1`).
     * - Non-root: nodes pointing at `x` are relinked to the root, whose size
     *   shrinks by one.
     * - Root with members: the child of highest rank (ties: earliest inserted)
     *   becomes the root, adopts the other children and inherits `x`'s rank.
     *
     * Returns the receiver if `x` is absent.
     */
    remove(x: T): DisjointSet<T> {
        const forest = this.#forest;
        if (!forest.parent.has(x)) return this;

        const root = this.#rootOf(x);
        const total = this.#required(forest.size, root);
        let parent = forest.parent.delete(x);
        let rank = forest.rank.delete(x);
        let size = forest.size.delete(x);
        const order = forest.order.delete(x);
        const inserted = forest.inserted.delete(this.#required(forest.order, x));

        if (total === 1) return this.#derive({ parent, rank, size, order, inserted, count: forest.count - 1 });

        const remaining = parent;
        const children = inserted.values()
            .filter(el => this.#compare(this.#required(remaining, el), x) === 0);

        let newRoot = root;
        if (this.#compare(root, x) === 0) {
            newRoot = children.reduce((best, c) =>
                this.#required(rank, c) > this.#required(rank, best) ? c : best);
            rank = rank.set(newRoot, this.#required(forest.rank, x));
        }

        for (const child of children) parent = parent.set(child, newRoot);
        size = size.set(newRoot, total - 1);

        return this.#derive({ parent, rank, size, order, inserted });
    }

    /**
     * Makes `x` a singleton again, keeping its place in the insertion order.
     * `x` leaves its old component, which shrinks by one, so `count` grows by
     * one. Absent `x` is added; a singleton `x` returns the receiver.
     * @throws InvalidElementError for an absent, unsupported `x`.
     */
    reset(x: T): DisjointSet<T> {
        if (!this.#forest.parent.has(x)) return this.add(x);
        if (this.isSingleton(x)) return this;
        const seq = this.#required(this.#forest.order, x);
        return this.remove(x).#insert(x, seq);
    }

    /**
     * Adds the elements of `other` missing here as singletons, then replays
     * each of `other`'s components as unions with its earliest member.
     * Uses this set's comparator.
     */
    merge(other: DisjointSet<T>): DisjointSet<T> {
        let result: DisjointSet<T> = this;
        for (const el of other) result = result.add(el);
        for (const members of other.components().values()) {
            for (let i = 1; i < members.length; i++) {
                result = result.union(members[0], members[i]);
            }
        }
        return result;
    }

    // --- Equality & Output ---

    /**
     * For every element in comparator order, the comparator-smallest member
     * of its component.
     */
    #representatives(): T[] {
        const keys = this.#forest.parent.keys();
        const smallest = new Map<T, T>();
        for (const el of keys) {
            const root = this.#rootOf(el);
            if (!smallest.has(root)) smallest.set(root, el);
        }
        return keys.map(el => smallest.get(this.#rootOf(el)) ?? el);
    }

    /**
     * Same elements partitioned the same way.
     * Independent of tree shape, ranks, union order and insertion order.
     */
    equals(other: DisjointSet<T>): boolean {
        if (this === other) return true;
        if (this.elementCount !== other.elementCount || this.count !== other.count) return false;

        const keysA = this.#forest.parent.keys();
        const keysB = other.#forest.parent.keys();
        for (let i = 0; i < keysA.length; i++) {
            if (this.#compare(keysA[i], keysB[i]) !== 0) return false;
        }

        const repsA = this.#representatives();
        const repsB = other.#representatives();
        for (let i = 0; i < repsA.length; i++) {
            if (this.#compare(repsA[i], repsB[i]) !== 0) return false;
        }
        return true;
    }

    *[Symbol.iterator](): Iterator<T> { yield* this.#elements(); }

    toString(): string {
        const groups = [...this.components().values()]
            .map(members => `{${members.map(formatElement).join(', ')}}`);
        return `{${groups.join(', ')}}`;
    }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}
