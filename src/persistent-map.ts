import createTree from 'functional-red-black-tree';
import type { Comparator } from './value';

type Tree<K, V> = ReturnType<typeof createTree<K, V>>;

/**
 * Immutable ordered map over a functional red-black tree.
 *
 * Writes copy only the path from the root to the touched node (O(log N)),
 * so every version stays valid and versions share their untouched subtrees.
 * Keys are identified by the comparator, not by reference: `get` with a
 * structurally equal key finds the stored entry, and `set` keeps the stored key.
 *
 * @template K - Key type.
 * @template V - Value type.
 */
export class PersistentMap<K, V> {
    readonly #tree: Tree<K, V>;

    private constructor(tree: Tree<K, V>) {
        this.#tree = tree;
    }

    static empty<K, V>(compare: Comparator<K>): PersistentMap<K, V> {
        return new PersistentMap(createTree<K, V>(compare));
    }

    /** Number of entries. O(1). */
    get size(): number { return this.#tree.length; }

    has(key: K): boolean { return this.#tree.find(key).valid; }

    get(key: K): V | undefined {
        const value = this.#tree.get(key);
        return isStored(value) ? value : undefined;
    }

    /** Inserts or replaces. Returns the receiver when the value is already `value`. */
    set(key: K, value: V): PersistentMap<K, V> {
        const it = this.#tree.find(key);
        if (!it.valid) return new PersistentMap(this.#tree.insert(key, value));
        if (Object.is(it.value, value)) return this;
        return new PersistentMap(it.update(value));
    }

    /** Returns the receiver when `key` is absent. */
    delete(key: K): PersistentMap<K, V> {
        const it = this.#tree.find(key);
        return it.valid ? new PersistentMap(it.remove()) : this;
    }

    /** Keys in ascending order. */
    keys(): K[] { return this.#tree.keys; }

    /** Values in key order. */
    values(): V[] { return this.#tree.values; }
}

/** The tree reports a missing key as `void`. */
function isStored<V>(value: V | void): value is V {
    return value !== undefined;
}
