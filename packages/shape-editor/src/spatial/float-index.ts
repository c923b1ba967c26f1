/**
 * Ordered Float Index
 *
 * Sorted map from a float coordinate to the set of values sitting on that
 * coordinate. One index per axis backs range, radius and snap queries for
 * control points and grid lines alike.
 *
 * NaN keys are stored as `Number.MAX_VALUE` so they sort last and never
 * break the ordering.
 */

// =============================================================================
// Types
// =============================================================================

export interface FloatIndexEntry<V> {
    key: number;
    values: V[];
}

export interface FloatIndexOptions<V> {
    /** Identity of a value inside one key's set. */
    valueKey: (value: V) => string;
    /** Order of values inside one key's set. */
    compareValues: (a: V, b: V) => number;
}

interface Bucket<V> {
    key: number;
    values: Map<string, V>;
}

export function orderedKey(value: number): number {
    return Number.isNaN(value) ? Number.MAX_VALUE : value;
}

// =============================================================================
// Index
// =============================================================================

export class OrderedFloatIndex<V> {
    private readonly buckets: Bucket<V>[] = [];
    private readonly options: FloatIndexOptions<V>;

    constructor(options: FloatIndexOptions<V>) {
        this.options = options;
    }

    /** Builds an index from unsorted pairs with a single sort. */
    static build<V>(pairs: Iterable<readonly [number, V]>, options: FloatIndexOptions<V>): OrderedFloatIndex<V> {
        const index = new OrderedFloatIndex<V>(options);
        const byKey = new Map<number, Bucket<V>>();
        for (const [rawKey, value] of pairs) {
            const key = orderedKey(rawKey);
            let bucket = byKey.get(key);
            if (!bucket) {
                bucket = { key, values: new Map() };
                byKey.set(key, bucket);
            }
            bucket.values.set(options.valueKey(value), value);
        }
        index.buckets.push(...[...byKey.values()].sort((a, b) => a.key - b.key));
        return index;
    }

    get size(): number {
        return this.buckets.length;
    }

    insert(rawKey: number, value: V): void {
        const key = orderedKey(rawKey);
        const position = this.lowerBound(key);
        const existing = this.buckets[position];
        if (existing && existing.key === key) {
            existing.values.set(this.options.valueKey(value), value);
            return;
        }
        this.buckets.splice(position, 0, {
            key,
            values: new Map([[this.options.valueKey(value), value]]),
        });
    }

    get(rawKey: number): V[] | null {
        const key = orderedKey(rawKey);
        const bucket = this.buckets[this.lowerBound(key)];
        return bucket && bucket.key === key ? this.sortedValues(bucket) : null;
    }

    entries(): FloatIndexEntry<V>[] {
        return this.buckets.map((bucket) => this.toEntry(bucket));
    }

    /** Entries with `min <= key <= max`, ascending. */
    range(min: number, max: number): FloatIndexEntry<V>[] {
        const from = this.lowerBound(orderedKey(min));
        const to = this.upperBound(orderedKey(max));
        const result: FloatIndexEntry<V>[] = [];
        for (let i = from; i < to; i += 1) {
            const bucket = this.buckets[i];
            if (bucket) result.push(this.toEntry(bucket));
        }
        return result;
    }

    findInDistance(key: number, maxDistance: number): FloatIndexEntry<V>[] {
        const d = Math.abs(maxDistance);
        return this.range(key - d, key + d);
    }

    /**
     * Closest key within `maxDistance` that still holds a value not matched by
     * `ignore`; its values are returned without the ignored ones. The nearest
     * key at or below `key` and the nearest at or above are compared, and the
     * lower one wins a tie. A zero distance asks for an exact match.
     */
    findClosestInDistanceAndIgnore(
        rawKey: number,
        maxDistance: number,
        ignore: (value: V) => boolean = () => false
    ): FloatIndexEntry<V> | null {
        const key = orderedKey(rawKey);
        const keep = (bucket: Bucket<V>): FloatIndexEntry<V> | null => {
            const values = this.sortedValues(bucket).filter((value) => !ignore(value));
            return values.length > 0 ? { key: bucket.key, values } : null;
        };

        if (maxDistance === 0) {
            const bucket = this.buckets[this.lowerBound(key)];
            return bucket && bucket.key === key ? keep(bucket) : null;
        }

        const d = Math.abs(maxDistance);
        let before: FloatIndexEntry<V> | null = null;
        const lowest = this.lowerBound(key - d);
        for (let i = this.upperBound(key) - 1; i >= lowest && !before; i -= 1) {
            const bucket = this.buckets[i];
            if (bucket) before = keep(bucket);
        }
        let after: FloatIndexEntry<V> | null = null;
        const highest = this.upperBound(key + d);
        for (let i = this.lowerBound(key); i < highest && !after; i += 1) {
            const bucket = this.buckets[i];
            if (bucket) after = keep(bucket);
        }

        if (!before) return after;
        if (!after) return before;
        return keyDistance(after.key, key) < keyDistance(before.key, key) ? after : before;
    }

    // -------------------------------------------------------------------------
    // Internals
    // -------------------------------------------------------------------------

    private toEntry(bucket: Bucket<V>): FloatIndexEntry<V> {
        return { key: bucket.key, values: this.sortedValues(bucket) };
    }

    private sortedValues(bucket: Bucket<V>): V[] {
        return [...bucket.values.values()].sort(this.options.compareValues);
    }

    /** First position whose key is `>= key`. */
    private lowerBound(key: number): number {
        let low = 0;
        let high = this.buckets.length;
        while (low < high) {
            const mid = (low + high) >>> 1;
            const bucket = this.buckets[mid];
            if (bucket && bucket.key < key) {
                low = mid + 1;
            } else {
                high = mid;
            }
        }
        return low;
    }

    /** First position whose key is `> key`. */
    private upperBound(key: number): number {
        let low = 0;
        let high = this.buckets.length;
        while (low < high) {
            const mid = (low + high) >>> 1;
            const bucket = this.buckets[mid];
            if (bucket && bucket.key <= key) {
                low = mid + 1;
            } else {
                high = mid;
            }
        }
        return low;
    }
}

function keyDistance(a: number, b: number): number {
    const d = Math.abs(a - b);
    return Number.isNaN(d) ? Number.MAX_VALUE : d;
}
