import { LinkedList, type ListNode } from '@knotwork/list';
import { logger } from '@knotwork/log';

export interface LruCacheOptions<K, V> {
    capacity: number;
    onEvict?: (key: K, value: V) => void;
}

interface Entry<K, V> {
    key: K;
    value: V;
}

const log = logger('@knotwork/lru');

/**
 * Map with a fixed capacity that drops the least recently used entry when full.
 *
 * Recency is kept in a {@link LinkedList}: the head is the most recently used entry and each
 * key maps to its node handle, so every operation is O(1).
 */
export class LruCache<K, V> {
    readonly capacity: number;
    private readonly order = new LinkedList<Entry<K, V>>();
    private readonly lookup = new Map<K, ListNode<Entry<K, V>>>();
    private readonly onEvict: ((key: K, value: V) => void) | undefined;

    constructor({ capacity, onEvict }: LruCacheOptions<K, V>) {
        if (!Number.isInteger(capacity) || capacity <= 0) {
            throw new RangeError(`capacity must be a positive integer, got ${capacity}`);
        }
        this.capacity = capacity;
        this.onEvict = onEvict;
    }

    get size(): number {
        return this.order.length;
    }

    has(key: K): boolean {
        return this.lookup.has(key);
    }

    get(key: K): V | undefined {
        const node = this.lookup.get(key);
        if (node === undefined) {
            return undefined;
        }
        this.order.moveToFront(node);
        return node.value.value;
    }

    /**
     * Reads without touching recency.
     */
    peek(key: K): V | undefined {
        return this.lookup.get(key)?.value.value;
    }

    set(key: K, value: V): this {
        const node = this.lookup.get(key);
        if (node !== undefined) {
            node.value = { key, value };
            this.order.moveToFront(node);
            return this;
        }
        this.lookup.set(key, this.order.prepend({ key, value }));
        // onEvict may write back into the cache, so capacity is checked again after each eviction
        while (this.order.length > this.capacity) {
            this.evict();
        }
        return this;
    }

    delete(key: K): boolean {
        const node = this.lookup.get(key);
        if (node === undefined) {
            return false;
        }
        this.lookup.delete(key);
        this.order.unlink(node);
        return true;
    }

    clear() {
        this.lookup.clear();
        this.order.clear();
    }

    /**
     * Keys from most to least recently used.
     */
    *keys(): IterableIterator<K> {
        for (const entry of this.order) {
            yield entry.key;
        }
    }

    private evict() {
        const oldest = this.order.tail;
        if (oldest === undefined) {
            return;
        }
        const { key, value } = this.order.unlink(oldest);
        this.lookup.delete(key);
        log.verbose(`evicted ${String(key)}`);
        this.onEvict?.(key, value);
    }
}
