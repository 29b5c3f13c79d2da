import { ConcurrentModificationError } from './errors.js';
import type { LinkedList } from './list.js';
import type { ListNode } from './node.js';

// Index based helpers. Everything here goes through the public handle operations of
// LinkedList, so ownership checks and modCount bookkeeping stay in one place.

const checkRange = (start: number, end: number, length: number) => {
    if (!Number.isInteger(start) || !Number.isInteger(end) || start < 0 || start > end || end > length) {
        throw new RangeError(`invalid range [${start}, ${end}) for length ${length}`);
    }
};

const checkInsertIndex = (index: number, length: number) => {
    if (!Number.isInteger(index) || index < 0 || index > length) {
        throw new RangeError(`index ${index} out of range [0, ${length}]`);
    }
};

export function at<E>(list: LinkedList<E>, index: number): E {
    return list.nodeAt(index).value;
}

export function setAt<E>(list: LinkedList<E>, index: number, value: E) {
    list.nodeAt(index).value = value;
}

// `values` is copied before the first write: it may be a lazy view over `list` itself,
// and that view's cursor would fail half way through
export function addAll<E>(list: LinkedList<E>, values: Iterable<E>) {
    for (const value of Array.from(values)) {
        list.append(value);
    }
}

export function insertAt<E>(list: LinkedList<E>, index: number, value: E): ListNode<E> {
    checkInsertIndex(index, list.length);
    if (index === list.length) {
        return list.append(value);
    }
    return list.insertBefore(list.nodeAt(index), value);
}

export function insertAll<E>(list: LinkedList<E>, index: number, values: Iterable<E>) {
    checkInsertIndex(index, list.length);
    const items = Array.from(values);
    if (index === list.length) {
        addAll(list, items);
        return;
    }
    const ref = list.nodeAt(index);
    for (const value of items) {
        list.insertBefore(ref, value);
    }
}

export function removeAt<E>(list: LinkedList<E>, index: number): E {
    return list.unlink(list.nodeAt(index));
}

/**
 * Removes the first element equal to `value`.
 */
export function remove<E>(list: LinkedList<E>, value: E): boolean {
    const node = list.nodeOf(value);
    if (node === undefined) {
        return false;
    }
    list.unlink(node);
    return true;
}

export function removeNode<E>(list: LinkedList<E>, node: ListNode<E>): boolean {
    return list.tryUnlink(node);
}

function filterNodes<E>(list: LinkedList<E>, predicate: (value: E) => boolean, removeMatching: boolean) {
    let node = list.head;
    while (node !== undefined) {
        const next = node.next;
        const modCount = list.modCount;
        const matches = predicate(node.value);
        if (list.modCount !== modCount) {
            throw new ConcurrentModificationError();
        }
        if (matches === removeMatching) {
            list.unlink(node);
        }
        node = next;
    }
}

export function removeWhere<E>(list: LinkedList<E>, predicate: (value: E) => boolean) {
    filterNodes(list, predicate, true);
}

export function retainWhere<E>(list: LinkedList<E>, predicate: (value: E) => boolean) {
    filterNodes(list, predicate, false);
}

export function indexOf<E>(list: LinkedList<E>, value: E, start = 0): number {
    let index = Math.max(start, 0);
    for (let node = list.nodeAtOrNull(index); node !== undefined; node = node.next, ++index) {
        if (node.value === value) {
            return index;
        }
    }
    return -1;
}

export function lastIndexOf<E>(list: LinkedList<E>, value: E, start = list.length - 1): number {
    if (start < 0) {
        return -1;
    }
    let index = Math.min(start, list.length - 1);
    for (let node = list.nodeAtOrNull(index); node !== undefined; node = node.prev, --index) {
        if (node.value === value) {
            return index;
        }
    }
    return -1;
}

export function sublist<E>(list: LinkedList<E>, start: number, end = list.length): E[] {
    checkRange(start, end, list.length);
    const result: E[] = [];
    let node = list.nodeAtOrNull(start);
    for (let i = start; i < end && node !== undefined; ++i, node = node.next) {
        result.push(node.value);
    }
    return result;
}

export function removeRange<E>(list: LinkedList<E>, start: number, end: number) {
    checkRange(start, end, list.length);
    let node = list.nodeAtOrNull(start);
    for (let i = start; i < end && node !== undefined; ++i) {
        const next = node.next;
        list.unlink(node);
        node = next;
    }
}

export function replaceRange<E>(list: LinkedList<E>, start: number, end: number, values: Iterable<E>) {
    checkRange(start, end, list.length);
    const items = Array.from(values);
    removeRange(list, start, end);
    insertAll(list, start, items);
}

export function setAll<E>(list: LinkedList<E>, index: number, values: Iterable<E>) {
    checkInsertIndex(index, list.length);
    const items = Array.from(values);
    checkRange(index, index + items.length, list.length);
    let node = list.nodeAtOrNull(index);
    for (const value of items) {
        if (node === undefined) {
            break;
        }
        node.value = value;
        node = node.next;
    }
}

export function fillRange<E>(list: LinkedList<E>, start: number, end: number, value: E) {
    checkRange(start, end, list.length);
    let node = list.nodeAtOrNull(start);
    for (let i = start; i < end && node !== undefined; ++i, node = node.next) {
        node.value = value;
    }
}
