import { Cursor } from './cursor.js';
import { afterMutation, warnIfSelfMove } from './debug.js';
import { InvalidNodeError, ListStateError, UnsupportedOperationError } from './errors.js';
import { ListNode } from './node.js';

export interface ListOptions<E> {
    /**
     * Produces the value used to pad the list when `length` is increased.
     * Lists without it refuse to grow through `length`.
     */
    emptyValue?: () => E;
}

const projectValue = <E>(node: ListNode<E>) => node.value;
const projectNode = <E>(node: ListNode<E>) => node;

const checkCount = (count: number, name: string) => {
    if (!Number.isInteger(count) || count < 0) {
        throw new RangeError(`${name} must be a non-negative integer, got ${count}`);
    }
};

/**
 * Doubly linked list handing out stable {@link ListNode} handles.
 *
 * Every handle-based operation validates ownership and attachment before touching any link,
 * so a failed call leaves the list exactly as it was. Structural changes bump `modCount`,
 * which the cursors returned by the iteration methods use to fail fast.
 */
export class LinkedList<E> implements Iterable<E> {
    private _head: ListNode<E> | undefined = undefined;
    private _tail: ListNode<E> | undefined = undefined;
    private _length = 0;
    private _modCount = 0;
    private readonly emptyValue: (() => E) | undefined;

    constructor(values?: Iterable<E>, options: ListOptions<E> = {}) {
        this.emptyValue = options.emptyValue;
        if (values !== undefined) {
            for (const value of values) {
                this.append(value);
            }
        }
    }

    static from<E>(values: Iterable<E>, options?: ListOptions<E>): LinkedList<E> {
        return new LinkedList(values, options);
    }

    /**
     * All nodes share `value` itself, nothing is cloned.
     */
    static filled<E>(count: number, value: E, options?: ListOptions<E>): LinkedList<E> {
        checkCount(count, 'count');
        const list = new LinkedList<E>(undefined, options);
        for (let i = 0; i < count; ++i) {
            list.append(value);
        }
        return list;
    }

    static generate<E>(count: number, indexToValue: (index: number) => E, options?: ListOptions<E>): LinkedList<E> {
        checkCount(count, 'count');
        const list = new LinkedList<E>(undefined, options);
        for (let i = 0; i < count; ++i) {
            list.append(indexToValue(i));
        }
        return list;
    }

    get head(): ListNode<E> | undefined {
        return this._head;
    }

    get tail(): ListNode<E> | undefined {
        return this._tail;
    }

    get modCount(): number {
        return this._modCount;
    }

    get length(): number {
        return this._length;
    }

    /**
     * Shrinking detaches every node past `newLength`. Growing pads with `emptyValue()` and is
     * only allowed when the list was created with one.
     */
    set length(newLength: number) {
        checkCount(newLength, 'length');
        if (newLength === this._length) {
            return;
        }
        if (newLength > this._length) {
            const emptyValue = this.emptyValue;
            if (emptyValue === undefined) {
                throw new UnsupportedOperationError('cannot grow a list without an emptyValue');
            }
            while (this._length < newLength) {
                this.append(emptyValue());
            }
            return;
        }
        const newTail = newLength === 0 ? undefined : this.nodeAt(newLength - 1);
        let node = newTail === undefined ? this._head : newTail.$_next;
        if (newTail === undefined) {
            this._head = undefined;
        } else {
            newTail.$_next = undefined;
        }
        this._tail = newTail;
        while (node !== undefined) {
            const next = node.$_next;
            node.$_detach();
            node = next;
        }
        this._length = newLength;
        this.structuralChange('length');
    }

    get isEmpty(): boolean {
        return this._length === 0;
    }

    get first(): E {
        if (this._head === undefined) {
            throw new ListStateError('list is empty');
        }
        return this._head.value;
    }

    get last(): E {
        if (this._tail === undefined) {
            throw new ListStateError('list is empty');
        }
        return this._tail.value;
    }

    get single(): E {
        if (this._head === undefined) {
            throw new ListStateError('list is empty');
        }
        if (this._length !== 1) {
            throw new ListStateError('list has more than one element');
        }
        return this._head.value;
    }

    clear() {
        this.length = 0;
    }

    nodeAt(index: number): ListNode<E> {
        const node = this.nodeAtOrNull(index);
        if (node === undefined) {
            throw new RangeError(`index ${index} out of range [0, ${this._length})`);
        }
        return node;
    }

    nodeAtOrNull(index: number): ListNode<E> | undefined {
        if (!Number.isInteger(index) || index < 0 || index >= this._length) {
            return undefined;
        }
        let node: ListNode<E> | undefined;
        if (index < this._length >> 1) {
            node = this._head;
            for (let i = 0; i < index && node !== undefined; ++i) {
                node = node.$_next;
            }
        } else {
            node = this._tail;
            for (let i = this._length - 1; i > index && node !== undefined; --i) {
                node = node.$_prev;
            }
        }
        return node;
    }

    nodeOf(value: E, equals: (a: E, b: E) => boolean = (a, b) => a === b): ListNode<E> | undefined {
        for (let node = this._head; node !== undefined; node = node.$_next) {
            if (equals(node.value, value)) {
                return node;
            }
        }
        return undefined;
    }

    append(value: E): ListNode<E> {
        return this.insert(value, this._tail, 'append');
    }

    prepend(value: E): ListNode<E> {
        return this.insert(value, undefined, 'prepend');
    }

    insertAfter(ref: ListNode<E>, value: E): ListNode<E> {
        this.check(ref);
        return this.insert(value, ref, 'insertAfter');
    }

    insertBefore(ref: ListNode<E>, value: E): ListNode<E> {
        this.check(ref);
        return this.insert(value, ref.$_prev, 'insertBefore');
    }

    /**
     * Removes `node` from the chain and returns its value. The handle is left detached.
     */
    unlink(node: ListNode<E>): E {
        this.check(node);
        this.unsplice(node);
        node.$_detach();
        this._length--;
        this.structuralChange('unlink');
        return node.value;
    }

    tryUnlink(node: ListNode<E>): boolean {
        if (node.$_owner !== this) {
            return false;
        }
        this.unlink(node);
        return true;
    }

    moveToFront(node: ListNode<E>) {
        this.check(node);
        if (node === this._head) {
            return;
        }
        this.unsplice(node);
        this.splice(node, undefined);
        this.structuralChange('moveToFront');
    }

    moveToBack(node: ListNode<E>) {
        this.check(node);
        if (node === this._tail) {
            return;
        }
        this.unsplice(node);
        this.splice(node, this._tail);
        this.structuralChange('moveToBack');
    }

    moveAfter(node: ListNode<E>, target: ListNode<E>) {
        this.check(node);
        this.check(target);
        if (node === target) {
            warnIfSelfMove('moveAfter');
            return;
        }
        if (target.$_next === node) {
            return;
        }
        this.unsplice(node);
        this.splice(node, target);
        this.structuralChange('moveAfter');
    }

    moveBefore(node: ListNode<E>, target: ListNode<E>) {
        this.check(node);
        this.check(target);
        if (node === target) {
            warnIfSelfMove('moveBefore');
            return;
        }
        if (target.$_prev === node) {
            return;
        }
        this.unsplice(node);
        this.splice(node, target.$_prev);
        this.structuralChange('moveBefore');
    }

    swapNodes(a: ListNode<E>, b: ListNode<E>) {
        this.check(a);
        this.check(b);
        if (a === b) {
            return;
        }
        if (a.$_next === b) {
            this.swapAdjacent(a, b);
        } else if (b.$_next === a) {
            this.swapAdjacent(b, a);
        } else {
            const aPrev = a.$_prev;
            const aNext = a.$_next;
            const bPrev = b.$_prev;
            const bNext = b.$_next;

            a.$_prev = bPrev;
            a.$_next = bNext;
            b.$_prev = aPrev;
            b.$_next = aNext;

            this.relinkPrev(b, aPrev);
            this.relinkNext(b, aNext);
            this.relinkPrev(a, bPrev);
            this.relinkNext(a, bNext);
        }
        this.structuralChange('swapNodes');
    }

    /**
     * Reverses the chain in place; every handle stays attached. Lists shorter than two
     * elements are left alone and `modCount` is not bumped for them.
     */
    reverse() {
        if (this._length < 2) {
            return;
        }
        let node = this._head;
        while (node !== undefined) {
            const next = node.$_next;
            node.$_next = node.$_prev;
            node.$_prev = next;
            node = next;
        }
        const head = this._head;
        this._head = this._tail;
        this._tail = head;
        this.structuralChange('reverse');
    }

    [Symbol.iterator](): Cursor<E, E> {
        return new Cursor(this, 'forward', projectValue);
    }

    nodes(): Cursor<E, ListNode<E>> {
        return new Cursor(this, 'forward', projectNode);
    }

    nodesReversed(): Cursor<E, ListNode<E>> {
        return new Cursor(this, 'backward', projectNode);
    }

    reversed(): Cursor<E, E> {
        return new Cursor(this, 'backward', projectValue);
    }

    toString(): string {
        return `[${Array.from(this, String).join(', ')}]`;
    }

    private check(node: ListNode<E>) {
        if (node.$_owner === undefined) {
            throw new InvalidNodeError('detached');
        }
        if (node.$_owner !== this) {
            throw new InvalidNodeError('foreign');
        }
    }

    private insert(value: E, after: ListNode<E> | undefined, operation: string): ListNode<E> {
        const node = new ListNode(value, this);
        this.splice(node, after);
        this._length++;
        this.structuralChange(operation);
        return node;
    }

    // links a free node after `after`, or at the head when `after` is undefined
    private splice(node: ListNode<E>, after: ListNode<E> | undefined) {
        const before = after === undefined ? this._head : after.$_next;
        node.$_prev = after;
        node.$_next = before;
        this.relinkPrev(node, after);
        this.relinkNext(node, before);
    }

    // takes a node out of the chain, keeping its owner
    private unsplice(node: ListNode<E>) {
        const prev = node.$_prev;
        const next = node.$_next;
        if (prev === undefined) {
            this._head = next;
        } else {
            prev.$_next = next;
        }
        if (next === undefined) {
            this._tail = prev;
        } else {
            next.$_prev = prev;
        }
        node.$_prev = node.$_next = undefined;
    }

    // points `prev` (or the head) at `node`
    private relinkPrev(node: ListNode<E>, prev: ListNode<E> | undefined) {
        if (prev === undefined) {
            this._head = node;
        } else {
            prev.$_next = node;
        }
    }

    // points `next` (or the tail) at `node`
    private relinkNext(node: ListNode<E>, next: ListNode<E> | undefined) {
        if (next === undefined) {
            this._tail = node;
        } else {
            next.$_prev = node;
        }
    }

    private swapAdjacent(first: ListNode<E>, second: ListNode<E>) {
        const prev = first.$_prev;
        const next = second.$_next;
        second.$_prev = prev;
        second.$_next = first;
        first.$_prev = second;
        first.$_next = next;
        this.relinkPrev(second, prev);
        this.relinkNext(first, next);
    }

    private structuralChange(operation: string) {
        this._modCount++;
        afterMutation(this, operation);
    }
}
