import { ConcurrentModificationError } from './errors.js';
import type { LinkedList } from './list.js';
import type { ListNode } from './node.js';

export enum CursorState {
    NotStarted,
    Active,
    Exhausted,
    Failed
}

export type Direction = 'forward' | 'backward';

/**
 * Fail-fast traversal over a list's chain.
 *
 * The list's `modCount` is captured when the cursor is created and compared before every
 * step; any structural change in between makes the next step throw.
 */
export class Cursor<E, R> implements IterableIterator<R> {
    private readonly expectedModCount: number;
    private current: ListNode<E> | undefined;
    private _state = CursorState.NotStarted;

    constructor(
        private readonly list: LinkedList<E>,
        private readonly direction: Direction,
        private readonly project: (node: ListNode<E>) => R
    ) {
        this.expectedModCount = list.modCount;
    }

    get state(): CursorState {
        return this._state;
    }

    next(): IteratorResult<R> {
        switch (this._state) {
        case CursorState.Exhausted:
            return { done: true, value: undefined };
        case CursorState.Failed:
            throw new ConcurrentModificationError();
        }
        if (this.list.modCount !== this.expectedModCount) {
            this._state = CursorState.Failed;
            this.current = undefined;
            throw new ConcurrentModificationError();
        }
        const forward = this.direction === 'forward';
        if (this._state === CursorState.NotStarted) {
            this._state = CursorState.Active;
            this.current = forward ? this.list.head : this.list.tail;
        } else if (this.current !== undefined) {
            this.current = forward ? this.current.next : this.current.prev;
        }
        const node = this.current;
        if (node === undefined) {
            this._state = CursorState.Exhausted;
            return { done: true, value: undefined };
        }
        return { done: false, value: this.project(node) };
    }

    [Symbol.iterator]() {
        return this;
    }
}
