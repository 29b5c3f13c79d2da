import type { LinkedList } from './list.js';

/**
 * Stable handle to a value stored in a {@link LinkedList}.
 *
 * Handles stay valid for as long as the node is attached. Once unlinked the node keeps its
 * last value but has no neighbours and no owner, and no list will accept it again.
 */
export class ListNode<E> {
    value: E;

    /** @internal */
    $_owner: LinkedList<E> | undefined;
    /** @internal */
    $_prev: ListNode<E> | undefined = undefined;
    /** @internal */
    $_next: ListNode<E> | undefined = undefined;

    /** @internal */
    constructor(value: E, owner: LinkedList<E>) {
        this.value = value;
        this.$_owner = owner;
    }

    get isAttached(): boolean {
        return this.$_owner !== undefined;
    }

    get prev(): ListNode<E> | undefined {
        return this.$_prev;
    }

    get next(): ListNode<E> | undefined {
        return this.$_next;
    }

    /** @internal */
    $_detach() {
        this.$_owner = this.$_prev = this.$_next = undefined;
    }
}
