import { logger } from '@knotwork/log';
import { DEV } from 'esm-env';

import { ListStateError } from './errors.js';
import type { LinkedList } from './list.js';
import type { ListNode } from './node.js';

/**
 * Debug configuration flag: Walk the whole chain after every structural mutation and throw on
 * the first broken invariant. O(n) per mutation, meant for tests and debugging sessions.
 */
export const VERIFY_INVARIANTS = 1 << 0;

/**
 * Debug configuration flag: Warn when a node is moved relative to itself
 * The call is a no-op, but it usually points at a bookkeeping mistake in the caller
 */
export const WARN_ON_SELF_MOVE = 1 << 1;

/**
 * Current debug configuration bitfield
 */
let debugConfigFlags = 0;

const log = logger('@knotwork/list');

/**
 * Configure debug behavior using a bitfield of flags
 */
export const debugConfig = (flags: number): void => {
    debugConfigFlags = flags | 0;
};

/**
 * Walks `list` forward and backward and throws a {@link ListStateError} describing the first
 * violated invariant. Works in any build.
 */
export const verifyInvariants = <E>(list: LinkedList<E>): void => {
    const { head, tail, length } = list;
    if (head === undefined || tail === undefined) {
        if (head !== tail || length !== 0) {
            throw new ListStateError(`empty chain must have no head, no tail and length 0 (length ${length})`);
        }
        return;
    }
    if (head.prev !== undefined) {
        throw new ListStateError('head has a previous node');
    }
    if (tail.next !== undefined) {
        throw new ListStateError('tail has a next node');
    }

    let count = 0;
    let last = head;
    for (let node: ListNode<E> | undefined = head; node !== undefined; node = node.next) {
        if (++count > length) {
            throw new ListStateError(`forward walk exceeds length ${length}`);
        }
        if (node.$_owner !== list) {
            throw new ListStateError(`node at position ${count - 1} is not owned by this list`);
        }
        if (node.next !== undefined && node.next.prev !== node) {
            throw new ListStateError(`broken back link after position ${count - 1}`);
        }
        last = node;
    }
    if (count !== length || last !== tail) {
        throw new ListStateError(`forward walk visited ${count} nodes, length is ${length}`);
    }

    count = 0;
    let first = tail;
    for (let node: ListNode<E> | undefined = tail; node !== undefined; node = node.prev) {
        if (++count > length) {
            throw new ListStateError(`backward walk exceeds length ${length}`);
        }
        first = node;
    }
    if (count !== length || first !== head) {
        throw new ListStateError(`backward walk visited ${count} nodes, length is ${length}`);
    }
};

const checkAfterMutation = <E>(list: LinkedList<E>, operation: string): void => {
    if (debugConfigFlags & VERIFY_INVARIANTS) {
        try {
            verifyInvariants(list);
        } catch (e) {
            log.error(`invariant broken after ${operation}: ${e instanceof Error ? e.message : String(e)}`);
            throw e;
        }
    }
};

/**
 * Runs invariant verification after a structural mutation when VERIFY_INVARIANTS is set.
 * Only active in DEV mode.
 */
export const afterMutation: <E>(list: LinkedList<E>, operation: string) => void = DEV
    ? checkAfterMutation
    : () => {};

/**
 * Warn if a node is moved relative to itself.
 * Only runs in DEV mode and when WARN_ON_SELF_MOVE is enabled.
 */
export const warnIfSelfMove: (operation: string) => void = DEV
    ? (operation: string) => {
          if (debugConfigFlags & WARN_ON_SELF_MOVE) {
              log.warn(`${operation}() called with the same node as node and target; nothing was moved.`);
          }
      }
    : () => {};
