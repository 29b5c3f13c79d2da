export { LinkedList, type ListOptions } from './list.js';
export type { ListNode } from './node.js';
export { Cursor, CursorState, type Direction } from './cursor.js';
export {
    ListError,
    InvalidNodeError,
    ConcurrentModificationError,
    UnsupportedOperationError,
    ListStateError,
    type InvalidNodeReason
} from './errors.js';
export { debugConfig, verifyInvariants, VERIFY_INVARIANTS, WARN_ON_SELF_MOVE } from './debug.js';
export {
    at,
    setAt,
    addAll,
    insertAt,
    insertAll,
    removeAt,
    remove,
    removeNode,
    removeWhere,
    retainWhere,
    indexOf,
    lastIndexOf,
    sublist,
    removeRange,
    replaceRange,
    setAll,
    fillRange
} from './sequence.js';
