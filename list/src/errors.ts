export class ListError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export type InvalidNodeReason = 'foreign' | 'detached';

/**
 * A handle was passed to a list that cannot act on it: either another list owns it
 * or it has already been unlinked.
 */
export class InvalidNodeError extends ListError {
    readonly reason: InvalidNodeReason;
    constructor(reason: InvalidNodeReason) {
        super(reason === 'foreign' ? 'node does not belong to this list' : 'node is detached');
        this.reason = reason;
    }
}

export class ConcurrentModificationError extends ListError {
    constructor() {
        super('list was structurally modified during iteration');
    }
}

export class UnsupportedOperationError extends ListError {}

/**
 * Raised by accessors that need a particular number of elements (`first`, `last`, `single`)
 * and by invariant verification.
 */
export class ListStateError extends ListError {}
