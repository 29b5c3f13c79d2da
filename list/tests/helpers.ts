import { expect } from 'vitest';
import { verifyInvariants, type LinkedList } from '../src/index.js';

export function expectValues<E>(list: LinkedList<E>, expected: E[]) {
    expect(list.length).toBe(expected.length);
    expect(Array.from(list)).toEqual(expected);
    expect(Array.from(list.nodesReversed(), node => node.value)).toEqual([...expected].reverse());
    expect(Array.from(list.reversed())).toEqual([...expected].reverse());
    if (expected.length === 0) {
        expect(list.head).toBeUndefined();
        expect(list.tail).toBeUndefined();
    } else {
        expect(list.head?.value).toEqual(expected[0]);
        expect(list.tail?.value).toEqual(expected[expected.length - 1]);
    }
    expect(() => verifyInvariants(list)).not.toThrow();
}
