import { describe, expect, it } from 'vitest';
import {
    addAll,
    at,
    ConcurrentModificationError,
    fillRange,
    indexOf,
    insertAll,
    insertAt,
    lastIndexOf,
    LinkedList,
    remove,
    removeAt,
    removeNode,
    removeRange,
    removeWhere,
    replaceRange,
    retainWhere,
    setAll,
    setAt,
    sublist
} from '../src/index.js';
import { expectValues } from './helpers.js';

describe('sequence helpers', () => {

    it('at / setAt', () => {
        const list = new LinkedList([1, 2, 3]);
        const modCount = list.modCount;
        expect(at(list, 1)).toBe(2);
        setAt(list, 1, 99);
        expectValues(list, [1, 99, 3]);
        expect(list.modCount).toBe(modCount);
        expect(() => at(list, 3)).toThrow(RangeError);
    });

    it('addAll appends in order', () => {
        const list = new LinkedList([1, 2]);
        addAll(list, [3, 4]);
        expectValues(list, [1, 2, 3, 4]);
        addAll(list, []);
        expectValues(list, [1, 2, 3, 4]);
    });

    it('addAll with the list itself', () => {
        const list = new LinkedList([1, 2]);
        addAll(list, list);
        expectValues(list, [1, 2, 1, 2]);
    });

    it('insertAt boundaries', () => {
        const list = new LinkedList([2]);
        insertAt(list, 0, 1);
        insertAt(list, 2, 3);
        insertAt(list, 3, 4);
        expectValues(list, [1, 2, 3, 4]);
        expect(() => insertAt(list, -1, 0)).toThrow(RangeError);
        expect(() => insertAt(list, 5, 0)).toThrow(RangeError);
    });

    it('insertAll at head, middle and tail', () => {
        const head = new LinkedList([3, 4]);
        insertAll(head, 0, [1, 2]);
        expectValues(head, [1, 2, 3, 4]);

        const middle = new LinkedList([1, 4]);
        insertAll(middle, 1, [2, 3]);
        expectValues(middle, [1, 2, 3, 4]);

        const tail = new LinkedList([1, 2]);
        insertAll(tail, 2, [3, 4]);
        expectValues(tail, [1, 2, 3, 4]);

        insertAll(tail, 1, []);
        expectValues(tail, [1, 2, 3, 4]);
    });

    it('addAll with a lazy view of the same list', () => {
        const list = new LinkedList([1, 2, 3]);
        addAll(list, list.reversed());
        expectValues(list, [1, 2, 3, 3, 2, 1]);
    });

    it('insertAll with a lazy view of the same list', () => {
        const list = new LinkedList([1, 2, 3]);
        insertAll(list, 1, list.reversed());
        expectValues(list, [1, 3, 2, 1, 2, 3]);
    });

    it('insertAll with a generator reading the same list', () => {
        const list = new LinkedList([1, 2, 3]);
        function* scaled() {
            for (const value of list) {
                yield value * 10;
            }
        }
        insertAll(list, 1, scaled());
        expectValues(list, [1, 10, 20, 30, 2, 3]);
    });

    it('insertAll out of range changes nothing', () => {
        const list = new LinkedList([1, 2, 3]);
        expect(() => insertAll(list, -1, [9])).toThrow(RangeError);
        expect(() => insertAll(list, 4, [9])).toThrow(RangeError);
        expectValues(list, [1, 2, 3]);
    });

    it('removeAt returns the removed value', () => {
        const list = new LinkedList([1, 2, 3]);
        expect(removeAt(list, 1)).toBe(2);
        expectValues(list, [1, 3]);
        expect(() => removeAt(list, -1)).toThrow(RangeError);
        expect(() => removeAt(list, 2)).toThrow(RangeError);
    });

    it('remove removes first match', () => {
        const list = new LinkedList([1, 2, 2, 3]);
        expect(remove(list, 2)).toBe(true);
        expectValues(list, [1, 2, 3]);
        expect(remove(list, 999)).toBe(false);
        expectValues(list, [1, 2, 3]);
    });

    it('removeNode delegates to tryUnlink', () => {
        const list = new LinkedList([1, 2, 3]);
        const node = list.nodeAt(1);
        expect(removeNode(list, node)).toBe(true);
        expect(removeNode(list, node)).toBe(false);
        expectValues(list, [1, 3]);
    });

    it('removeWhere detaches removed nodes', () => {
        const list = new LinkedList([1, 2, 3, 4, 5]);
        const n2 = list.nodeAt(1);
        const n4 = list.nodeAt(3);
        removeWhere(list, value => value % 2 === 0);
        expectValues(list, [1, 3, 5]);
        expect(n2.isAttached).toBe(false);
        expect(n4.isAttached).toBe(false);
        expect(n2.prev).toBeUndefined();
        expect(n2.next).toBeUndefined();
    });

    it('retainWhere keeps matching', () => {
        const list = new LinkedList([1, 2, 3, 4, 5]);
        const nodes = Array.from(list.nodes());
        retainWhere(list, value => value % 2 === 0);
        expectValues(list, [2, 4]);
        expect(nodes.filter(node => node.isAttached).map(node => node.value)).toEqual([2, 4]);
    });

    it('predicate modifying the list fails fast', () => {
        const list = new LinkedList([1, 2, 3]);
        expect(() => removeWhere(list, value => {
            if (value === 2) {
                list.append(4);
            }
            return false;
        })).toThrow(ConcurrentModificationError);
    });

    it('indexOf with start', () => {
        const list = new LinkedList([1, 2, 1]);
        expect(indexOf(list, 1)).toBe(0);
        expect(indexOf(list, 1, 1)).toBe(2);
        expect(indexOf(list, 2, -10)).toBe(1);
        expect(indexOf(list, 1, 999)).toBe(-1);
    });

    it('lastIndexOf with start', () => {
        const list = new LinkedList([1, 2, 1, 2]);
        expect(lastIndexOf(list, 1)).toBe(2);
        expect(lastIndexOf(list, 2)).toBe(3);
        expect(lastIndexOf(list, 2, 2)).toBe(1);
        expect(lastIndexOf(list, 2, -1)).toBe(-1);
        expect(lastIndexOf(list, 1, 99)).toBe(2);
    });

    it('sublist', () => {
        const list = new LinkedList([1, 2, 3, 4, 5]);
        expect(sublist(list, 1, 4)).toEqual([2, 3, 4]);
        expect(sublist(list, 3)).toEqual([4, 5]);
        expect(sublist(list, 2, 2)).toEqual([]);
        expect(() => sublist(list, 3, 2)).toThrow(RangeError);
    });

    it('removeRange', () => {
        const list = new LinkedList([1, 2, 3, 4, 5]);
        removeRange(list, 1, 4);
        expectValues(list, [1, 5]);
        expect(() => removeRange(list, 0, 3)).toThrow(RangeError);
        expectValues(list, [1, 5]);
    });

    it('replaceRange', () => {
        const list = new LinkedList([1, 2, 3, 4]);
        replaceRange(list, 1, 3, [9, 8]);
        expectValues(list, [1, 9, 8, 4]);
        replaceRange(list, 0, 4, list);
        expectValues(list, [1, 9, 8, 4]);
    });

    it('setAll', () => {
        const list = new LinkedList([1, 2, 3, 4]);
        setAll(list, 1, [9, 8]);
        expectValues(list, [1, 9, 8, 4]);
        expect(() => setAll(list, 3, [7, 7])).toThrow(RangeError);
        expectValues(list, [1, 9, 8, 4]);
    });

    it('fillRange', () => {
        const list = new LinkedList([1, 2, 3, 4]);
        const modCount = list.modCount;
        fillRange(list, 1, 3, 0);
        expectValues(list, [1, 0, 0, 4]);
        expect(list.modCount).toBe(modCount);
    });
});
