import { describe, it, expect } from 'vitest';
import { PriorityHeap } from '../priorityHeap';

const ascending = (a: number, b: number): number => a - b;

describe('PriorityHeap', () => {
    it('pops in comparator order', () => {
        const heap = new PriorityHeap<number>(ascending);
        for (const n of [7, 3, 9, 1, 4, 1, 8]) {
            heap.push(n);
        }

        const out: number[] = [];
        let next = heap.pop();
        while (next !== undefined) {
            out.push(next);
            next = heap.pop();
        }

        expect(out).toEqual([1, 1, 3, 4, 7, 8, 9]);
        expect(heap.size).toBe(0);
    });

    it('returns undefined from an empty heap', () => {
        const heap = new PriorityHeap<number>(ascending);

        expect(heap.peek()).toBeUndefined();
        expect(heap.pop()).toBeUndefined();
    });

    it('toSortedArray leaves the heap intact', () => {
        const heap = new PriorityHeap<number>(ascending);
        [5, 2, 6].forEach(n => heap.push(n));

        const sorted = heap.toSortedArray();
        sorted.push(100);

        expect(sorted.slice(0, 3)).toEqual([2, 5, 6]);
        expect(heap.size).toBe(3);
        expect(heap.peek()).toBe(2);
    });

    it('rebuild restores order after ranks change in place', () => {
        const boxes = [{ rank: 5 }, { rank: 1 }, { rank: 3 }];
        const heap = new PriorityHeap<{ rank: number }>((a, b) => a.rank - b.rank);
        boxes.forEach(b => heap.push(b));

        boxes[0].rank = 0;
        heap.rebuild();

        expect(heap.pop()).toBe(boxes[0]);
        expect(heap.pop()).toBe(boxes[1]);
        expect(heap.pop()).toBe(boxes[2]);
    });

    it('clear empties the heap', () => {
        const heap = new PriorityHeap<number>(ascending);
        heap.push(1);
        heap.clear();

        expect(heap.size).toBe(0);
        expect(heap.peek()).toBeUndefined();
    });
});
