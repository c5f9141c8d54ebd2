// src/engine/priorityHeap.ts

export type Comparator<T> = (a: T, b: T) => number;

/**
 * Array-backed binary min-heap over an injected comparator
 *
 * The element the comparator ranks lowest sits at the top.
 *
 * Performance:
 * - push: O(log n)
 * - pop: O(log n)
 * - peek: O(1)
 * - rebuild: O(n)
 * - toSortedArray: O(n log n), leaves the heap untouched
 */
export class PriorityHeap<T> {
    private items: T[] = [];
    private readonly compare: Comparator<T>;

    constructor(compare: Comparator<T>) {
        this.compare = compare;
    }

    get size(): number {
        return this.items.length;
    }

    push(item: T): void {
        this.items.push(item);
        this.siftUp(this.items.length - 1);
    }

    peek(): T | undefined {
        return this.items[0];
    }

    pop(): T | undefined {
        const top = this.items[0];
        const last = this.items.pop();
        if (this.items.length > 0 && last !== undefined) {
            this.items[0] = last;
            this.siftDown(0);
        }
        return top;
    }

    clear(): void {
        this.items = [];
    }

    /**
     * Restore heap order after elements changed rank in place
     */
    rebuild(): void {
        for (let i = (this.items.length >> 1) - 1; i >= 0; i--) {
            this.siftDown(i);
        }
    }

    /**
     * Copy of the contents in comparator order
     *
     * Drains a throwaway clone, never the live array.
     */
    toSortedArray(): T[] {
        const clone = new PriorityHeap<T>(this.compare);
        clone.items = [...this.items];

        const ordered: T[] = [];
        let next = clone.pop();
        while (next !== undefined) {
            ordered.push(next);
            next = clone.pop();
        }
        return ordered;
    }

    private siftUp(index: number): void {
        let child = index;
        while (child > 0) {
            const parent = (child - 1) >> 1;
            if (this.compare(this.items[child], this.items[parent]) >= 0) {
                break;
            }
            this.swap(child, parent);
            child = parent;
        }
    }

    private siftDown(index: number): void {
        const length = this.items.length;
        let parent = index;

        for (;;) {
            const left = 2 * parent + 1;
            const right = left + 1;
            let smallest = parent;

            if (left < length && this.compare(this.items[left], this.items[smallest]) < 0) {
                smallest = left;
            }
            if (right < length && this.compare(this.items[right], this.items[smallest]) < 0) {
                smallest = right;
            }
            if (smallest === parent) {
                return;
            }

            this.swap(parent, smallest);
            parent = smallest;
        }
    }

    private swap(i: number, j: number): void {
        const tmp = this.items[i];
        this.items[i] = this.items[j];
        this.items[j] = tmp;
    }
}
