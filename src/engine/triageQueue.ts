// src/engine/triageQueue.ts

import { UsageError } from '../errors';
import { Patient } from '../models/Patient';
import { PatientRegistry } from './patientRegistry';
import { PriorityHeap } from './priorityHeap';
import { compareTriage } from './triageOrder';

/**
 * Triage queue - waiting line ordered by compareTriage
 *
 * Holds references to registry-owned patients and does not deduplicate.
 * Severity can change while a patient waits; registries passed to
 * watch() or enqueueById() flag the heap for a rebuild before the next read.
 *
 * Performance:
 * - enqueue: O(log n)
 * - dequeueNext: O(log n), O(n) once after a watched update
 * - peekNext: O(1), O(n) once after a watched update
 * - snapshotOrder: O(n log n) on a copy
 */
export class TriageQueue {
    private heap: PriorityHeap<Patient>;
    private stale: boolean;
    private watched: Map<PatientRegistry, () => void>;

    constructor() {
        this.heap = new PriorityHeap<Patient>(compareTriage);
        this.stale = false;
        this.watched = new Map();
    }

    /**
     * Add a patient to the waiting line
     *
     * @param patient Registered patient to wait
     * @throws UsageError when no patient is supplied
     */
    enqueue(patient: Patient): void {
        if (!patient) {
            throw new UsageError('Cannot enqueue an absent patient');
        }
        this.refresh();
        this.heap.push(patient);
    }

    /**
     * Look up id and enqueue that patient
     *
     * @param registry Registry to resolve the id in (also watched from now on)
     * @param id Patient ID
     * @returns False (queue untouched) if the registry has no such id
     */
    enqueueById(registry: PatientRegistry, id: string): boolean {
        const patient = registry.lookup(id);
        if (!patient) {
            return false;
        }

        this.watch(registry);
        this.enqueue(patient);
        return true;
    }

    /**
     * Most urgent waiting patient, left in place
     *
     * @returns Head of the queue or null if queue empty
     */
    peekNext(): Patient | null {
        this.refresh();
        return this.heap.peek() ?? null;
    }

    /**
     * Remove and return the most urgent waiting patient
     *
     * An empty queue is a normal outcome, not an error.
     *
     * @returns Head of the queue or null if queue empty
     */
    dequeueNext(): Patient | null {
        this.refresh();
        return this.heap.pop() ?? null;
    }

    /**
     * @returns Number of waiting entries, duplicates included
     */
    size(): number {
        return this.heap.size;
    }

    /**
     * Current triage order as a fresh array
     *
     * The live queue is not touched.
     *
     * @returns Copy of the queue, head first
     */
    snapshotOrder(): Patient[] {
        this.refresh();
        return this.heap.toSortedArray();
    }

    /**
     * Drop every waiting entry; registry and log are untouched
     */
    clear(): void {
        this.heap.clear();
        this.stale = false;
    }

    /**
     * Rebuild ordering whenever a patient in this registry is updated
     *
     * Watching the same registry twice is a no-op.
     *
     * @param registry Registry whose updates may reorder waiting patients
     * @returns Function that stops watching
     */
    watch(registry: PatientRegistry): () => void {
        const existing = this.watched.get(registry);
        if (existing) {
            return existing;
        }

        const unsubscribe = registry.onUpdate(() => {
            this.stale = true;
        });
        const stop = (): void => {
            unsubscribe();
            this.watched.delete(registry);
        };
        this.watched.set(registry, stop);
        return stop;
    }

    private refresh(): void {
        if (this.stale) {
            this.heap.rebuild();
            this.stale = false;
        }
    }
}
