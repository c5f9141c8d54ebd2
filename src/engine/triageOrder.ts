// src/engine/triageOrder.ts

import { Patient } from '../models/Patient';

/**
 * Triage ordering rule
 *
 * Pure function - same input always produces same output
 *
 * Rules:
 * 1. Same record (reference) ranks equal
 * 2. Higher severity first
 * 3. Equal severity: lower arrivalSeq first (FIFO)
 * 4. Absent operand ranks last
 *
 * arrivalSeq is unique per registry, so two distinct records never
 * tie on both keys. A re-registered id is a new record with its own
 * arrivalSeq and is ranked on its own keys.
 *
 * @returns Negative if a goes before b, positive if after, 0 if equal rank
 */
export function compareTriage(a: Patient | null | undefined, b: Patient | null | undefined): number {
    if (a == null && b == null) {
        return 0;
    }
    if (a == null) {
        return 1;
    }
    if (b == null) {
        return -1;
    }

    if (a === b) {
        return 0;
    }

    if (a.severity !== b.severity) {
        return b.severity - a.severity;
    }

    return a.arrivalSeq - b.arrivalSeq;
}

/**
 * Check that a sequence is in triage order
 *
 * @returns Index of the first element out of order, or -1
 */
export function findOrderViolation(order: readonly Patient[]): number {
    for (let i = 1; i < order.length; i++) {
        if (compareTriage(order[i - 1], order[i]) > 0) {
            return i;
        }
    }
    return -1;
}
