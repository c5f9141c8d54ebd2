// src/events/treatmentHandler.ts

import { TreatmentLog } from '../engine/treatmentLog';
import { TriageQueue } from '../engine/triageQueue';
import { TreatmentEvent, TreatmentOutcome } from '../models/TreatmentEvent';

/**
 * Admit the next patient and record the treatment
 *
 * State transition: queued → dequeued → logged
 *
 * Side effects:
 * 1. Removes the head of the queue
 * 2. Appends one event to the log
 *
 * @param clock Time source for start/end stamps
 * @returns Logged event, or null (nothing logged) if the queue is empty
 */
export function admitAndTreat(
    queue: TriageQueue,
    log: TreatmentLog,
    outcome: TreatmentOutcome,
    notes: string,
    clock: () => Date = () => new Date()
): TreatmentEvent | null {
    const patient = queue.dequeueNext();
    if (!patient) {
        return null;
    }

    const startedAt = clock();
    const endedAt = clock();

    const event: TreatmentEvent = {
        patient,
        startedAt,
        endedAt,
        outcome,
        notes
    };

    log.append(event);
    return event;
}

export function parseOutcome(raw: string): TreatmentOutcome | null {
    const key = raw.trim().toUpperCase();
    switch (key) {
        case TreatmentOutcome.STABLE:
            return TreatmentOutcome.STABLE;
        case TreatmentOutcome.OBSERVE:
            return TreatmentOutcome.OBSERVE;
        case TreatmentOutcome.TRANSFER:
            return TreatmentOutcome.TRANSFER;
        default:
            return null;
    }
}
