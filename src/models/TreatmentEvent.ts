// src/models/TreatmentEvent.ts

import { Patient } from './Patient';

/**
 * Disposition of a completed treatment
 */
export enum TreatmentOutcome {
    STABLE = 'STABLE',       // Stabilized, discharged
    OBSERVE = 'OBSERVE',     // Kept under observation
    TRANSFER = 'TRANSFER'    // Transferred to another unit/facility
}

/**
 * One completed treatment
 *
 * Data only. Created when a patient is dequeued and dispositioned,
 * appended to the TreatmentLog once, never edited afterwards.
 */
export interface TreatmentEvent {
    readonly patient: Patient;
    readonly startedAt: Date;
    readonly endedAt: Date;
    readonly outcome: TreatmentOutcome;
    readonly notes: string;
}

export function formatTreatment(event: TreatmentEvent): string {
    return `TreatedCase{patient=${event.patient.id}, start=${event.startedAt.toISOString()}, end=${event.endedAt.toISOString()}, outcome=${event.outcome}, notes='${event.notes}'}`;
}
