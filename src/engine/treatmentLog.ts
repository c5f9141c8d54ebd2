// src/engine/treatmentLog.ts

import { TreatmentEvent } from '../models/TreatmentEvent';

/**
 * Append-only record of completed treatments, in append order
 */
export class TreatmentLog {
    private events: TreatmentEvent[] = [];

    /**
     * Add an event at the tail
     *
     * @param event Completed treatment
     */
    append(event: TreatmentEvent): void {
        this.events.push(event);
    }

    /**
     * @returns Number of logged treatments
     */
    size(): number {
        return this.events.length;
    }

    /**
     * @returns Copy of the log in append order
     */
    oldestFirst(): TreatmentEvent[] {
        return [...this.events];
    }

    /**
     * @returns Copy of the log, most recent first
     */
    newestFirst(): TreatmentEvent[] {
        return [...this.events].reverse();
    }
}
