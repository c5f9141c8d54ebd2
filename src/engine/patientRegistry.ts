// src/engine/patientRegistry.ts

import {
    Patient,
    PatientRecord,
    isValidAge,
    isValidSeverity,
    normalizeAge,
    normalizeId,
    normalizeName,
    normalizeSeverity
} from '../models/Patient';

export interface PatientChanges {
    name?: string;
    age?: number;
    severity?: number;
}

export type PatientUpdateListener = (patient: Patient) => void;

/**
 * Patient registry - sole authority for identity and arrival order
 *
 * Every method is synchronous, so each call completes before any other
 * caller on the event loop can observe the registry.
 *
 * Invariant: at most one entry per id (re-registration replaces)
 * Invariant: arrivalSeq starts at 0 and grows by exactly 1 per register call
 */
export class PatientRegistry {
    private patients: Map<string, PatientRecord>;
    private nextArrivalSeq: number;
    private listeners: PatientUpdateListener[];

    constructor() {
        this.patients = new Map();
        this.nextArrivalSeq = 0;
        this.listeners = [];
    }

    /**
     * Create a patient with normalized fields and the next arrival number
     *
     * An existing entry with the same id is replaced (last write wins).
     * The sequence advances even when every field falls back to a default.
     *
     * @param id Patient ID, placeholder if blank
     * @param name Patient name, placeholder if blank
     * @param age Age in years, 0 if negative or fractional
     * @param severity Urgency 1-10, 1 if out of range
     * @returns Stored patient
     */
    register(id: string, name: string, age: number, severity: number): Patient {
        const arrivalSeq = this.nextArrivalSeq++;

        const patient: PatientRecord = {
            id: normalizeId(id),
            name: normalizeName(name),
            age: normalizeAge(age),
            severity: normalizeSeverity(severity),
            arrivedAt: new Date(),
            arrivalSeq
        };

        this.patients.set(patient.id, patient);
        return patient;
    }

    /**
     * Apply the supplied fields to an existing patient
     *
     * Invalid values are ignored field by field; a blank name becomes
     * the placeholder.
     *
     * @param id Patient ID
     * @param changes Fields to apply; omitted fields stay as they are
     * @returns Updated patient or null if id unknown
     */
    update(id: string, changes: PatientChanges): Patient | null {
        const patient = this.patients.get(id);
        if (!patient) {
            return null;
        }

        if (changes.name !== undefined) {
            patient.name = normalizeName(changes.name);
        }
        if (changes.age !== undefined && isValidAge(changes.age)) {
            patient.age = changes.age;
        }
        if (changes.severity !== undefined && isValidSeverity(changes.severity)) {
            patient.severity = changes.severity;
        }

        for (const listener of this.listeners) {
            listener(patient);
        }
        return patient;
    }

    /**
     * Get patient by ID
     *
     * @param id Patient ID
     * @returns Patient or null if not registered
     */
    lookup(id: string): Patient | null {
        return this.patients.get(id) ?? null;
    }

    /**
     * @param id Patient ID
     * @returns True if a patient with this ID is registered
     */
    contains(id: string): boolean {
        return this.patients.has(id);
    }

    /**
     * @returns Number of distinct registered IDs
     */
    count(): number {
        return this.patients.size;
    }

    /**
     * Subscribe to successful updates
     *
     * @param listener Called with the patient after each applied update
     * @returns Function that removes the listener
     */
    onUpdate(listener: PatientUpdateListener): () => void {
        this.listeners.push(listener);
        return () => {
            this.listeners = this.listeners.filter(l => l !== listener);
        };
    }
}
