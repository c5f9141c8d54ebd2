// src/models/Patient.ts

export const PLACEHOLDER_ID = 'No Id';
export const PLACEHOLDER_NAME = 'No Name';

export const MIN_SEVERITY = 1;
export const MAX_SEVERITY = 10;

/**
 * Patient record as held by the registry
 *
 * Data only, no methods. Mutation happens through PatientRegistry.update.
 *
 * Invariant: id and arrivalSeq never change after creation
 * Invariant: severity in [1, 10], age >= 0, name non-empty
 */
export interface PatientRecord {
    readonly id: string;
    name: string;
    age: number;
    severity: number;
    readonly arrivedAt: Date;
    readonly arrivalSeq: number;   // Registry-issued, strictly increasing
}

/**
 * Read-only view handed out to callers
 */
export type Patient = Readonly<PatientRecord>;

// Normalizers return a valid value and never throw

/**
 * @param raw Requested ID
 * @returns raw, or the placeholder when blank
 */
export function normalizeId(raw: string | null | undefined): string {
    return raw && raw.trim() !== '' ? raw : PLACEHOLDER_ID;
}

/**
 * @param raw Requested name
 * @returns raw, or the placeholder when blank
 */
export function normalizeName(raw: string | null | undefined): string {
    return raw && raw.trim() !== '' ? raw : PLACEHOLDER_NAME;
}

/**
 * @param raw Requested age
 * @returns raw if a non-negative integer, otherwise 0
 */
export function normalizeAge(raw: number): number {
    return isValidAge(raw) ? raw : 0;
}

/**
 * @param raw Requested severity
 * @returns raw if an integer in [1, 10], otherwise 1
 */
export function normalizeSeverity(raw: number): number {
    return isValidSeverity(raw) ? raw : MIN_SEVERITY;
}

export function isValidAge(value: number): boolean {
    return Number.isInteger(value) && value >= 0;
}

export function isValidSeverity(value: number): boolean {
    return Number.isInteger(value) && value >= MIN_SEVERITY && value <= MAX_SEVERITY;
}

/**
 * Identity check - two records are the same patient iff ids match
 *
 * Not an ordering rule: a re-registered id is a distinct record in the queue.
 */
export function samePatient(a: Patient, b: Patient): boolean {
    return a === b || a.id === b.id;
}

/**
 * One-line text form for the menu and logs
 */
export function formatPatient(p: Patient): string {
    return `Patient{id='${p.id}', name='${p.name}', age=${p.age}, severity=${p.severity}, arrivalSeq=${p.arrivalSeq}}`;
}
