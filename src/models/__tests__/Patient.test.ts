import { describe, it, expect } from 'vitest';
import {
    Patient,
    formatPatient,
    normalizeAge,
    normalizeName,
    normalizeSeverity,
    samePatient
} from '../Patient';
import { TreatmentOutcome, formatTreatment } from '../TreatmentEvent';

const ann: Patient = { id: 'P1', name: 'Ann', age: 30, severity: 5, arrivedAt: new Date(0), arrivalSeq: 0 };

describe('normalizers', () => {
    it('keep valid values', () => {
        expect(normalizeName('Ann')).toBe('Ann');
        expect(normalizeAge(0)).toBe(0);
        expect(normalizeSeverity(10)).toBe(10);
    });

    it('replace invalid values with defaults', () => {
        expect(normalizeName(undefined)).toBe('No Name');
        expect(normalizeAge(-1)).toBe(0);
        expect(normalizeAge(2.5)).toBe(0);
        expect(normalizeSeverity(0)).toBe(1);
        expect(normalizeSeverity(11)).toBe(1);
    });
});

describe('samePatient', () => {
    it('compares by id only', () => {
        expect(samePatient(ann, { ...ann, name: 'Other', severity: 9 })).toBe(true);
        expect(samePatient(ann, { ...ann, id: 'P2' })).toBe(false);
    });
});

describe('formatting', () => {
    it('renders a patient', () => {
        expect(formatPatient(ann)).toBe("Patient{id='P1', name='Ann', age=30, severity=5, arrivalSeq=0}");
    });

    it('renders a treatment', () => {
        const text = formatTreatment({
            patient: ann,
            startedAt: new Date('2026-01-01T10:00:00.000Z'),
            endedAt: new Date('2026-01-01T10:30:00.000Z'),
            outcome: TreatmentOutcome.TRANSFER,
            notes: 'to cardiology'
        });

        expect(text).toBe(
            "TreatedCase{patient=P1, start=2026-01-01T10:00:00.000Z, end=2026-01-01T10:30:00.000Z, outcome=TRANSFER, notes='to cardiology'}"
        );
    });
});
