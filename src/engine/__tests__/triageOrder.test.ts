import { describe, it, expect } from 'vitest';
import { Patient } from '../../models/Patient';
import { compareTriage, findOrderViolation } from '../triageOrder';

function patient(id: string, severity: number, arrivalSeq: number): Patient {
    return { id, name: id, age: 30, severity, arrivedAt: new Date(0), arrivalSeq };
}

describe('compareTriage', () => {
    it('ranks higher severity first', () => {
        const urgent = patient('A', 9, 5);
        const minor = patient('B', 2, 1);

        expect(compareTriage(urgent, minor)).toBeLessThan(0);
        expect(compareTriage(minor, urgent)).toBeGreaterThan(0);
    });

    it('breaks severity ties by arrival sequence', () => {
        const first = patient('A', 4, 0);
        const second = patient('B', 4, 2);

        expect(compareTriage(first, second)).toBeLessThan(0);
        expect(compareTriage(second, first)).toBeGreaterThan(0);
    });

    it('treats the same record as equal rank', () => {
        const p = patient('A', 3, 0);

        expect(compareTriage(p, p)).toBe(0);
    });

    it('ranks two records sharing an id on their own keys', () => {
        const original = patient('A', 3, 0);
        const reRegistered = patient('A', 8, 4);

        expect(compareTriage(reRegistered, original)).toBeLessThan(0);
        expect(compareTriage(original, reRegistered)).toBeGreaterThan(0);
    });

    it('puts an absent operand last', () => {
        const p = patient('A', 1, 99);

        expect(compareTriage(p, null)).toBeLessThan(0);
        expect(compareTriage(undefined, p)).toBeGreaterThan(0);
        expect(compareTriage(null, undefined)).toBe(0);
    });

    it('sorts a mixed list into triage order', () => {
        const list = [
            patient('P1', 4, 0),
            patient('P2', 8, 1),
            patient('P3', 4, 2),
            patient('P4', 10, 3),
            patient('P5', 8, 4)
        ];

        const ids = [...list].sort(compareTriage).map(p => p.id);

        expect(ids).toEqual(['P4', 'P2', 'P5', 'P1', 'P3']);
    });
});

describe('findOrderViolation', () => {
    it('returns -1 for an ordered sequence', () => {
        expect(findOrderViolation([patient('A', 9, 0), patient('B', 9, 1), patient('C', 2, 2)])).toBe(-1);
        expect(findOrderViolation([])).toBe(-1);
    });

    it('returns the index of the first misplaced element', () => {
        expect(findOrderViolation([patient('A', 9, 0), patient('B', 2, 1), patient('C', 5, 2)])).toBe(2);
    });
});
