// src/io/csvIO.ts

import { readFile, writeFile } from 'node:fs/promises';
import { PatientRegistry } from '../engine/patientRegistry';
import { CsvFormatError } from '../errors';
import { TreatmentEvent } from '../models/TreatmentEvent';

export const PATIENT_CSV_HEADER = 'id,name,age,severity';
export const TREATMENT_CSV_HEADER = 'id,name,age,severity,treatedAt';

/**
 * Row of an exported treatment file
 */
export interface TreatmentCsvRow {
    id: string;
    name: string;
    age: number;
    severity: number;
    treatedAt: Date;
}

const INTEGER = /^[+-]?\d+$/;

/**
 * Parse a whole-number field
 *
 * @param text Trimmed field text
 * @returns The value, or null if not an integer or beyond the safe range
 */
function parseInteger(text: string | undefined): number | null {
    if (text === undefined || !INTEGER.test(text)) {
        return null;
    }
    const value = Number(text);
    return Number.isSafeInteger(value) ? value : null;
}

/**
 * Register every patient in a patient CSV document
 *
 * Format: header `id,name,age,severity` (any case), then one patient per
 * non-blank line. Fields may be double-quoted to carry commas.
 *
 * Aborts at the first bad line. Rows before it stay registered.
 *
 * @returns Number of patients registered
 * @throws CsvFormatError with the offending line
 */
export function parsePatientsCsv(text: string, registry: PatientRegistry): number {
    if (text === '') {
        throw new CsvFormatError('CSV is empty', 1, '');
    }

    const lines = text.split(/\r?\n/);
    const header = lines[0];
    if (header.trim().toLowerCase() !== PATIENT_CSV_HEADER) {
        throw new CsvFormatError('Invalid CSV header', 1, header);
    }

    let registered = 0;
    for (let i = 1; i < lines.length; i++) {
        const line = lines[i].trim();
        if (line === '') {
            continue;
        }

        const lineNumber = i + 1;
        const fields = splitCsvLine(line, lineNumber);
        if (fields.length !== 4) {
            throw new CsvFormatError('Invalid row (wrong number of fields)', lineNumber, line);
        }

        const [id, name, ageText, severityText] = fields;
        if (id === '' || name === '' || ageText === '' || severityText === '') {
            throw new CsvFormatError('Missing field in row', lineNumber, line);
        }
        const age = parseInteger(ageText);
        const severity = parseInteger(severityText);
        if (age === null || severity === null) {
            throw new CsvFormatError('Invalid number in row', lineNumber, line);
        }

        registry.register(id, name, age, severity);
        registered++;
    }

    return registered;
}

export async function loadPatients(path: string, registry: PatientRegistry): Promise<number> {
    const text = await readFile(path, 'utf8');
    return parsePatientsCsv(text, registry);
}

/**
 * Render the log oldest-first as CSV
 *
 * Patient columns reflect the patient's state now, not at treatment time.
 */
export function renderTreatmentCsv(events: readonly TreatmentEvent[]): string {
    const rows = [TREATMENT_CSV_HEADER];
    for (const event of events) {
        const p = event.patient;
        rows.push([escapeCsvField(p.id), escapeCsvField(p.name), p.age, p.severity, event.endedAt.toISOString()].join(','));
    }
    return rows.join('\n') + '\n';
}

export async function exportLog(path: string, events: readonly TreatmentEvent[]): Promise<void> {
    await writeFile(path, renderTreatmentCsv(events), 'utf8');
}

/**
 * Parse a document produced by renderTreatmentCsv
 */
export function parseTreatmentCsv(text: string): TreatmentCsvRow[] {
    const lines = text.split(/\r?\n/);
    if (lines[0].trim().toLowerCase() !== TREATMENT_CSV_HEADER.toLowerCase()) {
        throw new CsvFormatError('Invalid CSV header', 1, lines[0]);
    }

    const rows: TreatmentCsvRow[] = [];
    for (let i = 1; i < lines.length; i++) {
        const line = lines[i].trim();
        if (line === '') {
            continue;
        }

        const fields = splitCsvLine(line, i + 1);
        const [id, name, ageText, severityText, treatedAtText] = fields;
        const age = parseInteger(ageText);
        const severity = parseInteger(severityText);
        const treatedAt = new Date(treatedAtText ?? '');
        if (fields.length !== 5 || age === null || severity === null || Number.isNaN(treatedAt.getTime())) {
            throw new CsvFormatError('Invalid treatment row', i + 1, line);
        }

        rows.push({ id, name, age, severity, treatedAt });
    }
    return rows;
}

/**
 * Quote when the value holds a comma or a double quote
 */
export function escapeCsvField(value: string): string {
    if (value.includes(',') || value.includes('"')) {
        return `"${value.replace(/"/g, '""')}"`;
    }
    return value;
}

/**
 * Split on commas outside double quotes, trim and unquote each field
 */
export function splitCsvLine(line: string, lineNumber: number): string[] {
    const raw: string[] = [];
    let current = '';
    let inQuotes = false;

    for (let i = 0; i < line.length; i++) {
        const ch = line[i];
        if (ch === '"') {
            if (inQuotes && line[i + 1] === '"') {
                current += '""';
                i++;
                continue;
            }
            inQuotes = !inQuotes;
            current += ch;
        } else if (ch === ',' && !inQuotes) {
            raw.push(current);
            current = '';
        } else {
            current += ch;
        }
    }

    if (inQuotes) {
        throw new CsvFormatError('Unterminated quoted field', lineNumber, line);
    }
    raw.push(current);

    return raw.map(unquote);
}

function unquote(field: string): string {
    const trimmed = field.trim();
    if (trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
        return trimmed.slice(1, -1).replace(/""/g, '"');
    }
    return trimmed;
}
