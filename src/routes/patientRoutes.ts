// src/routes/patientRoutes.ts

import { Router, Request, Response, text } from 'express';
import { z } from 'zod';
import { PatientRegistry } from '../engine/patientRegistry';
import { CsvFormatError } from '../errors';
import { parsePatientsCsv } from '../io/csvIO';

// Shape only - range normalization is the registry's job
const registerSchema = z.object({
    id: z.string(),
    name: z.string(),
    age: z.number().int(),
    severity: z.number().int()
});

const updateSchema = z.object({
    name: z.string().optional(),
    age: z.number().int().optional(),
    severity: z.number().int().optional()
});

/**
 * Patient routes - HTTP mapping only
 * Business logic delegated to the registry
 */
export function createPatientRoutes(registry: PatientRegistry): Router {
    const router = Router();

    /**
     * Register (or re-register) a patient
     * POST /patients
     * Body: { id, name, age, severity }
     */
    router.post('/', (req: Request, res: Response) => {
        const parsed = registerSchema.safeParse(req.body);
        if (!parsed.success) {
            res.status(400).json({ error: 'Invalid patient', issues: parsed.error.issues });
            return;
        }

        const { id, name, age, severity } = parsed.data;
        const patient = registry.register(id, name, age, severity);

        res.status(201).json({ patient });
    });

    /**
     * Import patients from CSV
     * POST /patients/import
     * Body: text/csv
     */
    router.post('/import', text({ type: ['text/csv', 'text/plain'] }), (req: Request, res: Response) => {
        if (typeof req.body !== 'string') {
            res.status(415).json({ error: 'Expected a text/csv body' });
            return;
        }

        try {
            const imported = parsePatientsCsv(req.body, registry);
            res.json({ imported, patients: registry.count() });
        } catch (err) {
            if (err instanceof CsvFormatError) {
                res.status(400).json({
                    error: err.message,
                    line: err.lineNumber,
                    content: err.content,
                    patients: registry.count()
                });
                return;
            }
            throw err;
        }
    });

    /**
     * Update an existing patient
     * PATCH /patients/:id
     * Body: { name?, age?, severity? }
     */
    router.patch('/:id', (req: Request, res: Response) => {
        const parsed = updateSchema.safeParse(req.body);
        if (!parsed.success) {
            res.status(400).json({ error: 'Invalid update', issues: parsed.error.issues });
            return;
        }

        const patient = registry.update(req.params.id, parsed.data);
        if (!patient) {
            res.status(404).json({ error: 'Patient not found' });
            return;
        }

        res.json({ patient });
    });

    /**
     * Look up a patient
     * GET /patients/:id
     */
    router.get('/:id', (req: Request, res: Response) => {
        const patient = registry.lookup(req.params.id);
        if (!patient) {
            res.status(404).json({ error: 'Patient not found' });
            return;
        }

        res.json({ patient });
    });

    return router;
}
