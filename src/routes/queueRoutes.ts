// src/routes/queueRoutes.ts

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { PatientRegistry } from '../engine/patientRegistry';
import { TreatmentLog } from '../engine/treatmentLog';
import { TriageQueue } from '../engine/triageQueue';
import { admitAndTreat, parseOutcome } from '../events/treatmentHandler';

const enqueueSchema = z.object({
    id: z.string().min(1)
});

const treatSchema = z.object({
    outcome: z.string(),
    notes: z.string().default('')
});

/**
 * Queue routes - HTTP mapping only
 * Business logic delegated to engine/events
 */
export function createQueueRoutes(
    registry: PatientRegistry,
    queue: TriageQueue,
    log: TreatmentLog
): Router {
    const router = Router();

    /**
     * Current triage order
     * GET /queue
     */
    router.get('/', (_req: Request, res: Response) => {
        res.json({ size: queue.size(), order: queue.snapshotOrder() });
    });

    /**
     * Enqueue a registered patient
     * POST /queue
     * Body: { id }
     */
    router.post('/', (req: Request, res: Response) => {
        const parsed = enqueueSchema.safeParse(req.body);
        if (!parsed.success) {
            res.status(400).json({ error: 'Missing patient id' });
            return;
        }

        if (!queue.enqueueById(registry, parsed.data.id)) {
            res.status(404).json({ error: 'Patient not found' });
            return;
        }

        res.status(201).json({ size: queue.size() });
    });

    /**
     * Next patient without removing
     * GET /queue/next
     */
    router.get('/next', (_req: Request, res: Response) => {
        const patient = queue.peekNext();
        if (!patient) {
            res.status(404).json({ error: 'Queue empty' });
            return;
        }

        res.json({ patient });
    });

    /**
     * Dequeue the next patient and log the treatment
     * POST /queue/treat
     * Body: { outcome, notes? }
     */
    router.post('/treat', (req: Request, res: Response) => {
        const parsed = treatSchema.safeParse(req.body);
        const outcome = parsed.success ? parseOutcome(parsed.data.outcome) : null;
        if (!parsed.success || !outcome) {
            res.status(400).json({ error: 'Outcome must be STABLE, OBSERVE or TRANSFER' });
            return;
        }

        const treatment = admitAndTreat(queue, log, outcome, parsed.data.notes);
        if (!treatment) {
            res.status(404).json({ error: 'Queue empty' });
            return;
        }

        res.json({ treatment });
    });

    /**
     * Drop everyone waiting
     * DELETE /queue
     */
    router.delete('/', (_req: Request, res: Response) => {
        queue.clear();
        res.status(204).end();
    });

    return router;
}
