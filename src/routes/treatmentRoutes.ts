// src/routes/treatmentRoutes.ts

import { Router, Request, Response } from 'express';
import { TreatmentLog } from '../engine/treatmentLog';
import { renderTreatmentCsv } from '../io/csvIO';

/**
 * Treatment log routes - read only
 */
export function createTreatmentRoutes(log: TreatmentLog): Router {
    const router = Router();

    /**
     * GET /treatments?order=newest|oldest
     */
    router.get('/', (req: Request, res: Response) => {
        const treatments = req.query.order === 'newest' ? log.newestFirst() : log.oldestFirst();
        res.json({ size: log.size(), treatments });
    });

    /**
     * GET /treatments/export.csv
     */
    router.get('/export.csv', (_req: Request, res: Response) => {
        res.type('text/csv').send(renderTreatmentCsv(log.oldestFirst()));
    });

    return router;
}
