// src/app.ts

import express from 'express';
import { PatientRegistry } from './engine/patientRegistry';
import { TreatmentLog } from './engine/treatmentLog';
import { TriageQueue } from './engine/triageQueue';
import { createPatientRoutes } from './routes/patientRoutes';
import { createQueueRoutes } from './routes/queueRoutes';
import { createTreatmentRoutes } from './routes/treatmentRoutes';

/**
 * In-memory data stores:
 * - registry: All known patients by id
 * - queue: Patients waiting for treatment, in triage order
 * - treatmentLog: Completed treatments, append-only
 */
export interface TriageStores {
    registry: PatientRegistry;
    queue: TriageQueue;
    treatmentLog: TreatmentLog;
}

export function createStores(): TriageStores {
    return {
        registry: new PatientRegistry(),
        queue: new TriageQueue(),
        treatmentLog: new TreatmentLog()
    };
}

/**
 * Express application setup
 *
 * @param stores Registry, queue and log the routes operate on
 * @returns Configured app, not yet listening
 */
export function createApp(stores: TriageStores): express.Express {
    const { registry, queue, treatmentLog } = stores;
    const app = express();

    // Middleware
    app.use(express.json());

    queue.watch(registry);

    // Routes
    app.use('/patients', createPatientRoutes(registry));
    app.use('/queue', createQueueRoutes(registry, queue, treatmentLog));
    app.use('/treatments', createTreatmentRoutes(treatmentLog));

    // Health check
    app.get('/health', (_req, res) => {
        res.json({
            status: 'healthy',
            patients: registry.count(),
            waiting: queue.size(),
            treated: treatmentLog.size()
        });
    });

    // Error handling
    app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
        console.error('Error:', err.message);
        res.status(500).json({ error: err.message });
    });

    return app;
}
