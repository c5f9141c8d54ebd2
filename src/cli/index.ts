// src/cli/index.ts

import { createInterface } from 'node:readline';
import { loadConfig } from '../config';
import { PatientRegistry } from '../engine/patientRegistry';
import { TreatmentLog } from '../engine/treatmentLog';
import { TriageQueue } from '../engine/triageQueue';
import { TriageMenu } from './triageMenu';

async function main(): Promise<void> {
    const config = loadConfig();
    const rl = createInterface({ input: process.stdin });

    const menu = new TriageMenu(
        new PatientRegistry(),
        new TriageQueue(),
        new TreatmentLog(),
        {
            lines: rl[Symbol.asyncIterator](),
            write: text => process.stdout.write(text)
        },
        { seed: config.LOAD_TEST_SEED, distribution: config.LOAD_TEST_DISTRIBUTION }
    );

    try {
        await menu.run();
    } finally {
        rl.close();
    }
}

main().catch(err => {
    console.error('Error:', err instanceof Error ? err.message : err);
    process.exitCode = 1;
});
