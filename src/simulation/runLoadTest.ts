// src/simulation/runLoadTest.ts

import { loadConfig } from '../config';
import { log, logSection, printLoadTestReport, runLoadTest } from './loadTest';

/**
 * Usage: runLoadTest [patients] [dequeues] [mixedOps]
 */
function main(): void {
    const config = loadConfig();
    const [patients = '10000', dequeues = '5000', mixedOps = '10000'] = process.argv.slice(2);

    logSection('LOAD TEST - START');
    log(`Seed ${config.LOAD_TEST_SEED}, distribution ${config.LOAD_TEST_DISTRIBUTION}`);

    const report = runLoadTest({
        patients: Number(patients),
        dequeues: Number(dequeues),
        mixedOps: Number(mixedOps),
        seed: config.LOAD_TEST_SEED,
        distribution: config.LOAD_TEST_DISTRIBUTION
    });
    printLoadTestReport(report);

    logSection('LOAD TEST COMPLETE');
    if (!report.orderHolds) {
        process.exitCode = 1;
    }
}

// Run load test
main();
