// src/simulation/sampleWorkloads.ts

import { PatientRegistry } from '../engine/patientRegistry';
import { TriageQueue } from '../engine/triageQueue';

/**
 * Severity distributions for generated patients
 */
export enum SeverityDistribution {
    UNIFORM = 'UNIFORM',   // 1-10 equally likely
    SKEWED = 'SKEWED'      // Minor cases dominate, ~60% land in 1-3
}

// Cumulative percent thresholds for severities 1..10
const SKEWED_THRESHOLDS = [25, 50, 60, 75, 85, 92, 96, 98, 99, 100];

export interface MixedWorkloadResult {
    enqueued: number;
    dequeued: number;
}

/**
 * Deterministic load generator
 *
 * Same seed and distribution always produce the same patients and the
 * same enqueue/dequeue mix, so timings can be compared run to run.
 */
export class SampleWorkloads {
    private readonly random: () => number;
    private readonly distribution: SeverityDistribution;
    private nextIdCounter = 1;

    constructor(seed: number, distribution: SeverityDistribution) {
        this.random = mulberry32(seed);
        this.distribution = distribution;
    }

    /**
     * Register `count` new patients and enqueue each one
     *
     * Registry first, so arrivalSeq follows generation order.
     */
    enqueueRandomPatients(count: number, registry: PatientRegistry, queue: TriageQueue): void {
        for (let i = 0; i < count; i++) {
            this.enqueueOne(registry, queue);
        }
    }

    /**
     * Attempt `count` dequeues; empty-queue attempts are expected traffic
     *
     * @returns Number of patients actually removed
     */
    performDequeues(count: number, queue: TriageQueue): number {
        let dequeued = 0;
        for (let i = 0; i < count; i++) {
            if (queue.dequeueNext()) {
                dequeued++;
            }
        }
        return dequeued;
    }

    /**
     * Random interleaving of enqueues and dequeues in ratioEnq:ratioDeq
     */
    runMixedWorkload(
        totalOps: number,
        ratioEnq: number,
        ratioDeq: number,
        registry: PatientRegistry,
        queue: TriageQueue
    ): MixedWorkloadResult {
        const totalRatio = ratioEnq + ratioDeq;
        if (totalRatio <= 0) {
            throw new RangeError('Workload ratios must sum to a positive number');
        }

        const result: MixedWorkloadResult = { enqueued: 0, dequeued: 0 };
        for (let i = 0; i < totalOps; i++) {
            if (this.nextInt(totalRatio) < ratioEnq) {
                this.enqueueOne(registry, queue);
                result.enqueued++;
            } else if (queue.dequeueNext()) {
                result.dequeued++;
            }
        }
        return result;
    }

    nextGeneratedId(): string {
        return `P${String(this.nextIdCounter++).padStart(4, '0')}`;
    }

    randomSeverity(): number {
        if (this.distribution === SeverityDistribution.UNIFORM) {
            return 1 + this.nextInt(10);
        }

        const roll = this.nextInt(100);
        const index = SKEWED_THRESHOLDS.findIndex(threshold => roll < threshold);
        return index + 1;
    }

    private enqueueOne(registry: PatientRegistry, queue: TriageQueue): void {
        const id = this.nextGeneratedId();
        const patient = registry.register(id, `Patient-${id}`, this.nextInt(120), this.randomSeverity());
        queue.enqueue(patient);
    }

    private nextInt(bound: number): number {
        return Math.floor(this.random() * bound);
    }
}

/**
 * Small seeded PRNG, uniform in [0, 1)
 */
function mulberry32(seed: number): () => number {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}
