// src/simulation/timing.ts

import { performance } from 'node:perf_hooks';

export interface Timed<T> {
    label: string;
    millis: number;
    result: T;
}

export function timed<T>(label: string, fn: () => T): Timed<T> {
    const start = performance.now();
    const result = fn();
    return { label, millis: performance.now() - start, result };
}
