// src/cli/triageMenu.ts

import { PatientRegistry } from '../engine/patientRegistry';
import { TreatmentLog } from '../engine/treatmentLog';
import { TriageQueue } from '../engine/triageQueue';
import { admitAndTreat } from '../events/treatmentHandler';
import { exportLog, loadPatients } from '../io/csvIO';
import { formatPatient } from '../models/Patient';
import { TreatmentOutcome, formatTreatment } from '../models/TreatmentEvent';
import { SampleWorkloads, SeverityDistribution } from '../simulation/sampleWorkloads';
import { timed } from '../simulation/timing';

export interface MenuIO {
    lines: AsyncIterator<string>;
    write: (text: string) => void;
}

export interface MenuOptions {
    seed: number;
    distribution: SeverityDistribution;
}

const MENU = [
    '',
    '========= Triage Menu =========',
    '1) Register patient',
    '2) Update patient',
    '3) Enqueue patient',
    '4) Peek next',
    '5) Admit & treat next',
    '6) Print triage order',
    '7) Find patient',
    '8) Show treatment log',
    '9) Load test',
    '10) Export log to CSV',
    '11) Import patients from CSV',
    '0) Exit',
    '==============================='
];

const OUTCOME_CHOICES = new Map<string, TreatmentOutcome>([
    ['1', TreatmentOutcome.STABLE],
    ['2', TreatmentOutcome.OBSERVE],
    ['3', TreatmentOutcome.TRANSFER]
]);

/**
 * Operator menu - text I/O only
 * Every action maps to one registry/queue/log operation
 */
export class TriageMenu {
    private registry: PatientRegistry;
    private queue: TriageQueue;
    private log: TreatmentLog;
    private io: MenuIO;
    private workloads: SampleWorkloads;
    private closed = false;

    constructor(
        registry: PatientRegistry,
        queue: TriageQueue,
        log: TreatmentLog,
        io: MenuIO,
        options: MenuOptions
    ) {
        this.registry = registry;
        this.queue = queue;
        this.log = log;
        this.io = io;
        this.workloads = new SampleWorkloads(options.seed, options.distribution);
        this.queue.watch(registry);
    }

    /**
     * Loop until "0" or end of input
     */
    async run(): Promise<void> {
        while (!this.closed) {
            this.println(MENU.join('\n'));
            const choice = await this.prompt('Choose: ');
            if (this.closed || choice === '0') {
                break;
            }
            await this.dispatch(choice);
        }
        this.println('Goodbye.');
    }

    private async dispatch(choice: string): Promise<void> {
        switch (choice) {
            case '1': return this.registerPatient();
            case '2': return this.updatePatient();
            case '3': return this.enqueuePatient();
            case '4': return this.peekNext();
            case '5': return this.treatNext();
            case '6': return this.printOrder();
            case '7': return this.findPatient();
            case '8': return this.showLog();
            case '9': return this.loadTest();
            case '10': return this.exportCsv();
            case '11': return this.importCsv();
            default:
                this.println('Invalid choice.');
        }
    }

    private async registerPatient(): Promise<void> {
        this.println('---- Register New Patient ----');
        const id = await this.prompt('ID: ');
        const name = await this.prompt('Name: ');
        const age = await this.promptInt('Age: ');
        const severity = await this.promptInt('Severity (1-10): ');
        if (age === null || severity === null) {
            return;
        }

        const patient = this.registry.register(id, name, age, severity);
        this.println(`Registered: ${formatPatient(patient)}`);
    }

    private async updatePatient(): Promise<void> {
        this.println('---- Update Patient ----');
        const id = await this.prompt('ID: ');
        const name = await this.prompt('New name (blank = no change): ');
        const age = parseOptionalInt(await this.prompt('New age (blank = no change): '));
        const severity = parseOptionalInt(await this.prompt('New severity (blank = no change): '));

        const updated = this.registry.update(id, {
            name: name === '' ? undefined : name,
            age,
            severity
        });
        this.println(updated ? 'Patient updated.' : 'Patient not found.');
    }

    private async enqueuePatient(): Promise<void> {
        const id = await this.prompt('Enter patient ID to enqueue: ');
        const added = this.queue.enqueueById(this.registry, id);
        this.println(added ? 'Added to queue.' : 'No such patient ID.');
    }

    private peekNext(): void {
        const next = this.queue.peekNext();
        this.println(next ? `Next: ${formatPatient(next)}` : 'Triage queue empty.');
    }

    private async treatNext(): Promise<void> {
        const next = this.queue.peekNext();
        if (!next) {
            this.println('Queue empty.');
            return;
        }
        this.println(`Treating: ${formatPatient(next)}`);

        const outcome = await this.askOutcome();
        if (outcome === null) {
            return;
        }
        const notes = await this.prompt('Notes: ');

        admitAndTreat(this.queue, this.log, outcome, notes);
        this.println('Treatment logged.');
    }

    private printOrder(): void {
        this.println('---- Triage Order ----');
        for (const patient of this.queue.snapshotOrder()) {
            this.println(formatPatient(patient));
        }
    }

    private async findPatient(): Promise<void> {
        const patient = this.registry.lookup(await this.prompt('ID: '));
        this.println(patient ? formatPatient(patient) : 'Not found.');
    }

    private async showLog(): Promise<void> {
        this.println('1) Oldest -> Newest');
        this.println('2) Newest -> Oldest');
        const choice = await this.prompt('Choose: ');

        const events = choice === '2' ? this.log.newestFirst() : this.log.oldestFirst();
        this.println('---- Treatment Log ----');
        for (const event of events) {
            this.println(formatTreatment(event));
        }
    }

    private async loadTest(): Promise<void> {
        this.println('---- Load Test ----');
        const n = await this.promptInt('How many patients to enqueue? ');
        const k = await this.promptInt('How many dequeues? ');
        if (n === null || k === null) {
            return;
        }

        // One generator per menu, so generated ids keep counting across runs
        const enqueue = timed('Enqueue N', () => this.workloads.enqueueRandomPatients(n, this.registry, this.queue));
        const dequeue = timed('Dequeue K', () => this.workloads.performDequeues(k, this.queue));

        this.println(`${enqueue.label}: ${enqueue.millis.toFixed(2)} ms`);
        this.println(`${dequeue.label}: ${dequeue.millis.toFixed(2)} ms (${dequeue.result} dequeued)`);
    }

    private async exportCsv(): Promise<void> {
        const path = await this.prompt('CSV file name: ');
        try {
            await exportLog(path, this.log.oldestFirst());
            this.println(`Exported to ${path}`);
        } catch (err) {
            this.println(`Export failed: ${errorMessage(err)}`);
        }
    }

    private async importCsv(): Promise<void> {
        const path = await this.prompt('CSV file name: ');
        try {
            const count = await loadPatients(path, this.registry);
            this.println(`Loaded ${count} patients from ${path}`);
        } catch (err) {
            this.println(`Import failed: ${errorMessage(err)}`);
        }
    }

    private async askOutcome(): Promise<TreatmentOutcome | null> {
        while (!this.closed) {
            this.println('Outcome: 1) STABLE  2) OBSERVE  3) TRANSFER');
            const outcome = OUTCOME_CHOICES.get(await this.prompt('Choose: '));
            if (outcome) {
                return outcome;
            }
            if (!this.closed) {
                this.println('Invalid choice.');
            }
        }
        return null;
    }

    /**
     * Re-prompt until an integer is entered
     *
     * @returns null if input ends first
     */
    private async promptInt(message: string): Promise<number | null> {
        while (!this.closed) {
            const value = parseOptionalInt(await this.prompt(message));
            if (value !== undefined) {
                return value;
            }
            if (!this.closed) {
                this.println('Enter a valid integer.');
            }
        }
        return null;
    }

    private async prompt(message: string): Promise<string> {
        this.io.write(message);
        const next = await this.io.lines.next();
        if (next.done) {
            this.closed = true;
            return '';
        }
        return next.value.trim();
    }

    private println(text: string): void {
        this.io.write(`${text}\n`);
    }
}

/**
 * Blank or non-numeric input means "no value"
 */
export function parseOptionalInt(raw: string): number | undefined {
    const text = raw.trim();
    return /^[+-]?\d+$/.test(text) ? Number(text) : undefined;
}

function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
