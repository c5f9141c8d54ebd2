// src/errors/index.ts

/**
 * Caller broke a contract (e.g. enqueued no patient). Indicates a bug.
 */
export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}

/**
 * Malformed patient import data. Aborts the whole import.
 */
export class CsvFormatError extends Error {
    readonly lineNumber: number;
    readonly content: string;

    constructor(message: string, lineNumber: number, content: string) {
        super(`${message} (line ${lineNumber}): ${content}`);
        this.name = 'CsvFormatError';
        this.lineNumber = lineNumber;
        this.content = content;
    }
}
