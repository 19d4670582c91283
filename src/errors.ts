export type TrackerErrorCode = 'FETCH_FAILED' | 'STORAGE_FAILED' | 'INVALID_CATALOG' | 'INVALID_INPUT';

export class TrackerError extends Error {
    readonly code: TrackerErrorCode;

    constructor(code: TrackerErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

/** The fetch collaborator threw, or handed back nothing to count. */
export class FetchError extends TrackerError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('FETCH_FAILED', message, options);
    }
}

export class StorageError extends TrackerError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('STORAGE_FAILED', message, options);
    }
}

export class CatalogError extends TrackerError {
    constructor(message: string) {
        super('INVALID_CATALOG', message);
    }
}

export class InputError extends TrackerError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('INVALID_INPUT', message, options);
    }
}

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));
