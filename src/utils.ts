/** Lookup key for free-text names: trimmed, lower-cased, inner whitespace collapsed. */
export const foldName = (value: string): string => value.trim().toLowerCase().replace(/\s+/g, ' ');

/**
 * Alphabetical order that doesn't depend on the runtime's locale data,
 * so serialized snapshots stay byte-identical across machines.
 */
export const compareNames = (a: string, b: string): number => {
    const foldedA = a.toLowerCase();
    const foldedB = b.toLowerCase();
    if (foldedA !== foldedB) return foldedA < foldedB ? -1 : 1;
    if (a === b) return 0;
    return a < b ? -1 : 1;
};

export const toIsoTimestamp = (value: Date | string): string => new Date(value).toISOString();

/** `YYYY-MM-DD` of the UTC day an ISO timestamp falls on. */
export const utcDay = (timestamp: string): string => toIsoTimestamp(timestamp).slice(0, 10);

export const isValidDate = (value: string): boolean => !Number.isNaN(Date.parse(value));

export const ratio = (part: number, whole: number): number => (whole > 0 ? part / whole : 0);
