import { z } from 'zod';

import { INPUT_DEFAULTS } from './constants.js';
import { InputError } from './errors.js';
import type { Input } from './types.js';
import { isValidDate } from './utils.js';

const dateString = z.string().refine(isValidDate, { message: 'must be an ISO date or timestamp' });

const inputSchema = z.object({
    mode: z.enum(['run', 'latest', 'range', 'history', 'export']).default(INPUT_DEFAULTS.mode),
    rows: z.array(z.record(z.unknown())).optional(),
    sourceDatasetId: z.string().min(1).optional(),
    feedUrl: z.string().url().optional(),
    storeName: z.string().min(1).default(INPUT_DEFAULTS.storeName),
    maxRejectPercent: z.number().int().min(0).max(100).default(INPUT_DEFAULTS.maxRejectPercent),
    catalog: z.record(z.array(z.string())).optional(),
    villageAliases: z.record(z.string()).optional(),
    from: dateString.optional(),
    to: dateString.optional(),
    days: z.number().int().positive().optional(),
});

/** Applies defaults to the raw Actor input and checks it; a missing input means a plain run. */
export const resolveInput = (raw: unknown): Input => {
    const result = inputSchema.safeParse(raw ?? {});
    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.') || 'input'}: ${issue.message}`);
        throw new InputError(`Invalid input: ${issues.join('; ')}`, { cause: result.error });
    }

    const { maxRejectPercent, ...rest } = result.data;
    return { ...rest, rejectThreshold: maxRejectPercent / 100 };
};
