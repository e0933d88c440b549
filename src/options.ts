import { z } from 'zod';
import { InvalidOptionsError } from './errors.js';

function isAsyncIterable(value: unknown): value is AsyncIterable<string> {
    return typeof value === 'object'
        && value !== null
        && Symbol.asyncIterator in value
        && typeof value[Symbol.asyncIterator] === 'function';
}

export const ParserOptionsSchema = z.object({
    /** Reject characters outside the accepted set of the current state */
    strict: z.boolean().default(false),
}).strict();

export const StreamOptionsSchema = ParserOptionsSchema.extend({
    /** The source stream yielding text chunks */
    stream: z.custom<AsyncIterable<string>>(isAsyncIterable, { message: 'stream must be an async iterable' }),
    /** Enable delta tracking between snapshots */
    trackDelta: z.boolean().default(true),
}).strict();

export const CliOptionsSchema = z.object({
    strict: z.boolean().default(false),
    every: z.boolean().default(false),
    /** Commander hands option values over as strings */
    chunkSize: z.union([z.string(), z.number()]).pipe(z.coerce.number().int().positive()).optional(),
});

/** Options accepted by StreamingJsonParser */
export type ParserOptions = z.input<typeof ParserOptionsSchema>;

/** Options accepted by JsonSnapshotStream */
export type StreamOptions = z.input<typeof StreamOptionsSchema>;

export type CliOptions = z.input<typeof CliOptionsSchema>;

/**
 * Validate an options object and apply defaults.
 */
export function resolveOptions<S extends z.ZodTypeAny>(schema: S, options: unknown): z.output<S> {
    const result = schema.safeParse(options);
    if (!result.success) {
        throw new InvalidOptionsError(result.error.issues);
    }
    return result.data;
}
