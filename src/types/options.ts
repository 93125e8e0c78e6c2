import { z } from 'zod';
import { createInvalidOptionsError } from './errors.js';

export const DEFAULTS = {
    occurIndex: false,
    internalVariablePrefix: '_G',
    variablePrefix: 'z',
    compoundNounRelation: 'r_nn_2',
    idLinePrefix: 'id(',
    semHeaderOffset: 4,
    termOffset: 8,
} as const;

export const parseOptionsSchema = z.object({
    occurIndex: z.boolean().default(DEFAULTS.occurIndex)
        .describe('Embed the (sentence, word) position into occurrence-anchored predicate names'),
    discourseId: z.string().min(1).optional()
        .describe('Identifier inserted into every occurrence-anchored predicate name'),
}).strict();

export const batchOptionsSchema = z.object({
    occurIndex: z.boolean().default(DEFAULTS.occurIndex)
        .describe('Embed the (sentence, word) position into occurrence-anchored predicate names'),
    useDiscourseIds: z.boolean().default(true)
        .describe('Insert each discourse id into its predicate names'),
}).strict();

export const discourseIdsSchema = z.array(z.string().min(1))
    .refine(ids => new Set(ids).size === ids.length, { message: 'discourse ids must be unique' });

export type ParseOptions = z.input<typeof parseOptionsSchema>;
export type ResolvedParseOptions = z.output<typeof parseOptionsSchema>;
export type BatchOptions = z.input<typeof batchOptionsSchema>;
export type ResolvedBatchOptions = z.output<typeof batchOptionsSchema>;

/**
 * Validate a value against a schema, raising INVALID_OPTIONS on failure.
 */
export function validateOptions<S extends z.ZodTypeAny>(schema: S, value: unknown): z.output<S> {
    const result = schema.safeParse(value);
    if (!result.success) {
        throw createInvalidOptionsError(
            result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        );
    }
    return result.data;
}
