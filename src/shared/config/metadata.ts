import { z } from 'zod';
import type { Metadata } from '../types';

const outlierFilterSchema = z.discriminatedUnion('method', [
    z.object({ method: z.literal('IQR'), outlier_iqr_multiplier: z.number().nonnegative() }),
    z.object({ method: z.literal('VariableBounds'), min: z.number(), max: z.number() }),
]);

const metadataSchema: z.ZodType<Metadata, z.ZodTypeDef, unknown> = z.object({
    input_var: z.string().min(1),
    target_var: z.string().min(1),
    split_char: z.string().length(1),
    decimal_point: z.enum(['.', ',']).optional(),
    regularization: z.number().finite().nonnegative(),
    pivot_tolerance: z.number().finite().nonnegative().optional(),
    test_split: z
        .object({
            test_fraction: z.number().min(0).lt(1),
            shuffle: z.boolean().optional(),
            seed: z.number().int().optional(),
        })
        .optional(),
    outlier_filtering: z.record(z.string(), outlierFilterSchema).optional(),
});

export function parseMetadata(raw: unknown): Metadata {
    return metadataSchema.parse(raw);
}
