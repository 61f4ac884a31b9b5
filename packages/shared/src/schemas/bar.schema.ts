import { z } from 'zod';

const price = z.number().finite().positive();

/**
 * Zod schema for Bar validation
 */
export const BarSchema = z
  .object({
    timestamp: z.number().int().nonnegative(),
    open: price,
    high: price,
    low: price,
    close: price,
    volume: z.number().finite().nonnegative(),
  })
  .refine((bar) => bar.high >= bar.low, {
    message: 'high must be greater than or equal to low',
    path: ['high'],
  });

/**
 * Type inferred from schema
 */
export type BarSchemaType = z.infer<typeof BarSchema>;
