import { z } from 'zod';

const size = z
  .number()
  .finite()
  .refine((value) => value !== 0, { message: 'must be non-zero' });

const limitPrice = z.number().finite().positive();

/**
 * Enter order schema
 */
export const EnterOrderSchema = z
  .object({
    action: z.literal('ENTER'),
    quantity: size.optional(),
    value: size.optional(),
    price: limitPrice.optional(),
  })
  .strict();

/**
 * Exit order schema
 */
export const ExitOrderSchema = z
  .object({
    action: z.literal('EXIT'),
    positionId: z.number().int().positive(),
    price: limitPrice.optional(),
  })
  .strict();

/**
 * Order schema. An enter order carries exactly one of quantity or value.
 */
export const OrderSchema = z
  .discriminatedUnion('action', [EnterOrderSchema, ExitOrderSchema])
  .superRefine((order, ctx) => {
    if (
      order.action === 'ENTER' &&
      (order.quantity === undefined) === (order.value === undefined)
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Provide exactly one of quantity or value',
        path: ['quantity'],
      });
    }
  });

/**
 * Type inferred from schema
 */
export type OrderSchemaType = z.infer<typeof OrderSchema>;
