import { z } from 'zod';

export const startSessionSchema = z.object({
  cashier: z.string().min(1),
});

export const selectBankSchema = z.object({
  bank: z.string().trim().min(1),
});

export const submitEntrySchema = z.object({
  credit: z.number().finite().positive().nullable().optional(),
});

export const entryQuerySchema = z.object({
  q: z.string().optional(),
});

export const selectRowSchema = z.object({
  entry_id: z.coerce.number().int().positive(),
});

export type SubmitEntryBody = z.infer<typeof submitEntrySchema>;
