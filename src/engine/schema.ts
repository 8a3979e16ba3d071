import { z } from 'zod';

export const ConstraintPolicySchema = z.object({
  maxPerArtist: z
    .number()
    .int('Max tracks per artist must be an integer')
    .positive('Max tracks per artist must be greater than 0')
    .optional(),
  suppressDuplicates: z.boolean().default(true),
});

export const MixOptionsSchema = z.object({
  randomize: z.boolean().default(false),
  seed: z
    .number()
    .int('Seed must be an integer')
    .refine(Number.isSafeInteger, 'Seed must be a safe integer')
    .optional(),
  maxOutputLength: z
    .number()
    .int('Max output length must be an integer')
    .positive('Max output length must be greater than 0')
    .optional(),
});
