import { z } from 'zod';
import { CommandVerb } from './interfaces/command.interface';

export const storedCommandSchema = z.object({
  token: z.string(),
  verb: z.nativeEnum(CommandVerb),
  boardAddress: z.number(),
  pinIndex: z.number().optional(),
  registerHalf: z.number().optional(),
  submittedAt: z.number(),
});

export const storedResultSchema = z.object({
  token: z.string(),
  verb: z.nativeEnum(CommandVerb),
  value: z.union([z.number(), z.boolean()]),
  ok: z.boolean(),
  error: z.enum(['InvalidAddress', 'BusTransactionFailure']).optional(),
  producedAt: z.number(),
});
