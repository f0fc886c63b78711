import { z } from 'zod';
import { parseHex } from '../../common/utils/hex';
import { CommandVerb } from '../../queue/interfaces/command.interface';

// Accepts 32, "0x20" or "20" (hex, as on the text protocol).
const byteOrHex = z.union([
  z.number().int(),
  z.string().transform((raw, ctx) => {
    const value = parseHex(raw);
    if (value === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'expected a number or a hex string',
      });
      return z.NEVER;
    }
    return value;
  }),
]);

const verb = z
  .string()
  .transform((raw) => raw.trim().toUpperCase())
  .pipe(z.nativeEnum(CommandVerb));

export const submitCommandSchema = z.object({
  verb,
  board: byteOrHex,
  target: byteOrHex.optional(),
});

export const waitCommandSchema = submitCommandSchema.extend({
  timeoutMs: z.number().int().positive().max(60_000).optional(),
});

export const scanQuerySchema = z.object({
  timeoutMs: z.coerce.number().int().positive().max(60_000).optional(),
});

export type SubmitCommandDto = z.infer<typeof submitCommandSchema>;
export type WaitCommandDto = z.infer<typeof waitCommandSchema>;
export type ScanQueryDto = z.infer<typeof scanQuerySchema>;
