import { z } from 'zod';
import { parseClickHouseDateTime } from './clickhouse/util';

const UINT8_MAX = 2 ** 8 - 1;
const UINT32_MAX = 2 ** 32 - 1;

// 64-bit integers arrive quoted in JSON output.
function unsignedIntegerField(max: number) {
  return z
    .union([
      z.number(),
      z
        .string()
        .regex(/^\s*\d+\s*$/, 'Expected an unsigned integer')
        .transform((value) => Number(value.trim()))
    ])
    .pipe(z.number().int().nonnegative().max(max));
}

export const stringField = z.string();

// UInt8 columns the server uses as booleans.
export const flagField = z.union([
  z.boolean(),
  unsignedIntegerField(UINT8_MAX).transform((value) => value !== 0)
]);

export const uint32Field = unsignedIntegerField(UINT32_MAX);

export const uint64Field = unsignedIntegerField(Number.MAX_SAFE_INTEGER);

export const dateTimeField = z
  .union([z.date(), z.number(), z.string()])
  .transform((value, ctx) => {
    const parsed = parseClickHouseDateTime(value);
    if (!parsed) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid DateTime value '${String(value)}'`
      });
      return z.NEVER;
    }
    return parsed;
  });
