import { z } from 'zod';
import { ACCELERATOR_KEY, DARK_ACCELERATOR_KEY } from '../types/token';

// Catalog row validation
// One record of the element catalog source: number, symbol, name, color.
// The number arrives as CSV text, so it is coerced before the integer checks.
export const CatalogRowSchema = z.object({
  number: z.coerce.number().int().min(1),
  symbol: z
    .string()
    .trim()
    .min(1, 'Symbol must not be empty')
    .regex(/^[A-Za-z]+$/, 'Symbol can only contain letters'),
  name: z.string().trim().min(1, 'Name must not be empty'),
  color: z
    .string()
    .trim()
    .regex(/^#[0-9a-fA-F]{6}$/, 'Color must be #rrggbb'),
});

export type CatalogRow = z.infer<typeof CatalogRowSchema>;

// Ring snapshot validation
// Token keys: catalog numbers for elements, negative keys for the markers.
export const TokenKeySchema = z
  .number()
  .int()
  .refine((key) => key >= 1 || key === ACCELERATOR_KEY || key === DARK_ACCELERATOR_KEY, {
    message: `Token key must be a catalog number (>= 1), ${ACCELERATOR_KEY} or ${DARK_ACCELERATOR_KEY}`,
  });

export const RingSnapshotSchema = z.object({
  version: z.literal(1),
  tokens: z.array(TokenKeySchema).min(1, 'A ring holds at least one token'),
});

/**
 * Flatten zod issues into `path: message` pairs for error context.
 */
export function describeIssues(error: z.ZodError): Array<{ path: string; message: string }> {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}
