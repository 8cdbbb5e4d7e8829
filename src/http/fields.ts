import { z } from 'zod';

/** Length in code points, so an astral-plane character counts once. */
export const charLength = (s: string) => [...s].length;

export function boundedText(min: number, max: number) {
  return z.string().superRefine((s, ctx) => {
    const length = charLength(s);
    if (length < min) {
      ctx.addIssue({ code: z.ZodIssueCode.too_small, minimum: min, type: 'string', inclusive: true });
    }
    if (length > max) {
      ctx.addIssue({ code: z.ZodIssueCode.too_big, maximum: max, type: 'string', inclusive: true });
    }
  });
}

/** Lower-cases the domain; the local part is left as typed. */
export function normalizeEmail(email: string): string {
  const at = email.lastIndexOf('@');
  if (at < 0) return email;
  return email.slice(0, at + 1) + email.slice(at + 1).toLowerCase();
}

export const emailSchema = z.string().trim().email().transform(normalizeEmail);

// ISO 8601 with a `Z` or numeric offset; booleans and epoch numbers are rejected.
export const isoDateSchema = z
  .string()
  .datetime({ offset: true })
  .transform((s) => new Date(s));
