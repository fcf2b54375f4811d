import { z } from 'zod';
import type { Variant } from '../types.js';
import { ResolutionError } from '../errors.js';
import type { Range } from './positions.js';

const ViewEntrySchema = z.object({ type: z.string() }).passthrough();

const ViewVariantSchema = z.object({
  type: z.literal('variant'),
  start: z.number().int().nonnegative(),
  description: z.string(),
});

/** A variant from the view_variants endpoint; `start` is a 0-based reference position. */
export type ViewVariant = z.infer<typeof ViewVariantSchema>;

/** Keep the `variant` entries of a view_variants list, dropping the stretches between them. */
export function parseViewVariants(views: unknown, description: string): ViewVariant[] {
  const entries = z.array(ViewEntrySchema).safeParse(views);
  if (!entries.success) {
    throw new ResolutionError(description, `Unexpected Mutalyzer variant view for ${description}`);
  }

  return entries.data
    .filter(entry => entry.type === 'variant')
    .map(entry => {
      const parsed = ViewVariantSchema.safeParse(entry);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new ResolutionError(
          description,
          `Malformed variant in Mutalyzer view for ${description} at ${issue.path.join('.')}: ${issue.message}`,
        );
      }
      return parsed.data;
    });
}

export function inside(exon: Range, variant: { start: number }): boolean {
  return variant.start >= exon[0] && variant.start < exon[1];
}

/** Variants starting inside the exon, with positions relative to the exon start. */
export function exonVariants(exon: Range, variants: readonly ViewVariant[]): Variant[] {
  return variants
    .filter(v => inside(exon, v))
    .map(v => ({ position: v.start - exon[0], description: v.description }));
}
