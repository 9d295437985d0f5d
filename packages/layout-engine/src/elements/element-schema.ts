import type { PageInput } from '@regroup/model';

import { ELEMENT_CLASSES } from '@regroup/model';
import { z } from 'zod';

import { MalformedElementError } from '../errors/layout-engine-error';
import { toInputIssues } from '../errors/zod-issues';

const coordinate = z.number().finite().nonnegative();
const unitInterval = z.number().min(0).max(1);

/**
 * Box with non-negative, non-inverted coordinates.
 * Zero-area boxes pass here and are dropped during preprocessing.
 */
export const boundingBoxSchema = z
  .object({
    x1: coordinate,
    y1: coordinate,
    x2: coordinate,
    y2: coordinate,
  })
  .refine((box) => box.x2 >= box.x1 && box.y2 >= box.y1, {
    message: 'Box corners are inverted (x2 < x1 or y2 < y1)',
  });

export const layoutElementSchema = z.object({
  id: z.string().min(1),
  className: z.enum(ELEMENT_CLASSES),
  bbox: boundingBoxSchema,
  confidence: unitInterval,
  text: z.string().optional(),
  textConfidence: unitInterval.optional(),
  description: z.string().optional(),
});

export const pageInputSchema = z
  .object({
    pageKey: z.string().optional(),
    width: z.number().finite().positive().optional(),
    height: z.number().finite().positive().optional(),
    elements: z.array(layoutElementSchema),
  })
  .superRefine((page, ctx) => {
    const seen = new Set<string>();
    page.elements.forEach((element, index) => {
      if (seen.has(element.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['elements', index, 'id'],
          message: `Duplicate element id "${element.id}"`,
        });
      }
      seen.add(element.id);
    });
  });

/**
 * Validate a page batch received from the detection collaborators
 *
 * @throws {MalformedElementError} When any element breaks the contract
 */
export function parsePageInput(input: unknown): PageInput {
  const result = pageInputSchema.safeParse(input);
  if (!result.success) {
    const issues = toInputIssues(result.error);
    throw new MalformedElementError(
      `Malformed page input (${issues.length} issue(s))`,
      issues,
      { cause: result.error },
    );
  }
  return result.data;
}
