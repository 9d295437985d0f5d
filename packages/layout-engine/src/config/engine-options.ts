import {
  ANCHOR_CLASSES,
  CHILD_CLASSES,
  STRATEGY_NAMES,
  WORKSHEET_CHILD_CLASSES,
} from '@regroup/model';
import { z } from 'zod';

import { InvalidEngineOptionsError } from '../errors/layout-engine-error';
import { toInputIssues } from '../errors/zod-issues';

/**
 * Digit pairs OCR tends to confuse; each pair is applied both ways
 */
export const DEFAULT_DIGIT_CONFUSIONS: ReadonlyArray<readonly [number, number]> =
  [
    [0, 6],
    [0, 9],
    [1, 7],
    [2, 9],
    [3, 8],
  ];

const digit = z.number().int().min(0).max(9);

/**
 * Schema of the engine tuning surface
 */
export const engineOptionsSchema = z.object({
  /**
   * Anchor classes kept in worksheet mode
   */
  allowedAnchorClasses: z
    .array(z.enum(ANCHOR_CLASSES))
    .default(() => [...ANCHOR_CLASSES]),

  /**
   * Child classes kept in worksheet mode
   */
  allowedChildClasses: z
    .array(z.enum(CHILD_CLASSES))
    .default(() => [...WORKSHEET_CHILD_CLASSES]),

  /**
   * Drop classes outside the allow-lists before assignment
   */
  worksheetMode: z.boolean().default(true),

  /**
   * Gap left of the right column's leftmost anchor, in pixels
   */
  columnGapMarginPx: z.number().nonnegative().default(20),

  /**
   * Weight of horizontal distance in child-to-anchor distance
   */
  proximityXWeight: z.number().nonnegative().default(0.2),

  /**
   * How many following anchors a large element may move forward to
   */
  lookaheadMaxGroups: z.number().int().nonnegative().default(2),

  /**
   * Envelope IoU above which two groups conflict
   */
  iouConflictThreshold: z.number().min(0).max(1).default(0.1),

  /**
   * Overlap area (px²) above which a conflict is severe
   */
  severeOverlapAreaPx2: z.number().nonnegative().default(10_000),

  /**
   * Largest identifier step still treated as a forward gap
   */
  sequenceLargeJump: z.number().int().positive().default(10),

  /**
   * Bound on per-job lock acquisition
   */
  jobLockTimeoutSeconds: z.number().positive().default(30),

  /**
   * Skip strategy recommendation and always use this strategy
   */
  forcedStrategy: z.enum(STRATEGY_NAMES).optional(),

  /**
   * Order of groups across columns
   */
  columnOrder: z.enum(['column-major', 'row-major']).default('column-major'),

  /**
   * Accepted distance between a digit-repair candidate and the expected
   * identifier
   */
  correctionWindow: z.number().int().nonnegative().default(2),

  /**
   * Confusable digit pairs used for identifier repair
   */
  digitConfusions: z
    .array(z.tuple([digit, digit]))
    .default(() =>
      DEFAULT_DIGIT_CONFUSIONS.map(([a, b]): [number, number] => [a, b]),
    ),

  /**
   * OCR confidence below which anchor text is not parsed
   */
  minIdentifierConfidence: z.number().min(0).max(1).default(0.5),
});

export type EngineOptionsInput = z.input<typeof engineOptionsSchema>;
export type EngineOptions = z.output<typeof engineOptionsSchema>;
export type ColumnOrder = EngineOptions['columnOrder'];

/**
 * Validate options and fill defaults
 *
 * @throws {InvalidEngineOptionsError} When any option is out of range
 */
export function resolveEngineOptions(
  input: EngineOptionsInput = {},
): EngineOptions {
  const result = engineOptionsSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidEngineOptionsError(toInputIssues(result.error), {
      cause: result.error,
    });
  }
  return result.data;
}

const optionalNumber = z.coerce.number().optional();
const csv = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0),
  )
  .optional();

/**
 * Environment variables read by engineOptionsFromEnv
 */
const envSchema = z.object({
  REGROUP_ALLOWED_ANCHOR_CLASSES: csv,
  REGROUP_ALLOWED_CHILD_CLASSES: csv,
  REGROUP_WORKSHEET_MODE: z
    .enum(['true', 'false'])
    .transform((value) => value === 'true')
    .optional(),
  REGROUP_COLUMN_GAP_MARGIN_PX: optionalNumber,
  REGROUP_PROXIMITY_X_WEIGHT: optionalNumber,
  REGROUP_LOOKAHEAD_MAX_GROUPS: optionalNumber,
  REGROUP_IOU_CONFLICT_THRESHOLD: optionalNumber,
  REGROUP_SEVERE_OVERLAP_AREA_PX2: optionalNumber,
  REGROUP_SEQUENCE_LARGE_JUMP: optionalNumber,
  REGROUP_JOB_LOCK_TIMEOUT_SECONDS: optionalNumber,
  REGROUP_FORCED_STRATEGY: z.string().optional(),
  REGROUP_COLUMN_ORDER: z.string().optional(),
  REGROUP_MIN_IDENTIFIER_CONFIDENCE: optionalNumber,
});

/**
 * Build engine options from `REGROUP_*` environment variables.
 * Unset variables keep their defaults; empty strings count as unset.
 *
 * @throws {InvalidEngineOptionsError} When a variable holds an invalid value
 */
export function engineOptionsFromEnv(
  env: Record<string, string | undefined> = process.env,
): EngineOptions {
  const present = Object.fromEntries(
    Object.entries(env).filter(
      ([key, value]) =>
        key.startsWith('REGROUP_') && value !== undefined && value !== '',
    ),
  );
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new InvalidEngineOptionsError(toInputIssues(parsed.error), {
      cause: parsed.error,
    });
  }

  const vars = parsed.data;
  const result = engineOptionsSchema.safeParse({
    allowedAnchorClasses: vars.REGROUP_ALLOWED_ANCHOR_CLASSES,
    allowedChildClasses: vars.REGROUP_ALLOWED_CHILD_CLASSES,
    worksheetMode: vars.REGROUP_WORKSHEET_MODE,
    columnGapMarginPx: vars.REGROUP_COLUMN_GAP_MARGIN_PX,
    proximityXWeight: vars.REGROUP_PROXIMITY_X_WEIGHT,
    lookaheadMaxGroups: vars.REGROUP_LOOKAHEAD_MAX_GROUPS,
    iouConflictThreshold: vars.REGROUP_IOU_CONFLICT_THRESHOLD,
    severeOverlapAreaPx2: vars.REGROUP_SEVERE_OVERLAP_AREA_PX2,
    sequenceLargeJump: vars.REGROUP_SEQUENCE_LARGE_JUMP,
    jobLockTimeoutSeconds: vars.REGROUP_JOB_LOCK_TIMEOUT_SECONDS,
    forcedStrategy: vars.REGROUP_FORCED_STRATEGY,
    columnOrder: vars.REGROUP_COLUMN_ORDER,
    minIdentifierConfidence: vars.REGROUP_MIN_IDENTIFIER_CONFIDENCE,
  });
  if (!result.success) {
    throw new InvalidEngineOptionsError(toInputIssues(result.error), {
      cause: result.error,
    });
  }
  return result.data;
}
