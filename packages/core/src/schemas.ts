/**
 * Zod schemas for the screening model's reply, plus the decoder the
 * evaluation loop uses to decide whether a reply is usable.
 */

import { z } from 'zod';

/**
 * Only the outcome is read by the evaluation loop. The other fields are
 * reported and logged as the model wrote them, whatever their JSON type.
 */
export const MatchResultSchema = z.object({
  MatchOutcome: z.string(),
  Confidence: z.unknown(),
  Reason: z.unknown(),
  RecommendedAction: z.unknown(),
});

export type MatchResult = z.infer<typeof MatchResultSchema>;

export const REQUIRED_MATCH_FIELDS = ['MatchOutcome', 'Confidence', 'Reason', 'RecommendedAction'] as const;

export type RequiredMatchField = (typeof REQUIRED_MATCH_FIELDS)[number];

export type MatchResultErrorKind = 'not-an-object' | 'missing-field' | 'invalid-field';

export interface MatchResultError {
  kind: MatchResultErrorKind;
  field?: RequiredMatchField;
  message: string;
}

export type MatchResultDecode =
  | { success: true; result: MatchResult }
  | { success: false; error: MatchResultError };

export function isRequiredMatchField(value: unknown): value is RequiredMatchField {
  return REQUIRED_MATCH_FIELDS.some((field) => field === value);
}

/**
 * Decode a parsed reply into a MatchResult.
 *
 * Presence of the four top-level fields is checked first, in declaration
 * order, so the reported field is stable when several are absent. A present
 * field is only rejected when it is a non-string MatchOutcome.
 */
export function decodeMatchResult(value: unknown): MatchResultDecode {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return {
      success: false,
      error: { kind: 'not-an-object', message: 'Response is not a JSON object' },
    };
  }

  const missing = REQUIRED_MATCH_FIELDS.find((field) => !(field in value));
  if (missing) {
    return {
      success: false,
      error: { kind: 'missing-field', field: missing, message: `Missing field "${missing}"` },
    };
  }

  const parsed = MatchResultSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.errors[0];
    const head = issue.path[0];
    const field = isRequiredMatchField(head) ? head : undefined;

    return {
      success: false,
      error: {
        kind: 'invalid-field',
        field,
        message: `Invalid field "${issue.path.join('.')}": ${issue.message}`,
      },
    };
  }

  return { success: true, result: parsed.data };
}
