/**
 * Verdict labels and the two ways of reading them: the lenient literal
 * comparisons the accuracy figures are defined by, and closed decoders that
 * reject anything unrecognised.
 */

export const MatchOutcome = {
  TrueMatch: 'True Match',
  FalseMatch: 'False Match',
} as const;

export type MatchOutcome = (typeof MatchOutcome)[keyof typeof MatchOutcome];

export type LabelDecode =
  | { success: true; outcome: MatchOutcome }
  | { success: false; error: string };

function normalize(raw: string): string {
  return raw.trim().toUpperCase();
}

export function outcomeFor(isMatch: boolean): MatchOutcome {
  return isMatch ? MatchOutcome.TrueMatch : MatchOutcome.FalseMatch;
}

/** `TRUE` in any case counts as an expected match; everything else does not. */
export function isExpectedTrue(label: string): boolean {
  return normalize(label) === 'TRUE';
}

/** `TRUE MATCH` in any case counts as a predicted match; everything else does not. */
export function isPredictedTrue(outcome: string): boolean {
  return normalize(outcome) === 'TRUE MATCH';
}

export function decodeExpectedLabel(label: string): LabelDecode {
  switch (normalize(label)) {
    case 'TRUE':
      return { success: true, outcome: MatchOutcome.TrueMatch };
    case 'FALSE':
      return { success: true, outcome: MatchOutcome.FalseMatch };
    default:
      return { success: false, error: `Unrecognized expected label "${label}"` };
  }
}

export function decodeMatchOutcome(outcome: string): LabelDecode {
  switch (normalize(outcome)) {
    case 'TRUE MATCH':
      return { success: true, outcome: MatchOutcome.TrueMatch };
    case 'FALSE MATCH':
      return { success: true, outcome: MatchOutcome.FalseMatch };
    default:
      return { success: false, error: `Unrecognized match outcome "${outcome}"` };
  }
}
