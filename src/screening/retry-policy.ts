import { Attempt, FieldSpec } from "../shared/types/screening.types";
import { validateField, ValidationRules, DEFAULT_VALIDATION_RULES } from "../validation/field-validator";

export type FieldAttemptOutcome =
  | { kind: "retry"; attempt: Attempt; attemptsUsed: number; hint: string }
  | { kind: "accepted"; attempt: Attempt; value: string };

/**
 * Applies one answer to a field. An invalid answer is re-prompted until the
 * field's attempt budget is spent; the answer that spends it is accepted as-is.
 */
export function applyFieldAttempt(
  spec: FieldSpec,
  attemptsUsed: number,
  rawValue: string,
  rules: ValidationRules = DEFAULT_VALIDATION_RULES,
): FieldAttemptOutcome {
  const attemptNumber = Math.min(Math.max(0, attemptsUsed) + 1, spec.maxAttempts);
  const verdict = validateField(spec.validatorKind, rawValue, rules);

  if (verdict.ok) {
    return {
      kind: "accepted",
      value: rawValue.trim(),
      attempt: freezeAttempt({
        fieldKey: spec.key,
        rawValue,
        attemptNumber,
        accepted: true,
        acceptedReason: "valid",
      }),
    };
  }

  if (attemptNumber < spec.maxAttempts) {
    return {
      kind: "retry",
      attemptsUsed: attemptNumber,
      hint: verdict.hint,
      attempt: freezeAttempt({
        fieldKey: spec.key,
        rawValue,
        attemptNumber,
        accepted: false,
        hint: verdict.hint,
      }),
    };
  }

  return {
    kind: "accepted",
    value: rawValue.trim(),
    attempt: freezeAttempt({
      fieldKey: spec.key,
      rawValue,
      attemptNumber,
      accepted: true,
      acceptedReason: "max_attempts_exhausted",
      hint: verdict.hint,
    }),
  };
}

function freezeAttempt(attempt: Attempt): Attempt {
  return Object.freeze(attempt);
}
