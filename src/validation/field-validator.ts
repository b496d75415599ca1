import { ValidatorKind } from "../shared/types/screening.types";

export type ValidationResult = { ok: true } | ValidationFailure;

export interface ValidationFailure {
  ok: false;
  hint: string;
}

export interface ValidationRules {
  phoneMinDigits: number;
  phoneMaxDigits: number;
}

export const DEFAULT_VALIDATION_RULES: ValidationRules = {
  phoneMinDigits: 7,
  phoneMaxDigits: 15,
};

export const EMAIL_EXAMPLE = "john.doe@example.com";
export const PHONE_EXAMPLE = "+1 (555) 123-4567";

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const PHONE_SEPARATORS = /[\s\-()]/g;
const PHONE_PATTERN = /^\+?\d+$/;
const EXPERIENCE_PATTERN = /^(?:\d+(?:\.\d+)?|\.\d+)$/;
const LETTER_PATTERN = /\p{L}/u;

export function validateField(
  kind: ValidatorKind,
  raw: string,
  rules: ValidationRules = DEFAULT_VALIDATION_RULES,
): ValidationResult {
  const value = raw.trim();
  switch (kind) {
    case "name":
      return validateName(value);
    case "email":
      return validateEmail(value);
    case "phone":
      return validatePhone(value, rules);
    case "experience":
      return validateExperience(value);
    case "free_text":
      return value.length > 0 ? { ok: true } : fail("Please type an answer so we can continue.");
  }
}

function validateName(value: string): ValidationResult {
  if (value.length > 0 && LETTER_PATTERN.test(value)) {
    return { ok: true };
  }
  return fail("Please share your full name so we know how to address you.");
}

function validateEmail(value: string): ValidationResult {
  if (EMAIL_PATTERN.test(value)) {
    return { ok: true };
  }
  return fail(`That doesn't look like a valid email address. Could you try again? (e.g., ${EMAIL_EXAMPLE})`);
}

function validatePhone(value: string, rules: ValidationRules): ValidationResult {
  const compact = value.replace(PHONE_SEPARATORS, "");
  const digitCount = compact.replace(/^\+/, "").length;
  if (
    PHONE_PATTERN.test(compact) &&
    digitCount >= rules.phoneMinDigits &&
    digitCount <= rules.phoneMaxDigits
  ) {
    return { ok: true };
  }
  return fail(
    `Please enter a phone number with ${rules.phoneMinDigits} to ${rules.phoneMaxDigits} digits, country code optional (e.g., ${PHONE_EXAMPLE}).`,
  );
}

function validateExperience(value: string): ValidationResult {
  if (EXPERIENCE_PATTERN.test(value)) {
    return { ok: true };
  }
  return fail("Please give your experience as a number of years, like 2, 5 or 3.5. If you're just starting out, 0 is fine.");
}

function fail(hint: string): ValidationFailure {
  return { ok: false, hint };
}
