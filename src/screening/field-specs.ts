import { FieldKey, FieldSpec, ValidatorKind } from "../shared/types/screening.types";

export const DEFAULT_MAX_ATTEMPTS = 2;

interface FieldDefinition {
  key: FieldKey;
  label: string;
  prompt: string;
  validatorKind: ValidatorKind;
}

const FIELD_DEFINITIONS: ReadonlyArray<FieldDefinition> = [
  {
    key: "name",
    label: "Name",
    prompt: "What's your full name?",
    validatorKind: "name",
  },
  {
    key: "email",
    label: "Email",
    prompt: "What's your email address?",
    validatorKind: "email",
  },
  {
    key: "phone",
    label: "Phone",
    prompt: "And your phone number? You can include the country code.",
    validatorKind: "phone",
  },
  {
    key: "experience",
    label: "Years of experience",
    prompt: "How many years of professional experience do you have? If you're just starting out, 0 is fine.",
    validatorKind: "experience",
  },
  {
    key: "position",
    label: "Desired position",
    prompt: "Which position or role are you interested in?",
    validatorKind: "free_text",
  },
  {
    key: "location",
    label: "Location",
    prompt: "Where are you currently located? (City, Country)",
    validatorKind: "free_text",
  },
  {
    key: "tech_stack",
    label: "Tech stack",
    prompt: [
      "Now let's talk about your technical skills.",
      "Which languages, frameworks, databases and tools do you work with?",
      "Please separate them with commas, for example: Python, React, PostgreSQL, Docker.",
    ].join("\n"),
    validatorKind: "free_text",
  },
];

export const TECH_STACK_FIELD: FieldKey = "tech_stack";

export function buildFieldSpecs(maxAttempts: number = DEFAULT_MAX_ATTEMPTS): ReadonlyArray<FieldSpec> {
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new Error(`maxAttempts must be a positive integer, got ${maxAttempts}`);
  }
  return Object.freeze(
    FIELD_DEFINITIONS.map((definition) => Object.freeze({ ...definition, maxAttempts })),
  );
}

export function fieldLabel(key: FieldKey): string {
  return FIELD_DEFINITIONS.find((definition) => definition.key === key)?.label ?? key;
}
