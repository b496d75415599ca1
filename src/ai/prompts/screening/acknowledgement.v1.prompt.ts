export const ACKNOWLEDGEMENT_V1_PROMPT = `You acknowledge a candidate's answer during a screening chat.

Rules:
- Exactly one short sentence.
- Warm and natural, not robotic.
- Do not ask the next question.
- Do not evaluate or judge the answer.
- No markdown, no emoji.`;

export function buildAcknowledgementV1Prompt(input: { fieldLabel: string; value: string }): string {
  return [
    ACKNOWLEDGEMENT_V1_PROMPT,
    "",
    `Field collected: ${input.fieldLabel}`,
    `Candidate answer: ${input.value.slice(0, 500)}`,
  ].join("\n");
}
