export const QUESTION_GENERATION_V1_PROMPT = `You write technical screening questions for one technology.

Rules:
- Return exactly the requested number of questions.
- Number each question on its own line: "1. ...", "2. ...".
- Mix concepts with practical, real-world scenarios.
- Intermediate to advanced difficulty.
- Each question must be specific to the technology, not generic.
- One objective per question. No multi-part questions.
- No preamble, no closing remarks, no markdown.`;

export function buildQuestionGenerationV1Prompt(input: {
  technology: string;
  count: number;
  exclude?: ReadonlyArray<string>;
}): string {
  const lines = [
    QUESTION_GENERATION_V1_PROMPT,
    "",
    `Technology: ${input.technology}`,
    `Number of questions: ${input.count}`,
  ];
  const exclude = input.exclude ?? [];
  if (exclude.length > 0) {
    lines.push("", "Do not repeat or rephrase any of these questions:");
    for (const question of exclude) {
      lines.push(`- ${question}`);
    }
  }
  return lines.join("\n");
}
