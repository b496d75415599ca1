const EMPATHY_LINES = [
  "Thanks for your answer.",
  "Understood.",
  "Thank you, that's helpful context.",
  "Got it.",
  "Thanks for walking me through that.",
] as const;

/** Short neutral line between technical questions; rotates by answer index. */
export function getShortEmpathyLine(answerIndex: number): string {
  const index = Math.abs(Math.floor(answerIndex)) % EMPATHY_LINES.length;
  return EMPATHY_LINES[index];
}
