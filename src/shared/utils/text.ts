export function collapseWhitespace(value: string): string {
  return value.trim().replace(/\s+/g, " ");
}

/** Key used for knowledge base lookups and technology de-duplication. */
export function normalizeTechnology(value: string): string {
  return collapseWhitespace(value).toLowerCase();
}

/** Equality key for question de-duplication. */
export function normalizeQuestionText(value: string): string {
  return collapseWhitespace(value).toLowerCase();
}
