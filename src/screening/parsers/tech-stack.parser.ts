import { collapseWhitespace, normalizeTechnology } from "../../shared/utils/text";

/**
 * Splits a self-reported tech stack into distinct technologies, keeping the
 * candidate's spelling of the first occurrence.
 */
export function parseTechStack(raw: string): string[] {
  const seen = new Set<string>();
  const technologies: string[] = [];
  const parts = raw.split(/[,;\n]+|\s+and\s+/i);
  for (const part of parts) {
    const display = collapseWhitespace(part.replace(/^[-*•]\s*/, ""));
    if (!display) {
      continue;
    }
    const key = normalizeTechnology(display);
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    technologies.push(display);
  }
  return technologies;
}
