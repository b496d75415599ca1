import { collapseWhitespace } from "../../shared/utils/text";

// Markdown emphasis may wrap the number ("**1.** ...") or the whole "Question 1:" label.
const NUMBERED_LINE = /^(?:\*\*|__)?(?:question\s*)?\d+\s*[.):-]\s*(?:\*\*|__)?\s*(.+)$/i;
const BULLET_LINE = /^[-*•]\s+(.+)$/;

/**
 * Extracts question lines from free-form model output. Numbered or bulleted
 * lines win; when there are none every non-empty line is taken, except
 * heading-like lines ending in a colon.
 */
export function parseQuestionList(raw: string): string[] {
  const lines = raw
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  const structured: string[] = [];
  for (const line of lines) {
    const match = line.match(NUMBERED_LINE) ?? line.match(BULLET_LINE);
    if (match) {
      structured.push(match[1]);
    }
  }

  const source = structured.length > 0 ? structured : lines.filter((line) => !line.endsWith(":"));
  return source.map(cleanQuestionText).filter((text) => text.length > 0);
}

function cleanQuestionText(value: string): string {
  return collapseWhitespace(value.replace(/^\*\*|\*\*$/g, "").replace(/^"(.*)"$/, "$1"));
}
