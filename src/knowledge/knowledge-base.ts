import { readFile } from "node:fs/promises";
import { ConfigurationError } from "../shared/errors";
import { collapseWhitespace, normalizeQuestionText, normalizeTechnology } from "../shared/utils/text";

export interface KnowledgeBaseDocument {
  technologies: Record<string, string[]>;
  aliases?: Record<string, string>;
}

/**
 * Read-only mapping from normalized technology name to curated questions.
 * Built once at startup and shared by every session.
 */
export interface KnowledgeBase {
  lookup(technology: string): ReadonlyArray<string> | undefined;
  technologies(): string[];
}

class StaticKnowledgeBase implements KnowledgeBase {
  constructor(
    private readonly entries: ReadonlyMap<string, ReadonlyArray<string>>,
    private readonly aliases: ReadonlyMap<string, string>,
  ) {}

  lookup(technology: string): ReadonlyArray<string> | undefined {
    const key = normalizeTechnology(technology);
    const canonical = this.aliases.get(key) ?? key;
    return this.entries.get(canonical);
  }

  technologies(): string[] {
    return Array.from(this.entries.keys());
  }
}

export function createKnowledgeBase(document: KnowledgeBaseDocument): KnowledgeBase {
  const entries = new Map<string, string[]>();
  for (const [rawKey, questions] of Object.entries(document.technologies)) {
    const key = normalizeTechnology(rawKey);
    if (!key) {
      throw new ConfigurationError("Knowledge base contains an empty technology name");
    }
    const merged = entries.get(key) ?? [];
    merged.push(...questions);
    entries.set(key, merged);
  }

  const frozenEntries = new Map<string, ReadonlyArray<string>>();
  for (const [key, questions] of entries) {
    frozenEntries.set(key, Object.freeze(dedupeQuestions(questions)));
  }

  const aliases = new Map<string, string>();
  for (const [rawAlias, rawTarget] of Object.entries(document.aliases ?? {})) {
    const target = normalizeTechnology(rawTarget);
    if (!frozenEntries.has(target)) {
      throw new ConfigurationError(`Knowledge base alias "${rawAlias}" points to unknown technology "${rawTarget}"`);
    }
    aliases.set(normalizeTechnology(rawAlias), target);
  }

  return new StaticKnowledgeBase(frozenEntries, aliases);
}

export async function loadKnowledgeBase(filePath: string): Promise<KnowledgeBase> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (error) {
    throw new ConfigurationError(
      `Knowledge base file cannot be read: ${filePath} (${error instanceof Error ? error.message : "Unknown error"})`,
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ConfigurationError(`Knowledge base file is not valid JSON: ${filePath}`);
  }
  return createKnowledgeBase(parseKnowledgeBaseDocument(parsed));
}

export function parseKnowledgeBaseDocument(raw: unknown): KnowledgeBaseDocument {
  if (!isRecord(raw) || !isRecord(raw.technologies)) {
    throw new ConfigurationError('Knowledge base must be an object with a "technologies" map');
  }

  const technologies: Record<string, string[]> = {};
  for (const [key, value] of Object.entries(raw.technologies)) {
    if (!Array.isArray(value) || !value.every((item): item is string => typeof item === "string")) {
      throw new ConfigurationError(`Knowledge base entry "${key}" must be a list of strings`);
    }
    technologies[key] = value.map(collapseWhitespace).filter((item) => item.length > 0);
  }

  const aliases: Record<string, string> = {};
  if (raw.aliases !== undefined) {
    if (!isRecord(raw.aliases)) {
      throw new ConfigurationError('Knowledge base "aliases" must be an object');
    }
    for (const [alias, target] of Object.entries(raw.aliases)) {
      if (typeof target !== "string") {
        throw new ConfigurationError(`Knowledge base alias "${alias}" must map to a string`);
      }
      aliases[alias] = target;
    }
  }

  return { technologies, aliases };
}

function dedupeQuestions(questions: ReadonlyArray<string>): string[] {
  const seen = new Set<string>();
  const output: string[] = [];
  for (const question of questions) {
    const key = normalizeQuestionText(question);
    if (!key || seen.has(key)) {
      continue;
    }
    seen.add(key);
    output.push(question);
  }
  return output;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
