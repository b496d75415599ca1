import { appendFile, mkdir, stat } from "node:fs/promises";
import path from "node:path";
import { FieldKey, SessionRecord } from "../shared/types/screening.types";
import { maskEmail, maskPhone } from "./anonymize";
import { SessionExporter } from "./session-exporter";

export const CSV_SESSION_COLUMNS = ["session_id", "status", "started_at", "ended_at"] as const;
export const CSV_QUESTIONS_COLUMN = "questions";

export interface CsvExportOptions {
  filePath: string;
  fieldKeys: ReadonlyArray<FieldKey>;
  anonymize?: boolean;
}

/**
 * Appends one row per finished session. The header is written only when the
 * file is new or empty; appends from one process are serialized.
 */
export class CsvExportService implements SessionExporter {
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly options: CsvExportOptions) {}

  columns(): string[] {
    return [...CSV_SESSION_COLUMNS, ...this.options.fieldKeys, CSV_QUESTIONS_COLUMN];
  }

  exportSession(record: Readonly<SessionRecord>): Promise<void> {
    const task = this.queue.then(() => this.appendRow(record));
    this.queue = task.catch(() => undefined);
    return task;
  }

  buildRow(record: Readonly<SessionRecord>): string[] {
    const fieldValues = this.options.fieldKeys.map((key) => this.fieldValue(key, record.fields[key] ?? ""));
    const questions = record.questions.map((item) => ({
      technology: item.technology,
      question: item.question.text,
      origin: item.question.origin,
      answer: item.answer,
    }));
    return [
      record.sessionId,
      record.status,
      record.startedAt,
      record.endedAt ?? "",
      ...fieldValues,
      JSON.stringify(questions),
    ];
  }

  private fieldValue(key: FieldKey, value: string): string {
    if (!this.options.anonymize || !value) {
      return value;
    }
    if (key === "email") {
      return maskEmail(value);
    }
    if (key === "phone") {
      return maskPhone(value);
    }
    return value;
  }

  private async appendRow(record: Readonly<SessionRecord>): Promise<void> {
    await mkdir(path.dirname(this.options.filePath), { recursive: true });
    const lines: string[] = [];
    if (await isMissingOrEmpty(this.options.filePath)) {
      lines.push(toCsvLine(this.columns()));
    }
    lines.push(toCsvLine(this.buildRow(record)));
    await appendFile(this.options.filePath, `${lines.join("\n")}\n`, "utf-8");
  }
}

export function escapeCsvValue(value: string): string {
  if (/[",\r\n]/.test(value) || value !== value.trim()) {
    return `"${value.replace(/"/g, "\"\"")}"`;
  }
  return value;
}

export function toCsvLine(values: ReadonlyArray<string>): string {
  return values.map(escapeCsvValue).join(",");
}

async function isMissingOrEmpty(filePath: string): Promise<boolean> {
  try {
    const info = await stat(filePath);
    return info.size === 0;
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return true;
    }
    throw error;
  }
}
