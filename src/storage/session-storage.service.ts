import { mkdir, readFile, readdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { SessionExporter } from "../export/session-exporter";
import { SessionRecord } from "../shared/types/screening.types";

const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

export class SessionStorageService implements SessionExporter {
  constructor(private readonly storageDir: string) {}

  async exportSession(record: Readonly<SessionRecord>): Promise<void> {
    await this.save(record);
  }

  async save(record: Readonly<SessionRecord>): Promise<string> {
    await mkdir(this.storageDir, { recursive: true });
    const filePath = this.filePathFor(record.sessionId);
    await writeFile(filePath, JSON.stringify(record, null, 2), "utf-8");
    return filePath;
  }

  async load(sessionId: string): Promise<SessionRecord | null> {
    if (!SESSION_ID_PATTERN.test(sessionId)) {
      return null;
    }
    try {
      const raw = await readFile(this.filePathFor(sessionId), "utf-8");
      return JSON.parse(raw) as SessionRecord;
    } catch {
      return null;
    }
  }

  async list(): Promise<SessionRecord[]> {
    await mkdir(this.storageDir, { recursive: true });
    const entries = await readdir(this.storageDir, { withFileTypes: true });
    const files = entries
      .filter((entry) => entry.isFile() && entry.name.endsWith(".json"))
      .map((entry) => entry.name);

    const records: SessionRecord[] = [];
    for (const fileName of files) {
      try {
        const raw = await readFile(path.join(this.storageDir, fileName), "utf-8");
        records.push(JSON.parse(raw) as SessionRecord);
      } catch {
        continue;
      }
    }

    records.sort((a, b) => (a.startedAt < b.startedAt ? 1 : -1));
    return records;
  }

  private filePathFor(sessionId: string): string {
    if (!SESSION_ID_PATTERN.test(sessionId)) {
      throw new Error(`Invalid session id: ${sessionId}`);
    }
    return path.join(this.storageDir, `${sessionId}.json`);
  }
}
