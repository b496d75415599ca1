import assert from "node:assert/strict";
import { mkdtemp, readFile, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import test from "node:test";
import { CsvExportService, escapeCsvValue, toCsvLine } from "../../export/csv-export.service";
import { SessionRecord } from "../../shared/types/screening.types";

function finishedRecord(sessionId: string): SessionRecord {
  return {
    sessionId,
    startedAt: "2024-05-01T10:00:00.000Z",
    endedAt: "2024-05-01T10:12:00.000Z",
    status: "completed",
    fields: {
      name: "Ada Lovelace",
      email: "ada@example.com",
      phone: "+1 555 123 4567",
      tech_stack: "Python, Docker",
    },
    attempts: [],
    questions: [
      {
        technology: "Python",
        question: { text: "What is the GIL?", origin: "retrieved" },
        answer: "A lock, mostly.",
      },
    ],
    degradedTechnologies: [],
    candidateNotes: [],
  };
}

async function tempCsvPath(): Promise<string> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "csv-export-"));
  return path.join(dir, "nested", "candidates.csv");
}

test("escaping quotes values with separators, quotes or edge whitespace", () => {
  assert.equal(escapeCsvValue("plain"), "plain");
  assert.equal(escapeCsvValue("a,b"), '"a,b"');
  assert.equal(escapeCsvValue('say "hi"'), '"say ""hi"""');
  assert.equal(escapeCsvValue("line\nbreak"), '"line\nbreak"');
  assert.equal(escapeCsvValue(" padded"), '" padded"');
  assert.equal(toCsvLine(["a", "b,c", ""]), 'a,"b,c",');
});

test("writes the header once and appends one row per session", async () => {
  const filePath = await tempCsvPath();
  const service = new CsvExportService({ filePath, fieldKeys: ["name", "email", "tech_stack"] });

  await service.exportSession(finishedRecord("s-1"));
  await service.exportSession(finishedRecord("s-2"));

  const lines = (await readFile(filePath, "utf-8")).split("\n");
  assert.equal(lines.length, 4);
  assert.equal(lines[0], "session_id,status,started_at,ended_at,name,email,tech_stack,questions");
  assert.equal(
    lines[1],
    's-1,completed,2024-05-01T10:00:00.000Z,2024-05-01T10:12:00.000Z,Ada Lovelace,ada@example.com,"Python, Docker","[{""technology"":""Python"",""question"":""What is the GIL?"",""origin"":""retrieved"",""answer"":""A lock, mostly.""}]"',
  );
  assert.equal(lines[2].startsWith("s-2,completed,"), true);
  assert.equal(lines[3], "");
});

test("an existing empty file still gets a header", async () => {
  const filePath = await tempCsvPath();
  const service = new CsvExportService({ filePath, fieldKeys: ["name"] });
  await service.exportSession(finishedRecord("s-0"));
  await writeFile(filePath, "", "utf-8");
  await service.exportSession(finishedRecord("s-1"));

  const lines = (await readFile(filePath, "utf-8")).trimEnd().split("\n");
  assert.deepEqual(lines.map((line) => line.split(",")[0]), ["session_id", "s-1"]);
});

test("concurrent exports do not interleave or duplicate the header", async () => {
  const filePath = await tempCsvPath();
  const service = new CsvExportService({ filePath, fieldKeys: ["name"] });
  await Promise.all(["a", "b", "c"].map((id) => service.exportSession(finishedRecord(id))));

  const lines = (await readFile(filePath, "utf-8")).trimEnd().split("\n");
  assert.deepEqual(lines.map((line) => line.split(",")[0]), ["session_id", "a", "b", "c"]);
});

test("anonymized rows mask email and phone and leave missing fields empty", () => {
  const service = new CsvExportService({
    filePath: "unused.csv",
    fieldKeys: ["name", "email", "phone", "location"],
    anonymize: true,
  });
  const row = service.buildRow(finishedRecord("s-9"));
  assert.deepEqual(row.slice(4, 8), ["Ada Lovelace", "ad***@example.com", "***-***-4567", ""]);
});
