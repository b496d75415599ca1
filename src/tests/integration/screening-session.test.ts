import assert from "node:assert/strict";
import { mkdtemp, readFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import test from "node:test";
import { createScreeningServices } from "../../app";
import { EnvConfig, loadEnv } from "../../config/env";
import { noopLogger } from "../../config/logger";
import { SessionStorageService } from "../../storage/session-storage.service";
import { ScriptedGenerationPort } from "../helpers/fakes";

const KNOWLEDGE_BASE_PATH = path.resolve(__dirname, "../../../data/knowledge-base.json");

async function testEnv(overrides: Record<string, string> = {}): Promise<EnvConfig> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "screening-session-"));
  return loadEnv({
    OPENAI_API_KEY: "test-key",
    KNOWLEDGE_BASE_PATH,
    SESSIONS_DIR: path.join(dir, "sessions"),
    EXPORT_CSV_PATH: path.join(dir, "export", "candidates.csv"),
    ACKNOWLEDGEMENT_MODE: "static",
    LLM_TIMEOUT_MS: "1000",
    ...overrides,
  });
}

const PROFILE_ANSWERS = ["Grace Hopper", "grace@example.com", "+1 555 987 6543", "12", "Staff engineer", "Arlington, USA"];

test("curated and generated questions flow through to the JSON archive and the CSV export", async () => {
  const env = await testEnv();
  const port = new ScriptedGenerationPort([
    "1. What are Elm ports used for?\n2. What is the Elm architecture?\n3. How does Elm avoid runtime exceptions?",
  ]);
  const { registry } = await createScreeningServices(env, noopLogger, { generationPort: port });
  const { sessionId, greeting } = registry.create();
  assert.equal(greeting.endsWith("What's your full name?"), true);

  for (const answer of PROFILE_ANSWERS) {
    await registry.send(sessionId, answer);
  }
  const firstQuestion = await registry.send(sessionId, "Python, docker, Elm");
  assert.ok(firstQuestion);
  assert.match(firstQuestion.reply, /I have 9 technical questions for you\./);
  assert.match(
    firstQuestion.reply,
    /Question 1 of 9 \(Python\): When would you choose a tuple over a list in Python, and why\?$/,
  );
  assert.equal(port.callsFor("question_generation_v1").length, 1);
  assert.match(port.calls[0].prompt, /Technology: Elm\nNumber of questions: 3/);

  let last = firstQuestion;
  for (let index = 1; index <= 9; index += 1) {
    const turn = await registry.send(sessionId, `Answer ${index}`);
    assert.ok(turn);
    last = turn;
  }
  assert.deepEqual(last.state, { kind: "summarizing" });

  const ended = await registry.end(sessionId);
  assert.ok(ended);
  assert.equal(ended.done, true);

  const storage = new SessionStorageService(env.sessionsDir);
  assert.deepEqual(
    (await storage.list()).map((record) => record.sessionId),
    [sessionId],
  );
  assert.equal(await storage.load("../escape"), null);
  const archived = await storage.load(sessionId);
  assert.ok(archived);
  assert.equal(archived.status, "completed");
  assert.equal(archived.questions.length, 9);
  assert.deepEqual(
    archived.questions.map((item) => `${item.technology}:${item.question.origin}`),
    [
      "Python:retrieved",
      "Python:retrieved",
      "Python:retrieved",
      "docker:retrieved",
      "docker:retrieved",
      "docker:retrieved",
      "Elm:generated",
      "Elm:generated",
      "Elm:generated",
    ],
  );
  assert.equal(archived.questions[3].question.text, "What is the difference between a Docker image and a container?");
  assert.equal(archived.questions[8].answer, "Answer 9");

  const csvLines = (await readFile(env.exportCsvPath, "utf-8")).trimEnd().split("\n");
  assert.equal(csvLines.length, 2);
  assert.equal(
    csvLines[0],
    "session_id,status,started_at,ended_at,name,email,phone,experience,position,location,tech_stack,questions",
  );
  assert.equal(csvLines[1].startsWith(`${sessionId},completed,`), true);
  assert.equal(csvLines[1].includes(",Grace Hopper,grace@example.com,+1 555 987 6543,12,Staff engineer,"), true);
});

test("generation outage degrades to curated questions and anonymized export", async () => {
  const env = await testEnv({ EXPORT_ANONYMIZE: "true", QUESTIONS_PER_TECHNOLOGY: "2" });
  const port = new ScriptedGenerationPort([new Error("401 unauthorized")]);
  const { registry } = await createScreeningServices(env, noopLogger, { generationPort: port });
  const { sessionId } = registry.create();

  for (const answer of PROFILE_ANSWERS) {
    await registry.send(sessionId, answer);
  }
  const turn = await registry.send(sessionId, "Go, Haskell");
  assert.ok(turn);
  assert.deepEqual(turn.notices, ["Questions for Haskell are unavailable at the moment, so I'll skip it."]);
  assert.match(turn.reply, /Question 1 of 2 \(Go\): /);

  const flow = registry.get(sessionId);
  assert.ok(flow);
  assert.deepEqual(flow.getRecord().degradedTechnologies, ["Haskell"]);

  await registry.send(sessionId, "bye");
  const csv = await readFile(env.exportCsvPath, "utf-8");
  assert.equal(csv.includes(",Grace Hopper,gr***@example.com,***-***-6543,12,"), true);
  assert.equal(csv.includes("grace@example.com"), false);

  const archived = await new SessionStorageService(env.sessionsDir).load(sessionId);
  assert.ok(archived);
  assert.equal(archived.status, "exited");
  assert.equal(archived.fields.email, "grace@example.com");
});

test("concurrent sessions keep their own state", async () => {
  const env = await testEnv();
  const { registry } = await createScreeningServices(env, noopLogger, {
    generationPort: new ScriptedGenerationPort(["1. Generated question?"]),
  });
  const first = registry.create();
  const second = registry.create();
  assert.notEqual(first.sessionId, second.sessionId);

  await Promise.all([
    registry.send(first.sessionId, "Ada Lovelace"),
    registry.send(second.sessionId, "Alan Turing"),
    registry.send(first.sessionId, "ada@example.com"),
  ]);

  assert.deepEqual(registry.get(first.sessionId)?.getRecord().fields, {
    name: "Ada Lovelace",
    email: "ada@example.com",
  });
  assert.deepEqual(registry.get(second.sessionId)?.getRecord().fields, { name: "Alan Turing" });
  assert.equal(await registry.send("missing", "hi"), null);
});

test("sessions are released from the registry once they end", async () => {
  const env = await testEnv();
  const { registry } = await createScreeningServices(env, noopLogger, {
    generationPort: new ScriptedGenerationPort(["1. Generated question?"]),
  });
  const sessionIds = Array.from({ length: 5 }, () => registry.create().sessionId);
  assert.equal(registry.size(), 5);

  for (const sessionId of sessionIds.slice(0, 3)) {
    const turn = await registry.send(sessionId, "bye");
    assert.ok(turn);
    assert.equal(turn.done, true);
  }
  assert.equal(registry.size(), 2);
  assert.equal(registry.get(sessionIds[0]), null);
  assert.equal(await registry.send(sessionIds[0], "hello?"), null);

  const ended = await registry.end(sessionIds[3]);
  assert.equal(ended?.done, true);
  assert.equal(registry.size(), 1);
  assert.notEqual(registry.get(sessionIds[4]), null);

  const archived = await new SessionStorageService(env.sessionsDir).list();
  assert.equal(archived.length, 4);
});
