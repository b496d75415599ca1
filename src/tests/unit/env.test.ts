import assert from "node:assert/strict";
import path from "node:path";
import test from "node:test";
import { loadEnv } from "../../config/env";
import { ConfigurationError } from "../../shared/errors";

test("defaults apply when only the API key is set", () => {
  const env = loadEnv({ OPENAI_API_KEY: "test-key" });

  assert.equal(env.openaiApiKey, "test-key");
  assert.equal(env.openaiChatModel, "gpt-4o-mini");
  assert.equal(env.openaiBaseUrl, "https://api.openai.com/v1");
  assert.equal(env.port, 3000);
  assert.equal(env.maxAttempts, 2);
  assert.equal(env.questionsPerTechnology, 3);
  assert.equal(env.phoneMinDigits, 7);
  assert.equal(env.phoneMaxDigits, 15);
  assert.equal(env.llmTimeoutMs, 25000);
  assert.equal(env.acknowledgementMode, "llm");
  assert.deepEqual(env.exitKeywords, ["bye", "exit", "quit", "goodbye"]);
  assert.equal(env.knowledgeBasePath, path.resolve(process.cwd(), "data/knowledge-base.json"));
  assert.equal(env.exportCsvPath, path.resolve(process.cwd(), "data/candidates.csv"));
  assert.equal(env.exportAnonymize, false);
  assert.equal(env.logLevel, "info");
  assert.equal(env.logWebhookUrl, undefined);
});

test("overrides are parsed and normalized", () => {
  const env = loadEnv({
    OPENAI_API_KEY: " test-key ",
    OPENAI_BASE_URL: "http://localhost:8080/v1//",
    MAX_ATTEMPTS: "3",
    QUESTIONS_PER_TECHNOLOGY: "5",
    ACKNOWLEDGEMENT_MODE: "Static",
    EXIT_KEYWORDS: "Bye, STOP , stop,,",
    EXPORT_ANONYMIZE: "yes",
    LOG_LEVEL: "DEBUG",
  });

  assert.equal(env.openaiApiKey, "test-key");
  assert.equal(env.openaiBaseUrl, "http://localhost:8080/v1");
  assert.equal(env.maxAttempts, 3);
  assert.equal(env.questionsPerTechnology, 5);
  assert.equal(env.acknowledgementMode, "static");
  assert.deepEqual(env.exitKeywords, ["bye", "stop"]);
  assert.equal(env.exportAnonymize, true);
  assert.equal(env.logLevel, "debug");
});

test("missing API key is a configuration error", () => {
  assert.throws(() => loadEnv({}), (error: unknown) => {
    assert.ok(error instanceof ConfigurationError);
    assert.equal(error.message, "Missing required environment variable: OPENAI_API_KEY");
    return true;
  });
});

test("invalid numeric and enum settings are rejected", () => {
  const base = { OPENAI_API_KEY: "test-key" };
  assert.throws(() => loadEnv({ ...base, MAX_ATTEMPTS: "0" }), /Invalid MAX_ATTEMPTS value: 0/);
  assert.throws(() => loadEnv({ ...base, QUESTIONS_PER_TECHNOLOGY: "2.5" }), /QUESTIONS_PER_TECHNOLOGY/);
  assert.throws(() => loadEnv({ ...base, LLM_TIMEOUT_MS: "10" }), /LLM_TIMEOUT_MS/);
  assert.throws(() => loadEnv({ ...base, PHONE_MIN_DIGITS: "10", PHONE_MAX_DIGITS: "8" }), /PHONE_MAX_DIGITS/);
  assert.throws(() => loadEnv({ ...base, ACKNOWLEDGEMENT_MODE: "poetry" }), /ACKNOWLEDGEMENT_MODE/);
  assert.throws(() => loadEnv({ ...base, EXPORT_ANONYMIZE: "maybe" }), /Invalid boolean value: maybe/);
  assert.throws(() => loadEnv({ ...base, LOG_LEVEL: "loud" }), /Invalid LOG_LEVEL value: loud/);
});
