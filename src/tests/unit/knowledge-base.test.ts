import assert from "node:assert/strict";
import { mkdtemp, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import test from "node:test";
import { createKnowledgeBase, loadKnowledgeBase, parseKnowledgeBaseDocument } from "../../knowledge/knowledge-base";
import { ConfigurationError } from "../../shared/errors";

test("lookup is case and whitespace insensitive and follows aliases", () => {
  const knowledgeBase = createKnowledgeBase({
    technologies: {
      Python: ["What is a list comprehension?", "What is a generator?"],
      "Node.js": ["What is the event loop?"],
    },
    aliases: { nodejs: "node.js", Py: "python" },
  });

  assert.deepEqual(knowledgeBase.lookup("  PYTHON "), ["What is a list comprehension?", "What is a generator?"]);
  assert.deepEqual(knowledgeBase.lookup("py"), ["What is a list comprehension?", "What is a generator?"]);
  assert.deepEqual(knowledgeBase.lookup("NodeJS"), ["What is the event loop?"]);
  assert.equal(knowledgeBase.lookup("cobol"), undefined);
  assert.deepEqual(knowledgeBase.technologies(), ["python", "node.js"]);
});

test("keys that normalize the same are merged and duplicate questions dropped", () => {
  const knowledgeBase = createKnowledgeBase({
    technologies: {
      Docker: ["What is an image?", "What is a volume?"],
      docker: ["what is an  IMAGE?", "What is a network?"],
    },
  });
  assert.deepEqual(knowledgeBase.lookup("docker"), ["What is an image?", "What is a volume?", "What is a network?"]);
  assert.deepEqual(knowledgeBase.technologies(), ["docker"]);
});

test("stored question lists cannot be mutated by callers", () => {
  const knowledgeBase = createKnowledgeBase({ technologies: { go: ["What is a goroutine?"] } });
  const questions = knowledgeBase.lookup("go");
  assert.ok(questions);
  assert.equal(Object.isFrozen(questions), true);
});

test("alias pointing at an unknown technology is a configuration error", () => {
  assert.throws(
    () => createKnowledgeBase({ technologies: { go: ["What is a goroutine?"] }, aliases: { golang: "gopher" } }),
    ConfigurationError,
  );
});

test("document parser rejects malformed shapes", () => {
  assert.throws(() => parseKnowledgeBaseDocument([]), /"technologies" map/);
  assert.throws(() => parseKnowledgeBaseDocument({ technologies: { go: "What is a goroutine?" } }), /list of strings/);
  assert.throws(() => parseKnowledgeBaseDocument({ technologies: {}, aliases: { golang: 1 } }), /must map to a string/);
  assert.deepEqual(parseKnowledgeBaseDocument({ technologies: { go: ["  What   is a goroutine? ", " "] } }), {
    technologies: { go: ["What is a goroutine?"] },
    aliases: {},
  });
});

test("loads the knowledge base from a JSON file", async () => {
  const dir = await mkdtemp(path.join(os.tmpdir(), "kb-test-"));
  const filePath = path.join(dir, "kb.json");
  await writeFile(filePath, JSON.stringify({ technologies: { rust: ["What is ownership?"] } }), "utf-8");

  const knowledgeBase = await loadKnowledgeBase(filePath);
  assert.deepEqual(knowledgeBase.lookup("Rust"), ["What is ownership?"]);

  await writeFile(filePath, "{ not json", "utf-8");
  await assert.rejects(loadKnowledgeBase(filePath), /not valid JSON/);
  await assert.rejects(loadKnowledgeBase(path.join(dir, "missing.json")), /cannot be read/);
});

test("bundled knowledge base loads and covers common stacks", async () => {
  const knowledgeBase = await loadKnowledgeBase(path.resolve(__dirname, "../../../data/knowledge-base.json"));
  for (const technology of ["python", "JavaScript", "react", "docker", "postgres", "k8s"]) {
    const questions = knowledgeBase.lookup(technology);
    assert.ok(questions && questions.length >= 3, technology);
  }
});
