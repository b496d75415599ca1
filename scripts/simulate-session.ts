import { mkdtemp } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { GenerationOptions, GenerationPort } from "../src/ai/generation.port";
import { createScreeningServices } from "../src/app";
import { loadEnv } from "../src/config/env";
import { createLogger } from "../src/config/logger";

/** Offline stand-in for the model: numbered questions for generation, one line for acknowledgements. */
class CannedGenerationPort implements GenerationPort {
  calls = 0;

  async generate(prompt: string, options?: GenerationOptions): Promise<string> {
    this.calls += 1;
    if (options?.promptName === "question_generation_v1") {
      const technology = prompt.match(/^Technology: (.+)$/m)?.[1] ?? "this technology";
      const count = Number(prompt.match(/^Number of questions: (\d+)$/m)?.[1] ?? "1");
      return Array.from({ length: count }, (_, index) => `${index + 1}. Simulated ${technology} question #${index + 1}?`).join("\n");
    }
    return "Thanks, noted.";
  }

  getModelName(): string {
    return "canned";
  }
}

const SCRIPT = [
  "Sam Rivera",
  "sam.rivera@",
  "sam.rivera@example.com",
  "+44 20 7946 0018",
  "4",
  "Backend engineer",
  "Manchester, UK",
  "TypeScript, Postgres, Elixir",
  "Types catch mistakes early.",
  "Narrowing through control flow.",
  "Structural typing.",
  "MVCC keeps readers and writers apart.",
  "EXPLAIN ANALYZE first.",
  "Partial indexes.",
  "Lightweight processes.",
  "Supervision trees.",
  "Pattern matching.",
  "Is the role remote?",
  "bye",
];

async function main(): Promise<void> {
  const workDir = await mkdtemp(path.join(os.tmpdir(), "screening-sim-"));
  const env = loadEnv({
    ...process.env,
    OPENAI_API_KEY: process.env.OPENAI_API_KEY ?? "test-key",
    SESSIONS_DIR: path.join(workDir, "sessions"),
    EXPORT_CSV_PATH: path.join(workDir, "candidates.csv"),
  });
  const logger = createLogger({ minLevel: "warn" });
  const port = new CannedGenerationPort();
  const { registry } = await createScreeningServices(env, logger, { generationPort: port });

  const { sessionId, greeting } = registry.create();
  process.stdout.write(`assistant> ${greeting}\n\n`);
  for (const line of SCRIPT) {
    process.stdout.write(`candidate> ${line}\n`);
    const result = await registry.send(sessionId, line);
    if (!result) {
      throw new Error(`Session ${sessionId} disappeared`);
    }
    process.stdout.write(`assistant> ${result.reply}\n\n`);
    if (result.done) {
      break;
    }
  }

  process.stdout.write(`model calls: ${port.calls}\nartifacts: ${workDir}\n`);
}

main().catch((error: unknown) => {
  process.stderr.write(`simulation failed: ${error instanceof Error ? error.message : "Unknown error"}\n`);
  process.exitCode = 1;
});
