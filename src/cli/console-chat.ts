import readline from "node:readline/promises";
import { createScreeningServices } from "../app";
import { loadEnv } from "../config/env";
import { createLogger } from "../config/logger";

async function main(): Promise<void> {
  const env = loadEnv();
  const logger = createLogger({ minLevel: env.logLevel === "debug" ? "debug" : "warn" });
  const { registry } = await createScreeningServices(env, logger);
  const { sessionId, greeting } = registry.create();

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  let closed = false;
  rl.on("close", () => {
    closed = true;
  });

  process.stdout.write(`\n${greeting}\n\n`);
  try {
    while (!closed) {
      let input: string;
      try {
        input = await rl.question("> ");
      } catch (error) {
        if (closed) {
          break;
        }
        throw error;
      }
      const result = await registry.send(sessionId, input);
      if (!result) {
        break;
      }
      process.stdout.write(`\n${result.reply}\n\n`);
      if (result.done) {
        rl.close();
        return;
      }
    }
    if (registry.get(sessionId)) {
      const ended = await registry.end(sessionId);
      if (ended) {
        process.stdout.write(`\n${ended.reply}\n`);
      }
    }
  } finally {
    rl.close();
  }
}

main().catch((error: unknown) => {
  process.stderr.write(`console chat failed: ${error instanceof Error ? error.message : "Unknown error"}\n`);
  process.exitCode = 1;
});
