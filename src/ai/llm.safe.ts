import { Logger } from "../config/logger";
import { PortError } from "../shared/errors";
import { GenerationPort } from "./generation.port";

export interface TextSafeCallArgs {
  port: GenerationPort;
  prompt: string;
  promptName: string;
  maxTokens?: number;
  temperature?: number;
  logger?: Logger;
  timeoutMs?: number;
}

export type SafeTextErrorCode = "timeout" | "transient_failure" | "llm_failure";

export type SafeTextResult =
  | { ok: true; text: string }
  | { ok: false; error_code: SafeTextErrorCode; message: string };

export const DEFAULT_TIMEOUT_MS = 25_000;

/**
 * Calls the generation port with a timeout and one retry on transient
 * failures. Never throws: failures come back as `{ ok: false }`.
 */
export async function callTextPromptSafe(args: TextSafeCallArgs): Promise<SafeTextResult> {
  const timeoutMs = normalizeTimeout(args.timeoutMs);
  const attempt = async (): Promise<string> =>
    withTimeout(
      args.port.generate(args.prompt, {
        promptName: args.promptName,
        maxTokens: args.maxTokens,
        temperature: args.temperature,
      }),
      timeoutMs,
    );

  try {
    return { ok: true, text: (await attempt()).trim() };
  } catch (error) {
    if (!isTransientError(error)) {
      return toFailure(error);
    }
  }

  args.logger?.warn("llm.safe.retry.once", {
    promptName: args.promptName,
    modelName: args.port.getModelName?.(),
  });
  try {
    return { ok: true, text: (await attempt()).trim() };
  } catch (error) {
    return toFailure(error);
  }
}

function toFailure(error: unknown): SafeTextResult {
  const message = error instanceof Error ? error.message : "Unknown error";
  if (isTimeoutError(error)) {
    return { ok: false, error_code: "timeout", message };
  }
  if (isTransientError(error)) {
    return { ok: false, error_code: "transient_failure", message };
  }
  return { ok: false, error_code: "llm_failure", message };
}

function normalizeTimeout(value?: number): number {
  if (typeof value === "number" && Number.isFinite(value) && value > 0) {
    return Math.round(value);
  }
  return DEFAULT_TIMEOUT_MS;
}

export function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new PortError("timeout", `Generation timed out after ${timeoutMs}ms`));
    }, timeoutMs);
    promise
      .then((value) => {
        clearTimeout(timer);
        resolve(value);
      })
      .catch((error: unknown) => {
        clearTimeout(timer);
        reject(error);
      });
  });
}

function isTimeoutError(error: unknown): boolean {
  if (error instanceof PortError) {
    return error.code === "timeout";
  }
  const message = error instanceof Error ? error.message.toLowerCase() : "";
  return message.includes("timeout") || message.includes("timed out");
}

function isTransientError(error: unknown): boolean {
  if (error instanceof PortError) {
    return error.transient;
  }
  const message = error instanceof Error ? error.message.toLowerCase() : "";
  return (
    message.includes("timeout") ||
    message.includes("econnreset") ||
    message.includes("network") ||
    message.includes("429") ||
    message.includes("rate limit")
  );
}
