import fetch from "node-fetch";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export interface CreateLoggerOptions {
  minLevel?: LogLevel;
  write?: (line: string) => void;
  webhook?: {
    url?: string;
    minLevel: LogLevel;
    ratePerMinute?: number;
    batchMs?: number;
  };
}

export interface LoggerContext {
  session_id?: string;
  state?: string;
  field_key?: string;
  technology?: string;
  prompt_name?: string;
  model_name?: string;
  latency_ms?: number;
  ok?: boolean;
  error_code?: string;
}

interface SinkEntry {
  level: LogLevel;
  message: string;
  meta?: Record<string, unknown>;
  timestamp: string;
}

export const noopLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

export function createLogger(options?: CreateLoggerOptions): Logger {
  const minLevel = options?.minLevel ?? "info";
  const write = options?.write ?? ((line: string) => process.stdout.write(line));
  const sink = buildWebhookLogSink(options?.webhook);

  const log = (level: LogLevel, message: string, meta?: Record<string, unknown>): void => {
    const timestamp = new Date().toISOString();
    if (isAtLeast(level, minLevel)) {
      const payload: Record<string, unknown> = { timestamp, level, message };
      if (meta) {
        payload.meta = meta;
      }
      write(`${safeJson(payload)}\n`);
    }
    sink?.enqueue({ level, message, meta, timestamp });
  };

  return {
    debug(message, meta) {
      log("debug", message, meta);
    },
    info(message, meta) {
      log("info", message, meta);
    },
    warn(message, meta) {
      log("warn", message, meta);
    },
    error(message, meta) {
      log("error", message, meta);
    },
  };
}

export function logContext(
  logger: Logger,
  level: LogLevel,
  message: string,
  context: LoggerContext,
  fields?: Record<string, unknown>,
): void {
  const meta: Record<string, unknown> = {
    ...context,
    ...(fields ?? {}),
  };
  logger[level](message, meta);
}

class WebhookLogSink {
  private readonly queue: SinkEntry[] = [];
  private flushTimer: NodeJS.Timeout | null = null;
  private windowStartMs = Date.now();
  private sentInWindow = 0;

  constructor(
    private readonly url: string,
    private readonly minLevel: LogLevel,
    private readonly ratePerMinute: number,
    private readonly batchMs: number,
  ) {}

  enqueue(entry: SinkEntry): void {
    if (!isAtLeast(entry.level, this.minLevel)) {
      return;
    }
    this.queue.push(entry);
    this.scheduleFlush();
  }

  private scheduleFlush(): void {
    if (this.flushTimer) {
      return;
    }
    this.flushTimer = setTimeout(() => {
      void this.flush();
    }, this.batchMs);
    this.flushTimer.unref();
  }

  private async flush(): Promise<void> {
    this.flushTimer = null;
    if (!this.queue.length) {
      return;
    }
    if (!this.tryConsumeRateWindow()) {
      this.scheduleFlush();
      return;
    }

    const batch = this.queue.splice(0, 10);
    try {
      await postToWebhook(this.url, formatLogBatch(batch));
    } catch (error) {
      process.stderr.write(
        `${safeJson({ level: "warn", message: "log.webhook.failed", error: error instanceof Error ? error.message : "Unknown error" })}\n`,
      );
    } finally {
      if (this.queue.length) {
        this.scheduleFlush();
      }
    }
  }

  private tryConsumeRateWindow(): boolean {
    const now = Date.now();
    if (now - this.windowStartMs >= 60_000) {
      this.windowStartMs = now;
      this.sentInWindow = 0;
    }
    if (this.sentInWindow >= this.ratePerMinute) {
      return false;
    }
    this.sentInWindow += 1;
    return true;
  }
}

function buildWebhookLogSink(config: CreateLoggerOptions["webhook"]): WebhookLogSink | undefined {
  const url = config?.url?.trim();
  if (!config || !url) {
    return undefined;
  }
  return new WebhookLogSink(
    url,
    config.minLevel,
    Math.max(1, Math.floor(config.ratePerMinute ?? 20)),
    Math.max(300, Math.floor(config.batchMs ?? 2500)),
  );
}

function isAtLeast(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[minLevel];
}

export function formatLogBatch(entries: ReadonlyArray<SinkEntry>): string {
  const blocks = entries.map((entry) => {
    const metaText = entry.meta ? `\nmeta: ${safeJson(redactMeta(entry.meta))}` : "";
    return `[${entry.level.toUpperCase()}] ${entry.timestamp}\n${entry.message}${metaText}`;
  });
  return truncateMessage(blocks.join("\n\n---\n\n"), 3800);
}

export function redactMeta(meta: Record<string, unknown>): Record<string, unknown> {
  const output: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    const lowerKey = key.toLowerCase();
    if (
      lowerKey.includes("token") ||
      lowerKey.includes("secret") ||
      lowerKey.includes("apikey") ||
      lowerKey.includes("api_key") ||
      lowerKey.includes("authorization") ||
      lowerKey.includes("email") ||
      lowerKey.includes("phone")
    ) {
      output[key] = "[REDACTED]";
      continue;
    }
    if (typeof value === "string" && value.length > 500) {
      output[key] = `${value.slice(0, 500)}...`;
      continue;
    }
    output[key] = value;
  }
  return output;
}

function safeJson(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return "\"[unserializable]\"";
  }
}

function truncateMessage(text: string, maxChars: number): string {
  if (text.length <= maxChars) {
    return text;
  }
  return `${text.slice(0, maxChars - 3)}...`;
}

async function postToWebhook(url: string, text: string): Promise<void> {
  const response = await fetch(url, {
    method: "POST",
    headers: {
      "content-type": "application/json",
    },
    body: JSON.stringify({ text }),
  });
  if (!response.ok) {
    throw new Error(`log_webhook_send_failed_http_${response.status}`);
  }
}
