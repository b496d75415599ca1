import express, { Express, NextFunction, Request, Response } from "express";
import { GenerationPort } from "./ai/generation.port";
import { LlmClient } from "./ai/llm.client";
import { EnvConfig } from "./config/env";
import { Logger } from "./config/logger";
import { CompositeSessionExporter } from "./export/composite-exporter";
import { CsvExportService } from "./export/csv-export.service";
import { SessionExporter } from "./export/session-exporter";
import { buildChatController } from "./http/chat.controller";
import { KnowledgeBase, loadKnowledgeBase } from "./knowledge/knowledge-base";
import {
  AcknowledgementSource,
  LlmAcknowledgementSource,
  StaticAcknowledgementSource,
} from "./screening/acknowledgement.service";
import { ConversationFlow } from "./screening/conversation-flow";
import { buildFieldSpecs } from "./screening/field-specs";
import {
  GeneratedQuestionProvider,
  HybridQuestionSource,
  KnowledgeBaseRetriever,
} from "./screening/question-source";
import { SessionRegistry } from "./screening/session-registry";
import { SessionStorageService } from "./storage/session-storage.service";

export interface ScreeningServices {
  knowledgeBase: KnowledgeBase;
  generationPort: GenerationPort;
  exporter: SessionExporter;
  registry: SessionRegistry;
}

export interface ScreeningServiceOverrides {
  knowledgeBase?: KnowledgeBase;
  generationPort?: GenerationPort;
  exporter?: SessionExporter;
}

export async function createScreeningServices(
  env: EnvConfig,
  logger: Logger,
  overrides: ScreeningServiceOverrides = {},
): Promise<ScreeningServices> {
  const knowledgeBase = overrides.knowledgeBase ?? (await loadKnowledgeBase(env.knowledgeBasePath));
  logger.info("Knowledge base loaded", {
    path: env.knowledgeBasePath,
    technologies: knowledgeBase.technologies().length,
  });

  const generationPort =
    overrides.generationPort ??
    new LlmClient(
      {
        apiKey: env.openaiApiKey,
        model: env.openaiChatModel,
        baseUrl: env.openaiBaseUrl,
      },
      logger,
    );

  const fieldSpecs = buildFieldSpecs(env.maxAttempts);
  const exporter =
    overrides.exporter ??
    new CompositeSessionExporter(
      [
        new SessionStorageService(env.sessionsDir),
        new CsvExportService({
          filePath: env.exportCsvPath,
          fieldKeys: fieldSpecs.map((spec) => spec.key),
          anonymize: env.exportAnonymize,
        }),
      ],
      logger,
    );

  const questionSource = new HybridQuestionSource(
    new KnowledgeBaseRetriever(knowledgeBase),
    new GeneratedQuestionProvider(generationPort, logger, env.llmTimeoutMs),
    logger,
  );
  const acknowledgementSource: AcknowledgementSource =
    env.acknowledgementMode === "llm"
      ? new LlmAcknowledgementSource(generationPort, logger, env.llmTimeoutMs)
      : new StaticAcknowledgementSource();

  const registry = new SessionRegistry(
    (sessionId) =>
      new ConversationFlow(sessionId, {
        fieldSpecs,
        questionSource,
        acknowledgementSource,
        exporter,
        logger,
        options: {
          questionsPerTechnology: env.questionsPerTechnology,
          exitKeywords: env.exitKeywords,
          validationRules: {
            phoneMinDigits: env.phoneMinDigits,
            phoneMaxDigits: env.phoneMaxDigits,
          },
        },
      }),
  );

  return { knowledgeBase, generationPort, exporter, registry };
}

export function createApp(deps: { registry: SessionRegistry; logger: Logger }): Express {
  const app = express();
  app.use(express.json({ limit: "64kb" }));

  app.get("/health", (_request: Request, response: Response) => {
    response.status(200).json({ ok: true, sessions: deps.registry.size() });
  });
  app.use("/", buildChatController(deps));

  app.use((error: unknown, _request: Request, response: Response, next: NextFunction) => {
    if (response.headersSent) {
      next(error);
      return;
    }
    const status = isBodyParseError(error) ? 400 : 500;
    if (status === 500) {
      deps.logger.error("Unhandled request error", {
        error: error instanceof Error ? error.message : "Unknown error",
      });
    }
    response.status(status).json({ ok: false, error: status === 400 ? "Malformed JSON body" : "Internal error" });
  });

  return app;
}

function isBodyParseError(error: unknown): boolean {
  return error instanceof SyntaxError && "body" in error;
}
