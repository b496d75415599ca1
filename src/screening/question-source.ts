import { callTextPromptSafe, SafeTextErrorCode } from "../ai/llm.safe";
import { GenerationPort } from "../ai/generation.port";
import { buildQuestionGenerationV1Prompt } from "../ai/prompts/screening/question-generation.v1.prompt";
import { Logger, logContext } from "../config/logger";
import { KnowledgeBase } from "../knowledge/knowledge-base";
import { Question } from "../shared/types/screening.types";
import { collapseWhitespace, normalizeQuestionText } from "../shared/utils/text";
import { parseQuestionList } from "./parsers/question-list.parser";

export type QuestionBatchStatus = "complete" | "partial" | "degraded";

export interface QuestionBatch {
  technology: string;
  questions: Question[];
  status: QuestionBatchStatus;
  generationRequests: number;
  errorCode?: SafeTextErrorCode;
}

export interface QuestionSource {
  getQuestions(technology: string, desiredCount: number): Promise<QuestionBatch>;
}

export class KnowledgeBaseRetriever {
  constructor(private readonly knowledgeBase: KnowledgeBase) {}

  retrieve(technology: string, limit: number): Question[] {
    const stored = this.knowledgeBase.lookup(technology) ?? [];
    return stored.slice(0, limit).map((text): Question => ({ text, origin: "retrieved" }));
  }
}

export type GenerationOutcome =
  | { ok: true; questions: Question[] }
  | { ok: false; errorCode: SafeTextErrorCode; message: string };

export class GeneratedQuestionProvider {
  constructor(
    private readonly port: GenerationPort,
    private readonly logger: Logger,
    private readonly timeoutMs?: number,
  ) {}

  async generate(technology: string, count: number, exclude: ReadonlyArray<string>): Promise<GenerationOutcome> {
    const safe = await callTextPromptSafe({
      port: this.port,
      prompt: buildQuestionGenerationV1Prompt({ technology, count, exclude }),
      promptName: "question_generation_v1",
      maxTokens: Math.min(1200, 120 * count + 100),
      temperature: 0.7,
      logger: this.logger,
      timeoutMs: this.timeoutMs,
    });
    if (!safe.ok) {
      return { ok: false, errorCode: safe.error_code, message: safe.message };
    }
    return {
      ok: true,
      questions: parseQuestionList(safe.text).map((text): Question => ({ text, origin: "generated" })),
    };
  }
}

class QuestionPool {
  private readonly seen = new Set<string>();
  readonly items: Question[] = [];

  constructor(private readonly capacity: number) {}

  addAll(questions: ReadonlyArray<Question>): void {
    for (const question of questions) {
      if (this.isFull()) {
        return;
      }
      const key = normalizeQuestionText(question.text);
      if (!key || this.seen.has(key)) {
        continue;
      }
      this.seen.add(key);
      this.items.push(question);
    }
  }

  isFull(): boolean {
    return this.items.length >= this.capacity;
  }

  missing(): number {
    return Math.max(0, this.capacity - this.items.length);
  }

  texts(): string[] {
    return this.items.map((item) => item.text);
  }
}

/**
 * Knowledge base first, generation for the remainder. De-duplicates by
 * normalized text and makes at most one supplemental generation request.
 */
export class HybridQuestionSource implements QuestionSource {
  constructor(
    private readonly retriever: KnowledgeBaseRetriever,
    private readonly generator: GeneratedQuestionProvider,
    private readonly logger: Logger,
  ) {}

  async getQuestions(technology: string, desiredCount: number): Promise<QuestionBatch> {
    if (!Number.isInteger(desiredCount) || desiredCount < 1) {
      throw new RangeError(`desiredCount must be a positive integer, got ${desiredCount}`);
    }
    const displayName = collapseWhitespace(technology);
    const pool = new QuestionPool(desiredCount);
    pool.addAll(this.retriever.retrieve(technology, desiredCount));
    const retrievedCount = pool.items.length;

    let generationRequests = 0;
    while (!pool.isFull() && generationRequests < 2) {
      const outcome = await this.generator.generate(displayName, pool.missing(), pool.texts());
      generationRequests += 1;
      if (!outcome.ok) {
        logContext(
          this.logger,
          "warn",
          "question_source.degraded",
          { technology: displayName, error_code: outcome.errorCode },
          { retrieved: retrievedCount, available: pool.items.length, desiredCount, error: outcome.message },
        );
        return {
          technology: displayName,
          questions: [...pool.items],
          status: "degraded",
          generationRequests,
          errorCode: outcome.errorCode,
        };
      }
      pool.addAll(outcome.questions);
    }

    const status: QuestionBatchStatus = pool.isFull() ? "complete" : "partial";
    logContext(
      this.logger,
      status === "complete" ? "info" : "warn",
      "question_source.resolved",
      { technology: displayName },
      {
        status,
        retrieved: retrievedCount,
        generated: pool.items.length - retrievedCount,
        desiredCount,
        generationRequests,
      },
    );
    return {
      technology: displayName,
      questions: [...pool.items],
      status,
      generationRequests,
    };
  }
}
