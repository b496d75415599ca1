import { Logger, logContext } from "../config/logger";
import { SessionExporter } from "../export/session-exporter";
import {
  FieldKey,
  FieldSpec,
  FlowState,
  SessionRecord,
  TechnologyQuestionPlan,
  TerminationReason,
  TurnResult,
} from "../shared/types/screening.types";
import { getShortEmpathyLine } from "../shared/utils/empathy.util";
import { DEFAULT_VALIDATION_RULES, ValidationRules } from "../validation/field-validator";
import { AcknowledgementSource } from "./acknowledgement.service";
import { TECH_STACK_FIELD } from "./field-specs";
import {
  candidateNoteReceivedMessage,
  closingSummaryMessage,
  completionMessage,
  degradedTechnologiesNotice,
  farewellMessage,
  NEUTRAL_ACKNOWLEDGEMENT,
  noQuestionsMessage,
  questionsIntroMessage,
  retryPromptMessage,
  sessionEndedMessage,
  technicalQuestionMessage,
  welcomeMessage,
} from "./messages";
import { parseTechStack } from "./parsers/tech-stack.parser";
import { QuestionSource } from "./question-source";
import { applyFieldAttempt } from "./retry-policy";

export interface ConversationFlowOptions {
  questionsPerTechnology: number;
  exitKeywords: ReadonlyArray<string>;
  validationRules: ValidationRules;
}

export interface ConversationFlowDeps {
  fieldSpecs: ReadonlyArray<FieldSpec>;
  questionSource: QuestionSource;
  acknowledgementSource: AcknowledgementSource;
  logger: Logger;
  exporter?: SessionExporter;
  options?: Partial<ConversationFlowOptions>;
  now?: () => Date;
}

const DEFAULT_OPTIONS: ConversationFlowOptions = {
  questionsPerTechnology: 3,
  exitKeywords: ["bye", "exit", "quit", "goodbye"],
  validationRules: DEFAULT_VALIDATION_RULES,
};

/**
 * One screening conversation. Messages must be fed sequentially; the flow
 * owns its session record until it is handed to the exporter on termination.
 */
export class ConversationFlow {
  private state: FlowState = { kind: "collecting", fieldIndex: 0, attemptsUsed: 0 };
  private plan: TechnologyQuestionPlan[] = [];
  private readonly record: SessionRecord;
  private readonly options: ConversationFlowOptions;
  private readonly exitKeywords: ReadonlySet<string>;
  private readonly exitHint: string;
  private readonly now: () => Date;

  constructor(
    readonly sessionId: string,
    private readonly deps: ConversationFlowDeps,
  ) {
    if (deps.fieldSpecs.length === 0) {
      throw new Error("Conversation flow requires at least one field spec");
    }
    this.options = { ...DEFAULT_OPTIONS, ...deps.options };
    if (!Number.isInteger(this.options.questionsPerTechnology) || this.options.questionsPerTechnology < 1) {
      throw new Error(`questionsPerTechnology must be a positive integer, got ${this.options.questionsPerTechnology}`);
    }
    const keywords = this.options.exitKeywords
      .map((keyword) => keyword.trim().toLowerCase())
      .filter((keyword) => keyword.length > 0);
    if (keywords.length === 0) {
      throw new Error("Conversation flow requires at least one exit keyword");
    }
    this.exitKeywords = new Set(keywords);
    this.exitHint = keywords[0];
    this.now = deps.now ?? (() => new Date());
    this.record = {
      sessionId,
      startedAt: this.now().toISOString(),
      status: "in_progress",
      fields: {},
      attempts: [],
      questions: [],
      degradedTechnologies: [],
      candidateNotes: [],
    };
  }

  start(): string {
    return welcomeMessage(this.deps.fieldSpecs[0].prompt, this.exitHint);
  }

  getState(): FlowState {
    return this.state;
  }

  getRecord(): Readonly<SessionRecord> {
    return this.record;
  }

  getQuestionPlan(): ReadonlyArray<TechnologyQuestionPlan> {
    return this.plan;
  }

  isExitCommand(text: string): boolean {
    const normalized = text.trim().toLowerCase().replace(/[.!?,;:]+$/, "").trim();
    return this.exitKeywords.has(normalized);
  }

  async handleMessage(text: string): Promise<TurnResult> {
    const state = this.state;
    if (state.kind === "terminated") {
      return this.turn(sessionEndedMessage());
    }
    if (this.isExitCommand(text)) {
      return this.finish(state.kind === "summarizing" ? "completed" : "exit");
    }

    switch (state.kind) {
      case "collecting":
        return this.handleFieldAnswer(state.fieldIndex, state.attemptsUsed, text);
      case "collecting_question":
        return this.handleQuestionAnswer(state.techIndex, state.questionIndex, text);
      case "summarizing":
        return this.handleCandidateNote(text);
    }
  }

  async terminate(): Promise<TurnResult> {
    if (this.state.kind === "terminated") {
      return this.turn(sessionEndedMessage());
    }
    return this.finish(this.state.kind === "summarizing" ? "completed" : "exit");
  }

  private async handleFieldAnswer(fieldIndex: number, attemptsUsed: number, text: string): Promise<TurnResult> {
    const spec = this.deps.fieldSpecs[fieldIndex];
    const outcome = applyFieldAttempt(spec, attemptsUsed, text, this.options.validationRules);
    this.record.attempts.push(outcome.attempt);

    if (outcome.kind === "retry") {
      this.state = { kind: "collecting", fieldIndex, attemptsUsed: outcome.attemptsUsed };
      this.log("info", "field.rejected", { field_key: spec.key }, { attemptNumber: outcome.attempt.attemptNumber });
      return this.turn(retryPromptMessage(outcome.hint, spec.prompt));
    }

    this.record.fields[spec.key] = outcome.value;
    this.log("info", "field.accepted", { field_key: spec.key }, {
      attemptNumber: outcome.attempt.attemptNumber,
      acceptedReason: outcome.attempt.acceptedReason,
    });

    const acknowledgement = await this.acknowledge(spec.key, outcome.value);
    const notices = spec.key === TECH_STACK_FIELD ? await this.materializeQuestionPlan(outcome.value) : [];

    const nextIndex = fieldIndex + 1;
    if (nextIndex < this.deps.fieldSpecs.length) {
      this.state = { kind: "collecting", fieldIndex: nextIndex, attemptsUsed: 0 };
      return this.turn(joinParagraphs(acknowledgement, ...notices, this.deps.fieldSpecs[nextIndex].prompt), notices);
    }
    return this.beginQuestions(acknowledgement, notices);
  }

  private beginQuestions(acknowledgement: string, notices: string[]): TurnResult {
    if (this.plan.length === 0) {
      return this.enterSummarizing(joinParagraphs(acknowledgement, ...notices, noQuestionsMessage()), notices);
    }
    this.state = { kind: "collecting_question", techIndex: 0, questionIndex: 0 };
    const total = this.totalQuestions();
    const intro = questionsIntroMessage(
      total,
      this.plan.map((entry) => entry.technology),
    );
    return this.turn(joinParagraphs(acknowledgement, ...notices, intro, this.currentQuestionMessage(0, 0)), notices);
  }

  private async handleQuestionAnswer(techIndex: number, questionIndex: number, text: string): Promise<TurnResult> {
    const entry = this.plan[techIndex];
    const question = entry.questions[questionIndex];
    this.record.questions.push({
      technology: entry.technology,
      question,
      answer: text.trim(),
    });
    this.log("info", "question.answered", { technology: entry.technology }, {
      questionIndex,
      origin: question.origin,
    });

    const answeredCount = this.record.questions.length;
    if (questionIndex + 1 < entry.questions.length) {
      this.state = { kind: "collecting_question", techIndex, questionIndex: questionIndex + 1 };
      return this.turn(joinParagraphs(getShortEmpathyLine(answeredCount - 1), this.currentQuestionMessage(techIndex, questionIndex + 1)));
    }
    if (techIndex + 1 < this.plan.length) {
      this.state = { kind: "collecting_question", techIndex: techIndex + 1, questionIndex: 0 };
      return this.turn(joinParagraphs(getShortEmpathyLine(answeredCount - 1), this.currentQuestionMessage(techIndex + 1, 0)));
    }
    return this.enterSummarizing();
  }

  private handleCandidateNote(text: string): TurnResult {
    const note = text.trim();
    if (note) {
      this.record.candidateNotes.push(note);
    }
    return this.turn(candidateNoteReceivedMessage(this.exitHint));
  }

  private enterSummarizing(prefix?: string, notices: string[] = []): TurnResult {
    this.state = { kind: "summarizing" };
    this.log("info", "session.summarizing", {}, {
      fields: Object.keys(this.record.fields).length,
      questions: this.record.questions.length,
    });
    const summary = completionMessage(closingSummaryMessage(this.record, this.deps.fieldSpecs), this.exitHint);
    return this.turn(prefix ? joinParagraphs(prefix, summary) : summary, notices);
  }

  private async finish(reason: TerminationReason): Promise<TurnResult> {
    this.state = { kind: "terminated", reason };
    this.record.status = reason === "exit" ? "exited" : "completed";
    this.record.endedAt = this.now().toISOString();
    this.log("info", "session.terminated", {}, {
      reason,
      fields: Object.keys(this.record.fields).length,
      questions: this.record.questions.length,
    });
    await this.exportRecord();
    return this.turn(farewellMessage(closingSummaryMessage(this.record, this.deps.fieldSpecs)));
  }

  private async materializeQuestionPlan(techStack: string): Promise<string[]> {
    const technologies = parseTechStack(techStack);
    const plan: TechnologyQuestionPlan[] = [];
    const degraded: string[] = [];
    const skipped: string[] = [];

    for (const technology of technologies) {
      try {
        const batch = await this.deps.questionSource.getQuestions(technology, this.options.questionsPerTechnology);
        if (batch.status === "degraded") {
          degraded.push(batch.technology);
        }
        if (batch.questions.length === 0) {
          skipped.push(batch.technology);
          continue;
        }
        plan.push({ technology: batch.technology, questions: batch.questions });
      } catch (error) {
        this.log("error", "question_plan.source_failed", { technology }, {
          error: error instanceof Error ? error.message : "Unknown error",
        });
        degraded.push(technology);
        skipped.push(technology);
      }
    }

    this.plan = plan;
    this.record.degradedTechnologies = degraded;
    this.log("info", "question_plan.materialized", {}, {
      technologies: technologies.length,
      planned: plan.length,
      questions: this.totalQuestions(),
      degraded: degraded.length,
    });
    return skipped.length > 0 ? [degradedTechnologiesNotice(skipped)] : [];
  }

  private async acknowledge(fieldKey: FieldKey, value: string): Promise<string> {
    try {
      const text = (await this.deps.acknowledgementSource.getAcknowledgement(fieldKey, value)).trim();
      return text || NEUTRAL_ACKNOWLEDGEMENT;
    } catch (error) {
      this.log("warn", "acknowledgement.failed", { field_key: fieldKey }, {
        error: error instanceof Error ? error.message : "Unknown error",
      });
      return NEUTRAL_ACKNOWLEDGEMENT;
    }
  }

  private async exportRecord(): Promise<void> {
    if (!this.deps.exporter) {
      return;
    }
    try {
      await this.deps.exporter.exportSession(this.record);
      this.log("info", "session.exported", {});
    } catch (error) {
      this.log("error", "session.export.failed", {}, {
        error: error instanceof Error ? error.message : "Unknown error",
      });
    }
  }

  private currentQuestionMessage(techIndex: number, questionIndex: number): string {
    const entry = this.plan[techIndex];
    let ordinal = questionIndex + 1;
    for (let index = 0; index < techIndex; index += 1) {
      ordinal += this.plan[index].questions.length;
    }
    return technicalQuestionMessage(ordinal, this.totalQuestions(), entry.technology, entry.questions[questionIndex].text);
  }

  private totalQuestions(): number {
    return this.plan.reduce((sum, entry) => sum + entry.questions.length, 0);
  }

  private turn(reply: string, notices: string[] = []): TurnResult {
    return {
      reply,
      state: this.state,
      done: this.state.kind === "terminated",
      notices,
    };
  }

  private log(
    level: "debug" | "info" | "warn" | "error",
    message: string,
    context: { field_key?: string; technology?: string },
    fields?: Record<string, unknown>,
  ): void {
    logContext(this.deps.logger, level, message, { session_id: this.sessionId, state: this.state.kind, ...context }, fields);
  }
}

function joinParagraphs(...parts: string[]): string {
  return parts.filter((part) => part.trim().length > 0).join("\n\n");
}
