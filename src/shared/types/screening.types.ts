export type ValidatorKind = "name" | "email" | "phone" | "experience" | "free_text";

export type FieldKey =
  | "name"
  | "email"
  | "phone"
  | "experience"
  | "position"
  | "location"
  | "tech_stack";

export interface FieldSpec {
  readonly key: FieldKey;
  readonly label: string;
  readonly prompt: string;
  readonly validatorKind: ValidatorKind;
  readonly maxAttempts: number;
}

export type AcceptedReason = "valid" | "max_attempts_exhausted";

export interface Attempt {
  readonly fieldKey: FieldKey;
  readonly rawValue: string;
  readonly attemptNumber: number;
  readonly accepted: boolean;
  readonly acceptedReason?: AcceptedReason;
  readonly hint?: string;
}

export type QuestionOrigin = "retrieved" | "generated";

export interface Question {
  readonly text: string;
  readonly origin: QuestionOrigin;
}

export interface AnsweredQuestion {
  readonly technology: string;
  readonly question: Question;
  readonly answer: string;
}

export type SessionStatus = "in_progress" | "completed" | "exited";

export interface SessionRecord {
  readonly sessionId: string;
  readonly startedAt: string;
  endedAt?: string;
  status: SessionStatus;
  fields: Partial<Record<FieldKey, string>>;
  attempts: Attempt[];
  questions: AnsweredQuestion[];
  degradedTechnologies: string[];
  candidateNotes: string[];
}

export type TerminationReason = "completed" | "exit";

export type FlowState =
  | { readonly kind: "collecting"; readonly fieldIndex: number; readonly attemptsUsed: number }
  | { readonly kind: "collecting_question"; readonly techIndex: number; readonly questionIndex: number }
  | { readonly kind: "summarizing" }
  | { readonly kind: "terminated"; readonly reason: TerminationReason };

export interface TechnologyQuestionPlan {
  readonly technology: string;
  readonly questions: ReadonlyArray<Question>;
}

export interface TurnResult {
  reply: string;
  state: FlowState;
  done: boolean;
  notices: string[];
}
