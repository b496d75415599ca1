import { GenerationPort } from "../ai/generation.port";
import { callTextPromptSafe } from "../ai/llm.safe";
import { buildAcknowledgementV1Prompt } from "../ai/prompts/screening/acknowledgement.v1.prompt";
import { Logger } from "../config/logger";
import { FieldKey } from "../shared/types/screening.types";
import { fieldLabel } from "./field-specs";
import { NEUTRAL_ACKNOWLEDGEMENT } from "./messages";

export interface AcknowledgementSource {
  getAcknowledgement(fieldKey: FieldKey, acceptedValue: string): Promise<string>;
}

const MAX_ACKNOWLEDGEMENT_LENGTH = 200;

export class LlmAcknowledgementSource implements AcknowledgementSource {
  constructor(
    private readonly port: GenerationPort,
    private readonly logger: Logger,
    private readonly timeoutMs?: number,
  ) {}

  async getAcknowledgement(fieldKey: FieldKey, acceptedValue: string): Promise<string> {
    const safe = await callTextPromptSafe({
      port: this.port,
      prompt: buildAcknowledgementV1Prompt({ fieldLabel: fieldLabel(fieldKey), value: acceptedValue }),
      promptName: "acknowledgement_v1",
      maxTokens: 60,
      temperature: 0.7,
      logger: this.logger,
      timeoutMs: this.timeoutMs,
    });
    if (!safe.ok) {
      this.logger.debug("acknowledgement.fallback", { fieldKey, errorCode: safe.error_code });
      return NEUTRAL_ACKNOWLEDGEMENT;
    }
    return sanitizeAcknowledgement(safe.text) ?? NEUTRAL_ACKNOWLEDGEMENT;
  }
}

export class StaticAcknowledgementSource implements AcknowledgementSource {
  async getAcknowledgement(fieldKey: FieldKey, acceptedValue: string): Promise<string> {
    switch (fieldKey) {
      case "name": {
        const firstName = acceptedValue.trim().split(/\s+/)[0];
        return firstName ? `Nice to meet you, ${firstName}!` : NEUTRAL_ACKNOWLEDGEMENT;
      }
      case "email":
        return "Thanks, I've noted your email.";
      case "phone":
        return "Great, thanks for the number.";
      case "experience":
        return "Thanks for sharing your experience.";
      case "position":
        return "Good to know what you're looking for.";
      case "location":
        return "Thanks for letting me know.";
      case "tech_stack":
        return "That's a solid set of tools.";
    }
  }
}

export function sanitizeAcknowledgement(raw: string): string | null {
  const firstLine = raw
    .split(/\r?\n/)
    .map((line) => line.trim())
    .find((line) => line.length > 0);
  if (!firstLine) {
    return null;
  }
  const unquoted = firstLine.replace(/^["'“]+|["'”]+$/g, "").trim();
  if (!unquoted) {
    return null;
  }
  if (unquoted.length > MAX_ACKNOWLEDGEMENT_LENGTH) {
    return `${unquoted.slice(0, MAX_ACKNOWLEDGEMENT_LENGTH - 3).trimEnd()}...`;
  }
  return unquoted;
}
