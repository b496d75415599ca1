import { FieldSpec, SessionRecord } from "../shared/types/screening.types";

export const NEUTRAL_ACKNOWLEDGEMENT = "Got it, thanks!";

export function welcomeMessage(firstPrompt: string, exitKeyword: string): string {
  return [
    "Hello! I'm the screening assistant for our recruitment team.",
    "",
    "This first conversation takes about 10 to 15 minutes. We'll cover:",
    "- your background and contact details",
    "- your technical skills",
    "- a few technical questions about the tools you use",
    "",
    `Everything you share is used for recruitment only. You can type '${exitKeyword}' at any time to stop.`,
    "",
    firstPrompt,
  ].join("\n");
}

export function retryPromptMessage(hint: string, prompt: string): string {
  return `${hint}\n\n${prompt}`;
}

export function questionsIntroMessage(total: number, technologies: ReadonlyArray<string>): string {
  return [
    `Based on your tech stack (${technologies.join(", ")}), I have ${total} technical ${total === 1 ? "question" : "questions"} for you.`,
    "Take your time with each answer.",
  ].join("\n");
}

export function technicalQuestionMessage(index: number, total: number, technology: string, text: string): string {
  return `Question ${index} of ${total} (${technology}): ${text}`;
}

export function noQuestionsMessage(): string {
  return "I couldn't prepare technical questions for your stack right now. Our team will follow up on the technical part separately.";
}

export function degradedTechnologiesNotice(technologies: ReadonlyArray<string>): string {
  return `Questions for ${technologies.join(", ")} are unavailable at the moment, so I'll skip ${technologies.length === 1 ? "it" : "them"}.`;
}

export function closingSummaryMessage(record: SessionRecord, fieldSpecs: ReadonlyArray<FieldSpec>): string {
  const name = record.fields.name?.trim();
  const lines = [name ? `Thank you, ${name}!` : "Thank you for your time!", ""];

  const collected = fieldSpecs.filter((spec) => typeof record.fields[spec.key] === "string");
  if (collected.length === 0) {
    lines.push("No details were collected in this session.");
  } else {
    lines.push("Here's what we collected:");
    for (const spec of collected) {
      lines.push(`- ${spec.label}: ${record.fields[spec.key] ?? ""}`);
    }
  }
  lines.push(`- Technical questions answered: ${record.questions.length}`);
  return lines.join("\n");
}

export function completionMessage(summary: string, exitKeyword: string): string {
  return [
    summary,
    "",
    "Next steps:",
    "- Our recruitment team will review your profile and answers.",
    "- You'll hear back from us within 3 to 5 business days.",
    "",
    `Do you have any questions for us? Ask away, or type '${exitKeyword}' to finish.`,
  ].join("\n");
}

export function candidateNoteReceivedMessage(exitKeyword: string): string {
  return `Thanks, I've noted that for the team and they'll get back to you by email. Anything else? Otherwise type '${exitKeyword}' to finish.`;
}

export function farewellMessage(summary: string): string {
  return [summary, "", "Thank you for chatting with us. Best of luck, and have a great day!"].join("\n");
}

export function sessionEndedMessage(): string {
  return "This screening session has ended. Please start a new session if you'd like to continue.";
}
