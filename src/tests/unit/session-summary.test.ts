import assert from "node:assert/strict";
import test from "node:test";
import { maskEmail, maskPhone } from "../../export/anonymize";
import { buildFieldSpecs } from "../../screening/field-specs";
import { closingSummaryMessage, technicalQuestionMessage } from "../../screening/messages";
import { SessionRecord } from "../../shared/types/screening.types";
import { getShortEmpathyLine } from "../../shared/utils/empathy.util";

function emptyRecord(): SessionRecord {
  return {
    sessionId: "s-1",
    startedAt: "2024-05-01T10:00:00.000Z",
    status: "in_progress",
    fields: {},
    attempts: [],
    questions: [],
    degradedTechnologies: [],
    candidateNotes: [],
  };
}

test("summary lists collected fields in order and counts answers", () => {
  const record = emptyRecord();
  record.fields = { email: "ada@example.com", name: "Ada Lovelace", experience: "7" };
  record.questions.push({
    technology: "Python",
    question: { text: "What is the GIL?", origin: "retrieved" },
    answer: "A lock.",
  });

  assert.equal(
    closingSummaryMessage(record, buildFieldSpecs()),
    [
      "Thank you, Ada Lovelace!",
      "",
      "Here's what we collected:",
      "- Name: Ada Lovelace",
      "- Email: ada@example.com",
      "- Years of experience: 7",
      "- Technical questions answered: 1",
    ].join("\n"),
  );
});

test("summary without any fields still reports the answer count", () => {
  assert.equal(
    closingSummaryMessage(emptyRecord(), buildFieldSpecs()),
    ["Thank you for your time!", "", "No details were collected in this session.", "- Technical questions answered: 0"].join("\n"),
  );
});

test("technical questions carry their position and technology", () => {
  assert.equal(technicalQuestionMessage(2, 6, "Docker", "What is a layer?"), "Question 2 of 6 (Docker): What is a layer?");
});

test("empathy lines rotate deterministically", () => {
  assert.equal(getShortEmpathyLine(0), "Thanks for your answer.");
  assert.equal(getShortEmpathyLine(1), "Understood.");
  assert.equal(getShortEmpathyLine(5), "Thanks for your answer.");
});

test("contact details are masked for anonymized exports", () => {
  assert.equal(maskEmail("ada@example.com"), "ad***@example.com");
  assert.equal(maskEmail("a@example.com"), "a***@example.com");
  assert.equal(maskEmail("not-an-email"), "***");
  assert.equal(maskPhone("+1 (555) 123-4567"), "***-***-4567");
  assert.equal(maskPhone("12"), "***-***");
});
