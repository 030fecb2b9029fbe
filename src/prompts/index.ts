import type { ConflictFinding } from "../modules/conflicts/conflict-detector.js";
import type { ContextEntry } from "../modules/fusion/context-assembler.js";

export const ANSWER_SYSTEM_PROMPT = [
  "You answer questions about Canadian statutes and regulations for legal research.",
  "Use ONLY the numbered context passages supplied by the user; never rely on outside knowledge.",
  "Every factual sentence must cite at least one passage by its reference id, for example \"ref_2\".",
  "If the context does not answer part of the question, say so in a claim with status \"not_found\" and no citations.",
  "Never invent reference ids, section numbers or document titles.",
  "When the user lists conflicts between passages, address each one in the conflicts array by its finding id.",
  "Do not give legal advice; describe what the provisions say.",
  "Reply with a single JSON object and nothing else, using exactly these keys:",
  "{\"direct_answer\": {\"sentence\": string, \"citations\": string[], \"status\": \"supported\" | \"not_found\"},",
  "\"explanation\": string,",
  "\"claims\": [{\"sentence\": string, \"citations\": string[], \"status\": \"supported\" | \"not_found\"}],",
  "\"requirements\": [{\"text\": string, \"citations\": string[]}],",
  "\"conflicts\": [{\"finding_id\": string, \"note\": string}],",
  "\"confidence\": {\"level\": \"high\" | \"medium\" | \"low\", \"justification\": string},",
  "\"limitations\": string[]}."
].join(" ");

export const ANSWER_RETRY_INSTRUCTION = [
  "Your previous reply could not be parsed.",
  "Reply again with only the JSON object described in the instructions, with no prose and no code fence."
].join(" ");

const formatContextEntry = ({ referenceId, hit }: ContextEntry): string => {
  const effective = hit.effectiveDate ? `, in force from ${hit.effectiveDate}` : "";
  const until = hit.effectiveUntil ? ` until ${hit.effectiveUntil}` : "";
  return [`[${referenceId}] ${hit.title}, Section ${hit.sectionId}${effective}${until}`, hit.content].join("\n");
};

const formatConflict = (finding: ConflictFinding): string =>
  `${finding.id} (${finding.kind}, between ${finding.referenceIds.join(" and ")}): ${finding.description}`;

export const buildAnswerUserPrompt = (input: {
  question: string;
  entries: ContextEntry[];
  conflicts: ConflictFinding[];
  retry?: boolean;
}): string => {
  const lines = [
    "Question:",
    input.question,
    "",
    "Context passages:",
    input.entries.map(formatContextEntry).join("\n\n"),
    "",
    "Conflicts between passages:",
    input.conflicts.length > 0 ? input.conflicts.map(formatConflict).join("\n") : "(none)"
  ];

  if (input.retry) {
    lines.push("", ANSWER_RETRY_INSTRUCTION);
  }

  return lines.join("\n");
};
