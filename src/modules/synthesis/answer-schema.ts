import { z } from "zod";
import { SynthesisParseError } from "../errors.js";
import type { CitedSentence, StructuredAnswer } from "./types.js";

const lowercased = (value: unknown): unknown => (typeof value === "string" ? value.trim().toLowerCase() : value);

const citationsSchema = z.array(z.string().trim().min(1)).default([]);

const citedSentenceSchema = z.object({
  sentence: z.string().trim().min(1),
  citations: citationsSchema,
  status: z.preprocess(lowercased, z.enum(["supported", "not_found"])).default("supported")
});

export const answerOutputSchema = z.object({
  direct_answer: citedSentenceSchema,
  explanation: z.string().default(""),
  claims: z.array(citedSentenceSchema).default([]),
  requirements: z
    .array(
      z.object({
        text: z.string().trim().min(1),
        citations: citationsSchema
      })
    )
    .default([]),
  conflicts: z
    .array(
      z.object({
        finding_id: z.string().nullish(),
        note: z.string().trim().min(1)
      })
    )
    .default([]),
  confidence: z.object({
    level: z.preprocess(lowercased, z.enum(["high", "medium", "low"])),
    justification: z.string().default("")
  }),
  limitations: z.array(z.string()).default([])
});

export type AnswerOutput = z.infer<typeof answerOutputSchema>;

const CODE_FENCE = /^```(?:json)?\s*([\s\S]*?)\s*```$/i;

export const stripCodeFence = (raw: string): string => {
  const trimmed = raw.trim();
  const fenced = CODE_FENCE.exec(trimmed);
  return fenced ? fenced[1] : trimmed;
};

const toCitedSentence = (value: AnswerOutput["direct_answer"]): CitedSentence => ({
  sentence: value.sentence,
  citations: value.citations,
  status: value.status
});

/** Parses generator output into a {@link StructuredAnswer}; any deviation is a {@link SynthesisParseError}. */
export const parseStructuredAnswer = (raw: string): StructuredAnswer => {
  const body = stripCodeFence(raw);
  if (body.length === 0) {
    throw new SynthesisParseError("Generator returned empty content.", raw);
  }

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    const message = error instanceof Error ? error.message : "invalid json";
    throw new SynthesisParseError(`Generator returned invalid JSON: ${message}`, raw, error);
  }

  const parsed = answerOutputSchema.safeParse(json);
  if (!parsed.success) {
    const details = parsed.error.issues
      .slice(0, 5)
      .map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`)
      .join("; ");
    throw new SynthesisParseError(`Generator JSON failed schema validation: ${details}`, raw, parsed.error);
  }

  const output = parsed.data;
  return {
    directAnswer: toCitedSentence(output.direct_answer),
    explanation: output.explanation,
    claims: output.claims.map(toCitedSentence),
    requirements: output.requirements.map((requirement) => ({
      text: requirement.text,
      citations: requirement.citations
    })),
    conflicts: output.conflicts.map((conflict) => ({
      findingId: conflict.finding_id ?? null,
      note: conflict.note
    })),
    selfReportedConfidence: {
      level: output.confidence.level,
      justification: output.confidence.justification
    },
    limitations: output.limitations
  };
};
