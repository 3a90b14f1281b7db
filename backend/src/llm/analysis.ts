import { z } from "zod";
import type { ResponseShape } from "../types";
import { errorMessage } from "../utils/redact";
import { ResponseShapeError } from "./errors";

export const DEFAULT_QUALITY_SCORE = 0;
export const DEFAULT_MAINTAINABILITY_INDEX = 50;
export const DEFAULT_READABILITY_SCORE = 75;
export const DEFAULT_TARGET_COMPLEXITY = "N/A";

/** Absent, null and "" all mean "not supplied"; numeric strings become numbers, anything else is left for z.number() to reject. */
function blankToUndefined(value: unknown): unknown {
  if (value === null || value === "") return undefined;
  if (typeof value === "string" && value.trim() !== "" && Number.isFinite(Number(value))) return Number(value);
  return value;
}

function numeric<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(blankToUndefined, schema);
}

const lineNumber = numeric(z.number().int());

const ComplexityCaseSchema = z.object({
  best: z.string(),
  average: z.string(),
  worst: z.string(),
  desc: z.string()
});

export const CodeAnalysisSchema = z.object({
  detected_language: z.string(),
  quality_score: numeric(z.number().int().default(DEFAULT_QUALITY_SCORE)),
  integrity_check: z.string(),
  plagiarism_check: z.string(),
  error_table: z.array(z.object({ line: lineNumber, error: z.string() })),
  final_code: z.string(),
  code_explanation: z.array(
    z.object({
      line: lineNumber,
      code: z.string(),
      explanation: z.string()
    })
  ),
  complexity: z.object({
    time: ComplexityCaseSchema,
    space: ComplexityCaseSchema
  }),
  maintainability_index: numeric(z.number().default(DEFAULT_MAINTAINABILITY_INDEX)),
  readability_score: numeric(z.number().default(DEFAULT_READABILITY_SCORE)),
  target_complexity: z.preprocess(
    (value) => (value === null || value === "" ? undefined : value),
    z.string().default(DEFAULT_TARGET_COMPLEXITY)
  )
});

export type CodeAnalysis = z.infer<typeof CodeAnalysisSchema>;

const FENCE_RE = /^```[A-Za-z0-9_-]*\s*\n?([\s\S]*?)\n?```$/;

export function stripCodeFences(text: string): string {
  const trimmed = text.trim();
  const match = FENCE_RE.exec(trimmed);
  return match ? (match[1] ?? "").trim() : trimmed;
}

export function tryParseJsonObject(text: string): unknown {
  const trimmed = stripCodeFences(text);
  const attempts = [trimmed];
  const first = trimmed.indexOf("{");
  const last = trimmed.lastIndexOf("}");
  if (first >= 0 && last > first && (first > 0 || last < trimmed.length - 1)) {
    attempts.push(trimmed.slice(first, last + 1));
  }

  let lastError: unknown;
  for (const attempt of attempts) {
    try {
      return JSON.parse(attempt);
    } catch (err) {
      lastError = err;
    }
  }
  throw new ResponseShapeError(`Model output is not valid JSON: ${errorMessage(lastError)}`);
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 5)
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/** Parses model text into a complete analysis record, filling the optional fields with their defaults. */
export function parseCodeAnalysis(text: string): CodeAnalysis {
  const parsed = CodeAnalysisSchema.safeParse(tryParseJsonObject(text));
  if (!parsed.success) {
    throw new ResponseShapeError(`Analysis does not match the expected shape: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

export const codeAnalysisShape: ResponseShape<CodeAnalysis> = {
  kind: "structured",
  parse: parseCodeAnalysis
};

export const textShape: ResponseShape<string> = {
  kind: "text",
  parse(text) {
    const trimmed = text.trim();
    if (!trimmed) throw new ResponseShapeError("Model returned an empty reply");
    return trimmed;
  }
};
