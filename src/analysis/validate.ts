import type { z } from "zod";
import type { DerivedIndices } from "../storage/types.js";
import { SchemaViolation } from "./errors.js";
import type { ProviderOutput } from "./provider.js";
import { judgeSchema, verdictSchema, type JudgeVerdict, type Verdict } from "./schema.js";

const CODE_FENCE = /^```[a-zA-Z]*\s*\n?([\s\S]*?)\n?\s*```$/;

export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const match = trimmed.match(CODE_FENCE);
  return match?.[1]?.trim() ?? trimmed;
}

/** Turn a provider output into a plain JSON value, or fail at the top level. */
export function readJsonOutput(output: ProviderOutput): unknown {
  if (output.kind === "json") return output.value;
  const body = stripCodeFence(output.text);
  if (body.length === 0) throw new SchemaViolation("$", "empty response");
  try {
    return JSON.parse(body);
  } catch {
    throw new SchemaViolation("$", "response is not valid JSON");
  }
}

export function validateWith<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  output: ProviderOutput
): T {
  const value = readJsonOutput(output);
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    throw new SchemaViolation("$", "top-level value must be an object");
  }
  const result = schema.safeParse(value);
  if (!result.success) {
    const [issue] = result.error.issues;
    const field = issue && issue.path.length > 0 ? issue.path.join(".") : "$";
    throw new SchemaViolation(field, issue?.message ?? "invalid value");
  }
  return result.data;
}

export function validateVerdict(output: ProviderOutput): Verdict {
  return validateWith(verdictSchema, output);
}

export function validateJudgeVerdict(output: ProviderOutput): JudgeVerdict {
  return validateWith(judgeSchema, output);
}

export function deriveIndices(verdict: Verdict): DerivedIndices {
  return {
    safetyScore: verdict.risk_assessment.safety_score,
    primaryGenre: verdict.content_taxonomy.primary_genre,
    isSlop: verdict.cognitive_nutrition.is_slop,
    isBrainrot: verdict.cognitive_nutrition.is_brainrot,
    isShort: verdict.video_metadata?.format === "Short_Vertical",
  };
}
