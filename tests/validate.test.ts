import test from "node:test";
import assert from "node:assert/strict";
import { SchemaViolation } from "../src/analysis/errors.js";
import {
  deriveIndices,
  stripCodeFence,
  validateJudgeVerdict,
  validateVerdict,
} from "../src/analysis/validate.js";
import { sampleVerdict } from "./helpers.js";

function text(body: string) {
  return { kind: "text" as const, text: body };
}

function expectViolation(fn: () => unknown, field: string, reason?: RegExp) {
  assert.throws(fn, (error: unknown) => {
    assert.ok(error instanceof SchemaViolation);
    assert.equal(error.field, field);
    if (reason) assert.match(error.reason, reason);
    return true;
  });
}

test("validateVerdict accepts a conforming JSON value", () => {
  const verdict = sampleVerdict();
  assert.deepEqual(validateVerdict({ kind: "json", value: verdict }), verdict);
});

test("validateVerdict strips a Markdown code fence around text output", () => {
  const verdict = sampleVerdict();
  const fenced = "```json\n" + JSON.stringify(verdict, null, 2) + "\n```";
  assert.deepEqual(validateVerdict(text(fenced)), verdict);
});

test("validateVerdict rejects an out-of-range safety score", () => {
  const verdict = sampleVerdict();
  verdict.risk_assessment.safety_score = 150;
  expectViolation(
    () => validateVerdict(text(JSON.stringify(verdict))),
    "risk_assessment.safety_score",
    /less than or equal to 100/
  );
});

test("validateVerdict rejects a value outside an enum domain", () => {
  const value = { ...sampleVerdict(), content_taxonomy: { ...sampleVerdict().content_taxonomy, primary_genre: "Cooking" } };
  expectViolation(
    () => validateVerdict({ kind: "json", value }),
    "content_taxonomy.primary_genre",
    /Invalid enum value/
  );
});

test("validateVerdict reports a missing section by name", () => {
  const { risk_assessment: _dropped, ...rest } = sampleVerdict();
  expectViolation(() => validateVerdict({ kind: "json", value: rest }), "risk_assessment", /Required/);
});

test("validateVerdict rejects non-object and unparseable output at the top level", () => {
  expectViolation(() => validateVerdict(text("[1, 2]")), "$", /top-level value must be an object/);
  expectViolation(() => validateVerdict(text("The video is fine.")), "$", /not valid JSON/);
  expectViolation(() => validateVerdict(text("   ")), "$", /empty response/);
});

test("validateVerdict keeps fields it does not know about", () => {
  const value = { ...sampleVerdict(), model_notes: "extra" };
  const verdict = validateVerdict({ kind: "json", value });
  assert.equal(verdict.model_notes, "extra");
});

test("stripCodeFence leaves unfenced text alone", () => {
  assert.equal(stripCodeFence('  {"a":1} '), '{"a":1}');
  assert.equal(stripCodeFence('```\n{"a":1}\n```'), '{"a":1}');
});

test("deriveIndices reads the indexed fields and flags short-form video", () => {
  const verdict = sampleVerdict();
  verdict.video_metadata = { format: "Short_Vertical", duration_perceived: "Micro (<1 min)" };
  verdict.cognitive_nutrition.is_brainrot = true;
  assert.deepEqual(deriveIndices(verdict), {
    safetyScore: 95,
    primaryGenre: "Education_STEM",
    isSlop: false,
    isBrainrot: true,
    isShort: true,
  });
});

test("validateJudgeVerdict checks the winner and an optional reconciled verdict", () => {
  assert.deepEqual(validateJudgeVerdict(text('{"winner":"tie","reasoning":"Both fine."}')), {
    winner: "tie",
    reasoning: "Both fine.",
  });
  expectViolation(
    () => validateJudgeVerdict(text('{"winner":"C","reasoning":"?"}')),
    "winner"
  );
  expectViolation(
    () =>
      validateJudgeVerdict({
        kind: "json",
        value: { winner: "A", reasoning: "ok", reconciled_verdict: { summary: "partial" } },
      }),
    "reconciled_verdict.visual_grounding",
    /Required/
  );
});
