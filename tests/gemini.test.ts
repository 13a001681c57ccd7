import test from "node:test";
import assert from "node:assert/strict";
import { APICallError } from "ai";
import { createProviderFactory } from "../src/analysis/factory.js";
import { SchemaViolation, TransportError } from "../src/analysis/errors.js";
import {
  classifyGeminiError,
  GeminiAnalysisProvider,
  responseSchemaFor,
  unparsedResponse,
} from "../src/analysis/gemini.js";
import { judgeSchema, verdictSchema } from "../src/analysis/schema.js";
import { validateVerdict } from "../src/analysis/validate.js";
import { MockAnalysisProvider } from "../src/analysis/mock.js";
import { configSchema } from "../src/config/schema.js";
import { FatalPreconditionError } from "../src/pipeline/errors.js";

function apiError(statusCode: number, message: string) {
  return new APICallError({
    message,
    url: "https://generativelanguage.googleapis.com/v1beta/models/test:generateContent",
    requestBodyValues: {},
    statusCode,
  });
}

test("classifyGeminiError maps HTTP status codes onto transport reasons", () => {
  const limited = classifyGeminiError(apiError(429, "Too many requests"));
  assert.equal(limited.info.reason, "rate_limited");
  assert.equal(limited.info.retryable, true);
  assert.equal(limited.info.statusCode, 429);
  assert.equal(limited.message, "Gemini API error 429: Too many requests");

  const auth = classifyGeminiError(apiError(403, "API key not valid"));
  assert.equal(auth.info.reason, "auth");
  assert.equal(auth.info.retryable, false);

  const server = classifyGeminiError(apiError(503, "Unavailable"));
  assert.equal(server.info.reason, "server");
  assert.equal(server.info.retryable, true);

  const bad = classifyGeminiError(apiError(400, "Bad request"));
  assert.equal(bad.info.reason, "bad_request");
  assert.equal(bad.info.retryable, false);
});

test("classifyGeminiError treats socket failures as retryable network errors", () => {
  const reset = Object.assign(new Error("read ECONNRESET"), { code: "ECONNRESET" });
  assert.equal(classifyGeminiError(reset).info.reason, "network");
  assert.equal(classifyGeminiError(reset).info.retryable, true);
  assert.equal(classifyGeminiError(new TypeError("fetch failed")).info.reason, "network");
});

test("classifyGeminiError does not retry aborts or unknown failures", () => {
  const abort = new Error("This operation was aborted");
  abort.name = "AbortError";
  assert.equal(classifyGeminiError(abort).info.retryable, false);
  assert.equal(classifyGeminiError(new Error("weird")).info.reason, "unknown");
});

test("classifyGeminiError redacts the API key", () => {
  const error = classifyGeminiError(apiError(401, "key test-secret is invalid"), "test-secret");
  assert.equal(error.message, "Gemini API error 401: key [redacted] is invalid");
});

test("createProviderFactory requires a key for gemini and none for mock", () => {
  assert.throws(
    () => createProviderFactory(configSchema.parse({ provider: "gemini" })),
    FatalPreconditionError
  );

  const gemini = createProviderFactory(
    configSchema.parse({ provider: "gemini", geminiApiKey: "test-secret" })
  )("gemini-2.5-pro");
  assert.ok(gemini instanceof GeminiAnalysisProvider);
  assert.equal(gemini.model, "gemini-2.5-pro");

  const mock = createProviderFactory(configSchema.parse({ provider: "mock" }))("gemini-2.5-flash-lite");
  assert.ok(mock instanceof MockAnalysisProvider);
  assert.equal(mock.name, "mock");
});

test("the mock provider answers analysis and judge requests offline", async () => {
  const provider = new MockAnalysisProvider("gemini-2.5-flash-lite");
  const signal = new AbortController().signal;
  const analysis = await provider.generate({ purpose: "analysis", system: "", prompt: "" }, { signal });
  assert.deepEqual(analysis.usage, { inputTokens: 100, outputTokens: 50 });
  assert.equal(analysis.model, "gemini-2.5-flash-lite");

  const judge = await provider.generate({ purpose: "judge", system: "", prompt: "" }, { signal });
  assert.deepEqual(judge.output, {
    kind: "text",
    text: JSON.stringify({ winner: "A", reasoning: "Mock judge: both responses are identical." }),
  });
});

test("each request kind asks Gemini for its own response schema", () => {
  assert.equal(responseSchemaFor("analysis"), verdictSchema);
  assert.equal(responseSchemaFor("judge"), judgeSchema);
});

test("a reply that misses the response schema reaches the validator as text", () => {
  const response = unparsedResponse(
    '{"risk_assessment": {"safety_score": 150}}',
    { inputTokens: 12, outputTokens: 7, totalTokens: 19 },
    "gemini-2.5-flash-lite"
  );
  assert.deepEqual(response, {
    output: { kind: "text", text: '{"risk_assessment": {"safety_score": 150}}' },
    usage: { inputTokens: 12, outputTokens: 7 },
    model: "gemini-2.5-flash-lite",
  });
  assert.throws(() => validateVerdict(response.output), SchemaViolation);
});

test("an empty unparsed reply is an empty_response transport error", () => {
  assert.throws(
    () => unparsedResponse("  ", undefined, "gemini-2.5-flash-lite"),
    (error: unknown) =>
      error instanceof TransportError &&
      error.info.reason === "empty_response" &&
      error.info.retryable === false
  );
});
