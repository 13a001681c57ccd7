import test from "node:test";
import assert from "node:assert/strict";
import { deriveIndices } from "../src/analysis/validate.js";
import { ingestHistory } from "../src/ingest/index.js";
import type { RecordStore } from "../src/storage/recordStore.js";
import type { AnalysisOutcome } from "../src/storage/types.js";
import { manualClock, openMemoryStore, sampleVerdict, takeoutEntry } from "./helpers.js";

const LONG_AGO = "2000-01-01T00:00:00.000Z";

function outcome(): AnalysisOutcome {
  const verdict = sampleVerdict();
  return {
    verdict,
    indices: deriveIndices(verdict),
    modelUsed: "gemini-2.5-flash-lite",
    schemaVersion: "v1",
    promptVersion: "persona-v1",
    inputTokens: 1000,
    outputTokens: 500,
    estimatedCost: 0.0003,
  };
}

async function seeded(now?: () => Date): Promise<RecordStore> {
  const store = await openMemoryStore(now);
  await ingestHistory(store, [
    takeoutEntry("vid00000001", { time: "2024-05-01T10:00:00.000Z" }),
    takeoutEntry("vid00000002", { time: "2024-05-03T10:00:00.000Z" }),
    takeoutEntry("vid00000003", { time: "2024-05-02T10:00:00.000Z" }),
  ]);
  return store;
}

test("claim is exclusive between concurrent callers", async () => {
  const store = await seeded();
  try {
    const results = await Promise.all([
      store.claim("vid00000001", { token: "a", staleBefore: LONG_AGO }),
      store.claim("vid00000001", { token: "b", staleBefore: LONG_AGO }),
    ]);
    assert.deepEqual(results.filter(Boolean).length, 1);
    const record = await store.getRecord("vid00000001");
    assert.equal(record?.status, "IN_PROGRESS");
    assert.equal(record?.attempts, 1);
  } finally {
    await store.close();
  }
});

test("resolution writes require the claim token", async () => {
  const store = await seeded();
  try {
    await store.claim("vid00000001", { token: "mine", staleBefore: LONG_AGO });
    assert.equal(await store.markAnalyzed("vid00000001", "other", outcome()), false);
    assert.equal(
      await store.markError("vid00000001", "other", { kind: "Internal", detail: "boom" }),
      false
    );
    assert.equal(await store.releaseClaim("vid00000001", "other"), false);
    assert.equal((await store.getRecord("vid00000001"))?.status, "IN_PROGRESS");

    assert.equal(await store.markAnalyzed("vid00000001", "mine", outcome()), true);
    const record = await store.getRecord("vid00000001");
    assert.ok(record);
    assert.equal(record.status, "ANALYZED");
    assert.equal(record.claimToken, undefined);
    assert.equal(record.claimedAt, undefined);
    assert.deepEqual(record.indices, {
      safetyScore: 95,
      primaryGenre: "Education_STEM",
      isSlop: false,
      isBrainrot: false,
      isShort: false,
    });
    assert.equal(await store.claim("vid00000001", { token: "again", staleBefore: LONG_AGO }), false);
  } finally {
    await store.close();
  }
});

test("a stale claim can be taken over and the old holder loses its writes", async () => {
  const clock = manualClock();
  const store = await seeded(clock.now);
  try {
    assert.equal(
      await store.claim("vid00000001", { token: "crashed", staleBefore: LONG_AGO }),
      true
    );
    const claimedAt = clock.now().toISOString();

    assert.equal(
      await store.claim("vid00000001", { token: "fresh", staleBefore: claimedAt }),
      false
    );

    clock.advance(60_000);
    assert.equal(
      await store.claim("vid00000001", { token: "fresh", staleBefore: clock.now().toISOString() }),
      true
    );
    const record = await store.getRecord("vid00000001");
    assert.equal(record?.attempts, 2);
    assert.equal(record?.claimToken, "fresh");
    assert.equal(record?.claimedAt, "2024-06-01T12:01:00.000Z");

    assert.equal(
      await store.markError("vid00000001", "crashed", { kind: "Internal", detail: "late" }),
      false
    );
  } finally {
    await store.close();
  }
});

test("markError records the failure and keeps tokens reported by the provider", async () => {
  const store = await seeded();
  try {
    await store.claim("vid00000002", { token: "t", staleBefore: LONG_AGO });
    await store.markError("vid00000002", "t", {
      kind: "SchemaViolation",
      detail: "SchemaViolation at risk_assessment.safety_score: too big",
      modelUsed: "gemini-2.5-flash-lite",
      inputTokens: 10,
      outputTokens: 20,
    });
    const record = await store.getRecord("vid00000002");
    assert.ok(record);
    assert.equal(record.status, "ERROR");
    assert.equal(record.errorKind, "SchemaViolation");
    assert.equal(record.errorDetail, "SchemaViolation at risk_assessment.safety_score: too big");
    assert.equal(record.inputTokens, 10);
    assert.equal(record.outputTokens, 20);
    assert.equal(record.analysisPayload, undefined);
  } finally {
    await store.close();
  }
});

test("releaseClaim returns the record to PENDING", async () => {
  const store = await seeded();
  try {
    await store.claim("vid00000003", { token: "t", staleBefore: LONG_AGO });
    assert.equal(await store.releaseClaim("vid00000003", "t"), true);
    const record = await store.getRecord("vid00000003");
    assert.equal(record?.status, "PENDING");
    assert.equal(record?.claimedAt, undefined);
  } finally {
    await store.close();
  }
});

test("resetToPending clears verdict and error state but ignores pending records", async () => {
  const store = await seeded();
  try {
    await store.claim("vid00000001", { token: "a", staleBefore: LONG_AGO });
    await store.markAnalyzed("vid00000001", "a", outcome());
    await store.claim("vid00000002", { token: "b", staleBefore: LONG_AGO });
    await store.markError("vid00000002", "b", { kind: "TransportError", detail: "down" });

    assert.equal(await store.resetToPending({ ids: ["vid00000001", "vid00000003"] }), 1);
    const reset = await store.getRecord("vid00000001");
    assert.ok(reset);
    assert.equal(reset.status, "PENDING");
    assert.equal(reset.analysisPayload, undefined);
    assert.equal(reset.indices, undefined);
    assert.equal(reset.modelUsed, undefined);
    assert.equal(reset.promptVersion, undefined);
    assert.equal(reset.estimatedCost, undefined);

    assert.equal(await store.resetToPending({ status: "ERROR" }), 1);
    const retried = await store.getRecord("vid00000002");
    assert.equal(retried?.status, "PENDING");
    assert.equal(retried?.errorKind, undefined);
    assert.equal(retried?.errorDetail, undefined);
  } finally {
    await store.close();
  }
});

test("selectCandidates orders by most recent watch and honours limit and ids", async () => {
  const clock = manualClock();
  const store = await seeded(clock.now);
  try {
    const staleBefore = LONG_AGO;
    const all = await store.selectCandidates({ kind: "all" }, { staleBefore });
    assert.deepEqual(
      all.map((r) => r.id),
      ["vid00000002", "vid00000003", "vid00000001"]
    );

    const limited = await store.selectCandidates({ kind: "limit", limit: 2 }, { staleBefore });
    assert.deepEqual(
      limited.map((r) => r.id),
      ["vid00000002", "vid00000003"]
    );

    await store.claim("vid00000003", { token: "t", staleBefore });
    const byId = await store.selectCandidates(
      { kind: "ids", ids: ["vid00000001", "vid00000003", "missing0000"] },
      { staleBefore }
    );
    assert.deepEqual(
      byId.map((r) => r.id),
      ["vid00000001"]
    );

    clock.advance(1_000);
    const withStale = await store.selectCandidates(
      { kind: "all" },
      { staleBefore: clock.now().toISOString() }
    );
    assert.deepEqual(
      withStale.map((r) => r.id),
      ["vid00000002", "vid00000003", "vid00000001"]
    );
  } finally {
    await store.close();
  }
});

test("transcripts can be attached or marked unavailable", async () => {
  const store = await seeded();
  try {
    assert.equal(await store.attachTranscript("vid00000001", "hello world"), true);
    assert.equal(await store.markTranscriptUnavailable("vid00000002"), true);
    assert.equal(await store.attachTranscript("missing0000", "text"), false);

    const withText = await store.getRecord("vid00000001");
    assert.equal(withText?.transcriptStatus, "FETCHED");
    assert.equal(withText?.transcriptText, "hello world");
    assert.equal((await store.getRecord("vid00000002"))?.transcriptStatus, "UNAVAILABLE");
  } finally {
    await store.close();
  }
});

test("countByStatus and totals summarize the table", async () => {
  const store = await seeded();
  try {
    await store.claim("vid00000001", { token: "a", staleBefore: LONG_AGO });
    await store.markAnalyzed("vid00000001", "a", outcome());
    await store.claim("vid00000002", { token: "b", staleBefore: LONG_AGO });

    assert.deepEqual(await store.countByStatus(), {
      PENDING: 1,
      IN_PROGRESS: 1,
      ANALYZED: 1,
      ERROR: 0,
      SKIPPED: 0,
    });
    assert.deepEqual(await store.totals(), {
      inputTokens: 1000,
      outputTokens: 500,
      estimatedCost: 0.0003,
    });
  } finally {
    await store.close();
  }
});
