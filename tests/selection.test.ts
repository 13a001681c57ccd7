import test from "node:test";
import assert from "node:assert/strict";
import { FatalPreconditionError } from "../src/pipeline/errors.js";
import { describeSelection, parseSelection } from "../src/pipeline/selection.js";

test("parseSelection accepts exactly one mode", () => {
  assert.deepEqual(parseSelection({ ids: [" vid00000001", "vid00000001", "vid00000002"] }), {
    kind: "ids",
    ids: ["vid00000001", "vid00000002"],
  });
  assert.deepEqual(parseSelection({ limit: 5 }), { kind: "limit", limit: 5 });
  assert.deepEqual(parseSelection({ all: true }), { kind: "all" });
});

test("parseSelection rejects zero or several modes", () => {
  const message = "Specify exactly one selection mode: --ids <id...>, --limit <n> or --all";
  assert.throws(() => parseSelection({}), { name: "FatalPreconditionError", message });
  assert.throws(() => parseSelection({ all: false }), { message });
  assert.throws(() => parseSelection({ limit: 2, all: true }), { message });
  assert.throws(() => parseSelection({ ids: ["a"], limit: 2 }), { message });
});

test("parseSelection validates limit and ids", () => {
  assert.throws(() => parseSelection({ limit: 0 }), FatalPreconditionError);
  assert.throws(() => parseSelection({ limit: 2.5 }), FatalPreconditionError);
  assert.throws(() => parseSelection({ ids: ["  "] }), {
    message: "--ids requires at least one id",
  });
});

test("describeSelection names the mode", () => {
  assert.equal(describeSelection({ kind: "ids", ids: ["a", "b"] }), "2 requested id(s)");
  assert.equal(describeSelection({ kind: "limit", limit: 3 }), "up to 3 most recently watched");
  assert.equal(describeSelection({ kind: "all" }), "all pending");
});
