import test from "node:test";
import assert from "node:assert/strict";
import {
  canonicalVideoUrl,
  tryExtractChannelId,
  tryExtractVideoIdFromUrl,
} from "../src/ingest/videoId.js";

test("tryExtractVideoIdFromUrl reads watch, short-link, shorts, live and embed URLs", () => {
  const id = "abcDEF12345";
  assert.equal(tryExtractVideoIdFromUrl(`https://www.youtube.com/watch?v=${id}`), id);
  assert.equal(tryExtractVideoIdFromUrl(`https://m.youtube.com/watch?v=${id}&t=42s`), id);
  assert.equal(tryExtractVideoIdFromUrl(`https://music.youtube.com/watch?v=${id}`), id);
  assert.equal(tryExtractVideoIdFromUrl(`https://youtu.be/${id}?si=share`), id);
  assert.equal(tryExtractVideoIdFromUrl(`https://www.youtube.com/shorts/${id}`), id);
  assert.equal(tryExtractVideoIdFromUrl(`https://www.youtube.com/live/${id}`), id);
  assert.equal(tryExtractVideoIdFromUrl(`https://www.youtube.com/embed/${id}`), id);
  assert.equal(tryExtractVideoIdFromUrl(`  https://youtube.com/watch?v=${id}  `), id);
});

test("tryExtractVideoIdFromUrl rejects ids of the wrong shape and foreign hosts", () => {
  assert.equal(tryExtractVideoIdFromUrl("https://www.youtube.com/watch?v=short"), undefined);
  assert.equal(tryExtractVideoIdFromUrl("https://www.youtube.com/watch"), undefined);
  assert.equal(tryExtractVideoIdFromUrl("https://www.youtube.com/watch?v=abc$EF12345"), undefined);
  assert.equal(tryExtractVideoIdFromUrl("https://www.youtube.com/playlist?list=PL123"), undefined);
  assert.equal(tryExtractVideoIdFromUrl("https://example.com/watch?v=abcDEF12345"), undefined);
  assert.equal(tryExtractVideoIdFromUrl("not a url"), undefined);
});

test("canonicalVideoUrl builds the watch URL", () => {
  assert.equal(canonicalVideoUrl("abcDEF12345"), "https://www.youtube.com/watch?v=abcDEF12345");
});

test("tryExtractChannelId only reads /channel/ URLs", () => {
  assert.equal(
    tryExtractChannelId("https://www.youtube.com/channel/UC_test-123"),
    "UC_test-123"
  );
  assert.equal(tryExtractChannelId("https://www.youtube.com/@handle"), undefined);
  assert.equal(tryExtractChannelId(undefined), undefined);
});
