import type { RecordMetadata } from "../storage/types.js";

function filled(value: string | undefined): boolean {
  return value !== undefined && value.trim().length > 0;
}

function completeness(m: RecordMetadata): number {
  return [m.title, m.channelName, m.channelUrl].filter(filled).length;
}

function compareStrings(a: string | undefined, b: string | undefined): number {
  const x = a ?? "";
  const y = b ?? "";
  return x < y ? -1 : x > y ? 1 : 0;
}

/**
 * Total order over metadata candidates: fuller first, then the most recent
 * watch, then the field values themselves as tie-breakers.
 */
export function compareMetadata(a: RecordMetadata, b: RecordMetadata): number {
  return (
    completeness(a) - completeness(b) ||
    compareStrings(a.seenAt, b.seenAt) ||
    compareStrings(a.title, b.title) ||
    compareStrings(a.channelName, b.channelName) ||
    compareStrings(a.channelUrl, b.channelUrl) ||
    compareStrings(a.channelId, b.channelId)
  );
}

/**
 * Keeps the greater candidate under `compareMetadata`. Being a max, it is
 * idempotent and gives the same result for any order of the same inputs.
 */
export function mergeMetadata(stored: RecordMetadata, incoming: RecordMetadata): RecordMetadata {
  return compareMetadata(incoming, stored) > 0 ? incoming : stored;
}

export function sameMetadata(a: RecordMetadata, b: RecordMetadata): boolean {
  return compareMetadata(a, b) === 0;
}
