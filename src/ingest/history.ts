import { readFile } from "node:fs/promises";
import { z } from "zod";
import { MalformedHistoryFileError } from "./errors.js";

// Google Takeout "watch-history.json" item.
const takeoutEntrySchema = z
  .object({
    header: z.string().optional(),
    title: z.string().optional(),
    titleUrl: z.string().optional(),
    subtitles: z
      .array(z.object({ name: z.string().optional(), url: z.string().optional() }).passthrough())
      .optional(),
    time: z.string().optional(),
  })
  .passthrough();

const genericEntrySchema = z
  .object({
    title: z.string().optional(),
    url: z.string().optional(),
    channel: z.string().optional(),
    channelUrl: z.string().optional(),
    timestamp: z.string().optional(),
  })
  .passthrough();

export type RawHistoryEntry = {
  source: "takeout" | "generic" | "unknown";
  /** Takeout product header ("YouTube", "YouTube Music", ...). */
  header?: string;
  title?: string;
  url?: string;
  channelName?: string;
  channelUrl?: string;
  time?: string;
  /** Stable serialization of the original item. */
  fingerprint: string;
};

const WATCHED_PREFIX = /^Watched\s+/;

export function normalizeHistoryEntry(item: unknown): RawHistoryEntry {
  const fingerprint = JSON.stringify(item) ?? "null";

  const takeout = takeoutEntrySchema.safeParse(item);
  if (takeout.success && (takeout.data.titleUrl !== undefined || takeout.data.header !== undefined)) {
    const channel = takeout.data.subtitles?.[0];
    return {
      source: "takeout",
      header: takeout.data.header,
      title: takeout.data.title?.replace(WATCHED_PREFIX, ""),
      url: takeout.data.titleUrl,
      channelName: channel?.name,
      channelUrl: channel?.url,
      time: takeout.data.time,
      fingerprint,
    };
  }

  const generic = genericEntrySchema.safeParse(item);
  if (generic.success) {
    return {
      source: "generic",
      title: generic.data.title,
      url: generic.data.url,
      channelName: generic.data.channel,
      channelUrl: generic.data.channelUrl,
      time: generic.data.timestamp,
      fingerprint,
    };
  }

  return { source: "unknown", fingerprint };
}

export function normalizeHistory(data: unknown): RawHistoryEntry[] {
  if (!Array.isArray(data)) {
    throw new MalformedHistoryFileError("expected a JSON array of history entries");
  }
  return data.map(normalizeHistoryEntry);
}

export async function readHistoryFile(path: string): Promise<RawHistoryEntry[]> {
  const raw = await readFile(path, "utf8");
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new MalformedHistoryFileError(`${path} is not valid JSON (${message})`);
  }
  return normalizeHistory(data);
}
