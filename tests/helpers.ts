import type { AnalysisProvider, ProviderRequest, ProviderResponse } from "../src/analysis/provider.js";
import { MOCK_VERDICT } from "../src/analysis/mock.js";
import type { Verdict } from "../src/analysis/schema.js";
import type { RawHistoryEntry } from "../src/ingest/history.js";
import { normalizeHistoryEntry } from "../src/ingest/history.js";
import { RecordStore } from "../src/storage/recordStore.js";

export const RUN_SETTINGS = {
  workers: 2,
  providerTimeoutMs: 1_000,
  providerRetries: 2,
  retryBaseDelayMs: 1,
  retryMaxDelayMs: 5,
  staleClaimMs: undefined,
  pricing: {},
};

/** Clock that only moves when told to. */
export function manualClock(start = "2024-06-01T12:00:00.000Z") {
  let current = Date.parse(start);
  return {
    now: () => new Date(current),
    advance(ms: number) {
      current += ms;
    },
  };
}

export async function openMemoryStore(now?: () => Date): Promise<RecordStore> {
  return RecordStore.open(":memory:", { now });
}

export function sampleVerdict(): Verdict {
  return structuredClone(MOCK_VERDICT);
}

export function takeoutEntry(
  id: string,
  options: { title?: string; channel?: string; time?: string } = {}
): RawHistoryEntry {
  return normalizeHistoryEntry({
    header: "YouTube",
    title: `Watched ${options.title ?? `Video ${id}`}`,
    titleUrl: `https://www.youtube.com/watch?v=${id}`,
    subtitles: [
      {
        name: options.channel ?? "Test Channel",
        url: "https://www.youtube.com/channel/UCtestchannel",
      },
    ],
    time: options.time ?? "2024-05-01T10:00:00.000Z",
  });
}

export function textResponse(
  body: unknown,
  model = "gemini-2.5-flash-lite",
  usage = { inputTokens: 1000, outputTokens: 500 }
): ProviderResponse {
  return {
    output: { kind: "text", text: typeof body === "string" ? body : JSON.stringify(body) },
    usage: { ...usage },
    model,
  };
}

type Responder = (
  request: ProviderRequest,
  call: number,
  signal: AbortSignal
) => Promise<ProviderResponse>;

/** In-process provider whose answers are scripted by the test. */
export class FakeProvider implements AnalysisProvider {
  name: "mock" = "mock";
  readonly requests: ProviderRequest[] = [];

  constructor(
    public model: string,
    private readonly respond: Responder
  ) {}

  async generate(request: ProviderRequest, opts: { signal: AbortSignal }) {
    this.requests.push(request);
    return this.respond(request, this.requests.length, opts.signal);
  }
}

/** Resolves only when the signal aborts, then rejects like fetch does. */
export function hangUntilAborted(signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    const fail = () => {
      const error = new Error("This operation was aborted");
      error.name = "AbortError";
      reject(error);
    };
    if (signal.aborted) return fail();
    signal.addEventListener("abort", fail, { once: true });
  });
}
