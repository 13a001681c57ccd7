type Level = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<Level | "silent", number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const ANSI = {
  dim: "2",
  bold: "1",
  red: "31;1",
  green: "32",
  yellow: "33",
  blue: "34",
  magenta: "35",
  cyan: "36",
} as const;

type Tone = keyof typeof ANSI;

function colorEnabled(): boolean {
  const noColor = process.env.NO_COLOR;
  return noColor !== "1" && noColor !== "true" && process.env.FORCE_COLOR !== "0";
}

function paint(tones: Tone[], text: string): string {
  if (!colorEnabled() || tones.length === 0) return text;
  const codes = tones.map((t) => ANSI[t]).join(";");
  return `\x1b[${codes}m${text}\x1b[0m`;
}

/** Stage name -> short tag and tones for `logStep` prefixes. */
const STAGES: Record<string, [tag: string, tones: Tone[]]> = {
  ingest: ["IN", ["cyan"]],
  select: ["SEL", ["cyan"]],
  claim: ["CLM", ["blue"]],
  analyze: ["LLM", ["magenta"]],
  judge: ["JDG", ["magenta"]],
  retry: ["RTRY", ["yellow"]],
  cost: ["COST", ["yellow"]],
  skip: ["SKIP", ["dim"]],
  done: ["DONE", ["bold", "green"]],
};

function isLevelName(value: string): value is keyof typeof LEVEL_RANK {
  return Object.hasOwn(LEVEL_RANK, value);
}

function threshold(): number {
  const raw = process.env.VA_LOG_LEVEL?.toLowerCase();
  return raw && isLevelName(raw) ? LEVEL_RANK[raw] : LEVEL_RANK.info;
}

// stdout belongs to the event stream while JSONL events are on.
function streamFor(level: Level): NodeJS.WriteStream {
  if (level === "warn" || level === "error") return process.stderr;
  return process.env.VA_JSON_EVENTS === "1" ? process.stderr : process.stdout;
}

function write(level: Level, prefix: string, message: string) {
  if (LEVEL_RANK[level] < threshold()) return;
  streamFor(level).write(`${prefix} ${message}\n`);
}

export function logDebug(message: string) {
  write("debug", paint(["dim"], "[debug]"), message);
}

export function logInfo(message: string) {
  write("info", paint(["cyan"], "[info]"), message);
}

export function logWarn(message: string) {
  write("warn", paint(["yellow"], "[warn]"), message);
}

export function logError(message: string) {
  write("error", paint(["red"], "[error]"), message);
}

export function logStep(stage: string, message: string) {
  const key = stage.toLowerCase();
  const known = STAGES[key];
  const prefix = known
    ? paint(known[1], `[${known[0]} ${key}]`)
    : paint(["dim"], `[${key}]`);
  write("info", prefix, message);
}
