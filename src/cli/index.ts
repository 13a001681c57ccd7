#!/usr/bin/env node
import { Command, InvalidArgumentError } from "commander";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import { ConfigError, loadConfig, parseConfig, type AppConfig } from "../config/index.js";
import { createProviderFactory } from "../analysis/factory.js";
import { ingestHistory, readHistoryFile } from "../ingest/index.js";
import { MalformedHistoryFileError } from "../ingest/errors.js";
import { compareConfigurations } from "../pipeline/compare.js";
import { FatalPreconditionError } from "../pipeline/errors.js";
import { JsonLinesEventEmitter } from "../pipeline/jsonlEmitter.js";
import { runAnalysis } from "../pipeline/run.js";
import { parseSelection } from "../pipeline/selection.js";
import { RecordNotFoundError } from "../storage/errors.js";
import { RecordStore } from "../storage/recordStore.js";
import { RECORD_STATUSES } from "../storage/types.js";
import { logError, logInfo, logWarn } from "../utils/logger.js";
import { createInterruptHandler } from "./interrupt.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const pkg: { version: string } = JSON.parse(
  readFileSync(join(__dirname, "../../package.json"), "utf8")
);

type GlobalOptions = { config: string };

type AnalyzeOptions = {
  ids?: string[];
  limit?: number;
  all?: boolean;
  workers?: number;
  model?: string;
  jsonEvents?: boolean;
};

type CompareOptions = {
  modelA?: string;
  modelB?: string;
  judgeModel?: string;
  judgeFallbackModel?: string;
};

function parseInteger(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) {
    throw new InvalidArgumentError("Expected an integer.");
  }
  return n;
}

const program = new Command();

program
  .name("viewaudit")
  .description("Ingest a video watch history and audit each video with an LLM")
  .version(pkg.version)
  .option("-c, --config <path>", "Path to config.yaml", "config.yaml");

function baseConfig(): AppConfig {
  const { config } = program.opts<GlobalOptions>();
  return loadConfig(config);
}

/** CLI flags take precedence over config.yaml and the environment. */
function withOverrides(config: AppConfig, overrides: Partial<AppConfig>): AppConfig {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, v]) => v !== undefined)
  );
  return parseConfig({ ...config, ...defined });
}

async function withStore<T>(
  config: AppConfig,
  fn: (store: RecordStore) => Promise<T>
): Promise<T> {
  const store = await RecordStore.open(config.dbPath);
  try {
    return await fn(store);
  } finally {
    await store.close();
  }
}

function printJson(value: unknown) {
  process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

program
  .command("ingest")
  .description("Import a watch-history file (Takeout or generic JSON)")
  .argument("[file]", "History file (defaults to historyPath)")
  .action(async (file: string | undefined) => {
    const config = baseConfig();
    const entries = await readHistoryFile(file ?? config.historyPath);
    await withStore(config, (store) => ingestHistory(store, entries));
  });

program
  .command("analyze")
  .description("Analyze pending records")
  .option("--ids <ids...>", "Analyze these record ids")
  .option("--limit <n>", "Analyze up to N most recently watched", parseInteger)
  .option("--all", "Analyze every pending record")
  .option("--workers <n>", "Parallel provider calls (1-20)", parseInteger)
  .option("--model <name>", "Model to analyze with")
  .option("--json-events", "Emit JSONL pipeline events to stdout")
  .action(async (opts: AnalyzeOptions) => {
    if (opts.jsonEvents) process.env.VA_JSON_EVENTS = "1";
    const selection = parseSelection({ ids: opts.ids, limit: opts.limit, all: opts.all });
    const config = withOverrides(baseConfig(), { workers: opts.workers, model: opts.model });
    const provider = createProviderFactory(config)(config.model);
    const emitter = opts.jsonEvents ? new JsonLinesEventEmitter() : undefined;

    const { signal, onInterrupt } = createInterruptHandler();
    process.on("SIGINT", onInterrupt);
    try {
      await withStore(config, (store) =>
        runAnalysis(store, provider, config, { selection, signal, emitter })
      );
    } finally {
      process.off("SIGINT", onInterrupt);
    }
  });

program
  .command("compare")
  .description("Analyze one record with two models and let a judge model pick")
  .argument("<id>", "Record id")
  .option("--model-a <name>", "First model")
  .option("--model-b <name>", "Second model")
  .option("--judge-model <name>", "Judge model")
  .option("--judge-fallback-model <name>", "Judge model used when the first is unavailable")
  .action(async (id: string, opts: CompareOptions) => {
    const config = withOverrides(baseConfig(), {
      compareModelA: opts.modelA,
      compareModelB: opts.modelB,
      judgeModel: opts.judgeModel,
      judgeFallbackModel: opts.judgeFallbackModel,
    });
    const factory = createProviderFactory(config);
    const result = await withStore(config, (store) =>
      compareConfigurations(
        store,
        factory,
        id,
        {
          a: config.compareModelA,
          b: config.compareModelB,
          judge: config.judgeModel,
          judgeFallback: config.judgeFallbackModel,
        },
        config
      )
    );
    printJson(result);
  });

program
  .command("reset")
  .description("Send ANALYZED or ERROR records back to PENDING for re-analysis")
  .argument("[ids...]", "Record ids")
  .option("--errors", "Reset every record in ERROR")
  .action(async (ids: string[], opts: { errors?: boolean }) => {
    if (opts.errors && ids.length > 0) {
      throw new FatalPreconditionError("Pass record ids or --errors, not both");
    }
    if (!opts.errors && ids.length === 0) {
      throw new FatalPreconditionError("Pass at least one record id, or --errors");
    }
    const config = baseConfig();
    const changed = await withStore(config, (store) =>
      store.resetToPending(opts.errors ? { status: "ERROR" } : { ids })
    );
    logInfo(`${changed} record(s) reset to PENDING`);
    if (!opts.errors && changed < ids.length) {
      logWarn(`${ids.length - changed} id(s) were missing or not ANALYZED/ERROR`);
    }
  });

program
  .command("status")
  .description("Show record counts and token/cost totals")
  .action(async () => {
    const config = baseConfig();
    const { counts, totals } = await withStore(config, async (store) => ({
      counts: await store.countByStatus(),
      totals: await store.totals(),
    }));
    const lines = RECORD_STATUSES.map((status) => `${status.padEnd(12)} ${counts[status]}`);
    lines.push(
      `${"tokens".padEnd(12)} ${totals.inputTokens} in / ${totals.outputTokens} out`,
      `${"cost".padEnd(12)} $${totals.estimatedCost.toFixed(6)}`
    );
    process.stdout.write(`${lines.join("\n")}\n`);
  });

program
  .command("show")
  .description("Print one record as JSON")
  .argument("<id>", "Record id")
  .action(async (id: string) => {
    const config = baseConfig();
    const record = await withStore(config, (store) => store.getRecord(id));
    if (!record) throw new RecordNotFoundError(id);
    printJson(record);
  });

program
  .command("transcript")
  .description("Attach a transcript to a record, or mark it unavailable")
  .argument("<id>", "Record id")
  .argument("[file]", "Plain-text transcript file")
  .option("--unavailable", "Mark the transcript as unavailable")
  .action(async (id: string, file: string | undefined, opts: { unavailable?: boolean }) => {
    if (Boolean(file) === Boolean(opts.unavailable)) {
      throw new FatalPreconditionError("Pass either a transcript file or --unavailable");
    }
    const config = baseConfig();
    const text = file ? readFileSync(file, "utf8") : undefined;
    const updated = await withStore(config, (store) =>
      text !== undefined ? store.attachTranscript(id, text) : store.markTranscriptUnavailable(id)
    );
    if (!updated) throw new RecordNotFoundError(id);
    logInfo(text !== undefined ? `Transcript attached to ${id}` : `${id} marked UNAVAILABLE`);
  });

const EXPECTED_ERRORS = [
  ConfigError,
  FatalPreconditionError,
  RecordNotFoundError,
  MalformedHistoryFileError,
];

async function main() {
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const expected = EXPECTED_ERRORS.some((cls) => error instanceof cls);
  logError(
    error instanceof Error
      ? expected
        ? error.message
        : error.stack ?? error.message
      : String(error)
  );
  process.exit(1);
});
