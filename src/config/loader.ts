import { readFileSync, existsSync } from "node:fs";
import { resolve } from "node:path";
import dotenv from "dotenv";
import YAML from "yaml";
import { ConfigError } from "./errors.js";
import { configSchema, type AppConfig } from "./schema.js";

type PartialConfig = Partial<Record<keyof AppConfig, unknown>>;

function loadYamlConfig(path: string): PartialConfig {
  if (!existsSync(path)) return {};
  const raw = readFileSync(path, "utf8");
  return YAML.parse(raw) ?? {};
}

function loadEnvConfig(): PartialConfig {
  dotenv.config();
  const env = process.env;
  // VA_-prefixed names win over the bare legacy names.
  const pick = (name: string, ...aliases: string[]): string | undefined => {
    for (const key of [`VA_${name}`, name, ...aliases]) {
      const value = env[key];
      if (value !== undefined && value.trim().length > 0) return value.trim();
    }
    return undefined;
  };
  const num = (raw: string | undefined) =>
    raw === undefined ? undefined : Number(raw);
  return {
    provider: pick("PROVIDER"),
    geminiApiKey: pick("GEMINI_API_KEY", "GOOGLE_GENERATIVE_AI_API_KEY"),
    model: pick("MODEL"),
    compareModelA: pick("COMPARE_MODEL_A"),
    compareModelB: pick("COMPARE_MODEL_B"),
    judgeModel: pick("JUDGE_MODEL"),
    judgeFallbackModel: pick("JUDGE_FALLBACK_MODEL"),
    dbPath: pick("DB_PATH"),
    historyPath: pick("HISTORY_PATH"),
    workers: num(pick("WORKERS")),
    providerTimeoutMs: num(pick("PROVIDER_TIMEOUT_MS")),
    providerRetries: num(pick("PROVIDER_RETRIES")),
    retryBaseDelayMs: num(pick("RETRY_BASE_DELAY_MS")),
    retryMaxDelayMs: num(pick("RETRY_MAX_DELAY_MS")),
    staleClaimMs: num(pick("STALE_CLAIM_MS")),
  };
}

function filterUndefined(obj: PartialConfig): PartialConfig {
  return Object.fromEntries(
    Object.entries(obj).filter(([, v]) => v !== undefined)
  );
}

export type ConfigSourceSnapshots = {
  yamlConfig: PartialConfig;
  envConfig: PartialConfig;
};

export function loadConfigSourceSnapshots(
  configPath = "config.yaml"
): ConfigSourceSnapshots {
  return {
    yamlConfig: loadYamlConfig(resolve(configPath)),
    envConfig: filterUndefined(loadEnvConfig()),
  };
}

export function loadConfig(configPath = "config.yaml"): AppConfig {
  const { yamlConfig, envConfig } = loadConfigSourceSnapshots(configPath);

  // Precedence: config.yaml (lowest) < .env / process env (highest)
  return parseConfig({ ...yamlConfig, ...envConfig });
}

export function parseConfig(input: unknown): AppConfig {
  const parsed = configSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
    );
  }
  return parsed.data;
}
