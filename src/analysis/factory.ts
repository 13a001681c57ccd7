import type { AppConfig } from "../config/schema.js";
import { FatalPreconditionError } from "../pipeline/errors.js";
import { GeminiAnalysisProvider } from "./gemini.js";
import { MockAnalysisProvider } from "./mock.js";
import type { AnalysisProvider } from "./provider.js";

export type ProviderFactory = (model: string) => AnalysisProvider;

/**
 * Returns a factory bound to the configured provider. Throws
 * FatalPreconditionError up front when credentials are missing.
 */
export function createProviderFactory(config: AppConfig): ProviderFactory {
  switch (config.provider) {
    case "gemini": {
      const apiKey = config.geminiApiKey;
      if (!apiKey) {
        throw new FatalPreconditionError(
          "GEMINI_API_KEY is required when provider=gemini (set provider: mock for offline runs)"
        );
      }
      return (model) => new GeminiAnalysisProvider(apiKey, model);
    }
    case "mock":
      return (model) => new MockAnalysisProvider(model);
    default:
      throw new FatalPreconditionError(`Unsupported provider: ${String(config.provider)}`);
  }
}
