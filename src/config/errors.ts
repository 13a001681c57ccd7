/** config.yaml, the environment or CLI flags produced an invalid configuration. */
export class ConfigError extends Error {
  name = "ConfigError";
  constructor(public issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
  }
}
