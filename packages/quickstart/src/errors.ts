export interface ConfigurationIssue {
  variable: string;
  problem: string;
}

/** Startup configuration is missing or malformed. Lists every offending variable at once. */
export class ConfigurationError extends Error {
  constructor(public readonly issues: ConfigurationIssue[]) {
    super(`Invalid configuration: ${issues.map((i) => `${i.variable} (${i.problem})`).join(", ")}`);
    this.name = "ConfigurationError";
  }

  get variables(): string[] {
    return this.issues.map((i) => i.variable);
  }
}
