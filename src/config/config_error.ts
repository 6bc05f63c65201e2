export class ConfigError extends Error {
  public readonly code = "invalid_config" as const;

  constructor(
    message: string,
    public readonly issues: Record<string, string[] | undefined> = {}
  ) {
    super(message);
    this.name = "ConfigError";
  }

  toJSON() {
    return {
      error: "invalid_config",
      code: this.code,
      message: this.message,
      details: this.issues,
    };
  }
}
