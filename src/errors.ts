export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
  }
}

export class EmailConfigError extends Error {
  constructor(public readonly missing: string[]) {
    super(`SMTP config incomplete: missing ${missing.join(', ')}`);
    this.name = 'EmailConfigError';
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
