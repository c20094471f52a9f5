export class InvalidFrameError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid frame input: ${issues.join('; ')}`);
    this.name = 'InvalidFrameError';
    this.issues = issues;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
