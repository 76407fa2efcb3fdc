export class RollsafeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ChangelogParseError extends RollsafeError {
  readonly filePath: string;
  readonly line?: number;

  constructor(filePath: string, reason: string, line?: number) {
    super(line !== undefined
      ? `Cannot parse changelog ${filePath} (line ${line}): ${reason}`
      : `Cannot parse changelog ${filePath}: ${reason}`);
    this.filePath = filePath;
    this.line = line;
  }
}

export class ConfigError extends RollsafeError {
  readonly configPath?: string;

  constructor(message: string, configPath?: string) {
    super(configPath ? `${configPath}: ${message}` : message);
    this.configPath = configPath;
  }
}
