export class ConfigInvalidValueError extends Error {
  key: string;

  constructor(key: string, value: unknown, expected: string) {
    super(`Invalid value for ${key}: ${JSON.stringify(value)} (expected ${expected}).`);
    this.name = "ConfigInvalidValueError";
    this.key = key;
  }
}

export class ConfigFileParseError extends Error {
  constructor(filePath: string, message: string) {
    super(`Failed to parse config file ${filePath}: ${message}`);
    this.name = "ConfigFileParseError";
  }
}
