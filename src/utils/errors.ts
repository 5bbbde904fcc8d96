// src/utils/errors.ts

export class ServerConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ServerConfigError';
  }
}

export class ServerConfigNotFoundError extends ServerConfigError {
  constructor(public fileName: string) {
    super(`Error: ${fileName} not found`);
    this.name = 'ServerConfigNotFoundError';
  }
}

export class ServerConfigParseError extends ServerConfigError {
  constructor(
    public fileName: string,
    public detail: string
  ) {
    super(`Error: Invalid JSON in ${fileName}: ${detail}`);
    this.name = 'ServerConfigParseError';
  }
}
