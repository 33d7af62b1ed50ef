export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export class FileNotFoundError extends Error {
  constructor(path: string) {
    super(`File not found: ${path}`);
    this.name = 'FileNotFoundError';
  }
}

export class ListingError extends Error {
  constructor(
    message: string,
    public readonly filePath: string
  ) {
    super(`${filePath}: ${message}`);
    this.name = 'ListingError';
  }
}
