export class DocumentExtractionError extends Error {
  constructor(
    message: string,
    readonly filePath: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "DocumentExtractionError";
  }
}

export class ConfigurationMissingError extends Error {
  constructor(
    message: string,
    readonly missingPath: string,
  ) {
    super(message);
    this.name = "ConfigurationMissingError";
  }
}
