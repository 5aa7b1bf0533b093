/**
 * Error types for BlobDir loading, filtering and writing
 */

/**
 * Base error class for all blobdir-filter errors
 */
export class BlobDirError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: string
  ) {
    super(message);
    this.name = "BlobDirError";
  }

  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Field values inconsistent with the owning dataset
 */
export class DataModelError extends BlobDirError {
  constructor(
    message: string,
    public readonly fieldId?: string,
    context?: string
  ) {
    super(fieldId ? `${message} (field "${fieldId}")` : message, "DATA_MODEL_ERROR", context);
    this.name = "DataModelError";
  }
}

export class UnknownKeyError extends BlobDirError {
  constructor(
    public readonly key: string,
    public readonly fieldId: string
  ) {
    super(`Unknown key "${key}" for field "${fieldId}"`, "UNKNOWN_KEY");
    this.name = "UnknownKeyError";
  }
}

/**
 * Filter parameter whose value cannot be parsed
 */
export class InvalidParameterValue extends BlobDirError {
  constructor(
    public readonly fieldId: string,
    public readonly param: string,
    public readonly value: string,
    expected: string
  ) {
    super(
      `Invalid value "${value}" for ${fieldId}--${param}, expected ${expected}`,
      "INVALID_PARAMETER_VALUE"
    );
    this.name = "InvalidParameterValue";
  }
}

/**
 * Missing or unreadable dataset directory, metadata or field file
 */
export class DatasetError extends BlobDirError {
  constructor(
    message: string,
    public readonly directory?: string,
    context?: string
  ) {
    super(message, "DATASET_ERROR", context);
    this.name = "DatasetError";
  }

  static fromSystemError(message: string, directory: string, systemError: unknown): DatasetError {
    const detail = systemError instanceof Error ? systemError.message : String(systemError);
    return new DatasetError(`${message}: ${detail}`, directory, `System error: ${detail}`);
  }
}

export class CompanionFileError extends BlobDirError {
  constructor(
    message: string,
    public readonly filePath: string
  ) {
    super(`${message}: ${filePath}`, "COMPANION_FILE_ERROR");
    this.name = "CompanionFileError";
  }
}
