/**
 * Error codes for jsonl-translate errors.
 * Using unique string codes for programmatic identification.
 */
export const TranslateErrorCode = {
  PORT_FAILURE: "TRANSLATE_001",
  TRANSLATION_FAILURE: "TRANSLATE_002",
  BATCH_FAILURE: "TRANSLATE_003",
  CANCELLED: "TRANSLATE_004",
  TRANSLATION_FAILED: "TRANSLATE_005",
  CONFIGURATION: "TRANSLATE_006",
  INPUT_FILE: "TRANSLATE_007",
} as const;

export type TranslateErrorCodeType =
  (typeof TranslateErrorCode)[keyof typeof TranslateErrorCode];

/**
 * Base error class for jsonl-translate.
 */
export class TranslateError extends Error {
  readonly code: TranslateErrorCodeType;

  constructor(
    code: TranslateErrorCodeType,
    message: string,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.code = code;
    this.name = "TranslateError";
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Error thrown when the translator call for a single leaf fails.
 */
export class PortFailure extends TranslateError {
  constructor(
    public readonly position: string,
    cause: unknown,
  ) {
    super(
      TranslateErrorCode.PORT_FAILURE,
      `Failed to translate ${position}: ${describeError(cause)}`,
      { position },
      { cause },
    );
    this.name = "PortFailure";
  }
}

/**
 * Error thrown when any leaf of a record fails.
 */
export class TranslationFailure extends TranslateError {
  constructor(
    public readonly recordIndex: number,
    cause: unknown,
  ) {
    super(
      TranslateErrorCode.TRANSLATION_FAILURE,
      `Record #${recordIndex + 1} could not be translated: ${describeError(cause)}`,
      { recordIndex },
      { cause },
    );
    this.name = "TranslationFailure";
  }
}

/**
 * Error thrown when a batch is aborted by a failing record.
 */
export class BatchFailure extends TranslateError {
  constructor(
    public readonly recordCount: number,
    cause: unknown,
  ) {
    super(
      TranslateErrorCode.BATCH_FAILURE,
      `Batch of ${recordCount} record(s) aborted: ${describeError(cause)}`,
      { recordCount },
      { cause },
    );
    this.name = "BatchFailure";
  }
}

/**
 * Error thrown for work abandoned after the run was aborted.
 */
export class TranslationCancelledError extends TranslateError {
  constructor(position?: string) {
    super(
      TranslateErrorCode.CANCELLED,
      position ? `Translation of ${position} cancelled` : "Translation cancelled",
      { position },
    );
    this.name = "TranslationCancelledError";
  }
}

/**
 * Error thrown when the model answers without usable text.
 */
export class TranslationFailedError extends TranslateError {
  constructor(reason: string, sourceText?: string) {
    super(
      TranslateErrorCode.TRANSLATION_FAILED,
      `Translation failed: ${reason}`,
      { reason, sourceText },
    );
    this.name = "TranslationFailedError";
  }
}

export class ConfigurationError extends TranslateError {
  constructor(reason: string) {
    super(TranslateErrorCode.CONFIGURATION, reason, { reason });
    this.name = "ConfigurationError";
  }
}

/**
 * Error thrown when an input file is missing or holds invalid JSON Lines.
 */
export class InputFileError extends TranslateError {
  constructor(
    public readonly filePath: string,
    reason: string,
    public readonly line?: number,
  ) {
    super(
      TranslateErrorCode.INPUT_FILE,
      line === undefined
        ? `${reason}: ${filePath}`
        : `${reason} at ${filePath}:${line}`,
      { filePath, line },
    );
    this.name = "InputFileError";
  }
}
