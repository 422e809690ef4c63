/**
 * Error classification for a generation run.
 * Format: E_CATEGORY_DETAIL
 */
export const ErrorCode = {
  // Bad flag combination or flag value
  INVALID_OPTIONS: "E_INVALID_OPTIONS",

  // Code does not fit the requested symbology
  CODE_MISMATCH: "E_CODE_MISMATCH",

  // Not enough unique codes in the requested space
  GENERATION_EXHAUSTED: "E_GENERATION_EXHAUSTED",

  // Input files
  INPUT_UNREADABLE: "E_INPUT_UNREADABLE",
  LOGO_UNREADABLE: "E_LOGO_UNREADABLE",

  // Output
  WRITE_FAILED: "E_WRITE_FAILED",
  RENDER_FAILED: "E_RENDER_FAILED",
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

export class CodegenError extends Error {
  readonly code: ErrorCodeType;

  constructor(code: ErrorCodeType, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CodegenError";
    this.code = code;
  }
}

export const isCodegenError = (error: unknown): error is CodegenError =>
  error instanceof CodegenError;

const messageOf = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Message shown to the user when a run terminates.
 * With `debug`, the stack and every nested cause are appended.
 */
export const describeError = (error: unknown, debug = false): string => {
  const head = isCodegenError(error)
    ? `[${error.code}] ${error.message}`
    : messageOf(error);
  if (!debug) {
    return head;
  }

  const lines = [head];
  if (error instanceof Error && error.stack) {
    lines.push(error.stack);
  }
  let cause = error instanceof Error ? error.cause : undefined;
  while (cause !== undefined) {
    lines.push(`Caused by: ${cause instanceof Error && cause.stack ? cause.stack : messageOf(cause)}`);
    cause = cause instanceof Error ? cause.cause : undefined;
  }
  return lines.join("\n");
};

/** 2 for usage errors, 1 for every other failure. */
export const exitCodeFor = (error: unknown): number =>
  isCodegenError(error) && error.code === ErrorCode.INVALID_OPTIONS ? 2 : 1;
