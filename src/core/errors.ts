export type ToolErrorCode = "CONFIGURATION" | "NOT_INITIALIZED" | "UNKNOWN_PARAMETER";

export interface ToolErrorOptions {
  details?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Hard failure raised for tool-authoring or host wiring defects. Data
 * problems (bad values, overwrite conflicts) are reported as booleans instead.
 */
export class ToolError extends Error {
  readonly code: ToolErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: ToolErrorCode, message: string, options?: ToolErrorOptions) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "ToolError";
    this.code = code;
    this.details = options?.details;
  }
}

export function isToolError(value: unknown): value is ToolError {
  return value instanceof ToolError;
}
