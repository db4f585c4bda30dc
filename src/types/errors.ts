/**
 * Fatal error types. Anything thrown from here aborts the compilation before
 * an output file is written.
 */

export type StructuralErrorCode =
  | "UNTERMINATED_UNION"
  | "NESTED_UNION"
  | "UNION_TOO_SMALL"
  | "UNDEFINED_PREFIX"
  | "NOT_A_PREFIXED_NAME"
  | "INVALID_LITERAL"
  | "UNEXPECTED_TYPE"
  | "UNEXPECTED_MAPPING"
  | "MAPPING_TARGET_MISSING"
  | "RANGE_MISMATCH"
  | "OUTSIDE_NAMESPACE"
  | "INVALID_VERSION"
  | "INVALID_CONFIG"
  | "INVALID_INPUT";

/**
 * Where in the input the problem was found. Every field is optional because
 * some errors (prefix resolution, config) happen outside a triple.
 */
export interface ErrorContext {
  row?: number;
  subject?: string;
  predicate?: string;
  object?: string;
  [key: string]: unknown;
}

export function describeContext(context: ErrorContext): string {
  const parts: string[] = [];
  if (typeof context.row === "number") parts.push(`row ${context.row}`);
  if (context.subject || context.predicate || context.object) {
    parts.push(`triple <${context.subject ?? "?"}> <${context.predicate ?? "?"}> ${context.object ?? "?"}`);
  }
  return parts.join(", ");
}

export class StructuralError extends Error {
  public readonly code: StructuralErrorCode;
  public readonly context: ErrorContext;
  public readonly detail: string;

  constructor(code: StructuralErrorCode, detail: string, context: ErrorContext = {}) {
    const where = describeContext(context);
    super(where ? `${detail} (${where})` : detail);
    this.name = "StructuralError";
    this.code = code;
    this.context = context;
    this.detail = detail;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, StructuralError);
    }
  }

  /** Same error with the row number filled in, for errors raised below the row loop. */
  atRow(row: number): StructuralError {
    if (typeof this.context.row === "number") return this;
    return new StructuralError(this.code, this.detail, { ...this.context, row });
  }

  toJSON(): { code: StructuralErrorCode; message: string; context: ErrorContext } {
    return { code: this.code, message: this.message, context: this.context };
  }
}

export class FetchError extends Error {
  public readonly url: string;
  public readonly status?: number;

  constructor(url: string, message: string, status?: number) {
    super(`Failed to fetch ${url}: ${message}`);
    this.name = "FetchError";
    this.url = url;
    this.status = status;
  }
}

export function isStructuralError(value: unknown): value is StructuralError {
  return value instanceof StructuralError;
}
