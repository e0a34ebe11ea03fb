export type AnalysisErrorCode =
  | "MALFORMED_INPUT"
  | "INSUFFICIENT_TEXT"
  | "CONFIGURATION"
  | "FETCH";

export class AnalysisError extends Error {
  readonly code: AnalysisErrorCode;

  constructor(code: AnalysisErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Required input structure (tag tree, HTML) is missing or empty. */
export class MalformedInputError extends AnalysisError {
  constructor(message: string) {
    super("MALFORMED_INPUT", message);
  }
}

/** No sentences or no words to compute text statistics from. */
export class InsufficientTextError extends AnalysisError {
  constructor(message = "No sentences or words in the extracted text") {
    super("INSUFFICIENT_TEXT", message);
  }
}

/** Raised while building the scoring pipeline, before any analysis runs. */
export class ConfigurationError extends AnalysisError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("CONFIGURATION", issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.issues = issues;
  }
}

export class FetchError extends AnalysisError {
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number) {
    super("FETCH", message);
    this.statusCode = statusCode;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message || error.name;
  return String(error);
}
