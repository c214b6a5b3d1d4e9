export type ValidationErrorCode =
  | "category-empty"
  | "length-too-short"
  | "nothing-selected"
  | "wordlist-empty"
  | "word-count-exceeds-wordlist";

export class InvalidArgumentError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [message]) {
    super(message);
    this.name = "InvalidArgumentError";
    this.issues = issues;
  }
}

export class ValidationError extends Error {
  readonly code: ValidationErrorCode;

  constructor(code: ValidationErrorCode, message: string) {
    super(message);
    this.name = "ValidationError";
    this.code = code;
  }
}

export class WordlistLoadError extends Error {
  readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "WordlistLoadError";
    this.status = options?.status;
  }
}

export class WordlistLoadCancelledError extends Error {
  constructor(message = "Word list loading was cancelled.") {
    super(message);
    this.name = "WordlistLoadCancelledError";
  }
}

export function errorMessage(error: unknown, fallback: string): string {
  return error instanceof Error ? error.message : fallback;
}
