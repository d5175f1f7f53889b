export interface FieldError {
  path: string;
  message: string;
}

export type ErrorCode =
  | "INVALID_ARGUMENT"
  | "CORPUS_UNREADABLE"
  | "INEXACT_SCORE"
  | "INDEX_SEALED"
  | "INTERNAL";

export interface SearchErrorParams {
  code: ErrorCode;
  detail?: string;
  errors?: FieldError[];
  cause?: unknown;
}

export class SearchError extends Error {
  readonly code: ErrorCode;
  readonly title: string;
  readonly detail?: string;
  readonly errors?: FieldError[];

  constructor(params: SearchErrorParams) {
    const title = codeToTitle(params.code);
    super(params.detail ? `${title}: ${params.detail}` : title, { cause: params.cause });
    this.name = "SearchError";
    this.code = params.code;
    this.title = title;
    this.detail = params.detail;
    this.errors = params.errors;
  }
}

export function isSearchError(e: unknown): e is SearchError {
  return e instanceof SearchError;
}

function codeToTitle(code: ErrorCode): string {
  switch (code) {
    case "INVALID_ARGUMENT":
      return "Invalid argument";
    case "CORPUS_UNREADABLE":
      return "Corpus unreadable";
    case "INEXACT_SCORE":
      return "Inexact score";
    case "INDEX_SEALED":
      return "Index sealed";
    default:
      return "Internal error";
  }
}
