import type { SearchErrorCode } from "../types/types";

export class SearchError extends Error {
  constructor(
    public readonly code: SearchErrorCode,
    message: string
  ) {
    super(message);
    this.name = "SearchError";
  }
}

// Bad bounds or options handed to a driver.
export class SearchConfigError extends SearchError {
  constructor(code: "INVALID_LIMIT" | "INVALID_OPTIONS", message: string) {
    super(code, message);
    this.name = "SearchConfigError";
  }
}

export class CliUsageError extends SearchError {
  constructor(message: string) {
    super("USAGE", message);
    this.name = "CliUsageError";
  }
}

export const isSearchError = (err: unknown): err is SearchError =>
  err instanceof SearchError;
