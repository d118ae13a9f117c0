export type PassVerdict = "complete" | "failure" | "cutoff";

export type StopReason = "threshold" | "exhausted" | "budget";

export type SearchErrorCode = "INVALID_LIMIT" | "INVALID_OPTIONS" | "USAGE";
