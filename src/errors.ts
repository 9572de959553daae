export type HygieneErrorCode =
  | "REPOSITORY_ACCESS_ERROR"
  | "HOSTING_API_ERROR"
  | "NO_STABLE_BRANCHES"
  | "CONFIG_INVALID";

export class HygieneError extends Error {
  constructor(
    public readonly code: HygieneErrorCode,
    message: string,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = "HygieneError";
  }
}

/** Local repository unreadable or a git command failed. */
export class RepositoryAccessError extends HygieneError {
  constructor(
    public readonly operation: string,
    cause?: unknown,
  ) {
    super("REPOSITORY_ACCESS_ERROR", `git ${operation} failed: ${describeCause(cause)}`, cause);
    this.name = "RepositoryAccessError";
  }
}

/** Authentication, network, GraphQL or rate-limit failure. Never retried. */
export class HostingApiError extends HygieneError {
  constructor(message: string, cause?: unknown) {
    super("HOSTING_API_ERROR", cause === undefined ? message : `${message}: ${describeCause(cause)}`, cause);
    this.name = "HostingApiError";
  }
}

export class NoStableBranchesError extends HygieneError {
  constructor() {
    super("NO_STABLE_BRANCHES", "No stable branches found!");
    this.name = "NoStableBranchesError";
  }
}

export class ConfigError extends HygieneError {
  constructor(message: string) {
    super("CONFIG_INVALID", message);
    this.name = "ConfigError";
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
