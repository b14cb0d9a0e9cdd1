export type InputIssue = { index: number; path: string; message: string };

/** A profile is missing identity fields; the batch is refused before any scoring. */
export class MalformedInputError extends Error {
  readonly issues: InputIssue[];

  constructor(issues: InputIssue[]) {
    const first = issues[0];
    super(
      first
        ? `Malformed candidate input (${issues.length} issue(s)); first at #${first.index} ${first.path}: ${first.message}`
        : "Malformed candidate input"
    );
    this.name = "MalformedInputError";
    this.issues = issues;
  }
}

/** The embedding collaborator failed; never cached, shared by every waiter of the flight. */
export class CacheComputeError extends Error {
  readonly key: string;

  constructor(key: string, cause: unknown) {
    super(`Encoder failed for key "${key.slice(0, 60)}": ${errorMessage(cause)}`);
    this.name = "CacheComputeError";
    this.key = key;
  }
}

/** Fatal at startup: bad env values, bad scoring tables, non-positive rate-limit budget. */
export class ConfigError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`);
    this.name = "ConfigError";
    this.problems = problems;
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
