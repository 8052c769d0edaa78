import { Data } from "effect";

export type ConfigurationIssue = {
  readonly path: string;
  readonly message: string;
};

export class ConfigurationError extends Data.TaggedError("ConfigurationError")<{
  readonly message: string;
  readonly issues: readonly ConfigurationIssue[];
}> {
  public static fromIssues(issues: readonly ConfigurationIssue[]): ConfigurationError {
    return new ConfigurationError({
      issues,
      message: issues.map((issue) => `${issue.path}: ${issue.message}`).join("; "),
    });
  }
}
