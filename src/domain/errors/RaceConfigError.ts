export class RaceConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: ReadonlyArray<string>,
  ) {
    super(message);
    this.name = "RaceConfigError";
  }

  static because(issues: readonly string[]): RaceConfigError {
    const [firstIssue] = issues;
    const message =
      issues.length === 0
        ? "Invalid race configuration"
        : issues.length === 1
          ? (firstIssue ?? "Invalid race configuration")
          : `Invalid race configuration: ${issues.join("; ")}`;
    return new RaceConfigError(message, issues);
  }
}
