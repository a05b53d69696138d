export class ProtocolError extends Error {
  constructor(
    message: string,
    public readonly issues: ReadonlyArray<string>,
  ) {
    super(message);
    this.name = "ProtocolError";
  }

  static because(issues: readonly string[]): ProtocolError {
    const [firstIssue] = issues;
    const message =
      issues.length === 0
        ? "Malformed protocol message"
        : issues.length === 1
          ? (firstIssue ?? "Malformed protocol message")
          : `Malformed protocol message: ${issues.join("; ")}`;
    return new ProtocolError(message, issues);
  }
}
