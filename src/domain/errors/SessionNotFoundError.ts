export class SessionNotFoundError extends Error {
  constructor(
    public readonly host: string,
    reason?: string,
  ) {
    super(
      reason
        ? `Could not find a session hosted by ${host}: ${reason}`
        : `Could not find a session hosted by ${host}`,
    );
    this.name = "SessionNotFoundError";
  }
}
