export class SessionNotJoinedError extends Error {
  constructor() {
    super("No session joined");
    this.name = "SessionNotJoinedError";
  }
}
