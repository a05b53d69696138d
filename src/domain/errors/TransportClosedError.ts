export class TransportClosedError extends Error {
  constructor(public readonly operation: string) {
    super(`Network channel closed during ${operation}`);
    this.name = "TransportClosedError";
  }
}
