export class CursorOutOfBoundsError extends Error {
  constructor(
    public readonly offset: number,
    public readonly length: number,
  ) {
    super(`Cursor ${offset} is outside of [0, ${length}]`);
    this.name = "CursorOutOfBoundsError";
  }
}
