export class InvalidRoundError extends Error {
  constructor(public readonly round: number) {
    super(`Invalid round: ${round} (expected a non-negative safe integer)`);
    this.name = "InvalidRoundError";
  }
}
