/** The repaired plan drifted from the original: step count, action set or intent changed. */
export class SemanticViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SemanticViolation";
  }
}

/** The repair service answered with something that is not a JSON object. */
export class RepairOutputError extends Error {
  constructor(
    message: string,
    readonly text: string
  ) {
    super(message);
    this.name = "RepairOutputError";
  }
}
