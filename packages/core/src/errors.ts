/**
 * Raised when rules cannot be read, parsed or validated.
 * A rule set is either fully valid or not built at all.
 */
export class RuleSetError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RuleSetError";
  }
}
