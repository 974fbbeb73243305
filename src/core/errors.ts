/**
 * Raised when a component is configured or fed in a way its contract forbids
 * (duplicate document id, shingle width of 0, tie breaker outside [0, 1]).
 *
 * Only thrown at construction or build time; query paths never throw.
 */
export class ContractViolationError extends Error {
  readonly code = "CONTRACT_VIOLATION";

  constructor(message: string) {
    super(message);
    this.name = "ContractViolationError";
  }
}

export function assertContract(condition: boolean, message: string): asserts condition {
  if (!condition) throw new ContractViolationError(message);
}
