import { EcosystemErrorCode } from "../constants/ErrorEnums";

/**
 * Base class for errors raised by the ecosystem engine.
 *
 * Domain errors are always thrown before any state is mutated, so callers
 * can report them and carry on with the same engine instance.
 */
export class EcosystemError extends Error {
  public readonly code: EcosystemErrorCode;

  constructor(code: EcosystemErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Raised when a species identifier is not one of the known animal types.
 */
export class InvalidSpeciesError extends EcosystemError {
  public readonly species: unknown;

  constructor(species: unknown) {
    super(EcosystemErrorCode.INVALID_SPECIES, `Unknown species: ${String(species)}`);
    this.species = species;
  }
}

/**
 * Raised for negative or non-integer amounts and counts.
 */
export class InvalidAmountError extends EcosystemError {
  public readonly amount: unknown;

  constructor(
    field: string,
    amount: unknown,
    expected = "a non-negative integer",
  ) {
    super(
      EcosystemErrorCode.INVALID_AMOUNT,
      `Invalid ${field}: ${String(amount)} (expected ${expected})`,
    );
    this.amount = amount;
  }
}

export function isEcosystemError(error: unknown): error is EcosystemError {
  return error instanceof EcosystemError;
}

/**
 * Throws InvalidAmountError unless the value is a non-negative safe integer.
 */
export function assertNonNegativeInteger(
  field: string,
  value: unknown,
): asserts value is number {
  if (typeof value !== "number" || !Number.isSafeInteger(value) || value < 0) {
    throw new InvalidAmountError(field, value);
  }
}
