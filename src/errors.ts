// src/errors.ts

export class EconomicsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Raised for any parameter that makes the cost model meaningless:
 * discount rate <= -1, non-positive horizon or lifetime, negative prices.
 * `field` is the dotted path of the offending value, e.g. "storage.lifetimeCycles".
 */
export class InvalidConfigurationError extends EconomicsError {
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.field = field;
  }
}

/** COE and LCOE are undefined when no energy is served. */
export class DegenerateComputationError extends EconomicsError {}
