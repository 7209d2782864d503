/**
 * Error catalogue shared by the network model, the classifiers and the CLI.
 * Keeping every code in one frozen table lets callers switch on stable strings
 * instead of class names when errors cross a serialisation boundary.
 */
export const ERROR_CATALOG = {
  NET: {
    INVALID: "E-NET-INVALID",
  },
  STORE: {
    MODE_MISMATCH: "E-STORE-MODE-MISMATCH",
    OUT_OF_RANGE: "E-STORE-OUT-OF-RANGE",
    UNCLASSIFIED: "E-STORE-UNCLASSIFIED",
    UNKNOWN_ATTRACTOR: "E-STORE-UNKNOWN-ATTRACTOR",
  },
  ANALYSIS: {
    ABORTED: "E-ANALYSIS-ABORTED",
    INVARIANT: "E-ANALYSIS-INVARIANT",
  },
  CLI: {
    USAGE: "E-CLI-USAGE",
  },
} as const;

type ErrorCatalog = typeof ERROR_CATALOG;

type FlattenCatalog<T extends Record<string, Record<string, string>>> = {
  [Family in keyof T & string as `${Family}_${keyof T[Family] & string}`]: T[Family][keyof T[Family] & string];
};

type FlatErrorCatalog = FlattenCatalog<ErrorCatalog>;

function flattenCatalog<T extends Record<string, Record<string, string>>>(catalog: T): FlattenCatalog<T> {
  const flat: Record<string, string> = {};
  for (const familyKey of Object.keys(catalog) as Array<keyof T & string>) {
    const family = catalog[familyKey];
    for (const codeKey of Object.keys(family) as Array<keyof T[typeof familyKey] & string>) {
      flat[`${familyKey}_${codeKey}`] = family[codeKey];
    }
  }
  return Object.freeze(flat) as FlattenCatalog<T>;
}

/** Flat access to every code, e.g. `ERROR_CODES.STORE_OUT_OF_RANGE`. */
export const ERROR_CODES: FlatErrorCatalog = flattenCatalog(ERROR_CATALOG);

export type ErrorCode = FlatErrorCatalog[keyof FlatErrorCatalog];

/** Base class carrying a stable code and JSON-serialisable details. */
export class AttractorError extends Error {
  public readonly code: ErrorCode;
  public readonly details: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = "AttractorError";
    this.code = code;
    this.details = details;
  }

  toJSON(): { name: string; code: ErrorCode; message: string; details: Record<string, unknown> } {
    return { name: this.name, code: this.code, message: this.message, details: this.details };
  }
}

/** Single problem found while validating a network definition. */
export interface NetworkViolation {
  /** JSON pointer to the offending location, e.g. `/nodes/2/parents/0`. */
  path: string;
  message: string;
  hint?: string;
}

/**
 * Raised when a network cannot be constructed. All violations are collected
 * before throwing so a caller fixing a hand-written network sees every problem
 * at once.
 */
export class ValidationError extends AttractorError {
  public readonly violations: readonly NetworkViolation[];

  constructor(violations: readonly NetworkViolation[]) {
    super(
      ERROR_CODES.NET_INVALID,
      violations.map((violation) => `${violation.path}: ${violation.message}`).join("; "),
      { violations },
    );
    this.name = "ValidationError";
    this.violations = violations;
  }
}

/** Raised when a store is asked for a field its update mode does not compute. */
export class ModeMismatchError extends AttractorError {
  constructor(mode: string, operation: string) {
    super(ERROR_CODES.STORE_MODE_MISMATCH, `${operation} is not available for ${mode} classifications`, {
      mode,
      operation,
    });
    this.name = "ModeMismatchError";
  }
}

/** Raised for a state integer outside `[0, 2^N)`. */
export class OutOfRangeError extends AttractorError {
  constructor(value: number, stateCount: number) {
    super(ERROR_CODES.STORE_OUT_OF_RANGE, `state ${value} is outside [0, ${stateCount})`, {
      value,
      stateCount,
    });
    this.name = "OutOfRangeError";
  }
}

export class UnknownAttractorError extends AttractorError {
  constructor(attractorId: number, attractorCount: number) {
    super(ERROR_CODES.STORE_UNKNOWN_ATTRACTOR, `attractor ${attractorId} does not exist (count ${attractorCount})`, {
      attractorId,
      attractorCount,
    });
    this.name = "UnknownAttractorError";
  }
}

/** Raised when a partial store is queried for a state the aborted pass never settled. */
export class UnclassifiedStateError extends AttractorError {
  constructor(state: number) {
    super(ERROR_CODES.STORE_UNCLASSIFIED, `state ${state} was not classified before the analysis stopped`, {
      state,
    });
    this.name = "UnclassifiedStateError";
  }
}

export type AbortReason = "states" | "time";

/** Raised by {@link requireComplete}-style guards that refuse partial results. */
export class ClassificationAbortedError extends AttractorError {
  public readonly reason: AbortReason;

  constructor(reason: AbortReason, classifiedCount: number, stateCount: number) {
    super(
      ERROR_CODES.ANALYSIS_ABORTED,
      `classification aborted on the ${reason} ceiling after ${classifiedCount}/${stateCount} states`,
      { reason, classifiedCount, stateCount },
    );
    this.name = "ClassificationAbortedError";
    this.reason = reason;
  }
}

/** Internal defect detected while a classifier runs. Never recoverable. */
export class InvariantViolationError extends AttractorError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(ERROR_CODES.ANALYSIS_INVARIANT, message, details);
    this.name = "InvariantViolationError";
  }
}

export class UsageError extends AttractorError {
  constructor(message: string) {
    super(ERROR_CODES.CLI_USAGE, message);
    this.name = "UsageError";
  }
}
