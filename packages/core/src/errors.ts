export type TcoErrorCode = "DATA_NOT_FOUND" | "CALCULATION_FAILED" | "INVALID_PARAMETER";

export class TcoError extends Error {
  code: TcoErrorCode;
  details?: unknown;

  constructor(message: string, code: TcoErrorCode, details?: unknown) {
    super(message);
    this.name = "TcoError";
    this.code = code;
    this.details = details;
  }
}

/** A required row or parameter is absent from a lookup table. */
export class DataNotFoundError extends TcoError {
  table: string;
  key: string;

  constructor(table: string, key: string) {
    super(`${table}: no entry for "${key}"`, "DATA_NOT_FOUND", { table, key });
    this.name = "DataNotFoundError";
    this.table = table;
    this.key = key;
  }
}

export class CalculationError extends TcoError {
  step: string;

  constructor(step: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${step} failed: ${reason}`, "CALCULATION_FAILED", { step });
    this.name = "CalculationError";
    this.step = step;
    this.cause = cause;
  }
}

export class ParameterError extends TcoError {
  parameterName: string;
  value: unknown;

  constructor(parameterName: string, message: string, value?: unknown) {
    super(message, "INVALID_PARAMETER", { parameterName, value });
    this.name = "ParameterError";
    this.parameterName = parameterName;
    this.value = value;
  }
}

/**
 * Runs one named step of an orchestrated calculation. Lookup failures and
 * errors from nested steps pass through; anything else is reported against
 * this step.
 */
export const runCalculationStep = <T>(step: string, fn: () => T): T => {
  try {
    return fn();
  } catch (error) {
    if (error instanceof DataNotFoundError || error instanceof CalculationError) {
      throw error;
    }
    throw new CalculationError(step, error);
  }
};

export const validatePositive = (value: number, name: string): void => {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ParameterError(name, `${name} must be > 0`, value);
  }
};

export const validateNonNegative = (value: number, name: string): void => {
  if (!Number.isFinite(value) || value < 0) {
    throw new ParameterError(name, `${name} must be >= 0`, value);
  }
};

export const validateFraction = (value: number, name: string): void => {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new ParameterError(name, `${name} must be between 0 and 1`, value);
  }
};
