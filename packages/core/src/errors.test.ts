import { describe, expect, it } from "vitest";
import {
  CalculationError,
  DataNotFoundError,
  ParameterError,
  runCalculationStep,
} from "./errors";

describe("runCalculationStep", () => {
  it("returns the step result", () => {
    expect(runCalculationStep("sum", () => 1 + 2)).toBe(3);
  });

  it("passes lookup failures through unchanged", () => {
    const missing = new DataNotFoundError("financialParams", "diesel_price");
    expect(() =>
      runCalculationStep("energy cost", () => {
        throw missing;
      }),
    ).toThrow(missing);
  });

  it("wraps anything else with the step name", () => {
    try {
      runCalculationStep("residual value", () => {
        throw new ParameterError("years", "years must be > 0", -1);
      });
      throw new Error("expected runCalculationStep to throw");
    } catch (error) {
      expect(error).toBeInstanceOf(CalculationError);
      if (error instanceof CalculationError) {
        expect(error.step).toBe("residual value");
        expect(error.code).toBe("CALCULATION_FAILED");
        expect(error.message).toBe("residual value failed: years must be > 0");
        expect(error.cause).toBeInstanceOf(ParameterError);
      }
    }
  });
});

describe("DataNotFoundError", () => {
  it("names the table and key", () => {
    const error = new DataNotFoundError("chargingOptions", "depot");
    expect(error.message).toBe('chargingOptions: no entry for "depot"');
    expect(error.code).toBe("DATA_NOT_FOUND");
    expect(error.name).toBe("DataNotFoundError");
  });
});
