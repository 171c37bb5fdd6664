import { describe, expect, it } from "vitest";
import {
  calculateBatteryReplacement,
  npvBatteryReplacement,
  yearsUntilReplacement,
} from "./batteryReplacementModel";
import { bevInputs, dieselInputs, tables } from "./testFixtures";

const fastFade = { replacementCostPerKwh: 100, degradationAnnualRate: 0.1, minimumCapacity: 0.5 };

describe("calculateBatteryReplacement", () => {
  it("is zero when the pack outlasts the vehicle", () => {
    expect(yearsUntilReplacement(tables.batteryParams)).toBeGreaterThan(10);
    expect(calculateBatteryReplacement(bevInputs.vehicle, tables.batteryParams, 10, 0.07)).toEqual({
      replacementYear: null,
      replacementCost: 0,
      npvReplacementCost: 0,
    });
  });

  it("discounts the replacement at the fractional threshold year", () => {
    const years = Math.log(0.5) / Math.log(0.9);
    const result = calculateBatteryReplacement(bevInputs.vehicle, fastFade, 10, 0.07);
    expect(result.replacementYear).toBeCloseTo(years, 12);
    expect(result.replacementCost).toBe(50000);
    expect(result.npvReplacementCost).toBeCloseTo(50000 / 1.07 ** years, 6);
  });

  it("is zero for a diesel vehicle", () => {
    expect(npvBatteryReplacement(dieselInputs.vehicle, fastFade, 10, 0.07)).toBe(0);
  });
});
