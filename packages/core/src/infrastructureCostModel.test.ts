import { describe, expect, it } from "vitest";
import {
  applyInfrastructureIncentives,
  calculateInfrastructureCosts,
  computeInfrastructureNpv,
} from "./infrastructureCostModel";
import type { IncentiveRule } from "./tables";
import { usd } from "./units";

const option = {
  infrastructureId: "depot-50",
  infrastructurePrice: usd(50000),
  serviceLifeYears: 5,
  maintenancePercent: 0.02,
  infrastructureDescription: "Depot 50kW charger",
};

describe("computeInfrastructureNpv", () => {
  it("adds one discounted capital term and five maintenance years per cycle", () => {
    const r = 0.05;
    let expected = 50000 + 50000 / (1 + r) ** 5;
    for (let year = 1; year <= 10; year += 1) {
      expected += 1000 / (1 + r) ** year;
    }
    expect(computeInfrastructureNpv(50000, 5, r, 10, 1000)).toBeCloseTo(expected, 6);
  });

  it("cuts the last cycle short at the end of the vehicle life", () => {
    expect(computeInfrastructureNpv(50000, 5, 0, 7, 1000)).toBe(107000);
  });
});

describe("calculateInfrastructureCosts", () => {
  it("spreads the costs across the fleet", () => {
    const costs = calculateInfrastructureCosts(option, 10, 0, 4);
    expect(costs).toEqual({
      infrastructurePrice: 50000,
      serviceLifeYears: 5,
      annualMaintenance: 1000,
      annualCapitalCost: 10000,
      totalAnnualCost: 11000,
      perVehicleAnnualCost: 2750,
      replacementCycles: 2,
      npvInfrastructure: 110000,
      npvPerVehicle: 27500,
      fleetSize: 4,
    });
  });

  it("rejects an empty fleet", () => {
    expect(() => calculateInfrastructureCosts(option, 10, 0, 0)).toThrow("fleetSize must be > 0");
  });
});

describe("applyInfrastructureIncentives", () => {
  const costs = calculateInfrastructureCosts(option, 10, 0, 4);
  const subsidy: IncentiveRule[] = [
    { incentiveType: "charging_infrastructure_subsidy", drivetrain: "BEV", active: true, rate: 0.4 },
  ];

  it("scales price and NPVs by the subsidy", () => {
    const result = applyInfrastructureIncentives(costs, subsidy, true);
    expect(result.infrastructurePriceWithIncentives).toBeCloseTo(30000, 9);
    expect(result.npvInfrastructureWithIncentives).toBeCloseTo(66000, 9);
    expect(result.npvPerVehicleWithIncentives).toBeCloseTo(16500, 9);
    expect(result.subsidyRate).toBe(0.4);
    expect(result.subsidyAmount).toBeCloseTo(20000, 9);
    expect(result.npvInfrastructure).toBe(110000);
    expect(result.appliedIncentives).toEqual(subsidy);
  });

  it("copies the plain values when incentives are off", () => {
    const result = applyInfrastructureIncentives(costs, subsidy, false);
    expect(result.infrastructurePriceWithIncentives).toBe(50000);
    expect(result.npvPerVehicleWithIncentives).toBe(27500);
    expect(result.subsidyRate).toBe(0);
    expect(result.subsidyAmount).toBe(0);
    expect(result.appliedIncentives).toEqual([]);
  });
});
