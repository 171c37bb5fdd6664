import { describe, expect, it } from "vitest";
import { CalculationError, DataNotFoundError } from "./errors";
import { bevInputs, dieselInputs, settings, tables } from "./testFixtures";
import { calculateVehicleTco } from "./vehicleTco";

const BEV_RESIDUAL = 400000 * 0.8 * 0.9 ** 9;
const DIESEL_RESIDUAL = 200000 * 0.8 * 0.9 ** 9;

describe("calculateVehicleTco", () => {
  it("runs the BEV pipeline with incentives and infrastructure", () => {
    const result = calculateVehicleTco(bevInputs, tables, settings);

    expect(result.energyCostPerKm).toBeCloseTo(0.2, 12);
    expect(result.weightedElectricityPrice).toBeNull();
    expect(result.annualCosts.annualOperatingCost).toBe(45000);
    expect(result.npvAnnualOperatingCost).toBe(450000);
    expect(result.acquisitionCost).toBe(385000);
    expect(result.residualValue).toBeCloseTo(BEV_RESIDUAL, 6);
    expect(result.battery.npvReplacementCost).toBe(0);
    expect(result.infrastructure?.npvPerVehicle).toBe(150000);
    expect(result.infrastructure?.npvPerVehicleWithIncentives).toBeCloseTo(120000, 6);
    expect(result.chargingRequirements?.chargerPowerKw).toBe(150);

    const expectedNpv = 385000 - BEV_RESIDUAL + 450000 + 120000;
    expect(result.tco.npvTotalCost).toBeCloseTo(expectedNpv, 6);
    expect(result.tco.tcoPerKm).toBeCloseTo(expectedNpv / 1000000, 12);
    expect(result.tco.tcoPerTonneKm).toBeCloseTo(expectedNpv / 1000000 / 20, 12);
    expect(result.social.socialTcoLifetime).toBeCloseTo(expectedNpv + 20000, 6);
  });

  it("runs the diesel pipeline without infrastructure", () => {
    const result = calculateVehicleTco(dieselInputs, tables, settings);

    expect(result.annualCosts.annualOperatingCost).toBe(109000);
    expect(result.acquisitionCost).toBe(208000);
    expect(result.infrastructure).toBeNull();
    expect(result.chargingRequirements).toBeNull();
    expect(result.tco.npvTotalCost).toBeCloseTo(208000 - DIESEL_RESIDUAL + 1090000, 6);
    expect(result.emissions.lifetimeEmissions).toBeCloseTo(1080000, 6);
    expect(result.externalities.npvExternality).toBeCloseTo(100000, 6);
  });

  it("records the weighted price when a charging mix is set", () => {
    const result = calculateVehicleTco(bevInputs, tables, {
      ...settings,
      chargingMix: { depot: 3, public: 1 },
    });
    expect(result.weightedElectricityPrice).toBeCloseTo(0.25, 12);
    expect(result.annualCosts.annualEnergyCost).toBeCloseTo(25000, 6);
  });

  it("falls back to the CO2 proxy without an externality table", () => {
    const result = calculateVehicleTco(dieselInputs, { ...tables, externalities: [] }, settings);
    expect(result.externalities.breakdown.CO2e.costPerKm).toBeCloseTo(0.108, 12);
  });

  it("is idempotent", () => {
    expect(calculateVehicleTco(bevInputs, tables, settings)).toEqual(
      calculateVehicleTco(bevInputs, tables, settings),
    );
  });

  it("lets lookup failures through unchanged", () => {
    expect(() =>
      calculateVehicleTco(bevInputs, tables, { ...settings, selectedChargingId: "missing" }),
    ).toThrow(DataNotFoundError);
  });

  it("names the step that failed", () => {
    const noConsumption = {
      ...dieselInputs,
      vehicle: { ...dieselInputs.vehicle, litresPer100km: undefined },
    };
    expect(() => calculateVehicleTco(noConsumption, tables, settings)).toThrow(CalculationError);
    expect(() => calculateVehicleTco(noConsumption, tables, settings)).toThrow(/^energy cost failed/);
  });
});
