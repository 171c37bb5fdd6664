import { describe, expect, it } from "vitest";
import { CalculationCache } from "./calculationCache";
import {
  algebraicParityYear,
  buildCumulativeCostCurves,
  calculateComparativeMetrics,
  calculatePayloadPenalty,
  calculateSocialBenefitMetrics,
  compareVehicles,
  type CostProfile,
  type VehicleComparison,
} from "./comparativeMetrics";
import { ParameterError } from "./errors";
import { bevInputs, dieselInputs, settings, tables } from "./testFixtures";

const bevProfile: CostProfile = {
  acquisitionCost: 200000,
  residualValue: 40000,
  annualCosts: { annualOperatingCost: 20000 },
  emissions: { lifetimeEmissions: 500000 },
  tco: { npvTotalCost: 350000 },
};

const dieselProfile: CostProfile = {
  acquisitionCost: 100000,
  residualValue: 20000,
  annualCosts: { annualOperatingCost: 30000 },
  emissions: { lifetimeEmissions: 800000 },
  tco: { npvTotalCost: 380000 },
};

describe("buildCumulativeCostCurves", () => {
  it("accumulates annual costs and nets residual value at the last year", () => {
    const curves = buildCumulativeCostCurves(bevProfile, dieselProfile, 4);
    expect(curves.years).toEqual([1, 2, 3, 4]);
    expect(curves.bev).toEqual([200000, 220000, 240000, 220000]);
    expect(curves.diesel).toEqual([100000, 130000, 160000, 170000]);
  });

  it("books infrastructure capital at each service-life boundary", () => {
    const withInfra: CostProfile = {
      ...bevProfile,
      infrastructure: {
        infrastructurePriceWithIncentives: 10000,
        annualMaintenance: 1000,
        serviceLifeYears: 2,
        fleetSize: 2,
      },
    };
    const curves = buildCumulativeCostCurves(withInfra, dieselProfile, 4);
    expect(curves.bev).toEqual([205000, 225500, 251000, 231500]);
  });

  it("keeps the battery out of the curve unless asked", () => {
    const withBattery: CostProfile = {
      ...bevProfile,
      battery: { replacementYear: 1.4, replacementCost: 50000 },
    };
    expect(buildCumulativeCostCurves(withBattery, dieselProfile, 4).bev).toEqual([
      200000, 220000, 240000, 220000,
    ]);
    expect(
      buildCumulativeCostCurves(withBattery, dieselProfile, 4, { batteryCashFlow: "curve" }).bev,
    ).toEqual([200000, 220000, 290000, 270000]);
  });
});

describe("algebraicParityYear", () => {
  it("divides the upfront gap by the annual saving", () => {
    expect(algebraicParityYear(100000, 10000)).toBe(10);
  });

  it("is infinite when the BEV is not dearer upfront", () => {
    expect(algebraicParityYear(-10000, 10000)).toBe(Number.POSITIVE_INFINITY);
    expect(algebraicParityYear(0, 10000)).toBe(Number.POSITIVE_INFINITY);
  });

  it("is infinite without an annual saving", () => {
    expect(algebraicParityYear(100000, 0)).toBe(Number.POSITIVE_INFINITY);
  });
});

describe("calculateComparativeMetrics", () => {
  it("reports both the curve crossing and the algebraic break-even", () => {
    const metrics = calculateComparativeMetrics(bevProfile, dieselProfile, 10);

    expect(metrics.upfrontCostDifference).toBe(100000);
    expect(metrics.annualOperatingSavings).toBe(10000);
    expect(metrics.simpleParityYear).toBe(10);
    expect(metrics.priceParityYear).toBeCloseTo(9 + 2 / 3, 9);
    expect(metrics.parityMethod).toBe("curve");
    expect(metrics.emissionSavingsLifetime).toBe(300000);
    expect(metrics.abatementCost).toBeCloseTo(-100, 9);
    expect(metrics.bevToDieselTcoRatio).toBeCloseTo(350000 / 380000, 12);
  });

  it("falls back to the algebraic break-even when the curves never meet", () => {
    const metrics = calculateComparativeMetrics(
      bevProfile,
      { ...dieselProfile, residualValue: 40000 },
      10,
    );
    expect(metrics.curves.bev[9] - metrics.curves.diesel[9]).toBe(10000);
    expect(metrics.priceParityYear).toBe(10);
    expect(metrics.parityMethod).toBe("algebraic");
  });

  it("reports no parity when BEV never saves", () => {
    const metrics = calculateComparativeMetrics(
      { ...bevProfile, annualCosts: { annualOperatingCost: 30000 } },
      dieselProfile,
      10,
    );
    expect(metrics.priceParityYear).toBe(Number.POSITIVE_INFINITY);
    expect(metrics.simpleParityYear).toBe(Number.POSITIVE_INFINITY);
    expect(metrics.parityMethod).toBe("none");
  });

  it("reports no parity when the BEV is cheaper from the first year", () => {
    const metrics = calculateComparativeMetrics(
      { ...bevProfile, acquisitionCost: 90000 },
      dieselProfile,
      10,
    );
    expect(metrics.upfrontCostDifference).toBe(-10000);
    expect(metrics.simpleParityYear).toBe(Number.POSITIVE_INFINITY);
    expect(metrics.priceParityYear).toBe(Number.POSITIVE_INFINITY);
    expect(metrics.parityMethod).toBe("none");
  });

  it("returns an infinite abatement cost without emission savings", () => {
    const metrics = calculateComparativeMetrics(
      bevProfile,
      { ...dieselProfile, emissions: { lifetimeEmissions: 500000 } },
      10,
    );
    expect(metrics.abatementCost).toBe(Number.POSITIVE_INFINITY);
  });

  it("returns an infinite ratio for a zero diesel TCO", () => {
    const metrics = calculateComparativeMetrics(
      bevProfile,
      { ...dieselProfile, tco: { npvTotalCost: 0 } },
      10,
    );
    expect(metrics.bevToDieselTcoRatio).toBe(Number.POSITIVE_INFINITY);
  });
});

describe("calculatePayloadPenalty", () => {
  const bev = {
    vehicle: { payloadTonnes: 20 },
    annualKms: 100000,
    truckLifeYears: 10,
    annualCosts: { annualOperatingCost: 45000 },
    tco: { npvTotalCost: 800000, tcoPerTonneKm: 0.04 },
  };
  const diesel = { ...bev, vehicle: { payloadTonnes: 25 } };

  it("prices the extra trips a lighter BEV needs", () => {
    const penalty = calculatePayloadPenalty(bev, diesel, {});
    if (!penalty.hasPenalty) {
      throw new Error("expected a payload penalty");
    }
    expect(penalty.payloadDifference).toBe(5);
    expect(penalty.payloadDifferencePercentage).toBe(20);
    expect(penalty.tripsMultiplier).toBe(1.25);
    expect(penalty.additionalTripsPercentage).toBe(25);
    expect(penalty.fleetRatio).toBe(1.25);
    expect(penalty.additionalBevsNeededPerDiesel).toBe(0.25);
    expect(penalty.additionalOperationalCostAnnual).toBe(11250);
    expect(penalty.additionalOperationalCostLifetime).toBe(112500);
    expect(penalty.additionalHoursAnnual).toBeCloseTo(2000 / 3, 9);
    expect(penalty.additionalLabourCostAnnual).toBeCloseTo(70000 / 3, 6);
    expect(penalty.lostCarryingCapacityAnnual).toBe(5000);
    expect(penalty.opportunityCostAnnual).toBe(600000);
    expect(penalty.opportunityCostLifetime).toBe(6000000);
    expect(penalty.bevTcoPerEffectiveTonneKm).toBeCloseTo(0.05, 12);
    expect(penalty.bevAdjustedLifetimeTco).toBe(912500);
  });

  it("reads overrides from the financial parameters", () => {
    const penalty = calculatePayloadPenalty(bev, diesel, {
      freight_value_per_tonne: 100,
      avg_trip_distance: 200,
    });
    expect(penalty.hasPenalty && penalty.opportunityCostAnnual).toBe(250000);
  });

  it("reports no penalty when the BEV carries as much", () => {
    expect(calculatePayloadPenalty(diesel, bev, {})).toEqual({
      hasPenalty: false,
      payloadDifference: -5,
      payloadDifferencePercentage: -25,
    });
  });
});

describe("calculateSocialBenefitMetrics", () => {
  const bev = {
    acquisitionCost: 385000,
    annualCosts: { annualOperatingCost: 45000 },
    externalities: { annualExternalityCost: 2000 },
  };
  const diesel = {
    acquisitionCost: 208000,
    annualCosts: { annualOperatingCost: 109000 },
    externalities: { annualExternalityCost: 10000 },
  };

  it("combines operating and externality savings", () => {
    const metrics = calculateSocialBenefitMetrics(bev, diesel, 10, 0);
    expect(metrics.bevPremium).toBe(177000);
    expect(metrics.annualOperatingSavings).toBe(64000);
    expect(metrics.annualExternalitySavings).toBe(8000);
    expect(metrics.totalAnnualBenefits).toBe(72000);
    expect(metrics.npvBenefits).toBe(720000);
    expect(metrics.benefitCostRatio).toBeCloseTo(720000 / 177000, 12);
    expect(metrics.simplePaybackPeriod).toBeCloseTo(177000 / 72000, 12);
    expect(metrics.socialPaybackPeriod).toBeCloseTo(177000 / 72000, 12);
  });

  it("interpolates the discounted payback inside the crossing year", () => {
    const r = 0.1;
    const year1 = 72000 / 1.1;
    const year2 = 72000 / 1.1 ** 2;
    const year3 = 72000 / 1.1 ** 3;
    const expected = 2 + (177000 - (year1 + year2)) / year3;
    expect(calculateSocialBenefitMetrics(bev, diesel, 10, r).socialPaybackPeriod).toBeCloseTo(
      expected,
      9,
    );
  });

  it("uses the whole life when the premium is never recovered", () => {
    const metrics = calculateSocialBenefitMetrics(
      { ...bev, acquisitionCost: 5000000 },
      diesel,
      10,
      0,
    );
    expect(metrics.socialPaybackPeriod).toBe(10);
  });

  it("returns infinite paybacks without benefits", () => {
    const metrics = calculateSocialBenefitMetrics(
      { ...bev, annualCosts: diesel.annualCosts, externalities: diesel.externalities },
      diesel,
      10,
      0.07,
    );
    expect(metrics.simplePaybackPeriod).toBe(Number.POSITIVE_INFINITY);
    expect(metrics.socialPaybackPeriod).toBe(Number.POSITIVE_INFINITY);
  });

  it("returns an infinite ratio when the BEV costs no more up front", () => {
    const metrics = calculateSocialBenefitMetrics({ ...bev, acquisitionCost: 208000 }, diesel, 10, 0);
    expect(metrics.benefitCostRatio).toBe(Number.POSITIVE_INFINITY);
  });
});

describe("compareVehicles", () => {
  it("compares the fixture fleet end to end", () => {
    const comparison = compareVehicles(bevInputs, dieselInputs, tables, settings);

    expect(comparison.metrics.upfrontCostDifference).toBe(257000);
    expect(comparison.metrics.annualOperatingSavings).toBe(64000);
    expect(comparison.metrics.priceParityYear).toBeCloseTo(5 + 21000 / 59000, 9);
    expect(comparison.metrics.simpleParityYear).toBeCloseTo(257000 / 64000, 12);
    expect(comparison.metrics.emissionSavingsLifetime).toBeCloseTo(580000, 6);
    expect(comparison.payloadPenalty.hasPenalty).toBe(true);
    expect(comparison.externalityComparison.breakdown[0].pollutantType).toBe("pm25");
    expect(comparison.tcoSavingsLifetime).toBeCloseTo(
      comparison.diesel.tco.npvTotalCost - (comparison.bev.tco.npvTotalCost + 112500),
      6,
    );
  });

  it("rejects a pair that is not BEV against Diesel", () => {
    expect(() => compareVehicles(dieselInputs, bevInputs, tables, settings)).toThrow(ParameterError);
  });

  it("serves repeat calls from an explicit cache", () => {
    const cache = new CalculationCache<VehicleComparison>(4);
    const first = compareVehicles(bevInputs, dieselInputs, tables, settings, { cache });
    const second = compareVehicles(bevInputs, dieselInputs, tables, settings, { cache });

    expect(second).toBe(first);
    expect(cache.stats()).toEqual({ hits: 1, misses: 1, size: 1 });
  });
});
