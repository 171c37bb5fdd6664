import type { CalculationCache } from "./calculationCache";
import { DEFAULT_PAYLOAD_PENALTY_ASSUMPTIONS } from "./defaults";
import { ParameterError, runCalculationStep } from "./errors";
import { compareExternalities, type ExternalityComparison } from "./externalityModel";
import { npvConstant, priceParityYear, safeDivide } from "./financialPrimitives";
import {
  getParameterOr,
  type CalculationSettings,
  type FinancialParameters,
  type ParameterTables,
  type VehicleInputs,
} from "./tables";
import { toNumber } from "./units";
import { calculateVehicleTco, type VehicleTcoResult } from "./vehicleTco";

/**
 * Structural view of a per-vehicle result; every VehicleTcoResult satisfies
 * it, and hand-built fixtures only need the fields a metric reads.
 */
export interface CostProfile {
  acquisitionCost: number;
  residualValue: number;
  annualCosts: { annualOperatingCost: number };
  emissions: { lifetimeEmissions: number };
  tco: { npvTotalCost: number };
  battery?: { replacementYear: number | null; replacementCost: number };
  infrastructure?: {
    infrastructurePriceWithIncentives: number;
    annualMaintenance: number;
    serviceLifeYears: number;
    fleetSize: number;
  } | null;
}

export type BatteryCashFlowMode = "npv-only" | "curve";

export interface ComparativeMetricsOptions {
  /**
   * "npv-only" keeps the battery replacement out of the year-by-year curves
   * (it is still part of every NPV). "curve" books it at the end of the
   * year in which the pack reaches its minimum capacity.
   */
  batteryCashFlow?: BatteryCashFlowMode;
}

export interface CumulativeCostCurves {
  years: number[];
  bev: number[];
  diesel: number[];
}

export type ParityMethod = "curve" | "algebraic" | "none";

export interface ComparativeMetrics {
  upfrontCostDifference: number;
  annualOperatingSavings: number;
  priceParityYear: number;
  simpleParityYear: number;
  parityMethod: ParityMethod;
  emissionSavingsLifetime: number;
  abatementCost: number;
  bevToDieselTcoRatio: number;
  curves: CumulativeCostCurves;
}

const infrastructureShare = (profile: CostProfile): { capital: number; maintenance: number } => {
  const infrastructure = profile.infrastructure;
  if (!infrastructure) {
    return { capital: 0, maintenance: 0 };
  }
  const fleetSize = infrastructure.fleetSize || 1;
  return {
    capital: infrastructure.infrastructurePriceWithIncentives / fleetSize,
    maintenance: infrastructure.annualMaintenance / fleetSize,
  };
};

const batteryCurveYear = (profile: CostProfile, lifeYears: number): number | null => {
  const replacementYear = profile.battery?.replacementYear ?? null;
  if (replacementYear === null || lifeYears < 2) {
    return null;
  }
  return Math.min(Math.max(1, Math.ceil(replacementYear)), lifeYears - 1);
};

const buildCurve = (
  profile: CostProfile,
  lifeYears: number,
  options: ComparativeMetricsOptions,
): number[] => {
  if (lifeYears < 1) {
    return [];
  }
  const share = infrastructureShare(profile);
  const serviceLife = profile.infrastructure?.serviceLifeYears ?? 0;
  const batteryYear =
    options.batteryCashFlow === "curve" ? batteryCurveYear(profile, lifeYears) : null;

  const curve = [profile.acquisitionCost + share.capital];
  for (let year = 1; year < lifeYears; year += 1) {
    let yearCost = profile.annualCosts.annualOperatingCost + share.maintenance;
    if (serviceLife > 0 && year % serviceLife === 0) {
      yearCost += share.capital;
    }
    if (year === batteryYear) {
      yearCost += profile.battery?.replacementCost ?? 0;
    }
    curve.push(curve[year - 1] + yearCost);
  }
  curve[curve.length - 1] -= profile.residualValue;
  return curve;
};

export const buildCumulativeCostCurves = (
  bev: CostProfile,
  diesel: CostProfile,
  lifeYears: number,
  options: ComparativeMetricsOptions = {},
): CumulativeCostCurves => ({
  years: Array.from({ length: Math.max(0, lifeYears) }, (_, index) => index + 1),
  bev: buildCurve(bev, lifeYears, options),
  diesel: buildCurve(diesel, lifeYears, options),
});

/**
 * Break-even assuming constant annual costs: upfront gap over annual saving.
 * Infinite when the BEV never costs more upfront or never saves.
 */
export const algebraicParityYear = (upfrontDifference: number, annualSavings: number): number => {
  if (upfrontDifference <= 0 || annualSavings <= 0) {
    return Number.POSITIVE_INFINITY;
  }
  return upfrontDifference / annualSavings;
};

export const calculateComparativeMetrics = (
  bev: CostProfile,
  diesel: CostProfile,
  lifeYears: number,
  options: ComparativeMetricsOptions = {},
): ComparativeMetrics => {
  const curves = buildCumulativeCostCurves(bev, diesel, lifeYears, options);
  const upfrontCostDifference = (curves.bev[0] ?? 0) - (curves.diesel[0] ?? 0);
  const annualOperatingSavings =
    diesel.annualCosts.annualOperatingCost - bev.annualCosts.annualOperatingCost;

  const curveParity = priceParityYear(curves.bev, curves.diesel, curves.years);
  const simpleParityYear = algebraicParityYear(upfrontCostDifference, annualOperatingSavings);

  let parityMethod: ParityMethod = "none";
  let parity = Number.POSITIVE_INFINITY;
  if (Number.isFinite(curveParity)) {
    parityMethod = "curve";
    parity = curveParity;
  } else if (simpleParityYear <= lifeYears) {
    parityMethod = "algebraic";
    parity = simpleParityYear;
  }

  const emissionSavingsLifetime =
    diesel.emissions.lifetimeEmissions - bev.emissions.lifetimeEmissions;
  const npvGap = bev.tco.npvTotalCost - diesel.tco.npvTotalCost;

  return {
    upfrontCostDifference,
    annualOperatingSavings,
    priceParityYear: parity,
    simpleParityYear,
    parityMethod,
    emissionSavingsLifetime,
    abatementCost:
      emissionSavingsLifetime > 0
        ? safeDivide(npvGap, emissionSavingsLifetime / 1000, Number.POSITIVE_INFINITY)
        : Number.POSITIVE_INFINITY,
    bevToDieselTcoRatio: safeDivide(
      bev.tco.npvTotalCost,
      diesel.tco.npvTotalCost,
      Number.POSITIVE_INFINITY,
    ),
    curves,
  };
};

export interface PayloadProfile {
  vehicle: { payloadTonnes: number };
  annualKms: number;
  truckLifeYears: number;
  annualCosts: { annualOperatingCost: number };
  tco: { npvTotalCost: number; tcoPerTonneKm: number };
}

export interface NoPayloadPenalty {
  hasPenalty: false;
  payloadDifference: number;
  payloadDifferencePercentage: number;
}

export interface PayloadPenalty {
  hasPenalty: true;
  payloadDifference: number;
  payloadDifferencePercentage: number;
  tripsMultiplier: number;
  additionalTripsPercentage: number;
  fleetRatio: number;
  additionalBevsNeededPerDiesel: number;
  additionalOperationalCostAnnual: number;
  additionalOperationalCostLifetime: number;
  additionalHoursAnnual: number;
  additionalLabourCostAnnual: number;
  additionalLabourCostLifetime: number;
  lostCarryingCapacityAnnual: number;
  opportunityCostAnnual: number;
  opportunityCostLifetime: number;
  bevTcoPerEffectiveTonneKm: number;
  bevAdjustedLifetimeTco: number;
}

export type PayloadPenaltyResult = NoPayloadPenalty | PayloadPenalty;

export const calculatePayloadPenalty = (
  bev: PayloadProfile,
  diesel: PayloadProfile,
  financialParams: FinancialParameters,
): PayloadPenaltyResult => {
  const bevPayload = bev.vehicle.payloadTonnes;
  const dieselPayload = diesel.vehicle.payloadTonnes;
  const payloadDifference = dieselPayload - bevPayload;
  const payloadDifferencePercentage = safeDivide(payloadDifference * 100, dieselPayload, 0);

  if (payloadDifference <= 0) {
    return { hasPenalty: false, payloadDifference, payloadDifferencePercentage };
  }

  const assumptions = DEFAULT_PAYLOAD_PENALTY_ASSUMPTIONS;
  const freightValuePerTonne = getParameterOr(
    financialParams,
    "freight_value_per_tonne",
    assumptions.freightValuePerTonne,
  );
  const driverCostHourly = getParameterOr(
    financialParams,
    "driver_cost_hourly",
    assumptions.driverCostHourly,
  );
  const avgTripDistance = getParameterOr(
    financialParams,
    "avg_trip_distance",
    assumptions.avgTripDistanceKm,
  );
  const avgLoadUnloadTime = getParameterOr(
    financialParams,
    "avg_loadunload_time",
    assumptions.avgLoadUnloadHours,
  );

  const { annualKms, truckLifeYears } = bev;
  const tripsMultiplier = safeDivide(dieselPayload, bevPayload, 1);
  const extraShare = tripsMultiplier - 1;

  const additionalOperationalCostAnnual = extraShare * bev.annualCosts.annualOperatingCost;

  const baselineDrivingHours = annualKms / assumptions.avgSpeedKmPerHour;
  const baselineTrips = safeDivide(annualKms, avgTripDistance, 0);
  const baselineTotalHours = baselineDrivingHours + baselineTrips * avgLoadUnloadTime;
  const additionalHoursAnnual = baselineTotalHours * extraShare;
  const additionalLabourCostAnnual = additionalHoursAnnual * driverCostHourly;

  const lostCarryingCapacityAnnual = payloadDifference * baselineTrips;
  const opportunityCostAnnual = lostCarryingCapacityAnnual * freightValuePerTonne;

  const effectivePayloadRatio = safeDivide(bevPayload, dieselPayload, 1);

  return {
    hasPenalty: true,
    payloadDifference,
    payloadDifferencePercentage,
    tripsMultiplier,
    additionalTripsPercentage: extraShare * 100,
    fleetRatio: tripsMultiplier,
    additionalBevsNeededPerDiesel: bevPayload > 0 ? extraShare : 0,
    additionalOperationalCostAnnual,
    additionalOperationalCostLifetime: additionalOperationalCostAnnual * truckLifeYears,
    additionalHoursAnnual,
    additionalLabourCostAnnual,
    additionalLabourCostLifetime: additionalLabourCostAnnual * truckLifeYears,
    lostCarryingCapacityAnnual,
    opportunityCostAnnual,
    opportunityCostLifetime: opportunityCostAnnual * truckLifeYears,
    bevTcoPerEffectiveTonneKm: safeDivide(bev.tco.tcoPerTonneKm, effectivePayloadRatio, 0),
    bevAdjustedLifetimeTco:
      bev.tco.npvTotalCost + additionalOperationalCostAnnual * truckLifeYears,
  };
};

export interface BenefitProfile {
  acquisitionCost: number;
  annualCosts: { annualOperatingCost: number };
  externalities: { annualExternalityCost: number };
}

export interface SocialBenefitMetrics {
  bevPremium: number;
  annualOperatingSavings: number;
  annualExternalitySavings: number;
  totalAnnualBenefits: number;
  npvBenefits: number;
  benefitCostRatio: number;
  simplePaybackPeriod: number;
  socialPaybackPeriod: number;
}

/**
 * Year in which discounted benefits first cover the premium, interpolated
 * within that year. The whole life is returned when they never do.
 */
const discountedPaybackPeriod = (
  premium: number,
  annualBenefit: number,
  discountRate: number,
  lifeYears: number,
): number => {
  let cumulative = 0;
  for (let year = 1; year <= lifeYears; year += 1) {
    const discounted = annualBenefit / (1 + discountRate) ** year;
    const previous = cumulative;
    cumulative += discounted;
    if (cumulative >= premium) {
      return year - 1 + safeDivide(premium - previous, discounted, 0);
    }
  }
  return lifeYears;
};

export const calculateSocialBenefitMetrics = (
  bev: BenefitProfile,
  diesel: BenefitProfile,
  lifeYears: number,
  discountRate: number,
): SocialBenefitMetrics => {
  const bevPremium = bev.acquisitionCost - diesel.acquisitionCost;
  const annualOperatingSavings =
    diesel.annualCosts.annualOperatingCost - bev.annualCosts.annualOperatingCost;
  const annualExternalitySavings =
    diesel.externalities.annualExternalityCost - bev.externalities.annualExternalityCost;
  const totalAnnualBenefits = annualOperatingSavings + annualExternalitySavings;
  const npvBenefits = npvConstant(totalAnnualBenefits, discountRate, lifeYears);

  const hasBenefits = totalAnnualBenefits !== 0;
  return {
    bevPremium,
    annualOperatingSavings,
    annualExternalitySavings,
    totalAnnualBenefits,
    npvBenefits,
    benefitCostRatio:
      bevPremium > 0 ? npvBenefits / bevPremium : Number.POSITIVE_INFINITY,
    simplePaybackPeriod: hasBenefits
      ? bevPremium / totalAnnualBenefits
      : Number.POSITIVE_INFINITY,
    socialPaybackPeriod: hasBenefits
      ? discountedPaybackPeriod(bevPremium, totalAnnualBenefits, discountRate, lifeYears)
      : Number.POSITIVE_INFINITY,
  };
};

const assertComparisonPair = (bev: VehicleInputs, diesel: VehicleInputs): void => {
  if (bev.vehicle.drivetrain !== "BEV") {
    throw new ParameterError("bev", "the first vehicle must be a BEV", bev.vehicle.vehicleId);
  }
  if (diesel.vehicle.drivetrain !== "Diesel") {
    throw new ParameterError(
      "diesel",
      "the comparator must be a Diesel vehicle",
      diesel.vehicle.vehicleId,
    );
  }
};

export interface VehicleComparison {
  bev: VehicleTcoResult;
  diesel: VehicleTcoResult;
  metrics: ComparativeMetrics;
  payloadPenalty: PayloadPenaltyResult;
  socialBenefit: SocialBenefitMetrics;
  externalityComparison: ExternalityComparison;
  /** Diesel lifetime TCO minus BEV lifetime TCO, payload-adjusted when the BEV carries less. */
  tcoSavingsLifetime: number;
}

export interface CompareVehiclesOptions extends ComparativeMetricsOptions {
  cache?: CalculationCache<VehicleComparison>;
}

const runComparison = (
  bevInputs: VehicleInputs,
  dieselInputs: VehicleInputs,
  tables: ParameterTables,
  settings: CalculationSettings,
  options: ComparativeMetricsOptions,
): VehicleComparison => {
  const bev = calculateVehicleTco(bevInputs, tables, settings);
  const diesel = calculateVehicleTco(dieselInputs, tables, settings);

  const metrics = runCalculationStep("comparative metrics", () =>
    calculateComparativeMetrics(bev, diesel, settings.truckLifeYears, options),
  );
  const payloadPenalty = runCalculationStep("payload penalty", () =>
    calculatePayloadPenalty(bev, diesel, tables.financialParams),
  );
  const socialBenefit = runCalculationStep("social benefit", () =>
    calculateSocialBenefitMetrics(bev, diesel, settings.truckLifeYears, settings.discountRate),
  );
  const externalityComparison = runCalculationStep("externality comparison", () =>
    compareExternalities(bev.externalities, diesel.externalities),
  );

  const bevLifetimeTco = payloadPenalty.hasPenalty
    ? payloadPenalty.bevAdjustedLifetimeTco
    : toNumber(bev.tco.npvTotalCost);

  return {
    bev,
    diesel,
    metrics,
    payloadPenalty,
    socialBenefit,
    externalityComparison,
    tcoSavingsLifetime: toNumber(diesel.tco.npvTotalCost) - bevLifetimeTco,
  };
};

/**
 * Full BEV-vs-Diesel comparison. A cache, when given, is consulted with a
 * fingerprint of every input; nothing is cached otherwise.
 */
export const compareVehicles = (
  bevInputs: VehicleInputs,
  dieselInputs: VehicleInputs,
  tables: ParameterTables,
  settings: CalculationSettings,
  options: CompareVehiclesOptions = {},
): VehicleComparison => {
  assertComparisonPair(bevInputs, dieselInputs);
  const { cache, ...metricOptions } = options;
  const compute = () =>
    runCalculationStep("vehicle comparison", () =>
      runComparison(bevInputs, dieselInputs, tables, settings, metricOptions),
    );

  if (!cache) {
    return compute();
  }
  return cache.getOrCompute(
    { bevInputs, dieselInputs, tables, settings, metricOptions },
    compute,
  );
};
