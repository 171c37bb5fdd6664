import { DEFAULT_SOCIAL_CARBON_PRICE } from "./defaults";
import { consumptionPer100km } from "./emissionsModel";
import { npvConstant, safeDivide } from "./financialPrimitives";
import {
  EXTERNALITIES_TOTAL,
  getParameterOr,
  type CalculationSettings,
  type EmissionFactor,
  type ExternalityRate,
  type ParameterTables,
  type VehicleSpec,
} from "./tables";
import { sum, toNumber, usd, type USD } from "./units";

export interface PollutantCost {
  costPerKm: number;
  annualCost: USD;
  lifetimeCost: USD;
  npvCost: USD;
}

export interface ExternalityResult {
  externalityPerKm: number;
  annualExternalityCost: USD;
  lifetimeExternalityCost: USD;
  npvExternality: USD;
  breakdown: Record<string, PollutantCost>;
}

export interface PollutantComparison {
  pollutantType: string;
  bevCostPerKm: number;
  dieselCostPerKm: number;
  savingsPerKm: number;
  savingsPercent: number;
}

export interface ExternalityComparison {
  breakdown: PollutantComparison[];
  bevTotal: number;
  dieselTotal: number;
  totalSavings: number;
  totalSavingsPercent: number;
}

const pollutantCost = (
  costPerKm: number,
  annualKms: number,
  lifeYears: number,
  discountRate: number,
): PollutantCost => {
  const annualCost = costPerKm * annualKms;
  return {
    costPerKm,
    annualCost: usd(annualCost),
    lifetimeCost: usd(annualCost * lifeYears),
    npvCost: usd(npvConstant(annualCost, discountRate, lifeYears)),
  };
};

const toResult = (
  externalityPerKm: number,
  breakdown: Record<string, PollutantCost>,
  annualKms: number,
  lifeYears: number,
  discountRate: number,
): ExternalityResult => {
  const total = pollutantCost(externalityPerKm, annualKms, lifeYears, discountRate);
  return {
    externalityPerKm,
    annualExternalityCost: total.annualCost,
    lifetimeExternalityCost: total.lifetimeCost,
    npvExternality: total.npvCost,
    breakdown,
  };
};

export const calculateExternalities = (
  vehicle: VehicleSpec,
  rates: readonly ExternalityRate[],
  annualKms: number,
  lifeYears: number,
  discountRate: number,
): ExternalityResult => {
  const rows = rates.filter(
    (rate) => rate.vehicleClass === vehicle.vehicleType && rate.drivetrain === vehicle.drivetrain,
  );
  const totalRow = rows.find((rate) => rate.pollutantType === EXTERNALITIES_TOTAL);
  const externalityPerKm = totalRow ? totalRow.costPerKm : sum(rows, (rate) => rate.costPerKm);

  const breakdown: Record<string, PollutantCost> = {};
  for (const row of rows) {
    if (row.pollutantType === EXTERNALITIES_TOTAL) {
      continue;
    }
    breakdown[row.pollutantType] = pollutantCost(row.costPerKm, annualKms, lifeYears, discountRate);
  }

  return toResult(externalityPerKm, breakdown, annualKms, lifeYears, discountRate);
};

/**
 * Prices CO2e from emission factors alone, for use when no externality
 * table is available. Falls back to the mean of all factors when the
 * vehicle's fuel type has no row.
 */
export const calculateCo2ExternalityProxy = (
  vehicle: VehicleSpec,
  emissionFactors: readonly EmissionFactor[],
  annualKms: number,
  lifeYears: number,
  discountRate: number,
  carbonPricePerTonne: number = DEFAULT_SOCIAL_CARBON_PRICE,
): ExternalityResult => {
  const fuelType = vehicle.drivetrain === "BEV" ? "electricity" : "diesel";
  const row = emissionFactors.find((factor) => factor.fuelType === fuelType);
  const kgPerUnit = row
    ? toNumber(row.co2PerUnit)
    : safeDivide(
        sum(emissionFactors, (factor) => factor.co2PerUnit),
        emissionFactors.length,
        0,
      );

  const costPerKm = ((consumptionPer100km(vehicle) / 100) * kgPerUnit / 1000) * carbonPricePerTonne;
  return toResult(
    costPerKm,
    { CO2e: pollutantCost(costPerKm, annualKms, lifeYears, discountRate) },
    annualKms,
    lifeYears,
    discountRate,
  );
};

/**
 * Table rates when `tables.externalities` has rows, the CO2 proxy at
 * `carbon_price` otherwise. `scale` multiplies the rates, or the carbon
 * price in proxy mode.
 */
export const priceExternalities = (
  vehicle: VehicleSpec,
  tables: ParameterTables,
  settings: CalculationSettings,
  scale = 1,
): ExternalityResult => {
  const { annualKms, truckLifeYears, discountRate } = settings;
  if (tables.externalities.length > 0) {
    return calculateExternalities(
      vehicle,
      tables.externalities.map((rate) => ({ ...rate, costPerKm: rate.costPerKm * scale })),
      annualKms,
      truckLifeYears,
      discountRate,
    );
  }
  return calculateCo2ExternalityProxy(
    vehicle,
    tables.emissionFactors,
    annualKms,
    truckLifeYears,
    discountRate,
    getParameterOr(tables.financialParams, "carbon_price", DEFAULT_SOCIAL_CARBON_PRICE) * scale,
  );
};

export const compareExternalities = (
  bev: ExternalityResult,
  diesel: ExternalityResult,
): ExternalityComparison => {
  const pollutants = new Set([...Object.keys(bev.breakdown), ...Object.keys(diesel.breakdown)]);

  const breakdown = [...pollutants]
    .map((pollutantType): PollutantComparison => {
      const bevCostPerKm = bev.breakdown[pollutantType]?.costPerKm ?? 0;
      const dieselCostPerKm = diesel.breakdown[pollutantType]?.costPerKm ?? 0;
      const savingsPerKm = dieselCostPerKm - bevCostPerKm;
      return {
        pollutantType,
        bevCostPerKm,
        dieselCostPerKm,
        savingsPerKm,
        savingsPercent: safeDivide(savingsPerKm * 100, dieselCostPerKm, 0),
      };
    })
    .sort((a, b) => b.savingsPerKm - a.savingsPerKm);

  const totalSavings = diesel.externalityPerKm - bev.externalityPerKm;
  return {
    breakdown,
    bevTotal: bev.externalityPerKm,
    dieselTotal: diesel.externalityPerKm,
    totalSavings,
    totalSavingsPercent: safeDivide(totalSavings * 100, diesel.externalityPerKm, 0),
  };
};
