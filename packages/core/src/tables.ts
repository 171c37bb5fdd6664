import { DataNotFoundError } from "./errors";
import type { KgCO2e, Tonnes, USD } from "./units";

export type Drivetrain = "BEV" | "Diesel";
export type IncentiveApplicability = Drivetrain | "All";

export interface VehicleSpec {
  readonly vehicleId: string;
  readonly vehicleModel?: string;
  /** Class key used for externality lookups, e.g. "Articulated". */
  readonly vehicleType: string;
  readonly drivetrain: Drivetrain;
  readonly msrpPrice: USD;
  readonly payloadTonnes: Tonnes;
  readonly kwhPer100km?: number;
  readonly litresPer100km?: number;
  readonly batteryCapacityKwh?: number;
}

export interface FeeSchedule {
  readonly vehicleId: string;
  readonly maintenancePerKm: USD;
  readonly registrationAnnual: USD;
  readonly insuranceAnnual: USD;
  readonly stampDuty: USD;
}

export interface VehicleInputs {
  readonly vehicle: VehicleSpec;
  readonly fees: FeeSchedule;
}

export type FinancialParameterKey =
  | "diesel_price"
  | "discount_rate_percent"
  | "initial_depreciation_percent"
  | "annual_depreciation_percent"
  | "carbon_price"
  | "freight_value_per_tonne"
  | "driver_cost_hourly"
  | "avg_trip_distance"
  | "avg_loadunload_time";

/** Open key set; the conventional keys are listed in FinancialParameterKey. */
export type FinancialParameters = Readonly<Record<string, number>>;

export interface BatteryParameters {
  readonly replacementCostPerKwh: number;
  /** Fraction of capacity lost per year. */
  readonly degradationAnnualRate: number;
  /** Fraction of original capacity below which the pack is replaced. */
  readonly minimumCapacity: number;
}

export interface ChargingOption {
  readonly chargingId: string;
  readonly perKwhPrice: number;
  readonly chargingApproach: string;
}

/** chargingId -> share. Shares are normalized by their sum. */
export type ChargingMix = Readonly<Record<string, number>>;

export interface InfrastructureOption {
  readonly infrastructureId: string;
  readonly infrastructurePrice: USD;
  readonly serviceLifeYears: number;
  /** Annual maintenance as a fraction of the capital price. */
  readonly maintenancePercent: number;
  readonly infrastructureDescription: string;
}

export const INCENTIVE_TYPES = [
  "purchase_rebate_aud",
  "stamp_duty_exemption",
  "registration_exemption",
  "insurance_discount",
  "electricity_rate_discount",
  "charging_infrastructure_subsidy",
  "toll_road_exemption",
  "battery_replacement_subsidy",
  "carbon_price_redemption",
] as const;

export type IncentiveType = (typeof INCENTIVE_TYPES)[number];

export interface IncentiveRule {
  readonly incentiveType: IncentiveType;
  readonly drivetrain: IncentiveApplicability;
  readonly active: boolean;
  /** Fraction for discounts and exemptions, currency amount for purchase_rebate_aud. */
  readonly rate: number;
}

export interface EmissionFactor {
  readonly fuelType: string;
  readonly emissionStandard: string;
  /** kg CO2e per kWh or per litre. */
  readonly co2PerUnit: KgCO2e;
}

export const EXTERNALITIES_TOTAL = "externalities_total";

export interface ExternalityRate {
  readonly vehicleClass: string;
  readonly drivetrain: Drivetrain;
  readonly pollutantType: string;
  readonly costPerKm: number;
}

export interface ParameterTables {
  readonly financialParams: FinancialParameters;
  readonly batteryParams: BatteryParameters;
  readonly chargingOptions: readonly ChargingOption[];
  readonly infrastructureOptions: readonly InfrastructureOption[];
  readonly incentives: readonly IncentiveRule[];
  readonly emissionFactors: readonly EmissionFactor[];
  readonly externalities: readonly ExternalityRate[];
}

export interface CalculationSettings {
  readonly annualKms: number;
  readonly truckLifeYears: number;
  /** Fraction, e.g. 0.07. */
  readonly discountRate: number;
  readonly fleetSize: number;
  readonly applyIncentives: boolean;
  readonly chargingMix?: ChargingMix;
  readonly selectedChargingId: string;
  readonly selectedInfrastructureId: string;
}

export const getParameter = (params: FinancialParameters, key: string): number => {
  const value = params[key];
  if (value === undefined) {
    throw new DataNotFoundError("financialParams", key);
  }
  return value;
};

export const getParameterOr = (
  params: FinancialParameters,
  key: string,
  fallback: number,
): number => params[key] ?? fallback;

export const withParameterOverride = (
  params: FinancialParameters,
  key: string,
  value: number,
): FinancialParameters => ({ ...params, [key]: value });

export const findChargingOption = (
  options: readonly ChargingOption[],
  chargingId: string,
): ChargingOption => {
  const option = options.find((item) => item.chargingId === chargingId);
  if (!option) {
    throw new DataNotFoundError("chargingOptions", chargingId);
  }
  return option;
};

export const withChargingPrices = (
  options: readonly ChargingOption[],
  priceFor: (option: ChargingOption) => number,
): ChargingOption[] =>
  options.map((option) => ({ ...option, perKwhPrice: priceFor(option) }));

export const findInfrastructureOption = (
  options: readonly InfrastructureOption[],
  infrastructureId: string,
): InfrastructureOption => {
  const option = options.find((item) => item.infrastructureId === infrastructureId);
  if (!option) {
    throw new DataNotFoundError("infrastructureOptions", infrastructureId);
  }
  return option;
};

export const findEmissionFactor = (
  factors: readonly EmissionFactor[],
  fuelType: string,
  emissionStandard: string,
): EmissionFactor => {
  const factor = factors.find(
    (item) => item.fuelType === fuelType && item.emissionStandard === emissionStandard,
  );
  if (!factor) {
    throw new DataNotFoundError("emissionFactors", `${fuelType}/${emissionStandard}`);
  }
  return factor;
};

/** Returns undefined when no active rule matches. */
export const findActiveIncentive = (
  incentives: readonly IncentiveRule[],
  incentiveType: IncentiveType,
  drivetrain: Drivetrain,
): IncentiveRule | undefined =>
  incentives.find(
    (rule) =>
      rule.incentiveType === incentiveType &&
      rule.active &&
      (rule.drivetrain === drivetrain || rule.drivetrain === "All"),
  );
