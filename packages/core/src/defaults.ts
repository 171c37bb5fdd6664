import type { CalculationSettings } from "./tables";

export const DAYS_PER_YEAR = 365;
export const DEFAULT_CHARGER_POWER_KW = 80;
/** Dollars per tonne CO2e used by the emission-factor externality proxy. */
export const DEFAULT_SOCIAL_CARBON_PRICE = 100;

export const DEFAULT_CALCULATION_SETTINGS: Pick<
  CalculationSettings,
  "annualKms" | "truckLifeYears" | "discountRate" | "fleetSize" | "applyIncentives"
> = {
  annualKms: 50000,
  truckLifeYears: 10,
  discountRate: 0.07,
  fleetSize: 1,
  applyIncentives: true,
};

export const CALCULATION_LIMITS = {
  annualKms: { min: 1000, max: 200000 },
  truckLifeYears: { min: 1, max: 30 },
  fleetSize: { min: 1, max: 1000 },
  discountRate: { min: 0, max: 0.2 },
} as const;

export const DEFAULT_PAYLOAD_PENALTY_ASSUMPTIONS = {
  freightValuePerTonne: 120,
  driverCostHourly: 35,
  avgTripDistanceKm: 100,
  avgLoadUnloadHours: 1,
  avgSpeedKmPerHour: 60,
} as const;

export const EMISSION_FACTOR_KEYS = {
  BEV: { fuelType: "electricity", emissionStandard: "Grid" },
  Diesel: { fuelType: "diesel", emissionStandard: "Euro IV+" },
} as const;
