import { runCalculationStep } from "../errors";
import { safeDivide } from "../financialPrimitives";
import {
  findChargingOption,
  withChargingPrices,
  withParameterOverride,
  type CalculationSettings,
  type ParameterTables,
  type VehicleInputs,
} from "../tables";
import { toNumber } from "../units";
import { calculateVehicleTco, type VehicleTcoResult } from "../vehicleTco";

export const SENSITIVITY_PARAMETERS = [
  "Annual Distance (km)",
  "Diesel Price ($/L)",
  "Vehicle Lifetime (years)",
  "Discount Rate (%)",
  "Electricity Price ($/kWh)",
] as const;

export type SensitivityParameter = (typeof SENSITIVITY_PARAMETERS)[number];

export interface SensitivityOutcome {
  tcoPerKm: number;
  tcoLifetime: number;
  annualOperatingCost: number;
}

export interface SensitivityRow {
  parameterValue: number;
  bev: SensitivityOutcome;
  diesel: SensitivityOutcome;
}

interface PerturbedRun {
  tables: ParameterTables;
  settings: CalculationSettings;
}

type Perturbation = (
  value: number,
  tables: ParameterTables,
  settings: CalculationSettings,
) => PerturbedRun;

const PERTURBATIONS: Readonly<Record<SensitivityParameter, Perturbation>> = {
  "Annual Distance (km)": (value, tables, settings) => ({
    tables,
    settings: { ...settings, annualKms: value },
  }),
  "Diesel Price ($/L)": (value, tables, settings) => ({
    tables: {
      ...tables,
      financialParams: withParameterOverride(tables.financialParams, "diesel_price", value),
    },
    settings,
  }),
  "Vehicle Lifetime (years)": (value, tables, settings) => ({
    tables,
    settings: { ...settings, truckLifeYears: value },
  }),
  // Values are percentages.
  "Discount Rate (%)": (value, tables, settings) => ({
    tables,
    settings: { ...settings, discountRate: value / 100 },
  }),
  // Every option moves with the selected one, keeping their relative spread.
  "Electricity Price ($/kWh)": (value, tables, settings) => {
    const basePrice = findChargingOption(
      tables.chargingOptions,
      settings.selectedChargingId,
    ).perKwhPrice;
    return {
      tables: {
        ...tables,
        chargingOptions: withChargingPrices(
          tables.chargingOptions,
          (option) => value * safeDivide(option.perKwhPrice, basePrice, 1),
        ),
      },
      settings,
    };
  },
};

export const isSensitivityParameter = (name: string): name is SensitivityParameter =>
  SENSITIVITY_PARAMETERS.some((parameter) => parameter === name);

const toOutcome = (result: VehicleTcoResult): SensitivityOutcome => ({
  tcoPerKm: result.tco.tcoPerKm,
  tcoLifetime: toNumber(result.tco.tcoLifetime),
  annualOperatingCost: toNumber(result.annualCosts.annualOperatingCost),
});

/**
 * Re-runs the per-vehicle pipeline for both vehicles at each value of one
 * parameter. Unrecognized parameter names yield no rows.
 */
export const performSensitivityAnalysis = (
  parameterName: string,
  values: readonly number[],
  bevInputs: VehicleInputs,
  dieselInputs: VehicleInputs,
  tables: ParameterTables,
  settings: CalculationSettings,
): SensitivityRow[] => {
  if (!isSensitivityParameter(parameterName)) {
    return [];
  }
  const perturb = PERTURBATIONS[parameterName];

  return values.map((parameterValue) =>
    runCalculationStep(`sensitivity ${parameterName} = ${parameterValue}`, () => {
      const run = perturb(parameterValue, tables, settings);
      return {
        parameterValue,
        bev: toOutcome(calculateVehicleTco(bevInputs, run.tables, run.settings)),
        diesel: toOutcome(calculateVehicleTco(dieselInputs, run.tables, run.settings)),
      };
    }),
  );
};
