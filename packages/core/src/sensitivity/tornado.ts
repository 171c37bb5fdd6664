import { ParameterError, runCalculationStep } from "../errors";
import { priceExternalities } from "../externalityModel";
import { safeDivide } from "../financialPrimitives";
import {
  findChargingOption,
  getParameter,
  type CalculationSettings,
  type FeeSchedule,
  type ParameterTables,
  type VehicleSpec,
} from "../tables";
import { calculateSocialTco } from "../tcoAggregator";
import { toNumber } from "../units";
import type { VehicleTcoResult } from "../vehicleTco";
import {
  SENSITIVITY_PARAMETERS,
  performSensitivityAnalysis,
  type SensitivityParameter,
} from "./sensitivityEngine";

export interface TornadoSubject {
  vehicle: VehicleSpec;
  fees?: FeeSchedule | null;
  tco: { tcoPerKm: number };
  weightedElectricityPrice?: number | null;
}

export interface TornadoImpact {
  parameter: SensitivityParameter;
  low: number;
  high: number;
  minImpact: number;
  maxImpact: number;
  spread: number;
}

export interface TornadoResult {
  baseTco: number;
  /** One entry per parameter, in SENSITIVITY_PARAMETERS order. */
  impacts: TornadoImpact[];
  /** Same impacts, widest swing first. */
  ranked: TornadoImpact[];
}

const tornadoRanges = (
  bev: TornadoSubject,
  tables: ParameterTables,
  settings: CalculationSettings,
): Record<SensitivityParameter, [number, number]> => {
  const { annualKms, truckLifeYears, discountRate } = settings;
  const dieselPrice = getParameter(tables.financialParams, "diesel_price");
  const electricityPrice =
    bev.weightedElectricityPrice ??
    findChargingOption(tables.chargingOptions, settings.selectedChargingId).perKwhPrice;
  const ratePercent = discountRate * 100;

  return {
    "Annual Distance (km)": [annualKms * 0.5, annualKms * 1.5],
    "Diesel Price ($/L)": [dieselPrice * 0.8, dieselPrice * 1.2],
    "Vehicle Lifetime (years)": [Math.max(1, truckLifeYears - 3), truckLifeYears + 3],
    "Discount Rate (%)": [Math.max(0.5, ratePercent - 3), ratePercent + 3],
    "Electricity Price ($/kWh)": [electricityPrice * 0.8, electricityPrice * 1.2],
  };
};

export const calculateTornadoData = (
  bev: TornadoSubject,
  diesel: TornadoSubject,
  tables: ParameterTables,
  settings: CalculationSettings,
): TornadoResult => {
  if (!bev.fees || !diesel.fees) {
    throw new ParameterError("fees", "Vehicle fees data is required for tornado analysis");
  }
  const bevInputs = { vehicle: bev.vehicle, fees: bev.fees };
  const dieselInputs = { vehicle: diesel.vehicle, fees: diesel.fees };

  const baseTco = bev.tco.tcoPerKm;
  const ranges = runCalculationStep("tornado ranges", () => tornadoRanges(bev, tables, settings));

  const impacts = SENSITIVITY_PARAMETERS.map((parameter): TornadoImpact => {
    const [low, high] = ranges[parameter];
    const [atLow, atHigh] = performSensitivityAnalysis(
      parameter,
      [low, high],
      bevInputs,
      dieselInputs,
      tables,
      settings,
    );
    const minImpact = atLow.bev.tcoPerKm - baseTco;
    const maxImpact = atHigh.bev.tcoPerKm - baseTco;
    return { parameter, low, high, minImpact, maxImpact, spread: Math.abs(maxImpact - minImpact) };
  });

  return {
    baseTco,
    impacts,
    ranked: [...impacts].sort((a, b) => b.spread - a.spread),
  };
};

export interface ExternalitySensitivityRow {
  percentChange: number;
  bevExternalityPerKm: number;
  dieselExternalityPerKm: number;
  bevTcoPerKm: number;
  dieselTcoPerKm: number;
  bevSocialTcoPerKm: number;
  dieselSocialTcoPerKm: number;
  socialAbatementCost: number;
}

export const DEFAULT_EXTERNALITY_PERCENT_CHANGES = [-50, 0, 50, 100] as const;

/**
 * Scales every externality rate by each percentage and re-prices social TCO.
 * With no externality table the CO2 proxy's carbon price is scaled instead.
 */
export const performExternalitySensitivity = (
  bev: VehicleTcoResult,
  diesel: VehicleTcoResult,
  tables: ParameterTables,
  settings: CalculationSettings,
  percentChanges: readonly number[] = DEFAULT_EXTERNALITY_PERCENT_CHANGES,
): ExternalitySensitivityRow[] => {
  const { annualKms, truckLifeYears } = settings;
  const emissionSavings =
    toNumber(diesel.emissions.lifetimeEmissions) - toNumber(bev.emissions.lifetimeEmissions);

  const socialFor = (result: VehicleTcoResult, scale: number) => {
    const externalities = priceExternalities(result.vehicle, tables, settings, scale);
    const social = calculateSocialTco(
      result.tco,
      toNumber(externalities.npvExternality),
      annualKms,
      truckLifeYears,
      toNumber(result.vehicle.payloadTonnes),
    );
    return { externalities, social };
  };

  return percentChanges.map((percentChange) =>
    runCalculationStep(`externality sensitivity ${percentChange}%`, () => {
      const scale = 1 + percentChange / 100;
      const bevRun = socialFor(bev, scale);
      const dieselRun = socialFor(diesel, scale);
      const socialGap =
        toNumber(bevRun.social.socialTcoLifetime) - toNumber(dieselRun.social.socialTcoLifetime);

      return {
        percentChange,
        bevExternalityPerKm: bevRun.externalities.externalityPerKm,
        dieselExternalityPerKm: dieselRun.externalities.externalityPerKm,
        bevTcoPerKm: bev.tco.tcoPerKm,
        dieselTcoPerKm: diesel.tco.tcoPerKm,
        bevSocialTcoPerKm: bevRun.social.socialTcoPerKm,
        dieselSocialTcoPerKm: dieselRun.social.socialTcoPerKm,
        socialAbatementCost:
          emissionSavings > 0
            ? safeDivide(socialGap, emissionSavings / 1000, Number.POSITIVE_INFINITY)
            : Number.POSITIVE_INFINITY,
      };
    }),
  );
};
