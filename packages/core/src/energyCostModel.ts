import { DAYS_PER_YEAR, DEFAULT_CHARGER_POWER_KW } from "./defaults";
import { consumptionPer100km } from "./emissionsModel";
import { safeDivide } from "./financialPrimitives";
import {
  findChargingOption,
  getParameter,
  type ChargingMix,
  type ChargingOption,
  type FinancialParameters,
  type InfrastructureOption,
  type VehicleSpec,
} from "./tables";

const MIX_EPSILON = 1e-12;

export interface ChargingSelection {
  chargingMix?: ChargingMix;
  selectedChargingId: string;
}

export interface ChargingRequirements {
  dailyDistance: number;
  dailyKwhRequired: number;
  chargerPowerKw: number;
  chargingTimePerDay: number;
  maxVehiclesPerCharger: number;
}

const hasMix = (mix: ChargingMix | undefined): mix is ChargingMix =>
  mix !== undefined && Object.keys(mix).length > 0;

/**
 * Weighted $/kWh for a charging mix. Shares may be fractions or
 * percentages; they are divided by their sum before weighting.
 */
export const weightedElectricityPrice = (
  mix: ChargingMix,
  chargingOptions: readonly ChargingOption[],
): number => {
  const entries = Object.entries(mix);
  if (entries.length === 0) {
    return 0;
  }
  const total = entries.reduce((acc, [, share]) => acc + share, 0);
  if (total < MIX_EPSILON) {
    return 0;
  }

  return entries.reduce((acc, [chargingId, share]) => {
    const option = findChargingOption(chargingOptions, chargingId);
    return acc + option.perKwhPrice * (share / total);
  }, 0);
};

export const resolveElectricityPrice = (
  chargingOptions: readonly ChargingOption[],
  selection: ChargingSelection,
): number =>
  hasMix(selection.chargingMix)
    ? weightedElectricityPrice(selection.chargingMix, chargingOptions)
    : findChargingOption(chargingOptions, selection.selectedChargingId).perKwhPrice;

export const calculateEnergyCostPerKm = (
  vehicle: VehicleSpec,
  chargingOptions: readonly ChargingOption[],
  financialParams: FinancialParameters,
  selection: ChargingSelection,
): number => {
  const perKm = consumptionPer100km(vehicle) / 100;
  if (vehicle.drivetrain === "BEV") {
    return perKm * resolveElectricityPrice(chargingOptions, selection);
  }
  return perKm * getParameter(financialParams, "diesel_price");
};

/** Reads the number written just before "kW" in a free-text description. */
export const parseChargerPowerKw = (description: string): number => {
  if (!description.includes("kW")) {
    return DEFAULT_CHARGER_POWER_KW;
  }
  const token = description.split("kW")[0].trim().split(" ").at(-1) ?? "";
  const power = Number.parseFloat(token);
  return Number.isFinite(power) ? power : DEFAULT_CHARGER_POWER_KW;
};

export const calculateChargingRequirements = (
  vehicle: VehicleSpec,
  annualKms: number,
  infrastructureOption?: InfrastructureOption,
): ChargingRequirements => {
  if (vehicle.drivetrain !== "BEV") {
    return {
      dailyDistance: 0,
      dailyKwhRequired: 0,
      chargerPowerKw: 0,
      chargingTimePerDay: 0,
      maxVehiclesPerCharger: 0,
    };
  }

  const dailyDistance = annualKms / DAYS_PER_YEAR;
  const dailyKwhRequired =
    (dailyDistance * consumptionPer100km(vehicle)) / 100;
  const chargerPowerKw = infrastructureOption
    ? parseChargerPowerKw(infrastructureOption.infrastructureDescription)
    : DEFAULT_CHARGER_POWER_KW;
  const chargingTimePerDay = chargerPowerKw > 0 ? safeDivide(dailyKwhRequired, chargerPowerKw, 0) : 0;
  const maxVehiclesPerCharger =
    chargingTimePerDay > 0 ? safeDivide(24, chargingTimePerDay, 0) : 0;

  return {
    dailyDistance,
    dailyKwhRequired,
    chargerPowerKw,
    chargingTimePerDay,
    maxVehiclesPerCharger,
  };
};
