import type { BatteryParameters, VehicleSpec } from "./tables";
import { toNumber, usd, type USD } from "./units";

export interface BatteryReplacement {
  /** Fractional year the pack reaches its minimum capacity, null when it never does within life. */
  replacementYear: number | null;
  replacementCost: USD;
  npvReplacementCost: USD;
}

const NO_REPLACEMENT: BatteryReplacement = {
  replacementYear: null,
  replacementCost: usd(0),
  npvReplacementCost: usd(0),
};

export const yearsUntilReplacement = (battery: BatteryParameters): number => {
  const { minimumCapacity, degradationAnnualRate } = battery;
  if (degradationAnnualRate <= 0 || minimumCapacity <= 0) {
    return Number.POSITIVE_INFINITY;
  }
  if (degradationAnnualRate >= 1) {
    return 0;
  }
  return Math.log(minimumCapacity) / Math.log(1 - degradationAnnualRate);
};

export const calculateBatteryReplacement = (
  vehicle: VehicleSpec,
  battery: BatteryParameters,
  lifeYears: number,
  discountRate: number,
): BatteryReplacement => {
  if (vehicle.drivetrain !== "BEV") {
    return { ...NO_REPLACEMENT };
  }

  const replacementYear = yearsUntilReplacement(battery);
  if (replacementYear > lifeYears) {
    return { ...NO_REPLACEMENT };
  }

  const replacementCost = (vehicle.batteryCapacityKwh ?? 0) * battery.replacementCostPerKwh;
  return {
    replacementYear,
    replacementCost: usd(replacementCost),
    npvReplacementCost: usd(replacementCost / (1 + discountRate) ** replacementYear),
  };
};

export const npvBatteryReplacement = (
  vehicle: VehicleSpec,
  battery: BatteryParameters,
  lifeYears: number,
  discountRate: number,
): number =>
  toNumber(calculateBatteryReplacement(vehicle, battery, lifeYears, discountRate).npvReplacementCost);
