import { EMISSION_FACTOR_KEYS } from "./defaults";
import { ParameterError } from "./errors";
import { findEmissionFactor, type EmissionFactor, type VehicleSpec } from "./tables";
import { kgCO2e, toNumber, type KgCO2e } from "./units";

export interface EmissionsResult {
  co2PerKm: KgCO2e;
  annualEmissions: KgCO2e;
  lifetimeEmissions: KgCO2e;
}

/** kWh or litres per 100 km, depending on the drivetrain. */
export const consumptionPer100km = (vehicle: VehicleSpec): number => {
  const value = vehicle.drivetrain === "BEV" ? vehicle.kwhPer100km : vehicle.litresPer100km;
  if (value === undefined) {
    const name = vehicle.drivetrain === "BEV" ? "kwhPer100km" : "litresPer100km";
    throw new ParameterError(name, `${name} is required for ${vehicle.vehicleId}`);
  }
  return value;
};

export const calculateEmissions = (
  vehicle: VehicleSpec,
  emissionFactors: readonly EmissionFactor[],
  annualKms: number,
  lifeYears: number,
): EmissionsResult => {
  const key = EMISSION_FACTOR_KEYS[vehicle.drivetrain];
  const factor = findEmissionFactor(emissionFactors, key.fuelType, key.emissionStandard);

  const co2PerKm = (consumptionPer100km(vehicle) / 100) * toNumber(factor.co2PerUnit);
  const annualEmissions = co2PerKm * annualKms;

  return {
    co2PerKm: kgCO2e(co2PerKm),
    annualEmissions: kgCO2e(annualEmissions),
    lifetimeEmissions: kgCO2e(annualEmissions * lifeYears),
  };
};
