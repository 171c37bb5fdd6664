import { adjustCostLine, type IncentiveContext } from "./incentives";
import type { FeeSchedule, IncentiveRule, VehicleSpec } from "./tables";
import { toNumber, usd, type USD } from "./units";

export interface AnnualCosts {
  annualEnergyCost: USD;
  annualMaintenanceCost: USD;
  registrationAnnual: USD;
  insuranceAnnual: USD;
  annualOperatingCost: USD;
}

export const calculateAnnualCosts = (
  vehicle: VehicleSpec,
  fees: FeeSchedule,
  energyCostPerKm: number,
  annualKms: number,
  incentives: readonly IncentiveRule[],
  applyIncentives: boolean,
): AnnualCosts => {
  const context: IncentiveContext = {
    incentives,
    drivetrain: vehicle.drivetrain,
    applyIncentives,
  };

  const energy = adjustCostLine(context, "energy", energyCostPerKm * annualKms).value;
  const maintenance = toNumber(fees.maintenancePerKm) * annualKms;
  const registration = adjustCostLine(
    context,
    "registration",
    toNumber(fees.registrationAnnual),
  ).value;
  const insurance = adjustCostLine(context, "insurance", toNumber(fees.insuranceAnnual)).value;

  return {
    annualEnergyCost: usd(energy),
    annualMaintenanceCost: usd(maintenance),
    registrationAnnual: usd(registration),
    insuranceAnnual: usd(insurance),
    annualOperatingCost: usd(energy + maintenance + registration + insurance),
  };
};
