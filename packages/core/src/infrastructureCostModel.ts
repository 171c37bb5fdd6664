import { validatePositive } from "./errors";
import { safeDivide } from "./financialPrimitives";
import { adjustCostLine } from "./incentives";
import type { IncentiveRule, InfrastructureOption } from "./tables";
import { toNumber, usd, type USD } from "./units";

export interface InfrastructureCosts {
  infrastructurePrice: USD;
  serviceLifeYears: number;
  annualMaintenance: USD;
  annualCapitalCost: USD;
  totalAnnualCost: USD;
  perVehicleAnnualCost: USD;
  replacementCycles: number;
  npvInfrastructure: USD;
  npvPerVehicle: USD;
  fleetSize: number;
}

export interface IncentivizedInfrastructureCosts extends InfrastructureCosts {
  infrastructurePriceWithIncentives: USD;
  npvInfrastructureWithIncentives: USD;
  npvPerVehicleWithIncentives: USD;
  subsidyRate: number;
  subsidyAmount: USD;
  appliedIncentives: IncentiveRule[];
}

export const replacementCyclesFor = (lifeYears: number, serviceLifeYears: number): number =>
  Math.max(1, Math.ceil(safeDivide(lifeYears, serviceLifeYears, 1)));

/**
 * Capital is paid at the start of every service cycle that begins inside
 * the vehicle life (the first one undiscounted); maintenance is paid at the
 * end of each year the cycle is in use.
 */
export const computeInfrastructureNpv = (
  price: number,
  serviceLifeYears: number,
  discountRate: number,
  lifeYears: number,
  annualMaintenance: number,
): number => {
  const cycles = replacementCyclesFor(lifeYears, serviceLifeYears);
  let npv = 0;

  for (let cycle = 0; cycle < cycles; cycle += 1) {
    const startYear = cycle * serviceLifeYears;
    if (startYear >= lifeYears) {
      break;
    }
    npv += cycle === 0 ? price : price / (1 + discountRate) ** startYear;

    const yearsInCycle = Math.min(serviceLifeYears, lifeYears - startYear);
    for (let year = 0; year < yearsInCycle; year += 1) {
      npv += annualMaintenance / (1 + discountRate) ** (startYear + year + 1);
    }
  }

  return npv;
};

export const calculateInfrastructureCosts = (
  option: InfrastructureOption,
  lifeYears: number,
  discountRate: number,
  fleetSize: number,
): InfrastructureCosts => {
  validatePositive(option.serviceLifeYears, "serviceLifeYears");
  validatePositive(fleetSize, "fleetSize");

  const price = toNumber(option.infrastructurePrice);
  const annualMaintenance = price * option.maintenancePercent;
  const annualCapitalCost = safeDivide(price, option.serviceLifeYears, 0);
  const totalAnnualCost = annualCapitalCost + annualMaintenance;
  const npvInfrastructure = computeInfrastructureNpv(
    price,
    option.serviceLifeYears,
    discountRate,
    lifeYears,
    annualMaintenance,
  );

  return {
    infrastructurePrice: usd(price),
    serviceLifeYears: option.serviceLifeYears,
    annualMaintenance: usd(annualMaintenance),
    annualCapitalCost: usd(annualCapitalCost),
    totalAnnualCost: usd(totalAnnualCost),
    perVehicleAnnualCost: usd(safeDivide(totalAnnualCost, fleetSize, 0)),
    replacementCycles: replacementCyclesFor(lifeYears, option.serviceLifeYears),
    npvInfrastructure: usd(npvInfrastructure),
    npvPerVehicle: usd(safeDivide(npvInfrastructure, fleetSize, 0)),
    fleetSize,
  };
};

export const applyInfrastructureIncentives = (
  costs: InfrastructureCosts,
  incentives: readonly IncentiveRule[],
  applyIncentives: boolean,
): IncentivizedInfrastructureCosts => {
  const price = toNumber(costs.infrastructurePrice);
  const adjustment = adjustCostLine(
    { incentives, drivetrain: "BEV", applyIncentives },
    "infrastructure",
    price,
  );
  const subsidyRate = safeDivide(adjustment.reduction, price, 0);
  const keep = 1 - subsidyRate;

  return {
    ...costs,
    infrastructurePriceWithIncentives: usd(price * keep),
    npvInfrastructureWithIncentives: usd(toNumber(costs.npvInfrastructure) * keep),
    npvPerVehicleWithIncentives: usd(toNumber(costs.npvPerVehicle) * keep),
    subsidyRate,
    subsidyAmount: usd(adjustment.reduction),
    appliedIncentives: adjustment.applied,
  };
};
