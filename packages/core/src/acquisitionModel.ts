import { calculateResidualValue } from "./financialPrimitives";
import { adjustCostLine, type IncentiveContext } from "./incentives";
import {
  getParameterOr,
  type FeeSchedule,
  type FinancialParameters,
  type IncentiveRule,
  type VehicleSpec,
} from "./tables";
import { toNumber, usd, type USD } from "./units";

export const calculateAcquisitionCost = (
  vehicle: VehicleSpec,
  fees: FeeSchedule,
  incentives: readonly IncentiveRule[],
  applyIncentives: boolean,
): USD => {
  const context: IncentiveContext = {
    incentives,
    drivetrain: vehicle.drivetrain,
    applyIncentives,
  };
  const purchase = adjustCostLine(context, "purchase", toNumber(vehicle.msrpPrice));
  const stampDuty = adjustCostLine(context, "stampDuty", toNumber(fees.stampDuty));
  return usd(purchase.value + stampDuty.value);
};

// Depreciation keys missing from the table are treated as no depreciation.
export const residualValueFor = (
  vehicle: VehicleSpec,
  lifeYears: number,
  financialParams: FinancialParameters,
): USD =>
  usd(
    calculateResidualValue(
      toNumber(vehicle.msrpPrice),
      lifeYears,
      getParameterOr(financialParams, "initial_depreciation_percent", 0),
      getParameterOr(financialParams, "annual_depreciation_percent", 0),
    ),
  );
