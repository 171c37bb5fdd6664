import { calculateAcquisitionCost, residualValueFor } from "./acquisitionModel";
import { calculateAnnualCosts, type AnnualCosts } from "./annualCostModel";
import {
  calculateBatteryReplacement,
  type BatteryReplacement,
} from "./batteryReplacementModel";
import { calculateEmissions, type EmissionsResult } from "./emissionsModel";
import {
  calculateChargingRequirements,
  calculateEnergyCostPerKm,
  weightedElectricityPrice,
  type ChargingRequirements,
} from "./energyCostModel";
import { runCalculationStep } from "./errors";
import { priceExternalities, type ExternalityResult } from "./externalityModel";
import { npvConstant } from "./financialPrimitives";
import {
  applyInfrastructureIncentives,
  calculateInfrastructureCosts,
  type IncentivizedInfrastructureCosts,
} from "./infrastructureCostModel";
import {
  findInfrastructureOption,
  type CalculationSettings,
  type FeeSchedule,
  type ParameterTables,
  type VehicleInputs,
  type VehicleSpec,
} from "./tables";
import { calculateSocialTco, calculateTco, type SocialTco, type TcoSummary } from "./tcoAggregator";
import { toNumber, usd, type USD } from "./units";

export interface VehicleTcoResult {
  vehicle: VehicleSpec;
  fees: FeeSchedule;
  annualKms: number;
  truckLifeYears: number;
  discountRate: number;
  energyCostPerKm: number;
  /** Set only for a BEV priced from a charging mix. */
  weightedElectricityPrice: number | null;
  annualCosts: AnnualCosts;
  npvAnnualOperatingCost: USD;
  acquisitionCost: USD;
  residualValue: USD;
  battery: BatteryReplacement;
  emissions: EmissionsResult;
  externalities: ExternalityResult;
  infrastructure: IncentivizedInfrastructureCosts | null;
  chargingRequirements: ChargingRequirements | null;
  tco: TcoSummary;
  social: SocialTco;
}

export const calculateVehicleTco = (
  inputs: VehicleInputs,
  tables: ParameterTables,
  settings: CalculationSettings,
): VehicleTcoResult => {
  const { vehicle, fees } = inputs;
  const { annualKms, truckLifeYears, discountRate, applyIncentives } = settings;
  const isBev = vehicle.drivetrain === "BEV";
  const mix = settings.chargingMix;

  const energyCostPerKm = runCalculationStep("energy cost", () =>
    calculateEnergyCostPerKm(vehicle, tables.chargingOptions, tables.financialParams, {
      chargingMix: mix,
      selectedChargingId: settings.selectedChargingId,
    }),
  );
  const mixPrice =
    isBev && mix && Object.keys(mix).length > 0
      ? runCalculationStep("weighted electricity price", () =>
          weightedElectricityPrice(mix, tables.chargingOptions),
        )
      : null;

  const annualCosts = runCalculationStep("annual costs", () =>
    calculateAnnualCosts(vehicle, fees, energyCostPerKm, annualKms, tables.incentives, applyIncentives),
  );
  const npvAnnualOperatingCost = runCalculationStep("operating cost NPV", () =>
    npvConstant(toNumber(annualCosts.annualOperatingCost), discountRate, truckLifeYears),
  );
  const acquisitionCost = runCalculationStep("acquisition cost", () =>
    calculateAcquisitionCost(vehicle, fees, tables.incentives, applyIncentives),
  );
  const residualValue = runCalculationStep("residual value", () =>
    residualValueFor(vehicle, truckLifeYears, tables.financialParams),
  );
  const battery = runCalculationStep("battery replacement", () =>
    calculateBatteryReplacement(vehicle, tables.batteryParams, truckLifeYears, discountRate),
  );
  const emissions = runCalculationStep("emissions", () =>
    calculateEmissions(vehicle, tables.emissionFactors, annualKms, truckLifeYears),
  );
  const externalities = runCalculationStep("externalities", () =>
    priceExternalities(vehicle, tables, settings),
  );

  const infrastructureOption = isBev
    ? findInfrastructureOption(tables.infrastructureOptions, settings.selectedInfrastructureId)
    : null;
  const infrastructure = infrastructureOption
    ? runCalculationStep("infrastructure costs", () =>
        applyInfrastructureIncentives(
          calculateInfrastructureCosts(
            infrastructureOption,
            truckLifeYears,
            discountRate,
            settings.fleetSize,
          ),
          tables.incentives,
          applyIncentives,
        ),
      )
    : null;
  const chargingRequirements = infrastructureOption
    ? runCalculationStep("charging requirements", () =>
        calculateChargingRequirements(vehicle, annualKms, infrastructureOption),
      )
    : null;

  const tco = runCalculationStep("tco", () =>
    calculateTco({
      acquisitionCost: toNumber(acquisitionCost),
      residualValue: toNumber(residualValue),
      npvAnnualOperatingCost,
      npvBatteryReplacement: toNumber(battery.npvReplacementCost),
      npvInfrastructure: infrastructure ? toNumber(infrastructure.npvPerVehicleWithIncentives) : 0,
      annualKms,
      lifeYears: truckLifeYears,
      payloadTonnes: toNumber(vehicle.payloadTonnes),
    }),
  );
  const social = runCalculationStep("social tco", () =>
    calculateSocialTco(
      tco,
      toNumber(externalities.npvExternality),
      annualKms,
      truckLifeYears,
      toNumber(vehicle.payloadTonnes),
    ),
  );

  return {
    vehicle,
    fees,
    annualKms,
    truckLifeYears,
    discountRate,
    energyCostPerKm,
    weightedElectricityPrice: mixPrice,
    annualCosts,
    npvAnnualOperatingCost: usd(npvAnnualOperatingCost),
    acquisitionCost,
    residualValue,
    battery,
    emissions,
    externalities,
    infrastructure,
    chargingRequirements,
    tco,
    social,
  };
};
