import type {
  CalculationSettings,
  ParameterTables,
  VehicleInputs,
} from "./tables";
import { kgCO2e, tonnes, usd } from "./units";

export const bevInputs: VehicleInputs = {
  vehicle: {
    vehicleId: "bev-1",
    vehicleModel: "Test BEV Prime Mover",
    vehicleType: "Articulated",
    drivetrain: "BEV",
    msrpPrice: usd(400000),
    payloadTonnes: tonnes(20),
    kwhPer100km: 100,
    batteryCapacityKwh: 500,
  },
  fees: {
    vehicleId: "bev-1",
    maintenancePerKm: usd(0.1),
    registrationAnnual: usd(5000),
    insuranceAnnual: usd(10000),
    stampDuty: usd(10000),
  },
};

export const dieselInputs: VehicleInputs = {
  vehicle: {
    vehicleId: "diesel-1",
    vehicleModel: "Test Diesel Prime Mover",
    vehicleType: "Articulated",
    drivetrain: "Diesel",
    msrpPrice: usd(200000),
    payloadTonnes: tonnes(25),
    litresPer100km: 40,
  },
  fees: {
    vehicleId: "diesel-1",
    maintenancePerKm: usd(0.15),
    registrationAnnual: usd(6000),
    insuranceAnnual: usd(8000),
    stampDuty: usd(8000),
  },
};

export const tables: ParameterTables = {
  financialParams: {
    diesel_price: 2,
    initial_depreciation_percent: 0.2,
    annual_depreciation_percent: 0.1,
  },
  batteryParams: {
    replacementCostPerKwh: 100,
    degradationAnnualRate: 0.02,
    minimumCapacity: 0.7,
  },
  chargingOptions: [
    { chargingId: "depot", perKwhPrice: 0.2, chargingApproach: "Depot overnight" },
    { chargingId: "public", perKwhPrice: 0.4, chargingApproach: "Public fast charging" },
  ],
  infrastructureOptions: [
    {
      infrastructureId: "depot-150",
      infrastructurePrice: usd(100000),
      serviceLifeYears: 10,
      maintenancePercent: 0.05,
      infrastructureDescription: "Depot 150kW DC charger",
    },
  ],
  incentives: [
    { incentiveType: "purchase_rebate_aud", drivetrain: "BEV", active: true, rate: 20000 },
    { incentiveType: "stamp_duty_exemption", drivetrain: "All", active: true, rate: 0.5 },
    { incentiveType: "registration_exemption", drivetrain: "BEV", active: false, rate: 0.5 },
    { incentiveType: "charging_infrastructure_subsidy", drivetrain: "BEV", active: true, rate: 0.2 },
    { incentiveType: "toll_road_exemption", drivetrain: "BEV", active: true, rate: 1 },
  ],
  emissionFactors: [
    { fuelType: "electricity", emissionStandard: "Grid", co2PerUnit: kgCO2e(0.5) },
    { fuelType: "diesel", emissionStandard: "Euro IV+", co2PerUnit: kgCO2e(2.7) },
  ],
  externalities: [
    { vehicleClass: "Articulated", drivetrain: "BEV", pollutantType: "externalities_total", costPerKm: 0.02 },
    { vehicleClass: "Articulated", drivetrain: "BEV", pollutantType: "pm25", costPerKm: 0.015 },
    { vehicleClass: "Articulated", drivetrain: "BEV", pollutantType: "noise", costPerKm: 0.005 },
    { vehicleClass: "Articulated", drivetrain: "Diesel", pollutantType: "externalities_total", costPerKm: 0.1 },
    { vehicleClass: "Articulated", drivetrain: "Diesel", pollutantType: "pm25", costPerKm: 0.06 },
    { vehicleClass: "Articulated", drivetrain: "Diesel", pollutantType: "nox", costPerKm: 0.04 },
  ],
};

/** Zero discount rate keeps every NPV a plain sum. */
export const settings: CalculationSettings = {
  annualKms: 100000,
  truckLifeYears: 10,
  discountRate: 0,
  fleetSize: 1,
  applyIncentives: true,
  selectedChargingId: "depot",
  selectedInfrastructureId: "depot-150",
};
