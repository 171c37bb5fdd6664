export const tcoPayload = {
  bev: {
    vehicle: {
      vehicleId: "bev-1",
      vehicleType: "Articulated",
      drivetrain: "BEV",
      msrpPrice: 400000,
      payloadTonnes: 20,
      kwhPer100km: 100,
      batteryCapacityKwh: 500,
    },
    fees: {
      vehicleId: "bev-1",
      maintenancePerKm: 0.1,
      registrationAnnual: 5000,
      insuranceAnnual: 10000,
      stampDuty: 10000,
    },
  },
  diesel: {
    vehicle: {
      vehicleId: "diesel-1",
      vehicleType: "Articulated",
      drivetrain: "Diesel",
      msrpPrice: 200000,
      payloadTonnes: 25,
      litresPer100km: 40,
    },
    fees: {
      vehicleId: "diesel-1",
      maintenancePerKm: 0.15,
      registrationAnnual: 6000,
      insuranceAnnual: 8000,
      stampDuty: 8000,
    },
  },
  tables: {
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
        infrastructurePrice: 100000,
        serviceLifeYears: 10,
        maintenancePercent: 0.05,
        infrastructureDescription: "Depot 150kW DC charger",
      },
    ],
    incentives: [
      { incentiveType: "purchase_rebate_aud", drivetrain: "BEV", active: true, rate: 20000 },
      { incentiveType: "stamp_duty_exemption", drivetrain: "All", active: true, rate: 0.5 },
      { incentiveType: "charging_infrastructure_subsidy", drivetrain: "BEV", active: true, rate: 0.2 },
    ],
    emissionFactors: [
      { fuelType: "electricity", emissionStandard: "Grid", co2PerUnit: 0.5 },
      { fuelType: "diesel", emissionStandard: "Euro IV+", co2PerUnit: 2.7 },
    ],
    externalities: [
      { vehicleClass: "Articulated", drivetrain: "BEV", pollutantType: "externalities_total", costPerKm: 0.02 },
      { vehicleClass: "Articulated", drivetrain: "Diesel", pollutantType: "externalities_total", costPerKm: 0.1 },
    ],
  },
  settings: {
    annualKms: 100000,
    truckLifeYears: 10,
    discountRate: 0,
    selectedChargingId: "depot",
    selectedInfrastructureId: "depot-150",
  },
};

export const postJson = (path: string, body: unknown): Request =>
  new Request(`http://localhost${path}`, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body),
  });
