export * from "./units";
export * from "./errors";
export * from "./defaults";
export * from "./tables";
export * from "./incentives";
export * from "./financialPrimitives";
export * from "./energyCostModel";
export * from "./emissionsModel";
export * from "./annualCostModel";
export * from "./acquisitionModel";
export * from "./batteryReplacementModel";
export * from "./infrastructureCostModel";
export * from "./externalityModel";
export * from "./tcoAggregator";
export * from "./vehicleTco";
export * from "./comparativeMetrics";
export * from "./calculationCache";
export * from "./sensitivity/sensitivityEngine";
export * from "./sensitivity/tornado";
