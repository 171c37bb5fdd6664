import { randomUUID } from "node:crypto";
import { z } from "zod";
import {
  CALCULATION_LIMITS,
  DEFAULT_CALCULATION_SETTINGS,
  INCENTIVE_TYPES,
  calculationFingerprint,
  compareVehicles,
  kgCO2e,
  tonnes,
  usd,
  type CalculationSettings,
  type ParameterTables,
  type VehicleComparison,
  type VehicleInputs,
} from "@truck-tco/core";

const drivetrainSchema = z.enum(["BEV", "Diesel"]);

export const vehicleSchema = z
  .object({
    vehicleId: z.string().min(1),
    vehicleModel: z.string().optional(),
    vehicleType: z.string().min(1),
    drivetrain: drivetrainSchema,
    msrpPrice: z.number().nonnegative(),
    payloadTonnes: z.number().nonnegative(),
    kwhPer100km: z.number().positive().optional(),
    litresPer100km: z.number().positive().optional(),
    batteryCapacityKwh: z.number().nonnegative().optional(),
  })
  .strict()
  .superRefine((value, context) => {
    if (value.drivetrain === "BEV" && value.kwhPer100km === undefined) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${value.vehicleId}: kwhPer100km is required for a BEV`,
      });
    }
    if (value.drivetrain === "Diesel" && value.litresPer100km === undefined) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${value.vehicleId}: litresPer100km is required for a Diesel vehicle`,
      });
    }
  });

export const feeScheduleSchema = z
  .object({
    vehicleId: z.string().min(1),
    maintenancePerKm: z.number().nonnegative(),
    registrationAnnual: z.number().nonnegative(),
    insuranceAnnual: z.number().nonnegative(),
    stampDuty: z.number().nonnegative(),
  })
  .strict();

export const vehicleInputsSchema = z
  .object({
    vehicle: vehicleSchema,
    fees: feeScheduleSchema,
  })
  .strict()
  .superRefine((value, context) => {
    if (value.fees.vehicleId !== value.vehicle.vehicleId) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        message: `fees.vehicleId must match vehicle.vehicleId (${value.vehicle.vehicleId})`,
      });
    }
  });

export const parameterTablesSchema = z
  .object({
    financialParams: z.record(z.number()),
    batteryParams: z
      .object({
        replacementCostPerKwh: z.number().nonnegative(),
        degradationAnnualRate: z.number().min(0).max(1),
        minimumCapacity: z.number().min(0).max(1),
      })
      .strict(),
    chargingOptions: z
      .array(
        z
          .object({
            chargingId: z.string().min(1),
            perKwhPrice: z.number().nonnegative(),
            chargingApproach: z.string(),
          })
          .strict(),
      )
      .min(1),
    infrastructureOptions: z.array(
      z
        .object({
          infrastructureId: z.string().min(1),
          infrastructurePrice: z.number().nonnegative(),
          serviceLifeYears: z.number().positive(),
          maintenancePercent: z.number().min(0).max(1),
          infrastructureDescription: z.string(),
        })
        .strict(),
    ),
    incentives: z
      .array(
        z
          .object({
            incentiveType: z.enum(INCENTIVE_TYPES),
            drivetrain: z.enum(["BEV", "Diesel", "All"]),
            active: z.boolean(),
            rate: z.number().nonnegative(),
          })
          .strict(),
      )
      .default([]),
    emissionFactors: z.array(
      z
        .object({
          fuelType: z.string().min(1),
          emissionStandard: z.string(),
          co2PerUnit: z.number().nonnegative(),
        })
        .strict(),
    ),
    externalities: z
      .array(
        z
          .object({
            vehicleClass: z.string().min(1),
            drivetrain: drivetrainSchema,
            pollutantType: z.string().min(1),
            costPerKm: z.number().nonnegative(),
          })
          .strict(),
      )
      .default([]),
  })
  .strict();

const limits = CALCULATION_LIMITS;

export const settingsSchema = z
  .object({
    annualKms: z.number().min(limits.annualKms.min).max(limits.annualKms.max).optional(),
    truckLifeYears: z
      .number()
      .int()
      .min(limits.truckLifeYears.min)
      .max(limits.truckLifeYears.max)
      .optional(),
    discountRate: z.number().min(limits.discountRate.min).max(limits.discountRate.max).optional(),
    fleetSize: z.number().int().min(limits.fleetSize.min).max(limits.fleetSize.max).optional(),
    applyIncentives: z.boolean().optional(),
    chargingMix: z.record(z.number().nonnegative()).optional(),
    selectedChargingId: z.string().min(1),
    selectedInfrastructureId: z.string().min(1),
  })
  .strict();

export const comparisonOptionsSchema = z
  .object({
    batteryCashFlow: z.enum(["npv-only", "curve"]).optional(),
  })
  .strict()
  .optional();

export const comparisonRequestObject = z
  .object({
    bev: vehicleInputsSchema,
    diesel: vehicleInputsSchema,
    tables: parameterTablesSchema,
    settings: settingsSchema,
    options: comparisonOptionsSchema,
  })
  .strict();

export const requireBevAgainstDiesel = (
  value: { bev: VehicleInputsPayload; diesel: VehicleInputsPayload },
  context: z.RefinementCtx,
): void => {
  if (value.bev.vehicle.drivetrain !== "BEV") {
    context.addIssue({
      code: z.ZodIssueCode.custom,
      message: "bev.vehicle.drivetrain must be BEV",
    });
  }
  if (value.diesel.vehicle.drivetrain !== "Diesel") {
    context.addIssue({
      code: z.ZodIssueCode.custom,
      message: "diesel.vehicle.drivetrain must be Diesel",
    });
  }
};

export const tcoRequestSchema = comparisonRequestObject.superRefine(requireBevAgainstDiesel);

export type TcoRequestPayload = z.infer<typeof tcoRequestSchema>;
export type ComparisonRequestPayload = z.infer<typeof comparisonRequestObject>;
export type VehicleInputsPayload = z.infer<typeof vehicleInputsSchema>;
export type ParameterTablesPayload = z.infer<typeof parameterTablesSchema>;
export type SettingsPayload = z.infer<typeof settingsSchema>;

export interface AssumptionUsed {
  name: string;
  value: number | boolean;
  source: "request" | "core-default";
  description: string;
}

export const toCoreVehicleInputs = (input: VehicleInputsPayload): VehicleInputs => ({
  vehicle: {
    ...input.vehicle,
    msrpPrice: usd(input.vehicle.msrpPrice),
    payloadTonnes: tonnes(input.vehicle.payloadTonnes),
  },
  fees: {
    vehicleId: input.fees.vehicleId,
    maintenancePerKm: usd(input.fees.maintenancePerKm),
    registrationAnnual: usd(input.fees.registrationAnnual),
    insuranceAnnual: usd(input.fees.insuranceAnnual),
    stampDuty: usd(input.fees.stampDuty),
  },
});

export const toCoreTables = (input: ParameterTablesPayload): ParameterTables => ({
  ...input,
  infrastructureOptions: input.infrastructureOptions.map((option) => ({
    ...option,
    infrastructurePrice: usd(option.infrastructurePrice),
  })),
  emissionFactors: input.emissionFactors.map((factor) => ({
    ...factor,
    co2PerUnit: kgCO2e(factor.co2PerUnit),
  })),
});

const resolveAssumption = <T extends number | boolean>(
  value: T | undefined,
  fallback: T,
  name: string,
  description: string,
  assumptionsUsed: AssumptionUsed[],
): T => {
  const resolved = value ?? fallback;
  assumptionsUsed.push({
    name,
    value: resolved,
    source: value === undefined ? "core-default" : "request",
    description,
  });
  return resolved;
};

export const resolveSettings = (
  input: SettingsPayload,
): { settings: CalculationSettings; assumptionsUsed: AssumptionUsed[] } => {
  const assumptionsUsed: AssumptionUsed[] = [];
  const defaults = DEFAULT_CALCULATION_SETTINGS;

  const settings: CalculationSettings = {
    annualKms: resolveAssumption(
      input.annualKms,
      defaults.annualKms,
      "settings.annualKms",
      "Distance driven per vehicle per year (km).",
      assumptionsUsed,
    ),
    truckLifeYears: resolveAssumption(
      input.truckLifeYears,
      defaults.truckLifeYears,
      "settings.truckLifeYears",
      "Operating life over which costs are discounted (years).",
      assumptionsUsed,
    ),
    discountRate: resolveAssumption(
      input.discountRate,
      defaults.discountRate,
      "settings.discountRate",
      "Real discount rate applied to every cash flow (fraction).",
      assumptionsUsed,
    ),
    fleetSize: resolveAssumption(
      input.fleetSize,
      defaults.fleetSize,
      "settings.fleetSize",
      "Vehicles sharing the charging infrastructure.",
      assumptionsUsed,
    ),
    applyIncentives: resolveAssumption(
      input.applyIncentives,
      defaults.applyIncentives,
      "settings.applyIncentives",
      "Whether active BEV incentives reduce costs.",
      assumptionsUsed,
    ),
    chargingMix: input.chargingMix,
    selectedChargingId: input.selectedChargingId,
    selectedInfrastructureId: input.selectedInfrastructureId,
  };

  return { settings, assumptionsUsed };
};

/** JSON has no Infinity; "never" is reported as null. */
export const finiteOrNull = (value: number): number | null =>
  Number.isFinite(value) ? value : null;

export interface TcoResponse {
  summary: {
    bevTcoPerKm: number;
    dieselTcoPerKm: number;
    bevLifetimeTco: number;
    dieselLifetimeTco: number;
    tcoSavingsLifetime: number;
    priceParityYear: number | null;
    simpleParityYear: number | null;
    parityMethod: "curve" | "algebraic" | "none";
    abatementCost: number | null;
    benefitCostRatio: number | null;
    socialPaybackPeriod: number | null;
  };
  comparison: VehicleComparison;
  settings: CalculationSettings;
  assumptionsUsed: AssumptionUsed[];
  /** Stable display id of the request; equal inputs share it. */
  inputFingerprint: string;
  traceId: string;
}

export interface ResolvedComparison {
  comparison: VehicleComparison;
  tables: ParameterTables;
  settings: CalculationSettings;
  assumptionsUsed: AssumptionUsed[];
}

export const runComparison = (payload: ComparisonRequestPayload): ResolvedComparison => {
  const { settings, assumptionsUsed } = resolveSettings(payload.settings);
  const tables = toCoreTables(payload.tables);
  const comparison = compareVehicles(
    toCoreVehicleInputs(payload.bev),
    toCoreVehicleInputs(payload.diesel),
    tables,
    settings,
    { batteryCashFlow: payload.options?.batteryCashFlow },
  );
  return { comparison, tables, settings, assumptionsUsed };
};

export const buildTcoResponse = (
  payload: TcoRequestPayload,
  traceId: string = randomUUID(),
): TcoResponse => {
  const { comparison, settings, assumptionsUsed } = runComparison(payload);
  const { bev, diesel, metrics, socialBenefit } = comparison;

  return {
    summary: {
      bevTcoPerKm: bev.tco.tcoPerKm,
      dieselTcoPerKm: diesel.tco.tcoPerKm,
      bevLifetimeTco: bev.tco.tcoLifetime,
      dieselLifetimeTco: diesel.tco.tcoLifetime,
      tcoSavingsLifetime: comparison.tcoSavingsLifetime,
      priceParityYear: finiteOrNull(metrics.priceParityYear),
      simpleParityYear: finiteOrNull(metrics.simpleParityYear),
      parityMethod: metrics.parityMethod,
      abatementCost: finiteOrNull(metrics.abatementCost),
      benefitCostRatio: finiteOrNull(socialBenefit.benefitCostRatio),
      socialPaybackPeriod: finiteOrNull(socialBenefit.socialPaybackPeriod),
    },
    comparison,
    settings,
    assumptionsUsed,
    inputFingerprint: calculationFingerprint(payload),
    traceId,
  };
};
