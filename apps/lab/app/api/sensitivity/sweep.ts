import { randomUUID } from "node:crypto";
import { z } from "zod";
import {
  SENSITIVITY_PARAMETERS,
  performSensitivityAnalysis,
  type CalculationSettings,
  type SensitivityRow,
} from "@truck-tco/core";
import {
  comparisonRequestObject,
  requireBevAgainstDiesel,
  resolveSettings,
  toCoreTables,
  toCoreVehicleInputs,
  type AssumptionUsed,
} from "../tco/comparison";

export const sensitivityRequestSchema = comparisonRequestObject
  .omit({ options: true })
  .extend({
    parameter: z.enum(SENSITIVITY_PARAMETERS),
    values: z.array(z.number().finite()).min(1).max(50),
  })
  .superRefine(requireBevAgainstDiesel);

export type SensitivityRequestPayload = z.infer<typeof sensitivityRequestSchema>;

export interface SensitivityResponse {
  parameter: SensitivityRequestPayload["parameter"];
  rows: SensitivityRow[];
  settings: CalculationSettings;
  assumptionsUsed: AssumptionUsed[];
  traceId: string;
}

export const buildSensitivityResponse = (
  payload: SensitivityRequestPayload,
  traceId: string = randomUUID(),
): SensitivityResponse => {
  const { settings, assumptionsUsed } = resolveSettings(payload.settings);
  const rows = performSensitivityAnalysis(
    payload.parameter,
    payload.values,
    toCoreVehicleInputs(payload.bev),
    toCoreVehicleInputs(payload.diesel),
    toCoreTables(payload.tables),
    settings,
  );

  return { parameter: payload.parameter, rows, settings, assumptionsUsed, traceId };
};
