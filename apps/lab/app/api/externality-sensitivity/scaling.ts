import { randomUUID } from "node:crypto";
import { z } from "zod";
import {
  DEFAULT_EXTERNALITY_PERCENT_CHANGES,
  performExternalitySensitivity,
} from "@truck-tco/core";
import {
  comparisonRequestObject,
  finiteOrNull,
  requireBevAgainstDiesel,
  runComparison,
  type AssumptionUsed,
} from "../tco/comparison";

export const externalitySensitivityRequestSchema = comparisonRequestObject
  .extend({
    percentChanges: z.array(z.number().min(-100).max(1000)).min(1).max(20).optional(),
  })
  .superRefine(requireBevAgainstDiesel);

export type ExternalitySensitivityRequestPayload = z.infer<
  typeof externalitySensitivityRequestSchema
>;

export interface ExternalitySensitivityPoint {
  percentChange: number;
  bevExternalityPerKm: number;
  dieselExternalityPerKm: number;
  bevTcoPerKm: number;
  dieselTcoPerKm: number;
  bevSocialTcoPerKm: number;
  dieselSocialTcoPerKm: number;
  socialAbatementCost: number | null;
}

export interface ExternalitySensitivityResponse {
  rows: ExternalitySensitivityPoint[];
  assumptionsUsed: AssumptionUsed[];
  traceId: string;
}

export const buildExternalitySensitivityResponse = (
  payload: ExternalitySensitivityRequestPayload,
  traceId: string = randomUUID(),
): ExternalitySensitivityResponse => {
  const { comparison, tables, settings, assumptionsUsed } = runComparison(payload);
  const rows = performExternalitySensitivity(
    comparison.bev,
    comparison.diesel,
    tables,
    settings,
    payload.percentChanges ?? DEFAULT_EXTERNALITY_PERCENT_CHANGES,
  );

  return {
    rows: rows.map((row) => ({
      ...row,
      socialAbatementCost: finiteOrNull(row.socialAbatementCost),
    })),
    assumptionsUsed,
    traceId,
  };
};
