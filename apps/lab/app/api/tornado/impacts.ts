import { randomUUID } from "node:crypto";
import { z } from "zod";
import { calculateTornadoData, type TornadoImpact } from "@truck-tco/core";
import {
  comparisonRequestObject,
  requireBevAgainstDiesel,
  runComparison,
  type AssumptionUsed,
} from "../tco/comparison";

export const tornadoRequestSchema = comparisonRequestObject.superRefine(requireBevAgainstDiesel);

export type TornadoRequestPayload = z.infer<typeof tornadoRequestSchema>;

export interface TornadoResponse {
  baseTco: number;
  impacts: TornadoImpact[];
  ranked: TornadoImpact[];
  assumptionsUsed: AssumptionUsed[];
  traceId: string;
}

/** Swings each sensitivity parameter around the request's own baseline. */
export const buildTornadoResponse = (
  payload: TornadoRequestPayload,
  traceId: string = randomUUID(),
): TornadoResponse => {
  const { comparison, tables, settings, assumptionsUsed } = runComparison(payload);
  const tornado = calculateTornadoData(comparison.bev, comparison.diesel, tables, settings);

  return { ...tornado, assumptionsUsed, traceId };
};
