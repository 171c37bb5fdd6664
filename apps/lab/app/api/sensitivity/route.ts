import { randomUUID } from "node:crypto";
import { NextResponse } from "next/server";
import { errorResponse } from "../errorResponse";
import {
  buildSensitivityResponse,
  sensitivityRequestSchema,
  type SensitivityRequestPayload,
} from "./sweep";

export async function POST(request: Request) {
  const traceId = randomUUID();
  try {
    const json = await request.json();
    const payload: SensitivityRequestPayload = sensitivityRequestSchema.parse(json);
    return NextResponse.json(buildSensitivityResponse(payload, traceId));
  } catch (error) {
    return errorResponse(error, "Invalid sensitivity request", traceId);
  }
}
