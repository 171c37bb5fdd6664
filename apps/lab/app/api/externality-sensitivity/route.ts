import { randomUUID } from "node:crypto";
import { NextResponse } from "next/server";
import { errorResponse } from "../errorResponse";
import {
  buildExternalitySensitivityResponse,
  externalitySensitivityRequestSchema,
  type ExternalitySensitivityRequestPayload,
} from "./scaling";

export async function POST(request: Request) {
  const traceId = randomUUID();
  try {
    const json = await request.json();
    const payload: ExternalitySensitivityRequestPayload =
      externalitySensitivityRequestSchema.parse(json);
    return NextResponse.json(buildExternalitySensitivityResponse(payload, traceId));
  } catch (error) {
    return errorResponse(error, "Invalid externality sensitivity request", traceId);
  }
}
