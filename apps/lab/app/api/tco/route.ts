import { randomUUID } from "node:crypto";
import { NextResponse } from "next/server";
import { errorResponse } from "../errorResponse";
import { buildTcoResponse, tcoRequestSchema, type TcoRequestPayload } from "./comparison";

export async function POST(request: Request) {
  const traceId = randomUUID();
  try {
    const json = await request.json();
    const payload: TcoRequestPayload = tcoRequestSchema.parse(json);
    return NextResponse.json(buildTcoResponse(payload, traceId));
  } catch (error) {
    return errorResponse(error, "Invalid TCO request", traceId);
  }
}
