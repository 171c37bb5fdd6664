import { randomUUID } from "node:crypto";
import { NextResponse } from "next/server";
import { errorResponse } from "../errorResponse";
import {
  buildTornadoResponse,
  tornadoRequestSchema,
  type TornadoRequestPayload,
} from "./impacts";

export async function POST(request: Request) {
  const traceId = randomUUID();
  try {
    const json = await request.json();
    const payload: TornadoRequestPayload = tornadoRequestSchema.parse(json);
    return NextResponse.json(buildTornadoResponse(payload, traceId));
  } catch (error) {
    return errorResponse(error, "Invalid tornado request", traceId);
  }
}
