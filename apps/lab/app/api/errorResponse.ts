import { NextResponse } from "next/server";
import { ZodError } from "zod";
import { CalculationError, DataNotFoundError, ParameterError, TcoError } from "@truck-tco/core";

export interface ErrorBody {
  error: string;
  code: string;
  traceId: string;
}

/** Innermost error behind a chain of wrapped calculation steps. */
const rootCause = (error: unknown): unknown => {
  let current = error;
  while (current instanceof CalculationError && current.cause !== undefined) {
    current = current.cause;
  }
  return current;
};

const statusFor = (error: unknown): number => {
  const cause = rootCause(error);
  if (cause instanceof ZodError || cause instanceof SyntaxError || cause instanceof ParameterError) {
    return 400;
  }
  if (cause instanceof DataNotFoundError) {
    return 404;
  }
  return 500;
};

const codeFor = (error: unknown): string => {
  if (error instanceof ZodError || error instanceof SyntaxError) {
    return "INVALID_REQUEST";
  }
  if (error instanceof TcoError) {
    return error.code;
  }
  return "INTERNAL_ERROR";
};

const messageFor = (error: unknown, fallback: string): string => {
  if (error instanceof ZodError) {
    return error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
  }
  return error instanceof Error ? error.message : fallback;
};

export const toErrorBody = (error: unknown, fallback: string, traceId: string): ErrorBody => ({
  error: messageFor(error, fallback),
  code: codeFor(error),
  traceId,
});

export const errorResponse = (error: unknown, fallback: string, traceId: string) => {
  const status = statusFor(error);
  if (status >= 500) {
    console.error(`[${traceId}] ${fallback}`, error);
  }
  return NextResponse.json(toErrorBody(error, fallback, traceId), { status });
};
