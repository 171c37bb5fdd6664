import { describe, expect, it } from "vitest";
import { postJson, tcoPayload } from "../fixtures";
import { POST } from "./route";

describe("POST /api/sensitivity", () => {
  it("re-runs both vehicles at every requested value", async () => {
    const response = await POST(
      postJson("/api/sensitivity", {
        ...tcoPayload,
        parameter: "Annual Distance (km)",
        values: [50000, 100000],
      }),
    );
    const body = (await response.json()) as {
      traceId: string;
      parameter: string;
      rows: Array<{
        parameterValue: number;
        bev: { annualOperatingCost: number };
        diesel: { annualOperatingCost: number };
      }>;
    };

    expect(response.status).toBe(200);
    expect(typeof body.traceId).toBe("string");
    expect(body.parameter).toBe("Annual Distance (km)");
    expect(body.rows.map((row) => row.parameterValue)).toEqual([50000, 100000]);
    expect(body.rows[0].bev.annualOperatingCost).toBe(30000);
    expect(body.rows[1].bev.annualOperatingCost).toBe(45000);
    expect(body.rows[1].diesel.annualOperatingCost).toBe(109000);
  });

  it("prices diesel from the swept value", async () => {
    const response = await POST(
      postJson("/api/sensitivity", {
        ...tcoPayload,
        parameter: "Diesel Price ($/L)",
        values: [3],
      }),
    );
    const body = (await response.json()) as {
      rows: Array<{ diesel: { annualOperatingCost: number } }>;
    };

    expect(response.status).toBe(200);
    expect(body.rows[0].diesel.annualOperatingCost).toBeCloseTo(149000, 6);
  });

  it("returns 400 for an unknown parameter", async () => {
    const response = await POST(
      postJson("/api/sensitivity", {
        ...tcoPayload,
        parameter: "Tyre Price",
        values: [1],
      }),
    );
    const body = (await response.json()) as { code: string };

    expect(response.status).toBe(400);
    expect(body.code).toBe("INVALID_REQUEST");
  });

  it("returns 400 without values", async () => {
    const response = await POST(
      postJson("/api/sensitivity", {
        ...tcoPayload,
        parameter: "Diesel Price ($/L)",
        values: [],
      }),
    );

    expect(response.status).toBe(400);
  });
});
