import { describe, expect, it } from "vitest";
import { postJson, tcoPayload } from "../fixtures";
import { POST } from "./route";

interface Impact {
  parameter: string;
  low: number;
  high: number;
  minImpact: number;
  maxImpact: number;
}

describe("POST /api/tornado", () => {
  it("returns one impact per parameter, widest swing first in ranked", async () => {
    const response = await POST(postJson("/api/tornado", tcoPayload));
    const body = (await response.json()) as {
      baseTco: number;
      impacts: Impact[];
      ranked: Impact[];
      traceId: string;
    };
    const electricity = body.impacts.find(
      (impact) => impact.parameter === "Electricity Price ($/kWh)",
    );

    expect(response.status).toBe(200);
    expect(body.impacts.map((impact) => impact.parameter)).toEqual([
      "Annual Distance (km)",
      "Diesel Price ($/L)",
      "Vehicle Lifetime (years)",
      "Discount Rate (%)",
      "Electricity Price ($/kWh)",
    ]);
    expect(body.impacts[0]).toMatchObject({ low: 50000, high: 150000 });
    expect(electricity?.low).toBeCloseTo(0.16, 12);
    expect(electricity?.minImpact).toBeCloseTo(-0.04, 9);
    expect(electricity?.maxImpact).toBeCloseTo(0.04, 9);
    expect(body.ranked.at(-1)?.parameter).toBe("Diesel Price ($/L)");
  });

  it("returns 400 when the vehicles are swapped", async () => {
    const response = await POST(
      postJson("/api/tornado", { ...tcoPayload, bev: tcoPayload.diesel, diesel: tcoPayload.bev }),
    );
    const body = (await response.json()) as { error: string };

    expect(response.status).toBe(400);
    expect(body.error).toBe(
      "bev.vehicle.drivetrain must be BEV; diesel.vehicle.drivetrain must be Diesel",
    );
  });

  it("returns 404 when diesel has no price", async () => {
    const response = await POST(
      postJson("/api/tornado", {
        ...tcoPayload,
        tables: { ...tcoPayload.tables, financialParams: {} },
      }),
    );

    expect(response.status).toBe(404);
  });
});
