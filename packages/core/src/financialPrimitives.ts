import { ParameterError } from "./errors";

export const safeDivide = (numerator: number, denominator: number, fallback: number): number => {
  if (denominator === 0 || Number.isNaN(denominator)) {
    return fallback;
  }
  const result = numerator / denominator;
  return Number.isNaN(result) ? fallback : result;
};

/** Present value of a constant cost paid at the end of years 1..years. */
export const npvConstant = (annualCost: number, discountRate: number, years: number): number => {
  if (years <= 0) {
    return 0;
  }
  if (discountRate === 0) {
    return annualCost * years;
  }
  if (discountRate <= -1) {
    throw new ParameterError("discountRate", "discountRate must be greater than -1", discountRate);
  }

  let total = 0;
  for (let year = 1; year <= years; year += 1) {
    total += annualCost / (1 + discountRate) ** year;
  }
  return total;
};

/** Present value of an explicit series whose first entry falls at year 0. */
export const NPV = (discountRate: number, cashFlows: readonly number[]): number => {
  if (discountRate <= -1) {
    throw new ParameterError("discountRate", "discountRate must be greater than -1", discountRate);
  }
  return cashFlows.reduce(
    (acc, cashFlow, periodIndex) => acc + cashFlow / (1 + discountRate) ** periodIndex,
    0,
  );
};

export const calculateResidualValue = (
  msrp: number,
  years: number,
  initialDepreciation: number,
  annualDepreciation: number,
): number => {
  if (years <= 0) {
    return 0;
  }
  return msrp * (1 - initialDepreciation) * (1 - annualDepreciation) ** (years - 1);
};

export const cumulativeCostCurve = (
  initialCost: number,
  annualCost: number,
  years: number,
): number[] => {
  const curve: number[] = [];
  for (let index = 0; index < years; index += 1) {
    curve.push(initialCost + annualCost * index);
  }
  return curve;
};

/**
 * Fractional year at which two cumulative cost curves first meet. Segments
 * where the curves run parallel are skipped. Returns +Infinity when they
 * never cross.
 */
export const priceParityYear = (
  curveA: readonly number[],
  curveB: readonly number[],
  years?: readonly number[],
): number => {
  if (curveA.length !== curveB.length) {
    throw new ParameterError(
      "curveB",
      "Cost curves must be the same length to compute parity",
      curveB.length,
    );
  }
  const yearAxis = years ?? curveA.map((_, index) => index + 1);
  if (yearAxis.length !== curveA.length) {
    throw new ParameterError("years", "years must match the curve length", yearAxis.length);
  }

  for (let i = 0; i < curveA.length - 1; i += 1) {
    const gapNow = curveA[i] - curveB[i];
    const gapNext = curveA[i + 1] - curveB[i + 1];
    if (gapNow * gapNext > 0) {
      continue;
    }
    const deltaA = curveA[i + 1] - curveA[i];
    const deltaB = curveB[i + 1] - curveB[i];
    if (deltaA === deltaB) {
      continue;
    }
    const t = (curveB[i] - curveA[i]) / (deltaA - deltaB);
    return yearAxis[i] + t;
  }

  return Number.POSITIVE_INFINITY;
};
