import {
  INCENTIVE_TYPES,
  findActiveIncentive,
  type Drivetrain,
  type IncentiveRule,
  type IncentiveType,
} from "./tables";

export type CostLine =
  | "purchase"
  | "stampDuty"
  | "registration"
  | "insurance"
  | "energy"
  | "infrastructure";

export type IncentiveEffect =
  | { kind: "flat"; line: CostLine }
  | { kind: "proportional"; line: CostLine }
  | { kind: "none" };

export const INCENTIVE_EFFECTS: Readonly<Record<IncentiveType, IncentiveEffect>> = {
  purchase_rebate_aud: { kind: "flat", line: "purchase" },
  stamp_duty_exemption: { kind: "proportional", line: "stampDuty" },
  registration_exemption: { kind: "proportional", line: "registration" },
  insurance_discount: { kind: "proportional", line: "insurance" },
  electricity_rate_discount: { kind: "proportional", line: "energy" },
  charging_infrastructure_subsidy: { kind: "proportional", line: "infrastructure" },
  toll_road_exemption: { kind: "none" },
  battery_replacement_subsidy: { kind: "none" },
  carbon_price_redemption: { kind: "none" },
};

export interface IncentiveContext {
  incentives: readonly IncentiveRule[];
  drivetrain: Drivetrain;
  applyIncentives: boolean;
}

export interface IncentiveAdjustment {
  value: number;
  reduction: number;
  applied: IncentiveRule[];
}

const incentiveReduction = (effect: IncentiveEffect, rule: IncentiveRule, base: number): number => {
  switch (effect.kind) {
    case "flat":
      return rule.rate;
    case "proportional":
      return base * rule.rate;
    case "none":
      return 0;
  }
};

/** Incentives only ever reduce BEV costs, and only when enabled for the run. */
export const resolveIncentive = (
  context: IncentiveContext,
  incentiveType: IncentiveType,
): IncentiveRule | undefined => {
  if (!context.applyIncentives || context.drivetrain !== "BEV") {
    return undefined;
  }
  return findActiveIncentive(context.incentives, incentiveType, context.drivetrain);
};

/**
 * Applies every incentive kind that targets `line`. Each reduction is taken
 * from the same undiscounted base, so the order of the rows is irrelevant.
 */
export const adjustCostLine = (
  context: IncentiveContext,
  line: CostLine,
  base: number,
): IncentiveAdjustment => {
  const applied: IncentiveRule[] = [];
  let reduction = 0;

  for (const incentiveType of INCENTIVE_TYPES) {
    const effect = INCENTIVE_EFFECTS[incentiveType];
    if (effect.kind === "none" || effect.line !== line) {
      continue;
    }
    const rule = resolveIncentive(context, incentiveType);
    if (!rule) {
      continue;
    }
    reduction += incentiveReduction(effect, rule, base);
    applied.push(rule);
  }

  return { value: base - reduction, reduction, applied };
};
