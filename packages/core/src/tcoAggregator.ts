import { safeDivide } from "./financialPrimitives";
import { toNumber, usd, type USD } from "./units";

export interface TcoInputs {
  acquisitionCost: number;
  residualValue: number;
  npvAnnualOperatingCost: number;
  npvBatteryReplacement: number;
  npvInfrastructure: number;
  annualKms: number;
  lifeYears: number;
  payloadTonnes: number;
}

export interface TcoSummary {
  npvTotalCost: USD;
  tcoPerKm: number;
  tcoPerTonneKm: number;
  tcoLifetime: USD;
  tcoAnnual: USD;
}

export interface SocialTco {
  socialTcoLifetime: USD;
  socialTcoPerKm: number;
  socialTcoPerTonneKm: number;
  externalityPercentage: number;
}

export const calculateTco = (inputs: TcoInputs): TcoSummary => {
  const npvTotalCost =
    inputs.acquisitionCost -
    inputs.residualValue +
    inputs.npvAnnualOperatingCost +
    inputs.npvBatteryReplacement +
    inputs.npvInfrastructure;
  const totalKms = inputs.annualKms * inputs.lifeYears;
  const tcoPerKm = safeDivide(npvTotalCost, totalKms, 0);

  return {
    npvTotalCost: usd(npvTotalCost),
    tcoPerKm,
    tcoPerTonneKm: safeDivide(tcoPerKm, inputs.payloadTonnes, 0),
    tcoLifetime: usd(npvTotalCost),
    tcoAnnual: usd(safeDivide(npvTotalCost, inputs.lifeYears, 0)),
  };
};

export const calculateSocialTco = (
  tco: TcoSummary,
  npvExternality: number,
  annualKms: number,
  lifeYears: number,
  payloadTonnes: number,
): SocialTco => {
  const socialTcoLifetime = toNumber(tco.npvTotalCost) + npvExternality;
  const socialTcoPerKm = safeDivide(socialTcoLifetime, annualKms * lifeYears, 0);

  return {
    socialTcoLifetime: usd(socialTcoLifetime),
    socialTcoPerKm,
    socialTcoPerTonneKm: safeDivide(socialTcoPerKm, payloadTonnes, 0),
    externalityPercentage: safeDivide(npvExternality * 100, socialTcoLifetime, 0),
  };
};
