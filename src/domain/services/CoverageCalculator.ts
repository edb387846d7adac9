import type { CoverageResult } from '../entities/Coverage.js';
import type { Profile } from '../entities/Profile.js';
import { InternalError } from '../errors/AppError.js';

/**
 * Version tag of the coverage formula. Changing the formula changes the
 * numbers clients receive, so it must come with a new tag.
 */
export const COVERAGE_POLICY_VERSION = '2024-1';

export interface CoveragePolicy {
  /** Real discount rate applied to future income; 0 means plain income × years. */
  realDiscountRate: number;
}

export const DEFAULT_COVERAGE_POLICY: CoveragePolicy = { realDiscountRate: 0 };

export const annuityFactor = (years: number, rate: number): number => {
  if (years <= 0) {
    return 0;
  }

  if (rate <= 0) {
    return years;
  }

  return (1 - (1 + rate) ** -years) / rate;
};

/**
 * Gap coverage: income replacement + outstanding debt − savings − existing cover,
 * clamped at zero and rounded to whole currency units.
 */
export const computeCoverage = (
  profile: Profile,
  policy: CoveragePolicy = DEFAULT_COVERAGE_POLICY,
): CoverageResult => {
  const rate = Math.max(0, policy.realDiscountRate);
  const factor = annuityFactor(profile.incomeReplacementYears, rate);

  const incomeReplacement = profile.annualIncome * factor;
  const debtObligations = profile.totalDebt;
  const assets = profile.availableSavings + profile.existingLifeInsurance;
  const gap = incomeReplacement + debtObligations - assets;

  if (!Number.isFinite(gap)) {
    throw new InternalError('Coverage calculation produced a non-finite amount');
  }

  const methodology =
    rate === 0
      ? 'annual_income × income_replacement_years + total_debt − available_savings − existing_life_insurance'
      : `annual_income × annuity factor at ${(rate * 100).toFixed(2)}% real rate + total_debt − available_savings − existing_life_insurance`;

  return {
    amount: Math.round(Math.max(0, gap)),
    currency: profile.currency,
    breakdown: {
      incomeReplacement: Math.round(incomeReplacement),
      debtObligations: Math.round(debtObligations),
      assetsOffset: assets === 0 ? 0 : -Math.round(assets),
      methodology,
    },
    assumptions: {
      incomeReplacementYears: profile.incomeReplacementYears,
      realDiscountRate: rate,
      policyVersion: COVERAGE_POLICY_VERSION,
    },
  };
};
