import type { AdviceRecord } from '../../domain/entities/AdviceRecord.js';
import type { Profile } from '../../domain/entities/Profile.js';
import type { ProfileDTO } from './ProfileDTO.js';

export interface AdviceRecordDTO {
  id: string;
  profile: ProfileDTO;
  coverage_amount: number;
  coverage_currency: string;
  breakdown: {
    income_replacement: number;
    debt_obligations: number;
    assets_offset: number;
    methodology: string;
  };
  assumptions: {
    income_replacement_years: number;
    real_discount_rate: number;
    policy_version: string;
  };
  recommendations: Array<{ name: string; summary: string; link: string; source?: string }>;
  research_notes: string;
  research_status: AdviceRecord['researchStatus'];
  reasoning_notes: string;
  timestamp: string;
}

export const toProfileDTO = (profile: Profile): ProfileDTO => ({
  age: profile.age,
  annual_income: profile.annualIncome,
  dependents: profile.dependents,
  location: profile.location,
  total_debt: profile.totalDebt,
  available_savings: profile.availableSavings,
  existing_life_insurance: profile.existingLifeInsurance,
  income_replacement_years: profile.incomeReplacementYears,
  currency: profile.currency,
});

export const toAdviceRecordDTO = (record: AdviceRecord): AdviceRecordDTO => ({
  id: record.id,
  profile: toProfileDTO(record.profile),
  coverage_amount: record.coverage.amount,
  coverage_currency: record.coverage.currency,
  breakdown: {
    income_replacement: record.coverage.breakdown.incomeReplacement,
    debt_obligations: record.coverage.breakdown.debtObligations,
    assets_offset: record.coverage.breakdown.assetsOffset,
    methodology: record.coverage.breakdown.methodology,
  },
  assumptions: {
    income_replacement_years: record.coverage.assumptions.incomeReplacementYears,
    real_discount_rate: record.coverage.assumptions.realDiscountRate,
    policy_version: record.coverage.assumptions.policyVersion,
  },
  recommendations: record.recommendations.map((item) => ({ ...item })),
  research_notes: record.researchNotes,
  research_status: record.researchStatus,
  reasoning_notes: record.reasoningNotes,
  timestamp: record.timestamp,
});
