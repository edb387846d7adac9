import type { Profile } from '../../domain/entities/Profile.js';

/** Wire-format profile used across tests; coverage under the default policy is 900000. */
export const rawProfile = (overrides: Record<string, unknown> = {}): Record<string, unknown> => ({
  age: 35,
  annual_income: 85000,
  dependents: 2,
  location: 'Austin, TX',
  total_debt: 200000,
  available_savings: 50000,
  existing_life_insurance: 100000,
  income_replacement_years: 10,
  currency: 'USD',
  ...overrides,
});

export const profile = (overrides: Partial<Profile> = {}): Profile => ({
  age: 35,
  annualIncome: 85000,
  dependents: 2,
  location: 'Austin, TX',
  totalDebt: 200000,
  availableSavings: 50000,
  existingLifeInsurance: 100000,
  incomeReplacementYears: 10,
  currency: 'USD',
  ...overrides,
});

export const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));
