import { z } from 'zod';

const supportedCurrencies = new Set(Intl.supportedValuesOf('currency'));

// income × years + debt stays below Number.MAX_SAFE_INTEGER at these caps.
export const MAX_AMOUNT = 1_000_000_000_000;
export const MAX_INCOME_REPLACEMENT_YEARS = 100;

const money = (field: string) =>
  z
    .number({ required_error: `${field} is required`, invalid_type_error: `${field} must be a number` })
    .finite()
    .nonnegative(`${field} must not be negative`)
    .max(MAX_AMOUNT, `${field} must not exceed ${MAX_AMOUNT}`);

export const ProfileSchema = z.object({
  age: z
    .number({ required_error: 'age is required', invalid_type_error: 'age must be a number' })
    .int('age must be a whole number')
    .positive('age must be positive'),
  annual_income: money('annual_income'),
  dependents: z
    .number({ required_error: 'dependents is required', invalid_type_error: 'dependents must be a number' })
    .int('dependents must be a whole number')
    .nonnegative('dependents must not be negative'),
  location: z
    .string({ required_error: 'location is required', invalid_type_error: 'location must be a string' })
    .trim()
    .min(1, 'location must not be empty'),
  total_debt: money('total_debt'),
  available_savings: money('available_savings'),
  existing_life_insurance: money('existing_life_insurance'),
  income_replacement_years: z
    .number({
      required_error: 'income_replacement_years is required',
      invalid_type_error: 'income_replacement_years must be a number',
    })
    .int('income_replacement_years must be a whole number')
    .positive('income_replacement_years must be positive')
    .max(MAX_INCOME_REPLACEMENT_YEARS, `income_replacement_years must not exceed ${MAX_INCOME_REPLACEMENT_YEARS}`),
  currency: z
    .string({ invalid_type_error: 'currency must be a string' })
    .trim()
    .toUpperCase()
    .refine((code) => /^[A-Z]{3}$/.test(code) && supportedCurrencies.has(code), {
      message: 'currency must be a recognised ISO-4217 code',
    })
    .default('USD'),
});

export type ProfileDTO = z.infer<typeof ProfileSchema>;
