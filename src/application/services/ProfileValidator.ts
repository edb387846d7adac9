import type { ZodError } from 'zod';
import type { Profile } from '../../domain/entities/Profile.js';
import { type ErrorIssue, ValidationError } from '../../domain/errors/AppError.js';
import { ProfileSchema } from '../dto/ProfileDTO.js';

export const toIssues = (error: ZodError, prefix: Array<string | number> = []): ErrorIssue[] =>
  error.issues.map((issue) => ({
    path: [...prefix, ...issue.path].join('.') || '(root)',
    message: issue.message,
  }));

export class ProfileValidator {
  validate(raw: unknown): Profile {
    return this.validateAt(raw, []);
  }

  /** Validates a profile nested in a larger payload, prefixing issue paths. */
  validateAt(raw: unknown, path: Array<string | number>): Profile {
    const parsed = ProfileSchema.safeParse(raw);

    if (!parsed.success) {
      throw new ValidationError('Invalid profile', toIssues(parsed.error, path));
    }

    const dto = parsed.data;

    return Object.freeze({
      age: dto.age,
      annualIncome: dto.annual_income,
      dependents: dto.dependents,
      location: dto.location,
      totalDebt: dto.total_debt,
      availableSavings: dto.available_savings,
      existingLifeInsurance: dto.existing_life_insurance,
      incomeReplacementYears: dto.income_replacement_years,
      currency: dto.currency,
    });
  }
}
