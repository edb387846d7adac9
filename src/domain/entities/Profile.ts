export interface Profile {
  readonly age: number;
  readonly annualIncome: number;
  readonly dependents: number;
  readonly location: string;
  readonly totalDebt: number;
  readonly availableSavings: number;
  readonly existingLifeInsurance: number;
  readonly incomeReplacementYears: number;
  readonly currency: string; // ISO-4217, shared by every monetary field
}
