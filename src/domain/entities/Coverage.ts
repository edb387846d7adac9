export interface CoverageBreakdown {
  readonly incomeReplacement: number;
  readonly debtObligations: number;
  /** Savings plus existing cover, as a non-positive offset. */
  readonly assetsOffset: number;
  readonly methodology: string;
}

export interface CoverageAssumptions {
  readonly incomeReplacementYears: number;
  readonly realDiscountRate: number;
  readonly policyVersion: string;
}

export interface CoverageResult {
  readonly amount: number;
  readonly currency: string;
  readonly breakdown: CoverageBreakdown;
  readonly assumptions: CoverageAssumptions;
}
