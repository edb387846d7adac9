import type { CoverageResult } from '../../../domain/entities/Coverage.js';
import type { Profile } from '../../../domain/entities/Profile.js';
import type { ReasoningClientPort, ReasoningResult } from '../../../application/ports/ReasoningClientPort.js';

const formatAmount = (amount: number, currency: string): string =>
  `${Math.abs(amount).toLocaleString('en-US')} ${currency}`;

/** Deterministic stand-in for the reasoning model. */
export class SimulatedReasoningClient implements ReasoningClientPort {
  async explain(profile: Profile, coverage: CoverageResult): Promise<ReasoningResult> {
    const { breakdown } = coverage;
    const money = (amount: number) => formatAmount(amount, coverage.currency);
    const years = profile.incomeReplacementYears === 1 ? '1 year' : `${profile.incomeReplacementYears} years`;

    const sentences = [
      `Recommended coverage of ${money(coverage.amount)} for a ${profile.age}-year-old in ${profile.location}.`,
      `It replaces ${years} of income (${money(breakdown.incomeReplacement)}), covers ${money(
        breakdown.debtObligations,
      )} of debt and subtracts ${money(breakdown.assetsOffset)} of savings and existing cover.`,
    ];

    if (coverage.amount === 0) {
      sentences.push('Existing savings and cover already meet the estimated need.');
    } else if (profile.dependents > 0) {
      sentences.push(
        `The amount is sized to support ${profile.dependents} ${profile.dependents === 1 ? 'dependent' : 'dependents'}.`,
      );
    }

    return { notes: sentences.join(' ') };
  }
}
