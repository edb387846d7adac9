import type { RecommendationItem } from '../../../domain/entities/AdviceRecord.js';
import type { CoverageResult } from '../../../domain/entities/Coverage.js';
import type { Profile } from '../../../domain/entities/Profile.js';
import type { ResearchClientPort, ResearchResult } from '../../../application/ports/ResearchClientPort.js';

/** Deterministic stand-in for live product search. */
export class SimulatedResearchClient implements ResearchClientPort {
  async findPlans(profile: Profile, coverage: CoverageResult): Promise<ResearchResult> {
    if (coverage.amount === 0) {
      return {
        recommendations: [],
        notes: `No additional cover needed; no plans searched for ${profile.location}.`,
      };
    }

    const term = Math.max(10, Math.ceil(profile.incomeReplacementYears / 5) * 5);
    const recommendations: RecommendationItem[] = [
      {
        name: `Level Term ${term}`,
        summary: `Fixed premium term life policy lasting ${term} years.`,
        link: `https://plans.example.com/level-term-${term}`,
        source: 'simulated',
      },
    ];

    if (profile.totalDebt > 0) {
      recommendations.push({
        name: 'Decreasing Term',
        summary: 'Cover that falls alongside a repayment mortgage or loan balance.',
        link: 'https://plans.example.com/decreasing-term',
        source: 'simulated',
      });
    }

    if (profile.dependents > 0) {
      recommendations.push({
        name: 'Family Income Benefit',
        summary: 'Pays a monthly income to dependents for the rest of the term.',
        link: 'https://plans.example.com/family-income-benefit',
        source: 'simulated',
      });
    }

    return {
      recommendations,
      notes: `Simulated search for term life insurance in ${profile.location}. Illustrative products only; compare quotes from licensed providers.`,
    };
  }
}
