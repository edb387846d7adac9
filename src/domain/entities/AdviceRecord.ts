import type { CoverageResult } from './Coverage.js';
import type { Profile } from './Profile.js';

export interface RecommendationItem {
  readonly name: string;
  readonly summary: string;
  readonly link: string;
  readonly source?: string;
}

export type ResearchStatus = 'ok' | 'unavailable';

export interface AdviceRecord {
  readonly id: string;
  readonly profile: Profile;
  readonly coverage: CoverageResult;
  readonly recommendations: readonly RecommendationItem[];
  readonly researchNotes: string;
  readonly researchStatus: ResearchStatus;
  readonly reasoningNotes: string;
  readonly timestamp: string; // ISO-8601 UTC
}
