import type { RecommendationItem } from '../../domain/entities/AdviceRecord.js';
import type { CoverageResult } from '../../domain/entities/Coverage.js';
import type { Profile } from '../../domain/entities/Profile.js';

export interface ResearchResult {
  recommendations: RecommendationItem[];
  notes: string;
}

export interface ResearchClientPort {
  findPlans(profile: Profile, coverage: CoverageResult): Promise<ResearchResult>;
}
