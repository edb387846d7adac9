import type { CoverageResult } from '../../domain/entities/Coverage.js';
import type { Profile } from '../../domain/entities/Profile.js';

export interface ReasoningResult {
  notes: string;
}

/**
 * Explains a computed coverage figure. Implementations report failures
 * (timeouts, quota, malformed answers) as UpstreamError with stage 'reasoning'.
 */
export interface ReasoningClientPort {
  explain(profile: Profile, coverage: CoverageResult): Promise<ReasoningResult>;
}
