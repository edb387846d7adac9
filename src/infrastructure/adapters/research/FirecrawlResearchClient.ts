import { z } from 'zod';
import type { RecommendationItem } from '../../../domain/entities/AdviceRecord.js';
import type { CoverageResult } from '../../../domain/entities/Coverage.js';
import type { Profile } from '../../../domain/entities/Profile.js';
import { UpstreamError } from '../../../domain/errors/AppError.js';
import type { ResearchClientPort, ResearchResult } from '../../../application/ports/ResearchClientPort.js';
import type { Transport } from '../../http/FetchTransport.js';

export interface FirecrawlConfig {
  apiKey: string;
  baseUrl: string;
  maxResults: number;
}

const SearchResponseSchema = z.object({
  success: z.boolean(),
  data: z.array(
    z.object({
      url: z.string(),
      title: z.string().optional(),
      description: z.string().optional(),
    }),
  ),
});

const hostnameOf = (link: string): string => {
  try {
    return new URL(link).hostname;
  } catch {
    return 'web';
  }
};

export class FirecrawlResearchClient implements ResearchClientPort {
  constructor(
    private readonly config: FirecrawlConfig,
    private readonly transport: Transport,
  ) {}

  async findPlans(profile: Profile, coverage: CoverageResult): Promise<ResearchResult> {
    const query = `term life insurance ${coverage.amount} ${coverage.currency} coverage ${profile.location}`;

    const response = await this.transport({
      url: `${this.config.baseUrl.replace(/\/+$/, '')}/v1/search`,
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.config.apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({ query, limit: this.config.maxResults }),
    });

    if (response.status < 200 || response.status >= 300) {
      throw new UpstreamError('research', `Search request failed with status ${response.status}`);
    }

    const parsed = SearchResponseSchema.safeParse(response.body);
    if (!parsed.success || !parsed.data.success) {
      throw new UpstreamError('research', 'Search service returned a malformed response');
    }

    const recommendations: RecommendationItem[] = parsed.data.data.slice(0, this.config.maxResults).map((hit) => ({
      name: hit.title?.trim() || hit.url,
      summary: hit.description?.trim() ?? '',
      link: hit.url,
      source: hostnameOf(hit.url),
    }));

    return {
      recommendations,
      notes:
        recommendations.length > 0
          ? `Found ${recommendations.length} term life results for ${profile.location} via web search. Listings are not endorsements; compare quotes before buying.`
          : `No term life results found for ${profile.location}.`,
    };
  }
}
