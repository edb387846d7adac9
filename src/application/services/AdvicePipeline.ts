import crypto from 'node:crypto';
import dayjs from 'dayjs';
import type { Logger } from 'pino';
import type { AdviceRecord, RecommendationItem, ResearchStatus } from '../../domain/entities/AdviceRecord.js';
import type { CoverageResult } from '../../domain/entities/Coverage.js';
import type { Profile } from '../../domain/entities/Profile.js';
import { describeError } from '../../domain/errors/AppError.js';
import {
  computeCoverage,
  type CoveragePolicy,
  DEFAULT_COVERAGE_POLICY,
} from '../../domain/services/CoverageCalculator.js';
import type { HistoryStorePort } from '../ports/HistoryStorePort.js';
import type { ReasoningClientPort } from '../ports/ReasoningClientPort.js';
import type { ResearchClientPort, ResearchResult } from '../ports/ResearchClientPort.js';
import { ProfileValidator } from './ProfileValidator.js';
import { withTimeout } from './withTimeout.js';

export interface AdvicePipelineOptions {
  /** Per-collaborator deadline; an expired call counts as an upstream failure. */
  timeoutMs: number;
  coveragePolicy: CoveragePolicy;
}

export const DEFAULT_PIPELINE_OPTIONS: AdvicePipelineOptions = {
  timeoutMs: 20_000,
  coveragePolicy: DEFAULT_COVERAGE_POLICY,
};

type ResearchOutcome = ResearchResult & { status: ResearchStatus };

const freezeCoverage = (coverage: CoverageResult): CoverageResult =>
  Object.freeze({
    ...coverage,
    breakdown: Object.freeze({ ...coverage.breakdown }),
    assumptions: Object.freeze({ ...coverage.assumptions }),
  });

const copyRecommendation = (item: RecommendationItem): RecommendationItem =>
  Object.freeze({
    name: item.name,
    summary: item.summary,
    link: item.link,
    ...(item.source !== undefined ? { source: item.source } : {}),
  });

/**
 * Validate → compute → (reasoning ‖ research) → assemble → append.
 *
 * Reasoning is required: when it fails the request fails with the
 * UpstreamError and nothing is stored. Research is optional: when it fails the
 * record carries no recommendations and `researchStatus: 'unavailable'`.
 */
export class AdvicePipeline {
  constructor(
    private readonly validator: ProfileValidator,
    private readonly reasoning: ReasoningClientPort,
    private readonly research: ResearchClientPort,
    private readonly history: HistoryStorePort,
    private readonly logger: Logger,
    private readonly options: AdvicePipelineOptions = DEFAULT_PIPELINE_OPTIONS,
  ) {}

  async run(raw: unknown): Promise<AdviceRecord> {
    const record = await this.build(raw);
    await this.history.append(record);
    return record;
  }

  /** Everything `run` does except the history append. */
  async build(raw: unknown): Promise<AdviceRecord> {
    const profile = this.validator.validate(raw);
    return this.buildFor(profile);
  }

  async buildFor(input: Profile): Promise<AdviceRecord> {
    const profile: Profile = Object.freeze({ ...input });
    const coverage = freezeCoverage(computeCoverage(profile, this.options.coveragePolicy));

    const researchTask = withTimeout('research', this.options.timeoutMs, () =>
      this.research.findPlans(profile, coverage),
    ).then(
      (result): ResearchOutcome => ({ ...result, status: 'ok' }),
      (error: unknown): ResearchOutcome => {
        this.logger.warn({ err: error, location: profile.location }, 'Research unavailable, continuing without plans');
        return { recommendations: [], notes: `Research unavailable: ${describeError(error)}`, status: 'unavailable' };
      },
    );

    const reasoningTask = withTimeout('reasoning', this.options.timeoutMs, () =>
      this.reasoning.explain(profile, coverage),
    ).catch((error: unknown) => {
      this.logger.error({ err: error }, 'Reasoning failed, advice request aborted');
      throw error;
    });

    const [reasoning, research] = await Promise.all([reasoningTask, researchTask]);

    const record: AdviceRecord = Object.freeze({
      id: crypto.randomUUID(),
      profile,
      coverage,
      recommendations: Object.freeze(research.recommendations.map(copyRecommendation)),
      researchNotes: research.notes,
      researchStatus: research.status,
      reasoningNotes: reasoning.notes,
      timestamp: dayjs().toISOString(),
    });

    this.logger.info(
      {
        recordId: record.id,
        coverageAmount: coverage.amount,
        currency: coverage.currency,
        researchStatus: record.researchStatus,
      },
      'Advice record created',
    );

    return record;
  }
}
