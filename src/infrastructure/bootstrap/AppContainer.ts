import type { Logger } from 'pino';
import { AdvicePipeline } from '../../application/services/AdvicePipeline.js';
import { CompareService } from '../../application/services/CompareService.js';
import { ProfileValidator } from '../../application/services/ProfileValidator.js';
import type { HistoryStorePort } from '../../application/ports/HistoryStorePort.js';
import type { ReasoningClientPort } from '../../application/ports/ReasoningClientPort.js';
import type { ResearchClientPort } from '../../application/ports/ResearchClientPort.js';
import { InMemoryHistoryStore } from '../adapters/storage/InMemoryHistoryStore.js';
import { createOpenAIClient, OpenAIReasoningClient } from '../adapters/reasoning/OpenAIReasoningClient.js';
import { SimulatedReasoningClient } from '../adapters/reasoning/SimulatedReasoningClient.js';
import { FirecrawlResearchClient } from '../adapters/research/FirecrawlResearchClient.js';
import { SimulatedResearchClient } from '../adapters/research/SimulatedResearchClient.js';
import { type AppConfig, loadConfig } from '../config/Config.js';
import { createFetchTransport } from '../http/FetchTransport.js';
import { logger as rootLogger } from '../logging/logger.js';

export interface AppContainerOverrides {
  config?: AppConfig;
  reasoning?: ReasoningClientPort;
  research?: ResearchClientPort;
  history?: HistoryStorePort;
  logger?: Logger;
}

export class AppContainer {
  readonly config: AppConfig;
  readonly logger: Logger;

  readonly validator: ProfileValidator;
  readonly reasoning: ReasoningClientPort;
  readonly research: ResearchClientPort;
  readonly history: HistoryStorePort;
  readonly advicePipeline: AdvicePipeline;
  readonly compareService: CompareService;

  constructor(overrides: AppContainerOverrides = {}) {
    this.config = overrides.config ?? loadConfig();
    this.logger = overrides.logger ?? rootLogger;

    this.validator = new ProfileValidator();
    this.history = overrides.history ?? new InMemoryHistoryStore();
    this.reasoning = overrides.reasoning ?? this.createReasoningClient();
    this.research = overrides.research ?? this.createResearchClient();

    this.advicePipeline = new AdvicePipeline(
      this.validator,
      this.reasoning,
      this.research,
      this.history,
      this.logger.child({ component: 'advice-pipeline' }),
      {
        timeoutMs: this.config.pipeline.upstreamTimeoutMs,
        coveragePolicy: { realDiscountRate: this.config.pipeline.realDiscountRate },
      },
    );

    this.compareService = new CompareService(this.validator, this.advicePipeline, this.history, {
      concurrency: this.config.compare.concurrency,
      maxProfiles: this.config.compare.maxProfiles,
    });
  }

  providers(): { reasoning: string; research: string } {
    return {
      reasoning: this.config.reasoning.provider,
      research: this.config.research.provider,
    };
  }

  private createReasoningClient(): ReasoningClientPort {
    const { reasoning, pipeline } = this.config;

    if (reasoning.provider === 'simulated') {
      return new SimulatedReasoningClient();
    }

    const client = createOpenAIClient({
      apiKey: reasoning.apiKey,
      baseUrl: reasoning.baseUrl,
      timeoutMs: pipeline.upstreamTimeoutMs,
    });

    return new OpenAIReasoningClient(client, { model: reasoning.model });
  }

  private createResearchClient(): ResearchClientPort {
    const { research, pipeline } = this.config;

    if (research.provider === 'simulated') {
      return new SimulatedResearchClient();
    }

    return new FirecrawlResearchClient(
      { apiKey: research.apiKey, baseUrl: research.baseUrl, maxResults: research.maxResults },
      createFetchTransport(pipeline.upstreamTimeoutMs),
    );
  }
}
