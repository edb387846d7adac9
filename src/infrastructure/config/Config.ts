import { z } from 'zod';

export type ReasoningConfig =
  | { provider: 'simulated'; model: string }
  | { provider: 'openai'; apiKey: string; baseUrl?: string; model: string };

export type ResearchConfig =
  | { provider: 'simulated'; baseUrl: string; maxResults: number }
  | { provider: 'firecrawl'; apiKey: string; baseUrl: string; maxResults: number };

export interface AppConfig {
  app: {
    port: number;
    corsOrigin: string;
  };
  reasoning: ReasoningConfig;
  research: ResearchConfig;
  pipeline: {
    upstreamTimeoutMs: number;
    realDiscountRate: number;
  };
  compare: {
    concurrency: number;
    maxProfiles: number;
  };
}

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  CORS_ORIGIN: z.string().default('*'),
  ADVISOR_REASONING_PROVIDER: z.enum(['openai', 'simulated']).optional(),
  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: optionalString,
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  ADVISOR_RESEARCH_PROVIDER: z.enum(['firecrawl', 'simulated']).optional(),
  FIRECRAWL_API_KEY: optionalString,
  FIRECRAWL_BASE_URL: z.string().url().default('https://api.firecrawl.dev'),
  ADVISOR_RESEARCH_MAX_RESULTS: z.coerce.number().int().min(1).max(5).default(5),
  ADVISOR_UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
  ADVISOR_REAL_DISCOUNT_RATE: z.coerce.number().min(0).max(1).default(0),
  ADVISOR_COMPARE_CONCURRENCY: z.coerce.number().int().min(1).max(32).default(4),
  ADVISOR_COMPARE_MAX_PROFILES: z.coerce.number().int().min(1).default(10),
});

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

type Env = z.infer<typeof EnvSchema>;

const reasoningConfig = (vars: Env): ReasoningConfig => {
  const provider = vars.ADVISOR_REASONING_PROVIDER ?? (vars.OPENAI_API_KEY ? 'openai' : 'simulated');

  if (provider === 'simulated') {
    return { provider, model: vars.OPENAI_MODEL };
  }

  if (!vars.OPENAI_API_KEY) {
    throw new ConfigError('OPENAI_API_KEY is required when ADVISOR_REASONING_PROVIDER=openai');
  }

  return { provider, apiKey: vars.OPENAI_API_KEY, baseUrl: vars.OPENAI_BASE_URL, model: vars.OPENAI_MODEL };
};

const researchConfig = (vars: Env): ResearchConfig => {
  const provider = vars.ADVISOR_RESEARCH_PROVIDER ?? (vars.FIRECRAWL_API_KEY ? 'firecrawl' : 'simulated');
  const search = { baseUrl: vars.FIRECRAWL_BASE_URL, maxResults: vars.ADVISOR_RESEARCH_MAX_RESULTS };

  if (provider === 'simulated') {
    return { provider, ...search };
  }

  if (!vars.FIRECRAWL_API_KEY) {
    throw new ConfigError('FIRECRAWL_API_KEY is required when ADVISOR_RESEARCH_PROVIDER=firecrawl');
  }

  return { provider, apiKey: vars.FIRECRAWL_API_KEY, ...search };
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(`Invalid environment configuration: ${details}`);
  }

  const vars = parsed.data;

  return {
    app: {
      port: vars.PORT,
      corsOrigin: vars.CORS_ORIGIN,
    },
    reasoning: reasoningConfig(vars),
    research: researchConfig(vars),
    pipeline: {
      upstreamTimeoutMs: vars.ADVISOR_UPSTREAM_TIMEOUT_MS,
      realDiscountRate: vars.ADVISOR_REAL_DISCOUNT_RATE,
    },
    compare: {
      concurrency: vars.ADVISOR_COMPARE_CONCURRENCY,
      maxProfiles: vars.ADVISOR_COMPARE_MAX_PROFILES,
    },
  };
};
