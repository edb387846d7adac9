import OpenAI from 'openai';
import { z } from 'zod';
import type { CoverageResult } from '../../../domain/entities/Coverage.js';
import type { Profile } from '../../../domain/entities/Profile.js';
import { describeError, UpstreamError } from '../../../domain/errors/AppError.js';
import type { ReasoningClientPort, ReasoningResult } from '../../../application/ports/ReasoningClientPort.js';
import { toProfileDTO } from '../../../application/dto/AdviceRecordDTO.js';
import { extractJson } from './extractJson.js';

/** The slice of the OpenAI SDK this adapter calls. */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(
        body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming,
      ): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

export interface OpenAIReasoningOptions {
  model: string;
  temperature?: number;
  maxTokens?: number;
}

const ReasoningAnswerSchema = z.object({
  reasoning_notes: z.string().min(1),
  agrees_with_coverage: z.boolean().optional(),
});

const SYSTEM_PROMPT = `You are a conservative life insurance advisor assistant.
You receive a client profile and a coverage figure that was already computed with a fixed formula.
Do not recompute or change the figure. Explain in plain language why it fits the client, what drives it,
and what the client should double-check. Keep it to one short paragraph.

Return ONLY a JSON object, no markdown:
{"reasoning_notes": string, "agrees_with_coverage": boolean}`;

export const createOpenAIClient = (config: { apiKey: string; baseUrl?: string; timeoutMs: number }): OpenAI =>
  new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseUrl,
    timeout: config.timeoutMs,
    maxRetries: 0,
  });

export class OpenAIReasoningClient implements ReasoningClientPort {
  constructor(
    private readonly client: ChatCompletionClient,
    private readonly options: OpenAIReasoningOptions,
  ) {}

  async explain(profile: Profile, coverage: CoverageResult): Promise<ReasoningResult> {
    const userPrompt = `Client profile JSON:
${JSON.stringify(toProfileDTO(profile))}

Computed coverage JSON:
${JSON.stringify({
  coverage_amount: coverage.amount,
  coverage_currency: coverage.currency,
  breakdown: coverage.breakdown,
  assumptions: coverage.assumptions,
})}`;

    let content: string | null;

    try {
      const response = await this.client.chat.completions.create({
        model: this.options.model,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: userPrompt },
        ],
        temperature: this.options.temperature ?? 0,
        max_tokens: this.options.maxTokens ?? 500,
      });
      content = response.choices[0]?.message.content ?? null;
    } catch (error) {
      throw new UpstreamError('reasoning', `Reasoning model request failed: ${describeError(error)}`, {
        cause: error,
      });
    }

    const answer = ReasoningAnswerSchema.safeParse(extractJson(content));
    if (!answer.success) {
      throw new UpstreamError('reasoning', 'Reasoning model returned a malformed answer');
    }

    const notes = answer.data.reasoning_notes.trim();

    return {
      notes:
        answer.data.agrees_with_coverage === false
          ? `Flagged for review: the model questioned the computed figure. ${notes}`
          : notes,
    };
  }
}
