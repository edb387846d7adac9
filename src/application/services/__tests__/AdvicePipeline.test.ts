import { pino } from 'pino';
import { afterEach, beforeEach, describe, expect, it, type Mock, vi } from 'vitest';
import { delay, rawProfile } from '../../../__tests__/helpers/profiles.js';
import type { CoverageResult } from '../../../domain/entities/Coverage.js';
import type { Profile } from '../../../domain/entities/Profile.js';
import { UpstreamError, ValidationError } from '../../../domain/errors/AppError.js';
import { InMemoryHistoryStore } from '../../../infrastructure/adapters/storage/InMemoryHistoryStore.js';
import type { ReasoningResult } from '../../ports/ReasoningClientPort.js';
import type { ResearchResult } from '../../ports/ResearchClientPort.js';
import { AdvicePipeline, type AdvicePipelineOptions, DEFAULT_PIPELINE_OPTIONS } from '../AdvicePipeline.js';
import { ProfileValidator } from '../ProfileValidator.js';

const silent = pino({ level: 'silent' });

const plans = [
  { name: 'Level Term 20', summary: 'Twenty-year level term.', link: 'https://plans.test/level-20', source: 'plans.test' },
  { name: 'Decreasing Term', summary: 'Tracks a mortgage.', link: 'https://plans.test/decreasing' },
];

type Explain = (profile: Profile, coverage: CoverageResult) => Promise<ReasoningResult>;
type FindPlans = (profile: Profile, coverage: CoverageResult) => Promise<ResearchResult>;

describe('AdvicePipeline', () => {
  let history: InMemoryHistoryStore;
  let reasoning: { explain: Mock<Explain> };
  let research: { findPlans: Mock<FindPlans> };

  const pipeline = (options: AdvicePipelineOptions = DEFAULT_PIPELINE_OPTIONS) =>
    new AdvicePipeline(
      new ProfileValidator(),
      reasoning,
      research,
      history,
      silent,
      options,
    );

  beforeEach(() => {
    history = new InMemoryHistoryStore();
    reasoning = { explain: vi.fn<Explain>(async () => ({ notes: 'Covers a decade of income and the mortgage.' })) };
    research = { findPlans: vi.fn<FindPlans>(async () => ({ recommendations: plans, notes: 'Two plans found.' })) };
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('assembles and stores a complete record', async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-03-01T12:00:00Z'));

    const record = await pipeline().run(rawProfile());

    expect(record.coverage.amount).toBe(900000);
    expect(record.coverage.currency).toBe('USD');
    expect(record.reasoningNotes).toBe('Covers a decade of income and the mortgage.');
    expect(record.recommendations).toEqual(plans);
    expect(record.researchNotes).toBe('Two plans found.');
    expect(record.researchStatus).toBe('ok');
    expect(record.timestamp).toBe('2026-03-01T12:00:00.000Z');
    expect(record.profile.location).toBe('Austin, TX');
    expect(record.id).toMatch(/^[0-9a-f-]{36}$/);

    const stored = await history.listAll();
    expect(stored).toHaveLength(1);
    expect(stored[0]).toBe(record);
  });

  it('passes the validated profile and computed coverage to both collaborators', async () => {
    await pipeline().run(rawProfile());

    const [reasonedProfile, reasonedCoverage] = reasoning.explain.mock.calls[0] ?? [];
    expect(reasonedProfile?.annualIncome).toBe(85000);
    expect(reasonedCoverage?.amount).toBe(900000);
    expect(research.findPlans.mock.calls[0]?.[1]).toBe(reasonedCoverage);
  });

  it('freezes the record and its nested values', async () => {
    const record = await pipeline().run(rawProfile());

    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.profile)).toBe(true);
    expect(Object.isFrozen(record.coverage)).toBe(true);
    expect(Object.isFrozen(record.coverage.breakdown)).toBe(true);
    expect(Object.isFrozen(record.recommendations)).toBe(true);
    expect(Object.isFrozen(record.recommendations[0])).toBe(true);
  });

  it('copies recommendations instead of keeping the collaborator objects', async () => {
    const record = await pipeline().run(rawProfile());

    expect(record.recommendations[0]).not.toBe(plans[0]);
    expect(record.recommendations[1]).toEqual({
      name: 'Decreasing Term',
      summary: 'Tracks a mortgage.',
      link: 'https://plans.test/decreasing',
    });
  });

  it('fails fast on invalid input without calling collaborators or storing anything', async () => {
    await expect(pipeline().run(rawProfile({ age: -1 }))).rejects.toBeInstanceOf(ValidationError);

    expect(reasoning.explain).not.toHaveBeenCalled();
    expect(research.findPlans).not.toHaveBeenCalled();
    expect(await history.size()).toBe(0);
  });

  it('fails the request when reasoning fails and stores nothing', async () => {
    reasoning.explain.mockRejectedValue(new Error('quota exceeded'));

    const failure = pipeline().run(rawProfile());

    await expect(failure).rejects.toBeInstanceOf(UpstreamError);
    await expect(failure).rejects.toMatchObject({
      stage: 'reasoning',
      message: 'reasoning service failed: quota exceeded',
    });
    expect(await history.size()).toBe(0);
  });

  it('applies the same reasoning policy to every request', async () => {
    reasoning.explain.mockRejectedValue(new Error('quota exceeded'));
    const advice = pipeline();

    for (let attempt = 0; attempt < 3; attempt += 1) {
      await expect(advice.run(rawProfile())).rejects.toMatchObject({ stage: 'reasoning' });
    }
    expect(await history.size()).toBe(0);
  });

  it('degrades when research fails and still stores the record', async () => {
    research.findPlans.mockRejectedValue(new Error('search quota exceeded'));

    const record = await pipeline().run(rawProfile());

    expect(record.researchStatus).toBe('unavailable');
    expect(record.recommendations).toEqual([]);
    expect(record.researchNotes).toBe('Research unavailable: research service failed: search quota exceeded');
    expect(record.reasoningNotes).toBe('Covers a decade of income and the mortgage.');
    expect(await history.size()).toBe(1);
  });

  it('keeps the message of an UpstreamError raised by the research adapter', async () => {
    research.findPlans.mockRejectedValue(new UpstreamError('research', 'Search request failed with status 429'));

    const record = await pipeline().run(rawProfile());

    expect(record.researchNotes).toBe('Research unavailable: Search request failed with status 429');
  });

  it('times out a slow reasoning call', async () => {
    reasoning.explain.mockImplementation(() => new Promise<never>(() => undefined));

    await expect(pipeline({ ...DEFAULT_PIPELINE_OPTIONS, timeoutMs: 20 }).run(rawProfile())).rejects.toMatchObject({
      stage: 'reasoning',
      message: 'reasoning service timed out after 20ms',
    });
    expect(await history.size()).toBe(0);
  });

  it('times out a slow research call and degrades', async () => {
    research.findPlans.mockImplementation(() => new Promise<never>(() => undefined));

    const record = await pipeline({ ...DEFAULT_PIPELINE_OPTIONS, timeoutMs: 20 }).run(rawProfile());

    expect(record.researchStatus).toBe('unavailable');
    expect(record.researchNotes).toBe('Research unavailable: research service timed out after 20ms');
  });

  it('starts research without waiting for reasoning', async () => {
    const events: string[] = [];
    reasoning.explain.mockImplementation(async () => {
      await delay(10);
      events.push('reasoning-done');
      return { notes: 'ok' };
    });
    research.findPlans.mockImplementation(async () => {
      events.push('research-start');
      return { recommendations: [], notes: 'none' };
    });

    await pipeline().run(rawProfile());

    expect(events).toEqual(['research-start', 'reasoning-done']);
  });

  it('uses the configured coverage policy', async () => {
    const record = await pipeline({ timeoutMs: 1000, coveragePolicy: { realDiscountRate: 0.02 } }).run(rawProfile());

    expect(record.coverage.amount).toBe(813520);
  });

  it('builds a record without storing it', async () => {
    const record = await pipeline().build(rawProfile());

    expect(record.coverage.amount).toBe(900000);
    expect(await history.size()).toBe(0);
  });
});
