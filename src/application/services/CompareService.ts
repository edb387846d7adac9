import pLimit from 'p-limit';
import type { AdviceRecord } from '../../domain/entities/AdviceRecord.js';
import type { Profile } from '../../domain/entities/Profile.js';
import { type ErrorIssue, ValidationError } from '../../domain/errors/AppError.js';
import type { HistoryStorePort } from '../ports/HistoryStorePort.js';
import { AdvicePipeline } from './AdvicePipeline.js';
import { ProfileValidator } from './ProfileValidator.js';

export interface CompareOptions {
  concurrency: number;
  maxProfiles: number;
}

export const DEFAULT_COMPARE_OPTIONS: CompareOptions = { concurrency: 4, maxProfiles: 10 };

export class CompareService {
  constructor(
    private readonly validator: ProfileValidator,
    private readonly pipeline: AdvicePipeline,
    private readonly history: HistoryStorePort,
    private readonly options: CompareOptions = DEFAULT_COMPARE_OPTIONS,
  ) {}

  /**
   * The batch is all-or-nothing: every profile is validated before any upstream
   * call, and records are appended (in input order) only once every run succeeded.
   */
  async compare(raw: unknown): Promise<AdviceRecord[]> {
    const profiles = this.validateBatch(raw);
    const limit = pLimit(Math.max(1, this.options.concurrency));

    // The first failure drops every run that has not started yet.
    const runFor = async (profile: Profile): Promise<AdviceRecord> => {
      try {
        return await this.pipeline.buildFor(profile);
      } catch (error) {
        limit.clearQueue();
        throw error;
      }
    };

    const records = await Promise.all(profiles.map((profile) => limit(() => runFor(profile))));

    for (const record of records) {
      await this.history.append(record);
    }

    return records;
  }

  private validateBatch(raw: unknown): Profile[] {
    if (!Array.isArray(raw)) {
      throw new ValidationError('Expected an array of profiles', [{ path: '(root)', message: 'must be an array' }]);
    }

    if (raw.length === 0) {
      throw new ValidationError('At least one profile is required', [
        { path: '(root)', message: 'must contain at least one profile' },
      ]);
    }

    if (raw.length > this.options.maxProfiles) {
      throw new ValidationError(`At most ${this.options.maxProfiles} profiles can be compared at once`, [
        { path: '(root)', message: `must contain at most ${this.options.maxProfiles} profiles` },
      ]);
    }

    const profiles: Profile[] = [];
    const issues: ErrorIssue[] = [];

    raw.forEach((item: unknown, index: number) => {
      try {
        profiles.push(this.validator.validateAt(item, [index]));
      } catch (error) {
        if (!(error instanceof ValidationError)) {
          throw error;
        }
        issues.push(...error.issues);
      }
    });

    if (issues.length > 0) {
      throw new ValidationError('One or more profiles are invalid', issues);
    }

    return profiles;
  }
}
