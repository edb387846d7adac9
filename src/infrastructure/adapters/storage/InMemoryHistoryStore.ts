import type { AdviceRecord } from '../../../domain/entities/AdviceRecord.js';
import type { HistoryStorePort } from '../../../application/ports/HistoryStorePort.js';

/**
 * Process-lifetime history. Grows without bound and is lost on restart; swap
 * in another HistoryStorePort for persistence.
 *
 * Every mutation completes synchronously on the event loop, so concurrent
 * requests append whole records one at a time.
 */
export class InMemoryHistoryStore implements HistoryStorePort {
  private readonly records: AdviceRecord[] = [];

  async append(record: AdviceRecord): Promise<void> {
    this.records.push(record);
  }

  async listAll(): Promise<AdviceRecord[]> {
    return [...this.records];
  }

  async size(): Promise<number> {
    return this.records.length;
  }

  async clear(): Promise<void> {
    this.records.length = 0;
  }
}
