import type { AdviceRecord } from '../../domain/entities/AdviceRecord.js';

export interface HistoryStorePort {
  append(record: AdviceRecord): Promise<void>;
  /** Snapshot in insertion order; later appends do not show up in it. */
  listAll(): Promise<AdviceRecord[]>;
  size(): Promise<number>;
  clear(): Promise<void>;
}
