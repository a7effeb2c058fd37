import type {
  AttemptRecord,
  AttemptRecordInput,
  LearnedMapping,
  LearnedMappingInput,
  ManualMapping,
} from '@team-identity/shared/types';

export interface LearnedMappingFilter {
  verified?: boolean;
  limit?: number;
}

export const DEFAULT_LIST_LIMIT = 100;

/**
 * Persistence collaborator for the resolution engine.
 *
 * Every write is a single atomic statement. Implementations report failures as
 * PersistenceUnavailableError so callers can degrade without inspecting driver errors.
 */
export interface MappingStore {
  loadManualMappings(): Promise<ManualMapping[]>;
  /** Verified rows, or rows above the trusted confidence, highest confidence first */
  loadTrustedLearnedMappings(): Promise<LearnedMapping[]>;
  /**
   * Insert or update on (sourceName, matchedName, context). An update replaces
   * confidence, strategy and timestamp; it never clears `verified`.
   */
  upsertLearnedMapping(mapping: LearnedMappingInput): Promise<void>;
  /** Remove the pair in every context. Resolves to the number of rows removed. */
  deleteLearnedMapping(sourceName: string, matchedName: string): Promise<number>;
  countLearnedMappings(): Promise<number>;
  /** Most recent first */
  listLearnedMappings(filter?: LearnedMappingFilter): Promise<LearnedMapping[]>;
  appendAttempt(record: AttemptRecordInput): Promise<void>;
  /** Attempts at or after `cutoff`, oldest first */
  listAttemptsSince(cutoff: Date): Promise<AttemptRecord[]>;
  close(): Promise<void>;
}
