import { RoundHistoryEntry } from '@history/domain/RoundHistoryEntry';

/** Append-only archive of finished rounds. */
export interface RoundHistoryStore {
  /** Throws DuplicateHistoryEntryError if the round was already recorded. */
  record(entry: RoundHistoryEntry): void;
  /** Newest first. */
  recent(limit: number): RoundHistoryEntry[];
  findById(roundId: number): RoundHistoryEntry | undefined;
}
