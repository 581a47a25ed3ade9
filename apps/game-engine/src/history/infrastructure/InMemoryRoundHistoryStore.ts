import { RoundHistoryStore } from '@history/application/ports/RoundHistoryStore';
import { RoundHistoryEntry } from '@history/domain/RoundHistoryEntry';
import { DuplicateHistoryEntryError } from '@shared/kernel/DomainError';

export class InMemoryRoundHistoryStore implements RoundHistoryStore {
  private readonly entries: RoundHistoryEntry[] = [];
  private readonly byId = new Map<number, RoundHistoryEntry>();
  private lastRoundId = 0;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error(`History capacity must be a positive integer, got ${capacity}`);
    }
  }

  record(entry: RoundHistoryEntry): void {
    // Ids are monotonic, so anything at or below the last id was already archived or evicted.
    if (this.byId.has(entry.roundId) || entry.roundId <= this.lastRoundId) {
      throw new DuplicateHistoryEntryError(`Round ${entry.roundId} is already recorded`);
    }

    this.entries.push(entry);
    this.byId.set(entry.roundId, entry);
    this.lastRoundId = entry.roundId;

    while (this.entries.length > this.capacity) {
      const evicted = this.entries.shift();
      if (evicted) this.byId.delete(evicted.roundId);
    }
  }

  recent(limit: number): RoundHistoryEntry[] {
    if (limit <= 0) return [];
    return this.entries.slice(-limit).reverse();
  }

  findById(roundId: number): RoundHistoryEntry | undefined {
    return this.byId.get(roundId);
  }

  get size(): number {
    return this.entries.length;
  }
}
