import { RoundHistoryStore } from '@history/application/ports/RoundHistoryStore';
import { RoundHistoryEntry } from '@history/domain/RoundHistoryEntry';

export const DEFAULT_RECENT_ROUNDS = 20;
export const MAX_RECENT_ROUNDS = 100;

export class GetRecentRoundsUseCase {
  constructor(private readonly historyStore: RoundHistoryStore) {}

  execute(limit: number = DEFAULT_RECENT_ROUNDS): RoundHistoryEntry[] {
    const n = Math.min(Math.max(Math.floor(limit), 0), MAX_RECENT_ROUNDS);
    return this.historyStore.recent(n);
  }
}
