import { PendingCreditStore } from '@betting/application/ports/PendingCreditStore';
import { PendingCredit } from '@betting/application/commands/PendingCredit';

/**
 * Holds only credits still owed; a record is dropped once resolved.
 * Lost on restart, so production deployments need a durable store.
 */
export class InMemoryPendingCreditStore implements PendingCreditStore {
  private readonly owed: Map<string, PendingCredit> = new Map();

  save(record: PendingCredit): void {
    if (record.resolved) {
      this.owed.delete(record.id);
      return;
    }
    this.owed.set(record.id, record);
  }

  get(id: string): PendingCredit | undefined {
    return this.owed.get(id);
  }

  getUnresolved(): PendingCredit[] {
    return Array.from(this.owed.values());
  }

  markResolved(id: string): void {
    const record = this.owed.get(id);
    if (record) {
      record.resolved = true;
      this.owed.delete(id);
    }
  }

  get size(): number {
    return this.owed.size;
  }
}
