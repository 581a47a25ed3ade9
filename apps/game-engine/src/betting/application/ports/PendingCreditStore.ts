import { PendingCredit } from '@betting/application/commands/PendingCredit';

export interface PendingCreditStore {
  save(record: PendingCredit): void;
  get(id: string): PendingCredit | undefined;
  getUnresolved(): PendingCredit[];
  markResolved(id: string): void;
}
