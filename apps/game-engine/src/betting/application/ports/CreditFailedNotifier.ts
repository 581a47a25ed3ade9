import { PendingCredit } from '@betting/application/commands/PendingCredit';

export interface CreditFailedNotifier {
  creditFailed(record: PendingCredit): Promise<void>;
}
