export interface CashoutCommand {
  accountId: string;
  betId: string;
}
