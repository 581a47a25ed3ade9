export interface PlaceBetCommand {
  accountId: string;
  stakeCents: number;
  autoCashoutTarget?: number;
}
