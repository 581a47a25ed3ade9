export enum BetStatus {
  PLACED = 'PLACED',
  CASHED_OUT = 'CASHED_OUT',
  LOST = 'LOST',
  VOIDED = 'VOIDED',
}
