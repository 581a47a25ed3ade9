export enum RoundPhase {
  BETTING = 'BETTING',
  FLIGHT = 'FLIGHT',
  CRASHED = 'CRASHED',
  SETTLED = 'SETTLED',
  VOIDED = 'VOIDED',
}

const validTransitions: Record<RoundPhase, RoundPhase[]> = {
  [RoundPhase.BETTING]: [RoundPhase.FLIGHT, RoundPhase.VOIDED],
  [RoundPhase.FLIGHT]: [RoundPhase.CRASHED, RoundPhase.VOIDED],
  [RoundPhase.CRASHED]: [RoundPhase.SETTLED],
  [RoundPhase.SETTLED]: [],
  [RoundPhase.VOIDED]: [],
};

export function canTransition(from: RoundPhase, to: RoundPhase): boolean {
  return validTransitions[from].includes(to);
}
