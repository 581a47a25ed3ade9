export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

export class InvalidMoneyError extends DomainError {}
export class InvalidStakeError extends DomainError {}
export class InvalidAutoCashoutError extends DomainError {}
export class InvalidStateTransition extends DomainError {}
export class WindowClosedError extends DomainError {}
export class AlreadySettledError extends DomainError {}
export class DuplicateBetError extends DomainError {}
export class InvalidCrashPointError extends DomainError {}
export class InvalidSeedError extends DomainError {}
export class FairnessDerivationFailedError extends DomainError {}
export class SeedNotRevealableError extends DomainError {}
export class DuplicateHistoryEntryError extends DomainError {}
