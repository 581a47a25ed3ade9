import { RoundPhase, canTransition } from '@engine/domain/RoundPhase';
import { Multiplier } from '@engine/domain/Multiplier';
import { BetLedger } from '@betting/domain/BetLedger';
import { Bet } from '@betting/domain/Bet';
import { CrashPoint } from '@shared/kernel/CrashPoint';
import {
  DomainError,
  InvalidStateTransition,
  WindowClosedError,
} from '@shared/kernel/DomainError';
import { SeedCommitment } from '@rng/domain/SeedCommitment';

export class Round {
  private _phase: RoundPhase = RoundPhase.BETTING;
  private _admissionsOpen = true;
  private _crashPoint: CrashPoint | null = null;
  private _startOfFlightTime: number | null = null;
  private _crashDeadline: number | null = null;
  private _crashTime: number | null = null;
  private _voidReason: string | null = null;
  private readonly _bets = new BetLedger();

  constructor(
    readonly id: number,
    readonly commitment: SeedCommitment,
    readonly openedAt: number,
    readonly bettingWindowEndsAt: number,
    private readonly growthRate: number,
  ) {}

  get phase(): RoundPhase {
    return this._phase;
  }

  get bets(): BetLedger {
    return this._bets;
  }

  get startOfFlightTime(): number | null {
    return this._startOfFlightTime;
  }

  /** Instant the curve reaches the crash point; cashouts must land strictly before it. */
  get crashDeadline(): number | null {
    return this._crashDeadline;
  }

  get crashTime(): number | null {
    return this._crashTime;
  }

  get voidReason(): string | null {
    return this._voidReason;
  }

  /** Hidden while the round can still take bets or cashouts. */
  get revealedCrashPoint(): CrashPoint | null {
    if (this._phase === RoundPhase.BETTING || this._phase === RoundPhase.FLIGHT) return null;
    return this._crashPoint;
  }

  isAcceptingBets(): boolean {
    return this._phase === RoundPhase.BETTING && this._admissionsOpen;
  }

  closeAdmissions(): void {
    this._admissionsOpen = false;
  }

  /**
   * Records a bet whose debit has already gone through. Admission was
   * checked before the debit, so this only requires the window not to
   * have been resolved yet.
   */
  addBet(bet: Bet): void {
    if (this._phase !== RoundPhase.BETTING) {
      throw new WindowClosedError(`Round ${this.id} is no longer taking bets`);
    }
    if (bet.roundId !== this.id) {
      throw new DomainError(`Bet ${bet.id} belongs to round ${bet.roundId}, not ${this.id}`);
    }
    this._bets.add(bet);
  }

  /** Returns the crash deadline. */
  startFlight(crashPoint: CrashPoint, now: number): number {
    this.transitionTo(RoundPhase.FLIGHT);
    this._admissionsOpen = false;
    this._crashPoint = crashPoint;
    this._startOfFlightTime = now;
    this._crashDeadline = now + Multiplier.timeFor(crashPoint.value, this.growthRate);
    return this._crashDeadline;
  }

  isInFlightAt(now: number): boolean {
    return (
      this._phase === RoundPhase.FLIGHT &&
      this._crashDeadline !== null &&
      now < this._crashDeadline
    );
  }

  multiplierAt(now: number): number {
    switch (this._phase) {
      case RoundPhase.FLIGHT: {
        const start = this._startOfFlightTime ?? now;
        const end = Math.min(now, this._crashDeadline ?? now);
        return Multiplier.valueAt(end - start, this.growthRate);
      }
      case RoundPhase.CRASHED:
      case RoundPhase.SETTLED:
        return this._crashPoint?.value ?? 1.0;
      default:
        return 1.0;
    }
  }

  elapsedAt(now: number): number {
    if (this._startOfFlightTime === null) return 0;
    return Math.max(0, now - this._startOfFlightTime);
  }

  crash(now: number): void {
    this.transitionTo(RoundPhase.CRASHED);
    this._crashTime = now;
  }

  settle(): void {
    if (this._bets.placedCount > 0) {
      throw new InvalidStateTransition(
        `Round ${this.id} still has ${this._bets.placedCount} unsettled bets`,
      );
    }
    this.transitionTo(RoundPhase.SETTLED);
  }

  void(reason: string, now: number): void {
    this.transitionTo(RoundPhase.VOIDED);
    this._admissionsOpen = false;
    this._voidReason = reason;
    this._crashTime = now;
  }

  private transitionTo(next: RoundPhase): void {
    if (!canTransition(this._phase, next)) {
      throw new InvalidStateTransition(`Cannot transition from ${this._phase} to ${next}`);
    }
    this._phase = next;
  }
}
