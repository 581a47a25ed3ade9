import { GameConfig } from '@shared/kernel/GameConfig';
import { CrashPoint } from '@shared/kernel/CrashPoint';
import { Clock } from '@shared/ports/Clock';
import { Logger } from '@shared/ports/Logger';
import { Round } from '@engine/domain/Round';
import { RoundPhase } from '@engine/domain/RoundPhase';
import { EventPublisher } from '@engine/application/ports/EventPublisher';
import { TickScheduler } from '@engine/application/ports/TickScheduler';
import { Timer } from '@engine/application/ports/Timer';
import { PromiseTracker } from '@engine/application/PromiseTracker';
import { AutoCashoutMonitor } from '@engine/application/AutoCashoutMonitor';
import { FairnessCommitter } from '@rng/application/FairnessCommitter';
import { ClientSeedProvider } from '@rng/application/ports/ClientSeedProvider';
import { RoundRegistry } from '@betting/application/ports/RoundRegistry';
import { PlaceBetUseCase } from '@betting/application/PlaceBetUseCase';
import { SettleRoundUseCase } from '@betting/application/SettleRoundUseCase';
import { RoundHistoryStore } from '@history/application/ports/RoundHistoryStore';
import { createHistoryEntry } from '@history/domain/RoundHistoryEntry';

export const FAIRNESS_DERIVATION_FAILED = 'FAIRNESS_DERIVATION_FAILED';
export const SHUTDOWN = 'SHUTDOWN';

/**
 * Drives rounds through BETTING -> FLIGHT -> CRASHED -> SETTLED, or VOIDED.
 *
 * Phase ends are wall-clock deadlines held by the Timer: the betting
 * window end, then the crash instant startOfFlight + timeFor(crashPoint).
 * Ticks only publish progress and trigger auto-cashouts; they never
 * decide when the round crashes.
 *
 * All round mutation happens in synchronous sections on the event loop.
 * The one await, draining debits still in flight when the window closes,
 * happens after admissions are shut, so no bet can slip in afterwards.
 */
export class RoundScheduler {
  private running = false;
  private nextRoundId = 1;

  constructor(
    private readonly config: GameConfig,
    private readonly committer: FairnessCommitter,
    private readonly clientSeedProvider: ClientSeedProvider,
    private readonly registry: RoundRegistry,
    private readonly placeBetUseCase: PlaceBetUseCase,
    private readonly settleRoundUseCase: SettleRoundUseCase,
    private readonly autoCashoutMonitor: AutoCashoutMonitor,
    private readonly historyStore: RoundHistoryStore,
    private readonly eventPublisher: EventPublisher,
    private readonly tickScheduler: TickScheduler,
    private readonly timer: Timer,
    private readonly clock: Clock,
    private readonly events: PromiseTracker,
    private readonly logger: Logger,
  ) {}

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) throw new Error('Round scheduler is already running');
    this.running = true;
    this.openRound();
  }

  /** Halts the phase clock and shuts admissions; `drain` resolves the round left open. */
  stop(): void {
    this.running = false;
    this.timer.clear();
    this.tickScheduler.stop();

    const round = this.registry.current();
    if (round && (round.phase === RoundPhase.BETTING || round.phase === RoundPhase.FLIGHT)) {
      round.closeAdmissions();
      this.logger.warn('Scheduler stopped with a round in progress', {
        roundId: round.id,
        phase: round.phase,
        bets: round.bets.size,
      });
    }
  }

  /**
   * Waits for pending debits, then voids a round the stopped clock can no
   * longer crash so its open stakes are refunded.
   */
  async drain(): Promise<void> {
    await this.placeBetUseCase.awaitInFlight();

    const round = this.registry.current();
    if (
      !this.running &&
      round &&
      (round.phase === RoundPhase.BETTING || round.phase === RoundPhase.FLIGHT)
    ) {
      this.voidRound(round, SHUTDOWN);
    }
    await this.events.drain();
  }

  /**
   * Operator void of the current round. Only bets still PLACED are
   * refunded; bets already cashed out keep their payout.
   */
  async voidCurrentRound(reason: string): Promise<boolean> {
    const round = this.registry.current();
    if (!round) return false;

    if (round.phase === RoundPhase.BETTING) {
      this.timer.clear();
      round.closeAdmissions();
      await this.placeBetUseCase.awaitInFlight();
    }

    if (round.phase !== RoundPhase.BETTING && round.phase !== RoundPhase.FLIGHT) {
      return false;
    }
    this.voidRound(round, reason);
    return true;
  }

  private openRound(): void {
    if (!this.running) return;

    const now = this.clock.now();
    const commitment = this.committer.commit(this.clientSeedProvider.next());
    const round = new Round(
      this.nextRoundId++,
      commitment,
      now,
      now + this.config.bettingWindowMs,
      this.config.growthRate,
    );
    this.registry.open(round);

    this.logger.info('Round opened', {
      roundId: round.id,
      commitHash: commitment.commitHash,
      nonce: commitment.nonce,
      bettingWindowEndsAt: round.bettingWindowEndsAt,
    });
    this.events.track(
      this.eventPublisher.roundBetting({
        roundId: round.id,
        commitHash: commitment.commitHash,
        clientSeed: commitment.clientSeed,
        nonce: commitment.nonce,
        bettingWindowEndsAt: round.bettingWindowEndsAt,
      }),
    );

    this.timer.scheduleAt(() => this.events.track(this.endBetting(round)), round.bettingWindowEndsAt);
  }

  private async endBetting(round: Round): Promise<void> {
    round.closeAdmissions();
    await this.placeBetUseCase.awaitInFlight();

    if (!this.running || round.phase !== RoundPhase.BETTING) return;

    let crashPoint: CrashPoint;
    try {
      crashPoint = this.committer.deriveCrashPoint(round.commitment);
    } catch (err) {
      this.logger.error('Crash point derivation failed; voiding round', {
        roundId: round.id,
        error: err instanceof Error ? err.message : String(err),
      });
      this.voidRound(round, FAIRNESS_DERIVATION_FAILED);
      return;
    }

    const now = this.clock.now();
    const crashDeadline = round.startFlight(crashPoint, now);

    this.logger.info('Flight started', { roundId: round.id, bets: round.bets.size });
    this.events.track(this.eventPublisher.roundStarted(round.id, now));

    this.tickScheduler.start(() => this.onTick(round));
    this.timer.scheduleAt(() => this.crash(round), crashDeadline);
  }

  private onTick(round: Round): void {
    const now = this.clock.now();
    if (!round.isInFlightAt(now)) return;

    this.autoCashoutMonitor.onTick(round, now);
    this.events.track(
      this.eventPublisher.tick(round.id, round.multiplierAt(now), round.elapsedAt(now)),
    );
  }

  private crash(round: Round): void {
    if (round.phase !== RoundPhase.FLIGHT) return;
    this.tickScheduler.stop();

    const crashPoint = this.committer.deriveCrashPoint(round.commitment);
    this.autoCashoutMonitor.sweepBeforeCrash(round, crashPoint.hundredths);

    const now = this.clock.now();
    round.crash(now);
    this.settleRoundUseCase.settleLosses(round);
    round.settle();

    this.archive(round, now);
    this.logger.info('Round crashed', {
      roundId: round.id,
      crashMultiplier: crashPoint.value,
      bets: round.bets.size,
    });

    this.timer.scheduleImmediate(() => this.openRound());
  }

  private voidRound(round: Round, reason: string): void {
    this.tickScheduler.stop();
    this.timer.clear();

    const now = this.clock.now();
    round.void(reason, now);
    const refunded = this.settleRoundUseCase.refundVoided(round);

    this.archive(round, now);
    this.logger.warn('Round voided', {
      roundId: round.id,
      reason,
      refundedBets: refunded.length,
    });

    if (this.running) this.timer.scheduleImmediate(() => this.openRound());
  }

  private archive(round: Round, now: number): void {
    this.committer.close(round.commitment);

    let serverSeed: string | null = null;
    try {
      serverSeed = this.committer.reveal(round.commitment);
    } catch (err) {
      this.logger.error('Server seed could not be revealed', {
        roundId: round.id,
        error: err instanceof Error ? err.message : String(err),
      });
    }

    const entry = createHistoryEntry(round, serverSeed, now);
    this.historyStore.record(entry);
    this.committer.release(round.commitment);

    this.events.track(
      round.phase === RoundPhase.VOIDED
        ? this.eventPublisher.roundVoided(entry)
        : this.eventPublisher.roundCrashed(entry),
    );
  }
}
