import { Msg, NatsConnection, Subscription } from 'nats';
import { z } from 'zod';
import { Logger } from '@shared/ports/Logger';
import { PromiseTracker } from '@engine/application/PromiseTracker';
import { GetRoundStateUseCase } from '@engine/application/GetRoundStateUseCase';
import { PlaceBetUseCase } from '@betting/application/PlaceBetUseCase';
import { CashoutUseCase } from '@betting/application/CashoutUseCase';
import { GetBetUseCase } from '@betting/application/GetBetUseCase';
import { GetRecentRoundsUseCase } from '@history/application/GetRecentRoundsUseCase';
import { VerifyRoundUseCase } from '@history/application/VerifyRoundUseCase';
import { GameTopics } from './topics';
import {
  placeBetSchema,
  cashoutSchema,
  currentRoundSchema,
  recentRoundsSchema,
  verifyRoundSchema,
  betQuerySchema,
} from './schemas';

export interface EngineUseCases {
  placeBet: PlaceBetUseCase;
  cashout: CashoutUseCase;
  getRoundState: GetRoundStateUseCase;
  getRecentRounds: GetRecentRoundsUseCase;
  verifyRound: VerifyRoundUseCase;
  getBet: GetBetUseCase;
}

const INVALID_PAYLOAD = { success: false, error: 'INVALID_PAYLOAD' } as const;

/**
 * Exposes the engine interface as NATS request/reply subjects.
 * Payloads are validated with zod; every request with a reply
 * subject gets exactly one JSON answer.
 */
export class NatsCommandHandler {
  private readonly subscriptions: Subscription[] = [];
  private readonly encoder = new TextEncoder();
  private readonly requests: PromiseTracker;

  constructor(
    private readonly nats: NatsConnection,
    private readonly topics: GameTopics,
    private readonly useCases: EngineUseCases,
    private readonly logger: Logger,
  ) {
    this.requests = new PromiseTracker('requests', 10_000, logger);
  }

  listen(): void {
    const { placeBet, cashout, getRoundState, getRecentRounds, verifyRound, getBet } =
      this.useCases;

    this.reply(this.topics.CMD_PLACE_BET, placeBetSchema, (cmd) => placeBet.execute(cmd));
    this.reply(this.topics.CMD_CASHOUT, cashoutSchema, (cmd) => cashout.execute(cmd));
    this.reply(this.topics.QUERY_CURRENT_ROUND, currentRoundSchema, () => ({
      success: true,
      round: getRoundState.execute(),
    }));
    this.reply(this.topics.QUERY_RECENT_ROUNDS, recentRoundsSchema, (query) => ({
      success: true,
      rounds: getRecentRounds.execute(query.limit),
    }));
    this.reply(this.topics.QUERY_VERIFY_ROUND, verifyRoundSchema, (query) =>
      verifyRound.execute(query.roundId),
    );
    this.reply(this.topics.QUERY_BET, betQuerySchema, (query) => {
      const bet = getBet.execute(query.betId);
      return bet ? { success: true, bet } : { success: false, error: 'BET_NOT_FOUND' };
    });
  }

  async close(): Promise<void> {
    await Promise.all(this.subscriptions.map((s) => s.drain()));
    this.subscriptions.length = 0;
    await this.requests.drain();
  }

  private reply<T>(
    subject: string,
    schema: z.ZodType<T>,
    handler: (payload: T) => unknown,
  ): void {
    const sub = this.nats.subscribe(subject, {
      callback: (err, msg) => {
        if (err) {
          this.logger.error('NATS subscription error', { subject, error: err.message });
          return;
        }
        this.requests.track(this.handle(subject, msg, schema, handler));
      },
    });
    this.subscriptions.push(sub);
  }

  private async handle<T>(
    subject: string,
    msg: Msg,
    schema: z.ZodType<T>,
    handler: (payload: T) => unknown,
  ): Promise<void> {
    let raw: unknown;
    try {
      raw = msg.data.length === 0 ? {} : msg.json();
    } catch (parseErr) {
      this.logger.warn('Unparseable NATS request', {
        subject,
        error: parseErr instanceof Error ? parseErr.message : String(parseErr),
      });
      this.respond(msg, INVALID_PAYLOAD);
      return;
    }

    const result = schema.safeParse(raw);
    if (!result.success) {
      this.logger.warn('Invalid NATS request payload', {
        subject,
        issues: result.error.issues.map((i) => ({
          path: i.path.join('.'),
          message: i.message,
        })),
      });
      this.respond(msg, INVALID_PAYLOAD);
      return;
    }

    try {
      this.respond(msg, await handler(result.data));
    } catch (handlerErr) {
      this.logger.error('NATS request handler failed', {
        subject,
        error: handlerErr instanceof Error ? handlerErr.message : String(handlerErr),
      });
      this.respond(msg, { success: false, error: 'INTERNAL_ERROR' });
    }
  }

  private respond(msg: Msg, payload: unknown): void {
    if (!msg.reply) return;
    msg.respond(this.encoder.encode(JSON.stringify(payload)));
  }
}
