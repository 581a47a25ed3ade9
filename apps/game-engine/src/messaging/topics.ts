/**
 * NATS subjects for the crash round engine.
 *
 * Subjects are operator-siloed: each engine instance uses subjects
 * prefixed with `game.{operatorId}.*`. The prefix is resolved once at
 * boot via {@link createTopics}.
 */

export interface GameTopics {
  readonly ROUND_BETTING: string;
  readonly ROUND_STARTED: string;
  readonly ROUND_CRASHED: string;
  readonly ROUND_VOIDED: string;
  readonly TICK: string;
  readonly BET_PLACED: string;
  readonly BET_CASHED_OUT: string;
  readonly BET_LOST: string;
  readonly BET_VOIDED: string;
  readonly CREDIT_FAILED: string;

  // Request/reply
  readonly CMD_PLACE_BET: string;
  readonly CMD_CASHOUT: string;
  readonly QUERY_CURRENT_ROUND: string;
  readonly QUERY_RECENT_ROUNDS: string;
  readonly QUERY_VERIFY_ROUND: string;
  readonly QUERY_BET: string;
}

/**
 * @example
 * const TOPICS = createTopics('operator-a');
 * // TOPICS.ROUND_CRASHED === 'game.operator-a.round.crashed'
 */
export function createTopics(operatorId: string): GameTopics {
  if (!/^[\w-]+$/.test(operatorId)) {
    throw new Error(`Invalid operatorId for NATS topics: "${operatorId}"`);
  }

  const prefix = `game.${operatorId}`;

  return Object.freeze({
    ROUND_BETTING: `${prefix}.round.betting`,
    ROUND_STARTED: `${prefix}.round.started`,
    ROUND_CRASHED: `${prefix}.round.crashed`,
    ROUND_VOIDED: `${prefix}.round.voided`,
    TICK: `${prefix}.tick`,
    BET_PLACED: `${prefix}.bet.placed`,
    BET_CASHED_OUT: `${prefix}.bet.cashed_out`,
    BET_LOST: `${prefix}.bet.lost`,
    BET_VOIDED: `${prefix}.bet.voided`,
    CREDIT_FAILED: `${prefix}.credit.failed`,
    CMD_PLACE_BET: `${prefix}.cmd.place_bet`,
    CMD_CASHOUT: `${prefix}.cmd.cashout`,
    QUERY_CURRENT_ROUND: `${prefix}.query.current_round`,
    QUERY_RECENT_ROUNDS: `${prefix}.query.recent_rounds`,
    QUERY_VERIFY_ROUND: `${prefix}.query.verify_round`,
    QUERY_BET: `${prefix}.query.bet`,
  });
}
