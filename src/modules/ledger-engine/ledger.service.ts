import type { Container } from '../../infra/container.js';
import type { DomainEvent } from '../../types/index.js';
import { toPlainString } from '../../utils/decimal.js';
import { applyTradeEvent, type LedgerRules, type LedgerTransition } from './ledger-engine.js';

export type ApplyStatus = 'applied' | 'duplicate';

export interface ApplyOutcome {
  status: ApplyStatus;
  transition: LedgerTransition;
}

export class LedgerService {
  private readonly container: Container;
  private readonly rules: LedgerRules;

  constructor(container: Container) {
    this.container = container;
    this.rules = { divergenceTolerance: container.config.pnlDivergenceTolerance };
  }

  /**
   * Applies one domain event in a single store transaction. The history
   * insert doubles as the dedup check: when the event_uid already exists
   * the position is left untouched.
   */
  async applyEvent(event: DomainEvent): Promise<ApplyOutcome> {
    const { store } = this.container;
    const logger = this.container.logger.child({ module: 'ledger' });

    const outcome = await store.transaction(async (tx): Promise<ApplyOutcome> => {
      const position = await tx.getPosition(event.token);
      const transition = applyTradeEvent(position, event, this.rules);

      const inserted = await tx.insertHistoryOnce(transition.history);
      if (!inserted) {
        return { status: 'duplicate', transition };
      }

      if (transition.effect === 'CLOSED') {
        await tx.deletePosition(event.token);
      } else if (transition.effect !== 'NOOP' && transition.next) {
        await tx.upsertPosition(transition.next);
      }
      return { status: 'applied', transition };
    });

    const { transition } = outcome;
    if (outcome.status === 'duplicate') {
      logger.debug({ eventUid: event.eventUid }, 'Event already recorded');
      return outcome;
    }

    logger.info(
      {
        eventUid: event.eventUid,
        token: event.token,
        block: event.blockNumber,
        index: event.eventIndex,
        effect: transition.effect,
        amount: toPlainString(transition.history.amount),
        pnl: transition.history.pnl === null ? null : toPlainString(transition.history.pnl),
      },
      'Trade event applied',
    );

    if (transition.pnlDivergence) {
      await this.raiseDivergence(event, transition);
    }
    return outcome;
  }

  private async raiseDivergence(event: DomainEvent, transition: LedgerTransition): Promise<void> {
    const { alerts, logger } = this.container;
    const divergence = transition.pnlDivergence;
    if (!divergence) return;

    await alerts
      .send({
        kind: 'PNL_DIVERGENCE',
        severity: 'warning',
        message: 'Reported PnL differs from computed PnL',
        data: {
          eventUid: event.eventUid,
          txId: event.txId,
          token: event.token,
          reported: toPlainString(divergence.reported),
          computed: toPlainString(divergence.computed),
          difference: toPlainString(divergence.difference),
        },
        timestamp: Date.now(),
      })
      .catch((err: unknown) => {
        logger.error({ err, eventUid: event.eventUid }, 'Failed to deliver PnL divergence alert');
      });
  }
}
