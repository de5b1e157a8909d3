import { Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { AnyIdentity, Approver, Requester, isRequester, sameIdentity } from './entities/identity.entity';
import { LifecycleState, TRADE_ACTION_LABELS, TradeAction } from './entities/lifecycle-state.entity';
import {
  AnyTradeRecord,
  CancellableTradeRecord,
  MutableTradeFields,
  TradePayload,
  TradeRecord,
  copyDate,
  fieldsEqual,
  isCancellableRecord,
  snapshotFields,
} from './entities/trade-record.entity';
import {
  ForbiddenCapabilityError,
  InvalidDetailsError,
  InvalidTransitionError,
  TransitionError,
  UnauthorisedRequesterError,
} from './errors/trade.errors';
import { TradeHistoryService } from './trade-history.service';
import { checkDetails } from './trade-validation';
import { computeDiff } from './trade-diff';
import { Result, err, ok } from '../common/utils/result.util';

export type TradeMutation = (payload: TradePayload) => TradePayload;

const unchanged: TradeMutation = (payload) => payload;

// Untyped entry point for records whose state is only known at run time.
export type TradeCommand =
  | { action: TradeAction.Submit; actor: AnyIdentity }
  | { action: TradeAction.Accept; actor: AnyIdentity }
  | { action: TradeAction.Update; actor: AnyIdentity; fields: MutableTradeFields }
  | { action: TradeAction.Approve; actor: AnyIdentity }
  | { action: TradeAction.SendToExecute; actor: AnyIdentity }
  | { action: TradeAction.Book; actor: AnyIdentity; strike: Decimal }
  | { action: TradeAction.Cancel; actor: AnyIdentity };

/**
 * Lifecycle engine for trade proposals.
 *
 * Each named operation only accepts a record in its source state, so an
 * illegal transition does not type-check. Requester calls return a Result
 * because the caller must own the trade; approver calls are not ownership
 * checked and return the new record directly.
 *
 * Records are never mutated: every transition builds a new frozen record and
 * appends exactly one entry to the history ledger. A failed call leaves the
 * ledger untouched and does not hand the record back; the caller's own
 * reference stays valid.
 */
@Injectable()
export class TradeLifecycleService {
  private readonly logger = new Logger(TradeLifecycleService.name);

  constructor(private readonly history: TradeHistoryService) {}

  /**
   * Opens a Draft owned by the requester. trade date is stamped from `now`.
   * Creation is not a transition and leaves no history entry.
   */
  createDraft(
    user: Requester,
    fields: MutableTradeFields,
    now: Date = new Date(),
  ): Result<TradeRecord<LifecycleState.Draft>, InvalidDetailsError> {
    const snapshot = snapshotFields(fields);
    const tradeDate = copyDate(now);
    const issue = checkDetails(snapshot, tradeDate);
    if (issue) {
      return err(issue);
    }

    const draft: TradeRecord<LifecycleState.Draft> = {
      tradingEntity: user,
      fields: snapshot,
      tradeDate,
      strike: undefined,
      state: LifecycleState.Draft,
    };
    return ok(Object.freeze(draft));
  }

  /**
   * Capability-gated primitive behind every named operation.
   * The caller picks the target state; named operations pin it per edge.
   */
  transition<From extends LifecycleState, To extends LifecycleState>(
    actor: Requester,
    record: TradeRecord<From>,
    to: To,
    action: TradeAction,
    mutation?: TradeMutation,
  ): Result<TradeRecord<To>, UnauthorisedRequesterError>;
  transition<From extends LifecycleState, To extends LifecycleState>(
    actor: Approver,
    record: TradeRecord<From>,
    to: To,
    action: TradeAction,
    mutation?: TradeMutation,
  ): TradeRecord<To>;
  transition<From extends LifecycleState, To extends LifecycleState>(
    actor: AnyIdentity,
    record: TradeRecord<From>,
    to: To,
    action: TradeAction,
    mutation: TradeMutation = unchanged,
  ): Result<TradeRecord<To>, UnauthorisedRequesterError> | TradeRecord<To> {
    if (isRequester(actor)) {
      if (!sameIdentity(actor, record.tradingEntity)) {
        const error = new UnauthorisedRequesterError(actor.id, action, record.state);
        this.logger.warn(error.message);
        return err(error);
      }
      return ok(this.commit(actor, record, to, action, mutation));
    }
    return this.commit(actor, record, to, action, mutation);
  }

  submit(
    record: TradeRecord<LifecycleState.Draft>,
    actor: Requester,
  ): Result<TradeRecord<LifecycleState.PendingApproval>, UnauthorisedRequesterError> {
    return this.transition(actor, record, LifecycleState.PendingApproval, TradeAction.Submit);
  }

  accept(
    record: TradeRecord<LifecycleState.PendingApproval>,
    actor: Approver,
  ): TradeRecord<LifecycleState.Approved> {
    return this.transition(actor, record, LifecycleState.Approved, TradeAction.Accept);
  }

  /**
   * Replaces the mutable fields. Validation runs against the original trade
   * date before anything else, so a rejected update leaves no history.
   */
  update(
    record: TradeRecord<LifecycleState.PendingApproval>,
    actor: Approver,
    fields: MutableTradeFields,
  ): Result<TradeRecord<LifecycleState.NeedsReapproval>, InvalidDetailsError> {
    const issue = checkDetails(fields, record.tradeDate);
    if (issue) {
      this.logger.warn(`Update by ${actor.id} rejected: ${issue.message}`);
      return err(issue);
    }
    if (fieldsEqual(record.fields, fields)) {
      this.logger.debug(`Update by ${actor.id} leaves the fields unchanged`);
    }
    return ok(
      this.transition(actor, record, LifecycleState.NeedsReapproval, TradeAction.Update, (payload) => ({
        ...payload,
        fields,
      })),
    );
  }

  approve(
    record: TradeRecord<LifecycleState.NeedsReapproval>,
    actor: Requester,
  ): Result<TradeRecord<LifecycleState.Approved>, UnauthorisedRequesterError> {
    return this.transition(actor, record, LifecycleState.Approved, TradeAction.Approve);
  }

  sendToExecute(
    record: TradeRecord<LifecycleState.Approved>,
    actor: Approver,
  ): TradeRecord<LifecycleState.SentToCounterparty> {
    return this.transition(actor, record, LifecycleState.SentToCounterparty, TradeAction.SendToExecute);
  }

  /** Records the agreed strike. Only reachable once per trade. */
  book(
    record: TradeRecord<LifecycleState.SentToCounterparty>,
    strike: Decimal,
    actor: Requester,
  ): Result<TradeRecord<LifecycleState.Executed>, UnauthorisedRequesterError>;
  book(
    record: TradeRecord<LifecycleState.SentToCounterparty>,
    strike: Decimal,
    actor: Approver,
  ): TradeRecord<LifecycleState.Executed>;
  book(
    record: TradeRecord<LifecycleState.SentToCounterparty>,
    strike: Decimal,
    actor: AnyIdentity,
  ): Result<TradeRecord<LifecycleState.Executed>, UnauthorisedRequesterError> | TradeRecord<LifecycleState.Executed> {
    const setStrike: TradeMutation = (payload) => ({ ...payload, strike });
    return isRequester(actor)
      ? this.transition(actor, record, LifecycleState.Executed, TradeAction.Book, setStrike)
      : this.transition(actor, record, LifecycleState.Executed, TradeAction.Book, setStrike);
  }

  cancel(
    record: CancellableTradeRecord,
    actor: Requester,
  ): Result<TradeRecord<LifecycleState.Cancelled>, UnauthorisedRequesterError>;
  cancel(record: CancellableTradeRecord, actor: Approver): TradeRecord<LifecycleState.Cancelled>;
  cancel(
    record: CancellableTradeRecord,
    actor: AnyIdentity,
  ): Result<TradeRecord<LifecycleState.Cancelled>, UnauthorisedRequesterError> | TradeRecord<LifecycleState.Cancelled> {
    return isRequester(actor)
      ? this.transition(actor, record, LifecycleState.Cancelled, TradeAction.Cancel)
      : this.transition(actor, record, LifecycleState.Cancelled, TradeAction.Cancel);
  }

  /**
   * Runs a command against a record of any state.
   * Order of checks: the action must leave the current state, then the
   * actor's capability must be allowed to take it, then the named operation
   * applies its own ownership and field checks.
   */
  apply(record: AnyTradeRecord, command: TradeCommand): Result<AnyTradeRecord, TransitionError> {
    const { actor } = command;
    const invalid = () => err(new InvalidTransitionError(record.state, command.action));
    const forbidden = () => err(new ForbiddenCapabilityError(actor.id, actor.capability, command.action));

    switch (command.action) {
      case TradeAction.Submit:
        if (record.state !== LifecycleState.Draft) {
          return invalid();
        }
        return isRequester(actor) ? this.submit(record, actor) : forbidden();

      case TradeAction.Accept:
        if (record.state !== LifecycleState.PendingApproval) {
          return invalid();
        }
        return isRequester(actor) ? forbidden() : ok(this.accept(record, actor));

      case TradeAction.Update:
        if (record.state !== LifecycleState.PendingApproval) {
          return invalid();
        }
        return isRequester(actor) ? forbidden() : this.update(record, actor, command.fields);

      case TradeAction.Approve:
        if (record.state !== LifecycleState.NeedsReapproval) {
          return invalid();
        }
        return isRequester(actor) ? this.approve(record, actor) : forbidden();

      case TradeAction.SendToExecute:
        if (record.state !== LifecycleState.Approved) {
          return invalid();
        }
        return isRequester(actor) ? forbidden() : ok(this.sendToExecute(record, actor));

      case TradeAction.Book:
        if (record.state !== LifecycleState.SentToCounterparty) {
          return invalid();
        }
        return isRequester(actor)
          ? this.book(record, command.strike, actor)
          : ok(this.book(record, command.strike, actor));

      case TradeAction.Cancel:
        if (!isCancellableRecord(record)) {
          return invalid();
        }
        return isRequester(actor) ? this.cancel(record, actor) : ok(this.cancel(record, actor));
    }
  }

  private commit<From extends LifecycleState, To extends LifecycleState>(
    actor: AnyIdentity,
    record: TradeRecord<From>,
    to: To,
    action: TradeAction,
    mutation: TradeMutation,
  ): TradeRecord<To> {
    const payload = mutation({ fields: record.fields, strike: record.strike });
    const next: TradeRecord<To> = Object.freeze({
      tradingEntity: record.tradingEntity,
      fields: snapshotFields(payload.fields),
      tradeDate: record.tradeDate,
      strike: payload.strike,
      state: to,
    });

    const index = this.history.append({
      timestamp: new Date(),
      action,
      userId: actor.id,
      stateBefore: record.state,
      stateAfter: to,
      changes: computeDiff(record, next),
    });

    this.logger.log(
      `${actor.capability} ${actor.id} did ${TRADE_ACTION_LABELS[action]}: ${record.state} -> ${to} (history #${index})`,
    );
    return next;
  }
}
