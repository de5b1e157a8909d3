import { Capability } from '../entities/identity.entity';
import { LifecycleState, TRADE_ACTION_LABELS, TradeAction } from '../entities/lifecycle-state.entity';

export enum TradeErrorCode {
  InvalidDetails = 'INVALID_DETAILS',
  UnauthorisedRequester = 'UNAUTHORISED_REQUESTER',
  InvalidTransition = 'INVALID_TRANSITION',
  ForbiddenCapability = 'FORBIDDEN_CAPABILITY',
  TradeNotFound = 'TRADE_NOT_FOUND',
  DuplicateIdentifier = 'DUPLICATE_IDENTIFIER',
}

export abstract class TradeError extends Error {
  abstract readonly code: TradeErrorCode;

  protected constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// Proposed fields break a business rule (date ordering, currency membership).
export class InvalidDetailsError extends TradeError {
  readonly code = TradeErrorCode.InvalidDetails;

  constructor(readonly issue: string) {
    super(issue);
  }
}

// Requester acting on a trade it does not own.
export class UnauthorisedRequesterError extends TradeError {
  readonly code = TradeErrorCode.UnauthorisedRequester;

  constructor(
    readonly requester: string,
    readonly action: TradeAction,
    readonly state: LifecycleState,
  ) {
    super(
      `Invalid requester user ${requester} attempted to ${TRADE_ACTION_LABELS[action]} from state ${state}.`,
    );
  }
}

// Action is not an edge out of the record's current state.
export class InvalidTransitionError extends TradeError {
  readonly code = TradeErrorCode.InvalidTransition;

  constructor(
    readonly state: LifecycleState,
    readonly action: TradeAction,
  ) {
    super(`Cannot ${TRADE_ACTION_LABELS[action]} a trade in state ${state}.`);
  }
}

// Action exists from this state but not for the caller's capability.
export class ForbiddenCapabilityError extends TradeError {
  readonly code = TradeErrorCode.ForbiddenCapability;

  constructor(
    readonly userId: string,
    readonly capability: Capability,
    readonly action: TradeAction,
  ) {
    super(`${capability} ${userId} may not ${TRADE_ACTION_LABELS[action]} a trade.`);
  }
}

export class TradeNotFoundError extends TradeError {
  readonly code = TradeErrorCode.TradeNotFound;

  constructor(readonly tradeId: string) {
    super(`Trade ${tradeId} not found.`);
  }
}

export class DuplicateTradeIdentifierError extends TradeError {
  readonly code = TradeErrorCode.DuplicateIdentifier;

  constructor(readonly tradeId: string) {
    super(`Trade identifier ${tradeId} already exists.`);
  }
}

export type TransitionError =
  | InvalidDetailsError
  | UnauthorisedRequesterError
  | InvalidTransitionError
  | ForbiddenCapabilityError;
