// Fixed lifecycle of a trade proposal. Enum values double as display names
// in logs, errors and the audit history.
export enum LifecycleState {
  Draft = 'Draft',
  PendingApproval = 'PendingApproval',
  NeedsReapproval = 'NeedsReapproval',
  Approved = 'Approved',
  SentToCounterparty = 'SentToCounterparty',
  Executed = 'Executed',
  Cancelled = 'Cancelled',
}

// Numeric status reported by the status endpoint.
export const LIFECYCLE_STATE_IDS: Record<LifecycleState, number> = {
  [LifecycleState.Draft]: 0,
  [LifecycleState.PendingApproval]: 1,
  [LifecycleState.NeedsReapproval]: 2,
  [LifecycleState.Approved]: 3,
  [LifecycleState.SentToCounterparty]: 4,
  [LifecycleState.Executed]: 5,
  [LifecycleState.Cancelled]: 6,
};

export type CancellableState =
  | LifecycleState.PendingApproval
  | LifecycleState.NeedsReapproval
  | LifecycleState.Approved
  | LifecycleState.SentToCounterparty;

const CANCELLABLE_STATES: ReadonlySet<LifecycleState> = new Set<LifecycleState>([
  LifecycleState.PendingApproval,
  LifecycleState.NeedsReapproval,
  LifecycleState.Approved,
  LifecycleState.SentToCounterparty,
]);

export function isCancellable(state: LifecycleState): state is CancellableState {
  return CANCELLABLE_STATES.has(state);
}

export enum TradeAction {
  Cancel = 'Cancel',
  Submit = 'Submit',
  Accept = 'Accept',
  Update = 'Update',
  Approve = 'Approve',
  SendToExecute = 'SendToExecute',
  Book = 'Book',
}

export const TRADE_ACTION_LABELS: Record<TradeAction, string> = {
  [TradeAction.Cancel]: 'cancel',
  [TradeAction.Submit]: 'submit',
  [TradeAction.Accept]: 'accept',
  [TradeAction.Update]: 'update',
  [TradeAction.Approve]: 'approve',
  [TradeAction.SendToExecute]: 'send to execute',
  [TradeAction.Book]: 'book',
};

/**
 * The complete state graph: (from, action) -> to.
 * Executed and Cancelled are terminal.
 */
export const TRANSITIONS: Record<LifecycleState, Partial<Record<TradeAction, LifecycleState>>> = {
  [LifecycleState.Draft]: {
    [TradeAction.Submit]: LifecycleState.PendingApproval,
  },
  [LifecycleState.PendingApproval]: {
    [TradeAction.Accept]: LifecycleState.Approved,
    [TradeAction.Update]: LifecycleState.NeedsReapproval,
    [TradeAction.Cancel]: LifecycleState.Cancelled,
  },
  [LifecycleState.NeedsReapproval]: {
    [TradeAction.Approve]: LifecycleState.Approved,
    [TradeAction.Cancel]: LifecycleState.Cancelled,
  },
  [LifecycleState.Approved]: {
    [TradeAction.SendToExecute]: LifecycleState.SentToCounterparty,
    [TradeAction.Cancel]: LifecycleState.Cancelled,
  },
  [LifecycleState.SentToCounterparty]: {
    [TradeAction.Book]: LifecycleState.Executed,
    [TradeAction.Cancel]: LifecycleState.Cancelled,
  },
  [LifecycleState.Executed]: {},
  [LifecycleState.Cancelled]: {},
};

export function nextState(from: LifecycleState, action: TradeAction): LifecycleState | undefined {
  return TRANSITIONS[from][action];
}

/** Actions the graph allows out of a state, in enum order */
export function availableActions(from: LifecycleState): TradeAction[] {
  return Object.values(TradeAction).filter((action) => nextState(from, action) !== undefined);
}
