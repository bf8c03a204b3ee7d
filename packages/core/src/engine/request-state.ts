/**
 * Per-request state machine.
 *
 * States:
 * - received: Request accepted from the HTTP surface
 * - normalized: Path canonicalized into a route key
 * - resolved: Route key mapped onto a route or listing
 * - dispatched: Handler strategy invoked
 * - responded: Response descriptor produced (terminal)
 * - errored: Request failed at any earlier step (terminal)
 */

export type RequestState =
  | "received"
  | "normalized"
  | "resolved"
  | "dispatched"
  | "responded"
  | "errored";

/** Valid state transitions. There are no retries: both terminal states are final. */
const VALID_TRANSITIONS: Record<RequestState, ReadonlySet<RequestState>> = {
  received: new Set(["normalized", "errored"]),
  normalized: new Set(["resolved", "errored"]),
  resolved: new Set(["dispatched", "errored"]),
  dispatched: new Set(["responded", "errored"]),
  responded: new Set(),
  errored: new Set(),
};

export interface RequestTransitionEvent {
  from: RequestState;
  to: RequestState;
  timestamp: Date;
  reason?: string;
}

export type RequestStateListener = (event: RequestTransitionEvent) => void;

export class RequestStateMachine {
  private state: RequestState = "received";
  private listeners: RequestStateListener[] = [];

  getState(): RequestState {
    return this.state;
  }

  isTerminal(): boolean {
    return VALID_TRANSITIONS[this.state].size === 0;
  }

  canTransition(to: RequestState): boolean {
    return VALID_TRANSITIONS[this.state].has(to);
  }

  /** Throws if the transition is not valid. */
  transition(to: RequestState, reason?: string): void {
    if (!this.canTransition(to)) {
      throw new Error(`Invalid request state transition: ${this.state} -> ${to}`);
    }

    const event: RequestTransitionEvent = {
      from: this.state,
      to,
      timestamp: new Date(),
      reason,
    };

    this.state = to;

    for (const listener of this.listeners) {
      listener(event);
    }
  }

  /** Returns an unsubscribe function. */
  onStateChange(listener: RequestStateListener): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }
}
