/**
 * Single-writer connection state.
 *
 * ```
 * disconnected ──connect──▶ connecting ──ready──▶ connected
 *      ▲                        │                    │
 *      │                        ▼                    ▼
 *      └──────────────── disconnecting ◀─────────────┘
 *
 * failed ◀── connecting | connected | disconnecting
 * failed ──▶ connecting | disconnected
 * ```
 *
 * A connected transport whose peer closes cleanly goes straight to
 * 'disconnected'.
 */

import { StateTransitionError } from '@/transport/errors.js';
import type { ConnectionState, ConnectionStatus, StateListener } from '@/transport/types.js';
import type { Logger } from '@/ui/logging/index.js';

const TRANSITIONS: Record<ConnectionStatus, readonly ConnectionStatus[]> = {
  disconnected: ['connecting'],
  connecting: ['connected', 'disconnecting', 'failed'],
  connected: ['disconnecting', 'disconnected', 'failed'],
  disconnecting: ['disconnected', 'failed'],
  failed: ['connecting', 'disconnected'],
};

const INITIAL_STATE: ConnectionState = Object.freeze<ConnectionState>({ status: 'disconnected' });

const ILLEGAL_TRANSITION_ERROR = (from: ConnectionStatus, to: ConnectionStatus): string =>
  `Illegal connection state transition: ${from} -> ${to}`;

export class ConnectionStateMachine {
  private current: ConnectionState = INITIAL_STATE;
  private readonly listeners = new Set<StateListener>();

  constructor(private readonly log: Logger) {}

  get state(): ConnectionState {
    return this.current;
  }

  get status(): ConnectionStatus {
    return this.current.status;
  }

  canTransition(to: ConnectionStatus): boolean {
    return TRANSITIONS[this.current.status].includes(to);
  }

  /**
   * Move to `next` and notify observers.
   *
   * @throws StateTransitionError if the move is not in the transition table
   */
  transition(next: ConnectionState): void {
    const previous = this.current;
    if (!this.canTransition(next.status)) {
      throw new StateTransitionError(ILLEGAL_TRANSITION_ERROR(previous.status, next.status));
    }

    this.current = Object.freeze(next);
    this.log.debug(
      next.status === 'failed'
        ? `State ${previous.status} -> failed (${next.reason.message})`
        : `State ${previous.status} -> ${next.status}`
    );

    for (const listener of [...this.listeners]) {
      listener(this.current, previous);
    }
  }

  /**
   * @returns Unsubscribe function
   */
  onChange(listener: StateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
