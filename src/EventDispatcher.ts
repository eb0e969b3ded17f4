import XhrEvent from './XhrEvent.ts';
import XhrProgressEvent from './XhrProgressEvent.ts';

import type { QuirkProfile } from './QuirkProfile.ts';
import type { XhrStateSnapshot } from './XhrEvent.ts';
import type XhrEventTarget from './XhrEventTarget.ts';
import type { ListenerErrorReporter } from './XhrEventTarget.ts';
import type { TTerminalEventNames, TXhrEventNames } from './XhrEventNames.ts';

export type Transition =
  | { kind: 'open' }
  | { kind: 'send' }
  | { kind: 'headers-received' }
  | { kind: 'loading', loaded: number, total: number }
  | { kind: 'done', outcome: TTerminalEventNames };

export interface EventPlan {
  /**
   * Fired before the operation that caused the transition returns
   */
  immediate: readonly TXhrEventNames[];

  /**
   * Fired once send() has returned
   */
  afterSend: readonly TXhrEventNames[];
}

/**
 * Events produced by a transition, in firing order.
 *
 * @param transition State transition or terminal outcome
 * @param async Whether the request is async
 * @param profile Quirk profile
 * @returns Event plan
 */
export function planEvents(
  transition: Transition,
  async: boolean,
  profile: QuirkProfile
): EventPlan {
  switch (transition.kind) {
    case 'open':
      return { immediate: ['readystatechange'], afterSend: [] };
    case 'send': {
      if (!async) {
        return { immediate: [], afterSend: [] };
      }
      const duplicate: TXhrEventNames[] = profile.duplicateOpenedReadyStateChange
        ? ['readystatechange']
        : [];
      return profile.loadStart === 'in-send'
        ? { immediate: [...duplicate, 'loadstart'], afterSend: [] }
        : { immediate: duplicate, afterSend: ['loadstart'] };
    }
    case 'headers-received':
      return { immediate: async ? ['readystatechange'] : [], afterSend: [] };
    case 'loading':
      // readystatechange fires for every progress report, not only on the state change
      return { immediate: async ? ['readystatechange', 'progress'] : [], afterSend: [] };
    case 'done':
      return { immediate: ['readystatechange', transition.outcome, 'loadend'], afterSend: [] };
  }
}

/**
 * Fires the events of request transitions on a listener registry. Each event carries the request
 * state read when it is dispatched.
 */
export default class EventDispatcher {
  constructor(
    private readonly _target: XhrEventTarget,
    private readonly _profile: QuirkProfile,
    private readonly _getSnapshot: () => XhrStateSnapshot,
    private readonly _onListenerError: ListenerErrorReporter
  ) {}

  get profile() { return this._profile; }

  /**
   * Fire the immediate events of a transition.
   *
   * @param transition State transition or terminal outcome
   * @param isCurrent Checked before each event; dispatch stops once it returns false
   * @returns The events to fire once send() has returned
   */
  fireTransition(transition: Transition, isCurrent: () => boolean = () => true) {
    const { async } = this._getSnapshot();
    const { immediate, afterSend } = planEvents(transition, async, this._profile);
    const progress = transition.kind === 'loading' ? transition : { loaded: 0, total: 0 };
    this.fireEvents(immediate, isCurrent, progress.loaded, progress.total);
    return afterSend;
  }

  /**
   * @param types Event types, in firing order
   * @param isCurrent Checked before each event; dispatch stops once it returns false
   * @param loaded Loaded bytes reported by 'progress' events
   * @param total Total bytes reported by 'progress' events
   */
  fireEvents(
    types: readonly TXhrEventNames[],
    isCurrent: () => boolean = () => true,
    loaded = 0,
    total = 0
  ) {
    for (const type of types) {
      if (!isCurrent()) {
        return;
      }
      this._target.dispatchEvent(this._makeEvent(type, loaded, total), {
        handlerOrder: this._profile.eventHandlerOrder,
        onListenerError: this._onListenerError,
      });
    }
  }

  private _makeEvent(type: TXhrEventNames, loaded: number, total: number) {
    const snapshot = this._getSnapshot();
    if (type === 'readystatechange') {
      return new XhrEvent(type, snapshot);
    }
    return type === 'progress'
      ? new XhrProgressEvent(type, snapshot, loaded, total)
      : new XhrProgressEvent(type, snapshot);
  }
}
