import type { TXhrEventNames } from './XhrEventNames.ts';

/**
 * Request state as observed by the listeners of one event. Captured when the event is dispatched,
 * not when the transition that produced it was scheduled.
 */
export interface XhrStateSnapshot {
  readonly readyState: number;
  readonly status: number;
  readonly async: boolean;
}

/**
 * XMLHttpRequest Event
 */
export default class XhrEvent {
  readonly type: TXhrEventNames;

  readonly snapshot: XhrStateSnapshot;

  /**
   * @param type Event type
   * @param snapshot Request state at dispatch time
   */
  constructor(type: TXhrEventNames, snapshot: XhrStateSnapshot) {
    this.type = type;
    this.snapshot = snapshot;
  }
}
