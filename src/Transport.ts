import type TransferCycle from './TransferCycle.ts';

/**
 * Methods for reporting the progress and outcome of a transfer. Exactly one of onComplete(),
 * onFailure() and onTimeout() is expected per cycle. Callbacks for a cycle that was aborted or
 * replaced by a new open() are discarded.
 */
export interface TransferSink {
  /**
   * The first call moves an async request to HEADERS_RECEIVED, the next ones to LOADING.
   */
  onProgress(cycle: TransferCycle, loaded?: number, total?: number): void;

  /**
   * The transfer completed with an HTTP status, error statuses included.
   */
  onComplete(cycle: TransferCycle, status: number): void;

  onFailure(cycle: TransferCycle): void;

  /**
   * The transfer's deadline (TransferCycle.timeout) passed.
   */
  onTimeout(cycle: TransferCycle): void;
}

/**
 * Carries out the transfers of SimXhr requests.
 *
 * For a synchronous cycle (cycle.async === false), beginTransfer() must report the outcome before
 * it returns. For an async cycle, it must return first and report later.
 */
export interface Transport {
  beginTransfer(cycle: TransferCycle, sink: TransferSink): void;

  /**
   * Called when the request gives up on the cycle (abort() or a new open()).
   */
  cancelTransfer?(cycle: TransferCycle): void;
}
