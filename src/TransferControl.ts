import { throwTransportUsageError } from './Utils.ts';

import type TransferCycle from './TransferCycle.ts';
import type { TransferSink } from './Transport.ts';

/**
 * A transfer received by the TransportStub and methods to report its progress and outcome.
 *
 * Once the request cancels the transfer (abort() or a new open()), the reporting methods do
 * nothing. Reporting a second outcome is an error.
 */
export default class TransferControl {
  private _settled = false;

  private _cancelled = false;

  constructor(
    private readonly _cycle: TransferCycle,
    private readonly _sink: TransferSink,
    private readonly _onSettled?: () => void
  ) {}

  get cycle() { return this._cycle; }

  get method() { return this._cycle.method; }

  get url() { return this._cycle.url; }

  get body() { return this._cycle.body; }

  get async() { return this._cycle.async; }

  get timeout() { return this._cycle.timeout; }

  /**
   * @returns Whether an outcome was reported or the request cancelled the transfer
   */
  get settled() { return this._settled || this._cancelled; }

  get cancelled() { return this._cancelled; }

  /**
   * Report progress. The first call changes the request's readyState to HEADERS_RECEIVED, the next
   * ones to LOADING.
   *
   * @param loaded Transmitted bytes
   * @param total Body length in bytes
   */
  progress(loaded = 0, total = 0) {
    if (this._cancelled) {
      return;
    }
    if (this._settled) {
      throwTransportUsageError('progress reported after the transfer ended');
    }
    this._sink.onProgress(this._cycle, loaded, total);
  }

  /**
   * Complete the transfer. Changes the request's readyState to DONE.
   *
   * @param status Response http status (default 200)
   */
  complete(status = 200) {
    if (this._settle()) {
      this._sink.onComplete(this._cycle, status);
    }
  }

  /**
   * Simulate a network error. Changes the request's readyState to DONE.
   */
  fail() {
    if (this._settle()) {
      this._sink.onFailure(this._cycle);
    }
  }

  /**
   * Simulate a request timeout. Changes the request's readyState to DONE.
   */
  timeOut() {
    if (this._settle()) {
      this._sink.onTimeout(this._cycle);
    }
  }

  /**
   * Called when the request gives up on this transfer.
   */
  cancel() {
    if (!this.settled) {
      this._cancelled = true;
      this._onSettled?.();
    }
  }

  private _settle() {
    if (this._cancelled) {
      return false;
    }
    if (this._settled) {
      throwTransportUsageError('an outcome was already reported for this transfer');
    }
    this._settled = true;
    this._onSettled?.();
    return true;
  }
}
