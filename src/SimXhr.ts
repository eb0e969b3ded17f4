import { loadConfig } from './Config.ts';
import EventDispatcher from './EventDispatcher.ts';
import { getDefaultLogger } from './Logger.ts';
import { resolveQuirkProfile } from './QuirkProfile.ts';
import TransferCycle from './TransferCycle.ts';
import * as Utils from './Utils.ts';
import XhrEventTarget from './XhrEventTarget.ts';

import type { Logger } from './Logger.ts';
import type { QuirkProfile, TBuiltinQuirkProfileNames } from './QuirkProfile.ts';
import type { Transport, TransferSink } from './Transport.ts';
import type XhrEvent from './XhrEvent.ts';
import type { XhrStateSnapshot } from './XhrEvent.ts';
import type { TTerminalEventNames } from './XhrEventNames.ts';
import type { XhrEventHandler } from './XhrEventTarget.ts';

export type OnCreateCallback = (xhr: SimXhr) => void;

export type HandlerErrorCallback = (error: unknown, event: XhrEvent) => void;

export interface SimXhrOptions {
  transport?: Transport,
  quirkProfile?: QuirkProfile | TBuiltinQuirkProfileNames,
  logger?: Logger,
}

/**
 * What the transport reported for a cycle
 */
export type TransferOutcome =
  | { type: 'completed', status: number }
  | { type: 'failed' }
  | { type: 'timed-out' };

/**
 * Pick the terminal event of a cycle. An abort wins over anything the transport reported.
 *
 * @param aborted Whether abort() was called during the cycle
 * @param outcome Transport outcome, null when none arrived
 * @returns Terminal event name
 */
export function classifyOutcome(
  aborted: boolean,
  outcome: TransferOutcome | null
): TTerminalEventNames {
  if (aborted) {
    return 'abort';
  }
  if (outcome?.type === 'failed') {
    return 'error';
  }
  if (outcome?.type === 'timed-out') {
    return 'timeout';
  }
  return 'load';
}

/**
 * Simulated XMLHttpRequest. Reproduces the states and events of a request for each transport
 * outcome, in synchronous and async mode, with the event ordering of the selected quirk profile.
 * Based on https://xhr.spec.whatwg.org, minus headers and bodies.
 *
 * The transfer itself is delegated to a Transport, which reports progress and one outcome per
 * send() through the TransferSink methods of the request.
 */
export default class SimXhr extends XhrEventTarget implements TransferSink {
  private _readyState: number;
  private _status: number;
  private _async: boolean;
  private _timeout: number;
  private _requestMethod?: string;
  private _requestUrl?: string;

  private _sendFlag: boolean;
  private _abortedFlag: boolean;
  private _cycleCount: number;
  private _currentCycle?: TransferCycle;
  private _currentTransport?: Transport;

  private readonly _classDefaults: typeof SimXhr;
  private readonly _transport?: Transport;
  private readonly _logger: Logger;
  private readonly _dispatcher: EventDispatcher;

  constructor(options: SimXhrOptions = {}) {
    super();
    this._classDefaults = new.target;

    this._readyState = SimXhr.UNSENT;
    this._status = 0;
    this._async = true;
    this._timeout = 0;
    this._sendFlag = false;
    this._abortedFlag = false;
    this._cycleCount = 0;

    this._transport = options.transport;
    this._logger = options.logger ?? this._classDefaults.logger ?? getDefaultLogger();
    const profile = resolveQuirkProfile(options.quirkProfile
      ?? this._classDefaults.quirkProfile
      ?? loadConfig().quirkProfile);
    this._dispatcher = new EventDispatcher(
      this,
      profile,
      () => this._snapshot(),
      (error, event) => { this._reportHandlerError(error, event); }
    );

    this.onreadystatechange = null;

    SimXhr.onCreate?.(this);
  }

  //-------
  // States
  //-------

  static readonly UNSENT = 0;
  static readonly OPENED = 1;
  static readonly HEADERS_RECEIVED = 2;
  static readonly LOADING = 3;
  static readonly DONE = 4;

  readonly UNSENT = SimXhr.UNSENT;
  readonly OPENED = SimXhr.OPENED;
  readonly HEADERS_RECEIVED = SimXhr.HEADERS_RECEIVED;
  readonly LOADING = SimXhr.LOADING;
  readonly DONE = SimXhr.DONE;

  get onreadystatechange() { return this._getEventHandlerProperty('readystatechange'); }

  set onreadystatechange(value: XhrEventHandler) {
    this._setEventHandlerProperty('readystatechange', value);
  }

  //---------------
  // Configuration
  //---------------

  /**
   * Default transport of the instances of this class
   */
  static transport?: Transport;

  /**
   * Default quirk profile of the instances of this class. Falls back to SIM_XHR_QUIRK_PROFILE.
   */
  static quirkProfile?: QuirkProfile | TBuiltinQuirkProfileNames;

  /**
   * Default logger of the instances of this class. Falls back to the process-wide logger.
   */
  static logger?: Logger;

  /**
   * Hook for creation of SimXhr instances
   */
  static onCreate?: OnCreateCallback;

  /**
   * Default receiver of the errors thrown by event handlers
   */
  static onHandlerError?: HandlerErrorCallback;

  /**
   * Per-instance receiver of the errors thrown by event handlers. Without one, errors are logged.
   */
  onHandlerError?: HandlerErrorCallback;

  /**
   * @returns Quirk profile selected for this instance
   */
  get quirkProfile() { return this._dispatcher.profile; }

  /**
   * @returns The cycle of the send() in progress, if any
   */
  get currentCycle() { return this._currentCycle; }

  //-------
  // States
  //-------

  /**
   * @returns Client's state
   * @see {@link https://xhr.spec.whatwg.org/#dom-xmlhttprequest-readystate}
   */
  get readyState() { return this._readyState; }

  /**
   * @returns HTTP status of a completed transfer once DONE, 0 otherwise
   */
  get status() { return this._status; }

  /**
   * @returns Whether the current cycle is async
   */
  get async() { return this._async; }

  //--------
  // Request
  //--------

  /**
   * Set the request method, url and mode. Starts a new cycle: a transfer in progress is dropped
   * without events, status and the aborted flag are reset and listeners are kept.
   *
   * @param method Request HTTP method (GET, POST, etc.)
   * @param url Request url
   * @param async Async request flag. Omitted means true.
   * @see {@link https://xhr.spec.whatwg.org/#the-open()-method}
   */
  open(method: string, url: string | URL, async?: boolean) {
    const isAsync = arguments.length < 3 || !!async;
    if (!Utils.isRequestMethod(method)) {
      Utils.throwError('SyntaxError', `Method "${method}" is not a method.`);
    }
    if (Utils.isRequestMethodForbidden(method)) {
      Utils.throwError('SecurityError', `Method "${method}" forbidden.`);
    }
    method = Utils.normalizeHTTPMethodName(method);

    this._terminateTransfer();

    // Set variables
    this._sendFlag = false;
    this._abortedFlag = false;
    this._status = 0;
    this._async = isAsync;
    this._requestMethod = method;
    this._requestUrl = url.toString();
    if (this._readyState !== SimXhr.OPENED) {
      this._readyState = SimXhr.OPENED;
      this._dispatcher.fireTransition({ kind: 'open' });
    }
  }

  /**
   * @returns timeout attribute in milliseconds, 0 for none
   * @see {@link https://xhr.spec.whatwg.org/#dom-xmlhttprequest-timeout}
   */
  get timeout() { return this._timeout; }

  /**
   * Only settable before send(). Values that aren't positive mean no timeout. A timeout on a
   * synchronous request makes send() throw.
   *
   * @param value timeout value in milliseconds
   */
  set timeout(value: number) {
    if (this._sendFlag) {
      Utils.throwError('InvalidStateError', 'The timeout can\'t be changed after send().');
    }
    this._timeout = value > 0 ? value : 0;
  }

  /**
   * Initiate the request. In synchronous mode, returns once the cycle is DONE. A transport that
   * throws from beginTransfer() produces a network error.
   *
   * @param body Request body
   * @see {@link https://xhr.spec.whatwg.org/#the-send()-method}
   */
  send(body: unknown = null) {
    if (this._readyState !== SimXhr.OPENED || this._sendFlag) {
      Utils.throwError('InvalidStateError', 'send() requires OPENED and no send() in progress.');
    }
    if (!this._async && this._timeout > 0) {
      Utils.throwError('InvalidStateError', 'Synchronous requests can\'t have a timeout.');
    }
    const transport = this._transport ?? this._classDefaults.transport;
    if (!transport) {
      throw new Error('No transport: pass one to the constructor or set the class\' transport.');
    }
    if (this._requestMethod === 'GET' || this._requestMethod === 'HEAD') {
      body = null;
    }

    this._cycleCount += 1;
    const cycle = new TransferCycle(
      this._cycleCount,
      this._requestMethod ?? 'GET',
      this._requestUrl ?? '',
      body,
      this._async,
      this._timeout
    );
    this._currentCycle = cycle;
    this._currentTransport = transport;
    this._abortedFlag = false;
    this._sendFlag = true;
    this._logger.debug(
      { cycle: cycle.id, method: cycle.method, url: cycle.url, async: cycle.async },
      'transfer begins'
    );

    const isActive = () => this._isActive(cycle);

    if (this._async) {
      const afterSend = this._dispatcher.fireTransition({ kind: 'send' }, isActive);
      if (afterSend.length === 0) {
        if (isActive()) {
          this._beginTransfer(transport, cycle);
        }
        return;
      }

      void Promise.resolve().then(() => {
        this._dispatcher.fireEvents(afterSend, isActive);
        if (isActive()) {
          this._beginTransfer(transport, cycle);
        }
      }).catch((error: unknown) => {
        this._logger.error({ err: error, cycle: cycle.id }, 'transfer could not begin');
      });
      return;
    }

    // The transport answers before returning: this blocks like a synchronous XMLHttpRequest
    this._beginTransfer(transport, cycle);
    if (isActive()) {
      this._terminateTransfer();
      this._sendFlag = false;
      Utils.throwTransportUsageError('synchronous transfer returned without an outcome');
    }
  }

  /**
   * Abort the request. Only has an effect while a send() is in progress.
   *
   * @see {@link https://xhr.spec.whatwg.org/#the-abort()-method}
   */
  abort() {
    if (this._sendFlag && (this._readyState === SimXhr.OPENED ||
      this._readyState === SimXhr.HEADERS_RECEIVED ||
      this._readyState === SimXhr.LOADING)) {
      this._abortedFlag = true;
      this._terminateTransfer();
      this._processOutcome(null);
    }
  }

  //-------------
  // TransferSink
  //-------------

  /**
   * Report transfer progress. Only visible for async requests: the first call changes the
   * readyState to HEADERS_RECEIVED, the next ones to LOADING.
   *
   * @param cycle Originating cycle
   * @param loaded Transmitted bytes
   * @param total Body length in bytes
   */
  onProgress(cycle: TransferCycle, loaded = 0, total = 0) {
    if (!this._acceptsCallback(cycle, 'onProgress') || !this._async) {
      return;
    }

    const isActive = () => this._isActive(cycle);
    if (this._readyState === SimXhr.OPENED) {
      this._readyState = SimXhr.HEADERS_RECEIVED;
      this._dispatcher.fireTransition({ kind: 'headers-received' }, isActive);
    } else {
      this._readyState = SimXhr.LOADING;
      this._dispatcher.fireTransition({ kind: 'loading', loaded, total }, isActive);
    }
  }

  /**
   * The transfer completed. Changes the readyState to DONE and fires 'load', whatever the status.
   *
   * @param cycle Originating cycle
   * @param status HTTP status
   */
  onComplete(cycle: TransferCycle, status: number) {
    if (!Number.isInteger(status) || status < 100 || status > 599) {
      Utils.throwTransportUsageError(`status ${status} is not an HTTP status`);
    }
    if (this._acceptsCallback(cycle, 'onComplete')) {
      this._releaseTransfer();
      this._processOutcome({ type: 'completed', status });
    }
  }

  /**
   * Network error. Changes the readyState to DONE and fires 'error'.
   *
   * @param cycle Originating cycle
   */
  onFailure(cycle: TransferCycle) {
    if (this._acceptsCallback(cycle, 'onFailure')) {
      this._releaseTransfer();
      this._processOutcome({ type: 'failed' });
    }
  }

  /**
   * The deadline passed. Changes the readyState to DONE and fires 'timeout'.
   *
   * @param cycle Originating cycle
   */
  onTimeout(cycle: TransferCycle) {
    if (cycle.timeout === 0) {
      Utils.throwTransportUsageError('timeout reported for a transfer without a deadline');
    }
    if (this._acceptsCallback(cycle, 'onTimeout')) {
      this._releaseTransfer();
      this._processOutcome({ type: 'timed-out' });
    }
  }

  //----------
  // Internals
  //----------

  /**
   * Steps for reaching DONE. Exactly one terminal event followed by 'loadend'.
   *
   * @param outcome Transport outcome, null for an abort
   */
  private _processOutcome(outcome: TransferOutcome | null) {
    const terminalEvent = classifyOutcome(this._abortedFlag, outcome);
    this._sendFlag = false;
    this._readyState = SimXhr.DONE;
    this._status = terminalEvent === 'load' && outcome?.type === 'completed' ? outcome.status : 0;
    this._logger.debug(
      { cycle: this._cycleCount, outcome: terminalEvent, status: this._status },
      'transfer done'
    );

    this._dispatcher.fireTransition({ kind: 'done', outcome: terminalEvent });
  }

  /**
   * Hand the cycle to the transport. A transport that throws ends the cycle as a network failure,
   * whatever the mode and the profile.
   *
   * @param transport Transport of the cycle
   * @param cycle Cycle to transfer
   */
  private _beginTransfer(transport: Transport, cycle: TransferCycle) {
    try {
      transport.beginTransfer(cycle, this);
    } catch (error) {
      this._logger.error({ err: error, cycle: cycle.id }, 'transport could not begin the transfer');
      if (this._isActive(cycle)) {
        this._terminateTransfer();
        this._processOutcome({ type: 'failed' });
      }
    }
  }

  private _acceptsCallback(cycle: TransferCycle, callback: string) {
    if (this._isActive(cycle)) {
      return true;
    }
    this._logger.debug(
      { cycle: cycle.id, callback },
      'discarding transport callback for an ended cycle'
    );
    return false;
  }

  private _isActive(cycle: TransferCycle) {
    return this._sendFlag && this._currentCycle === cycle;
  }

  /**
   * Forget the current cycle after its outcome arrived
   */
  private _releaseTransfer() {
    delete this._currentCycle;
    delete this._currentTransport;
  }

  /**
   * Give up on the current cycle, if any, and tell its transport
   */
  private _terminateTransfer() {
    const cycle = this._currentCycle;
    const transport = this._currentTransport;
    this._releaseTransfer();
    if (cycle && transport) {
      transport.cancelTransfer?.(cycle);
    }
  }

  private _snapshot(): XhrStateSnapshot {
    return { readyState: this._readyState, status: this._status, async: this._async };
  }

  private _reportHandlerError(error: unknown, event: XhrEvent) {
    const onHandlerError = this.onHandlerError ?? this._classDefaults.onHandlerError;
    if (onHandlerError) {
      onHandlerError(error, event);
    } else {
      this._logger.error({ err: error, eventType: event.type }, 'event handler threw');
    }
  }
}
