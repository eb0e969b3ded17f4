import TransferControl from './TransferControl.ts';
import { normalizeHTTPMethodName } from './Utils.ts';

import type TransferCycle from './TransferCycle.ts';
import type { Transport, TransferSink } from './Transport.ts';

export type UrlMatcher = ((url: string) => boolean) | string | RegExp;

export interface StubResponse {
  status: number;

  /**
   * Number of progress reports before completion. Async transfers only.
   */
  progressTicks: number;

  /**
   * Delay before the first report. Async transfers only.
   */
  delayMillis: number;
}

type TransferHandlerCallback = (control: TransferControl) => void;

type SingleTransferHandler =
  Partial<StubResponse>
  | TransferHandlerCallback
  | 'error'
  | 'stall';

export type TransferHandler = SingleTransferHandler | SingleTransferHandler[];

interface Route {
  urlMatcher: UrlMatcher,
  handler: TransferHandler,
  count: number,
}

interface TransferLogEntry {
  method: string;
  url: string;
  async: boolean;
  timeout: number;
  body?: unknown;
}

interface ActiveTransfer {
  control: TransferControl;
  timers: NodeJS.Timeout[];
}

/**
 * Transport for SimXhr requests that answers from a route table instead of the network. Provides
 * simple route matching and transfer handlers to make test harness creation easier.
 *
 * Handlers:
 *  - a response object: completes with `status` (default 200) after `progressTicks` progress
 *    reports (default 0), `delayMillis` (default 0) after the transfer began
 *  - 'error': reports a network failure
 *  - 'stall': never answers; the request's deadline, if any, turns it into a timeout
 *  - a callback: receives the TransferControl and reports the outcome itself
 *  - a non-empty array of the above: each one is used once and the last one is used if out of
 *    elements
 *
 * Async transfers with a timeout get a deadline that reports a timeout unless an outcome was
 * reported first. Synchronous transfers are answered before beginTransfer() returns.
 */
export default class TransportStub implements Transport {
  private readonly _routes: Record<string, Route[]>;

  private readonly _transfers: TransferLogEntry[];

  private readonly _active: Map<TransferCycle, ActiveTransfer>;

  private _defaultRoute?: { handler: TransferHandler; count: number; };

  /**
   * @param routes Routes, keyed by HTTP method
   */
  constructor(routes?: Record<string, [UrlMatcher, TransferHandler]>) {
    this._routes = {};
    this._transfers = [];
    this._active = new Map();
    if (routes) {
      Object.entries(routes).forEach(([method, [urlMatcher, handler]]) => {
        this.addHandler(method, urlMatcher, handler);
      });
    }
  }

  /**
   * Add a GET transfer handler.
   *
   * @param urlMatcher Url matcher
   * @param handler Transfer handler
   * @returns this
   */
  get(urlMatcher: UrlMatcher, handler: TransferHandler) {
    return this.addHandler('GET', urlMatcher, handler);
  }

  /**
   * Add a POST transfer handler.
   *
   * @param urlMatcher Url matcher
   * @param handler Transfer handler
   * @returns this
   */
  post(urlMatcher: UrlMatcher, handler: TransferHandler) {
    return this.addHandler('POST', urlMatcher, handler);
  }

  /**
   * Add a PUT transfer handler.
   *
   * @param urlMatcher Url matcher
   * @param handler Transfer handler
   * @returns this
   */
  put(urlMatcher: UrlMatcher, handler: TransferHandler) {
    return this.addHandler('PUT', urlMatcher, handler);
  }

  /**
   * Add a DELETE transfer handler.
   *
   * @param urlMatcher Url matcher
   * @param handler Transfer handler
   * @returns this
   */
  delete(urlMatcher: UrlMatcher, handler: TransferHandler) {
    return this.addHandler('DELETE', urlMatcher, handler);
  }

  /**
   * Add a transfer handler.
   *
   * @param method HTTP method
   * @param urlMatcher Url matcher
   * @param handler Transfer handler
   * @returns this
   */
  addHandler(method: string, urlMatcher: UrlMatcher, handler: TransferHandler) {
    // Match the processing done in SimXhr.open() for the method name
    method = normalizeHTTPMethodName(method);
    checkHandler(handler);
    const routes = this._routes[method] ?? (this._routes[method] = []);
    routes.push({ urlMatcher, handler, count: 0 });
    return this;
  }

  /**
   * Set the default transfer handler for transfers that don't match any route.
   *
   * @param handler Transfer handler
   * @returns this
   */
  setDefaultHandler(handler: TransferHandler) {
    checkHandler(handler);
    this._defaultRoute = { handler, count: 0 };
    return this;
  }

  /**
   * Return 404 responses for transfers that don't match any route.
   *
   * @returns this
   */
  setDefault404() {
    return this.setDefaultHandler({ status: 404 });
  }

  /**
   * @returns Transfers received by the stub. Entries: { method, url, async, timeout, body? }
   */
  getTransferLog(): readonly TransferLogEntry[] {
    return [...this._transfers];
  }

  /**
   * @returns Number of transfers still waiting for an outcome
   */
  get pendingCount() { return this._active.size; }

  beginTransfer(cycle: TransferCycle, sink: TransferSink) {
    // Record the transfer for easier debugging
    this._transfers.push({
      method: cycle.method,
      url: cycle.url,
      async: cycle.async,
      timeout: cycle.timeout,
      body: cycle.body,
    });

    const active: ActiveTransfer = {
      control: new TransferControl(cycle, sink, () => { this._release(cycle); }),
      timers: [],
    };
    this._active.set(cycle, active);

    if (cycle.async && cycle.timeout > 0) {
      active.timers.push(setTimeout(() => { active.control.timeOut(); }, cycle.timeout));
    }

    const route = this._findFirstMatchingRoute(cycle) ?? this._defaultRoute;
    if (route) {
      const handler = Array.isArray(route.handler)
        ? route.handler[Math.min(route.handler.length - 1, route.count)]
        : route.handler;
      route.count += 1;
      this._runHandler(handler, active);
    }
  }

  cancelTransfer(cycle: TransferCycle) {
    this._active.get(cycle)?.control.cancel();
  }

  private _runHandler(handler: SingleTransferHandler, active: ActiveTransfer) {
    const { control } = active;
    if (handler === 'stall') {
      return;
    }

    if (!control.async) {
      // The caller is blocked in send(): answer right away
      if (typeof handler === 'function') {
        handler(control);
      } else if (handler === 'error') {
        control.fail();
      } else {
        control.complete(handler.status ?? 200);
      }
      return;
    }

    if (typeof handler === 'function') {
      const callback = handler;
      // Executes in an empty callstack, after send() returned
      void Promise.resolve().then(() => { callback(control); });
    } else if (handler === 'error') {
      void Promise.resolve().then(() => { control.fail(); });
    } else {
      const { status = 200, progressTicks = 0, delayMillis = 0 } = handler;
      active.timers.push(setTimeout(() => {
        for (let tick = 0; tick < progressTicks && !control.settled; tick += 1) {
          control.progress();
        }
        if (!control.settled) {
          control.complete(status);
        }
      }, delayMillis));
    }
  }

  private _release(cycle: TransferCycle) {
    const active = this._active.get(cycle);
    if (active) {
      active.timers.forEach((timer) => { clearTimeout(timer); });
      this._active.delete(cycle);
    }
  }

  private _findFirstMatchingRoute(cycle: TransferCycle) {
    const method = normalizeHTTPMethodName(cycle.method);
    const routes = this._routes[method];
    if (!routes) {
      return undefined;
    }

    const { url } = cycle;
    return routes.find((route) => {
      const { urlMatcher } = route;
      if (typeof urlMatcher === 'function') {
        return urlMatcher(url);
      } else if (urlMatcher instanceof RegExp) {
        return urlMatcher.test(url);
      }
      return urlMatcher === url;
    });
  }
}

function checkHandler(handler: TransferHandler) {
  if (Array.isArray(handler) && handler.length === 0) {
    throw new Error('A handler array needs at least one handler.');
  }
}
