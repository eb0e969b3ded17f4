import { getDefaultLogger } from './Logger.ts';

import type { EventHandlerOrder } from './QuirkProfile.ts';
import type XhrEvent from './XhrEvent.ts';
import type { TXhrEventNames } from './XhrEventNames.ts';

export type XhrEventListenerFunction = (event: XhrEvent) => unknown;

export type XhrEventListener = XhrEventListenerFunction | { handleEvent(event: XhrEvent): unknown };

export type XhrEventHandler = XhrEventListenerFunction | null;

export interface XhrAddEventListenerOptions {
  once?: boolean,
}

/**
 * Receives the errors thrown by listeners. Dispatch continues with the next listener.
 */
export type ListenerErrorReporter = (error: unknown, event: XhrEvent) => void;

export interface DispatchOptions {
  handlerOrder?: EventHandlerOrder,
  onListenerError?: ListenerErrorReporter,
}

/**
 * Listener registry of a request. Each event type has an ordered list of listeners attached with
 * addEventListener() and one keyword slot set through the `on<type>` properties. The keyword slot
 * doesn't take a position in the list: dispatchEvent() places it first or last as asked.
 */
export default class XhrEventTarget {
  private readonly _listeners: Map<TXhrEventNames, EventListenerEntry[]>;

  private readonly _keywordHandlers: Map<TXhrEventNames, EventListenerEntry>;

  constructor() {
    this._listeners = new Map();
    this._keywordHandlers = new Map();
  }

  get onabort() { return this._getEventHandlerProperty('abort'); }

  set onabort(value: XhrEventHandler) { this._setEventHandlerProperty('abort', value); }

  get onerror() { return this._getEventHandlerProperty('error'); }

  set onerror(value: XhrEventHandler) { this._setEventHandlerProperty('error', value); }

  get onload() { return this._getEventHandlerProperty('load'); }

  set onload(value: XhrEventHandler) { this._setEventHandlerProperty('load', value); }

  get onloadend() { return this._getEventHandlerProperty('loadend'); }

  set onloadend(value: XhrEventHandler) { this._setEventHandlerProperty('loadend', value); }

  get onloadstart() { return this._getEventHandlerProperty('loadstart'); }

  set onloadstart(value: XhrEventHandler) { this._setEventHandlerProperty('loadstart', value); }

  get onprogress() { return this._getEventHandlerProperty('progress'); }

  set onprogress(value: XhrEventHandler) { this._setEventHandlerProperty('progress', value); }

  get ontimeout() { return this._getEventHandlerProperty('timeout'); }

  set ontimeout(value: XhrEventHandler) { this._setEventHandlerProperty('timeout', value); }

  /**
   * Add an event listener. A listener already in the list for this type is not added again.
   * See https://dom.spec.whatwg.org/#dom-eventtarget-addeventlistener
   *
   * @param type Event type ('load', 'abort', etc)
   * @param listener Listener callback
   * @param options Options object
   */
  addEventListener(
    type: TXhrEventNames,
    listener: XhrEventListener | null | undefined,
    options?: XhrAddEventListenerOptions
  ) {
    if (listener) {
      const listeners = this._listeners.get(type) ?? [];
      if (listeners.every((entry) => entry.listener !== listener)) {
        listeners.push(makeListenerEntry(listener, !!options?.once));
        this._listeners.set(type, listeners);
      }
    }
  }

  /**
   * Remove an event listener.
   * See https://dom.spec.whatwg.org/#dom-eventtarget-removeeventlistener
   *
   * @param type Event type ('load', 'abort', etc)
   * @param listener Listener callback
   */
  removeEventListener(type: TXhrEventNames, listener: XhrEventListener | null | undefined) {
    if (listener) {
      const listeners = this._listeners.get(type);
      if (listeners) {
        const index = listeners.findIndex((entry) => entry.listener === listener);
        if (index >= 0) {
          listeners[index].removed = true;
          listeners.splice(index, 1);
        }
      }
    }
  }

  /**
   * Calls the keyword handler and the listeners for the event. A listener that throws is reported
   * and the next one is still called.
   *
   * @param event Event
   * @param options Keyword handler position and error reporter
   */
  dispatchEvent(event: XhrEvent, options: DispatchOptions = {}) {
    const { handlerOrder = 'before-listeners', onListenerError = logListenerError } = options;

    // Only the event listeners registered at this point should be called. Storing them here avoids
    // problems with callbacks that add or remove listeners.
    const listeners = this._listeners.get(event.type) ?? [];
    const keywordHandler = this._keywordHandlers.get(event.type);
    const keywordEntries = keywordHandler ? [keywordHandler] : [];
    const entries = handlerOrder === 'before-listeners'
      ? [...keywordEntries, ...listeners]
      : [...listeners, ...keywordEntries];

    entries.forEach((entry) => {
      if (entry.removed) {
        return;
      }
      if (entry.once) {
        const index = listeners.indexOf(entry);
        if (index >= 0) {
          listeners.splice(index, 1);
        }
        entry.removed = true;
      }

      try {
        if (typeof entry.listener === 'function') {
          entry.listener.call(this, event);
        } else {
          entry.listener.handleEvent(event);
        }
      } catch (error) {
        onListenerError(error, event);
      }
    });
  }

  protected _getEventHandlerProperty(type: TXhrEventNames): XhrEventHandler {
    const entry = this._keywordHandlers.get(type);
    return entry && typeof entry.listener === 'function' ? entry.listener : null;
  }

  protected _setEventHandlerProperty(type: TXhrEventNames, value: XhrEventHandler | undefined) {
    const current = this._keywordHandlers.get(type);
    if (current) {
      if (current.listener === value) {
        // no change
        return;
      }
      current.removed = true;
      this._keywordHandlers.delete(type);
    }

    if (typeof value === 'function') {
      this._keywordHandlers.set(type, makeListenerEntry(value, false));
    }
  }
}

interface EventListenerEntry {
  listener: XhrEventListener,
  once: boolean,
  removed: boolean,
}

function makeListenerEntry(listener: XhrEventListener, once: boolean): EventListenerEntry {
  return { listener, once, removed: false };
}

function logListenerError(error: unknown, event: XhrEvent) {
  getDefaultLogger().error({ err: error, eventType: event.type }, 'event listener threw');
}
