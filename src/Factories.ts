import SimXhr from './SimXhr.ts';
import TransportStub from './TransportStub.ts';

import type { Logger } from './Logger.ts';
import type { QuirkProfile, TBuiltinQuirkProfileNames } from './QuirkProfile.ts';
import type { HandlerErrorCallback, OnCreateCallback, SimXhrOptions } from './SimXhr.ts';
import type { Transport } from './Transport.ts';
import type { TransferHandler, UrlMatcher } from './TransportStub.ts';

/**
 * Create a new "local" SimXhr subclass. Using a subclass of `SimXhr` in each test case makes it
 * easier to ensure they are self-contained. For example if you set the transport static property on
 * a subclass, this will only affect that subclass and not the others created in your other test
 * cases. You therefore don't need to add cleanup code to revert the changes made to the subclass.
 *
 * @returns New SimXhr subclass
 */
export function newSimXhr(): typeof SimXhr {
  return class LocalSimXhr extends SimXhr {
    // Redeclared so that the values set on the parent class don't apply here
    static transport?: Transport;

    static quirkProfile?: QuirkProfile | TBuiltinQuirkProfileNames;

    static logger?: Logger;

    static onCreate?: OnCreateCallback;

    static onHandlerError?: HandlerErrorCallback;

    constructor(options?: SimXhrOptions) {
      super(options);

      // Call the local SimXhr subclass' onCreate hook on the new instance
      LocalSimXhr.onCreate?.(this);
    }
  };
}

/**
 * @param routes Routes
 * @returns new TransportStub and its own SimXhr subclass using it as transport
 */
export function newTransportStub(routes?: Record<string, [UrlMatcher, TransferHandler]>) {
  const stub = new TransportStub(routes);
  const LocalSimXhr = newSimXhr();
  LocalSimXhr.transport = stub;
  return { stub, SimXhr: LocalSimXhr };
}
