// Request class, transport stub and factory methods
export { newSimXhr, newTransportStub } from './Factories.ts';
export { default as SimXhr, classifyOutcome } from './SimXhr.ts';
export { default as TransportStub } from './TransportStub.ts';
export { default as TransferControl } from './TransferControl.ts';
export { default as TransferCycle } from './TransferCycle.ts';

// Events
export { default as XhrEvent } from './XhrEvent.ts';
export { default as XhrProgressEvent } from './XhrProgressEvent.ts';
export { default as XhrEventTarget } from './XhrEventTarget.ts';
export { default as EventDispatcher, planEvents } from './EventDispatcher.ts';
export {
  XHR_EVENT_NAMES,
  XHR_PROGRESS_EVENT_NAMES,
  TERMINAL_EVENT_NAMES,
} from './XhrEventNames.ts';

// Quirk profiles and configuration
export {
  BUILTIN_QUIRK_PROFILES,
  DEFAULT_PROFILE,
  LEGACY_IE_PROFILE,
  defineQuirkProfile,
  resolveQuirkProfile,
} from './QuirkProfile.ts';
export { loadConfig } from './Config.ts';
export { createLogger } from './Logger.ts';

export type {
  HandlerErrorCallback,
  OnCreateCallback,
  SimXhrOptions,
  TransferOutcome,
} from './SimXhr.ts';
export type { Transport, TransferSink } from './Transport.ts';
export type { StubResponse, TransferHandler, UrlMatcher } from './TransportStub.ts';
export type { XhrStateSnapshot } from './XhrEvent.ts';
export type {
  XhrAddEventListenerOptions,
  XhrEventHandler,
  XhrEventListener,
} from './XhrEventTarget.ts';
export type { EventPlan, Transition } from './EventDispatcher.ts';
export type {
  TTerminalEventNames,
  TXhrEventNames,
  TXhrProgressEventNames,
} from './XhrEventNames.ts';
export type { QuirkProfile, QuirkProfileInit, TBuiltinQuirkProfileNames } from './QuirkProfile.ts';
export type { SimXhrConfig } from './Config.ts';
export type { Logger } from './Logger.ts';
