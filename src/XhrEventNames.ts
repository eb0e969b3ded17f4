export const XHR_PROGRESS_EVENT_NAMES = [
  'loadstart',
  'progress',
  'abort',
  'error',
  'load',
  'timeout',
  'loadend',
] as const;

export type TXhrProgressEventNames = typeof XHR_PROGRESS_EVENT_NAMES[number];

export const XHR_EVENT_NAMES = ['readystatechange', ...XHR_PROGRESS_EVENT_NAMES] as const;

export type TXhrEventNames = typeof XHR_EVENT_NAMES[number];

// Exactly one of these ends each send() cycle, always followed by 'loadend'
export const TERMINAL_EVENT_NAMES = ['load', 'error', 'abort', 'timeout'] as const;

export type TTerminalEventNames = typeof TERMINAL_EVENT_NAMES[number];
