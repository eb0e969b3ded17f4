import { z } from 'zod';

/**
 * Where the keyword slot (`onload`, `onreadystatechange`, etc.) runs relative to the listeners
 * attached with addEventListener().
 */
export const EVENT_HANDLER_ORDERS = ['before-listeners', 'after-listeners'] as const;

export type EventHandlerOrder = typeof EVENT_HANDLER_ORDERS[number];

/**
 * When 'loadstart' fires for an async send():
 *  - 'in-send': before send() returns.
 *  - 'after-send': queued to run once send() has returned. An abort() issued before then drops it.
 */
export const LOAD_START_TIMINGS = ['in-send', 'after-send'] as const;

export type LoadStartTiming = typeof LOAD_START_TIMINGS[number];

export const QuirkProfileSchema = z.object({
  name: z.string().min(1),
  version: z.number().int().positive().default(1),
  eventHandlerOrder: z.enum(EVENT_HANDLER_ORDERS).default('before-listeners'),
  duplicateOpenedReadyStateChange: z.boolean().default(false),
  loadStart: z.enum(LOAD_START_TIMINGS).default('in-send'),
});

/**
 * Engine-specific ordering and duplication rules for the non-terminal events of a request. A
 * profile never changes which terminal event fires.
 */
export type QuirkProfile = Readonly<z.infer<typeof QuirkProfileSchema>>;

export type QuirkProfileInit = z.input<typeof QuirkProfileSchema>;

export const DEFAULT_PROFILE: QuirkProfile = Object.freeze({
  name: 'default',
  version: 1,
  eventHandlerOrder: 'before-listeners',
  duplicateOpenedReadyStateChange: false,
  loadStart: 'in-send',
});

// Fires readystatechange(1) a second time from send() and only then loadstart, after send() returns
export const LEGACY_IE_PROFILE: QuirkProfile = Object.freeze({
  name: 'legacy-ie',
  version: 1,
  eventHandlerOrder: 'before-listeners',
  duplicateOpenedReadyStateChange: true,
  loadStart: 'after-send',
});

export const BUILTIN_QUIRK_PROFILES = {
  default: DEFAULT_PROFILE,
  'legacy-ie': LEGACY_IE_PROFILE,
} as const;

export type TBuiltinQuirkProfileNames = keyof typeof BUILTIN_QUIRK_PROFILES;

export const BUILTIN_QUIRK_PROFILE_NAMES = ['default', 'legacy-ie'] as const satisfies
  readonly TBuiltinQuirkProfileNames[];

/**
 * Validate a custom profile. Omitted rules take the default profile's value.
 *
 * @param init Profile fields
 * @returns Frozen profile
 */
export function defineQuirkProfile(init: QuirkProfileInit): QuirkProfile {
  const result = QuirkProfileSchema.safeParse(init);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid quirk profile: ${details}`);
  }
  return Object.freeze(result.data);
}

/**
 * @param profile Built-in profile name or profile value
 * @returns The profile value
 */
export function resolveQuirkProfile(
  profile: QuirkProfile | TBuiltinQuirkProfileNames
): QuirkProfile {
  return typeof profile === 'string' ? BUILTIN_QUIRK_PROFILES[profile] : profile;
}
