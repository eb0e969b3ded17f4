import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import EventDispatcher, { planEvents } from '../src/EventDispatcher.ts';
import { DEFAULT_PROFILE, LEGACY_IE_PROFILE, defineQuirkProfile } from '../src/QuirkProfile.ts';
import XhrEventTarget from '../src/XhrEventTarget.ts';
import XhrProgressEvent from '../src/XhrProgressEvent.ts';

import type { XhrStateSnapshot } from '../src/XhrEvent.ts';
import type XhrEvent from '../src/XhrEvent.ts';
import type { TXhrEventNames } from '../src/XhrEventNames.ts';

describe('EventDispatcher', () => {
  describe('planEvents()', () => {
    it('should fire readystatechange on open', () => {
      assert.deepEqual(planEvents({ kind: 'open' }, true, DEFAULT_PROFILE), {
        immediate: ['readystatechange'],
        afterSend: [],
      });
      assert.deepEqual(planEvents({ kind: 'open' }, false, LEGACY_IE_PROFILE), {
        immediate: ['readystatechange'],
        afterSend: [],
      });
    });

    it('should fire loadstart from an async send()', () => {
      assert.deepEqual(planEvents({ kind: 'send' }, true, DEFAULT_PROFILE), {
        immediate: ['loadstart'],
        afterSend: [],
      });
    });

    it('should duplicate readystatechange and defer loadstart for the legacy profile', () => {
      assert.deepEqual(planEvents({ kind: 'send' }, true, LEGACY_IE_PROFILE), {
        immediate: ['readystatechange'],
        afterSend: ['loadstart'],
      });
    });

    it('should combine the rules of a custom profile', () => {
      const profile = defineQuirkProfile({ name: 'custom', duplicateOpenedReadyStateChange: true });
      assert.deepEqual(planEvents({ kind: 'send' }, true, profile), {
        immediate: ['readystatechange', 'loadstart'],
        afterSend: [],
      });
    });

    it('should fire nothing from a synchronous send()', () => {
      assert.deepEqual(planEvents({ kind: 'send' }, false, LEGACY_IE_PROFILE), {
        immediate: [],
        afterSend: [],
      });
    });

    it('should only fire intermediate events for async requests', () => {
      assert.deepEqual(planEvents({ kind: 'headers-received' }, true, DEFAULT_PROFILE).immediate, [
        'readystatechange',
      ]);
      assert.deepEqual(
        planEvents({ kind: 'loading', loaded: 1, total: 2 }, true, DEFAULT_PROFILE).immediate,
        ['readystatechange', 'progress']
      );
      assert.deepEqual(
        planEvents({ kind: 'headers-received' }, false, DEFAULT_PROFILE).immediate,
        []
      );
      assert.deepEqual(
        planEvents({ kind: 'loading', loaded: 1, total: 2 }, false, DEFAULT_PROFILE).immediate,
        []
      );
    });

    it('should end with the terminal event then loadend', () => {
      (['load', 'error', 'abort', 'timeout'] as const).forEach((outcome) => {
        [true, false].forEach((async) => {
          assert.deepEqual(planEvents({ kind: 'done', outcome }, async, LEGACY_IE_PROFILE), {
            immediate: ['readystatechange', outcome, 'loadend'],
            afterSend: [],
          });
        });
      });
    });
  });

  describe('fireTransition()', () => {
    function setup(profile = DEFAULT_PROFILE) {
      const target = new XhrEventTarget();
      let current: XhrStateSnapshot = { readyState: 1, status: 0, async: true };
      const errors: string[] = [];
      const dispatcher = new EventDispatcher(
        target,
        profile,
        () => current,
        (_error, event) => { errors.push(event.type); }
      );
      const received: XhrEvent[] = [];
      const types: TXhrEventNames[] = [
        'readystatechange', 'loadstart', 'progress', 'load', 'loadend',
      ];
      types.forEach((type) => {
        target.addEventListener(type, (event) => { received.push(event); });
      });
      return {
        target,
        dispatcher,
        received,
        errors,
        setState(next: XhrStateSnapshot) { current = next; },
      };
    }

    it('should dispatch the immediate events and return the deferred ones', () => {
      const { dispatcher, received } = setup(LEGACY_IE_PROFILE);
      const afterSend = dispatcher.fireTransition({ kind: 'send' });

      assert.deepEqual(received.map((event) => event.type), ['readystatechange']);
      assert.deepEqual(afterSend, ['loadstart']);
    });

    it('should build progress events for every event but readystatechange', () => {
      const { dispatcher, received } = setup();
      dispatcher.fireTransition({ kind: 'loading', loaded: 3, total: 8 });
      dispatcher.fireEvents(['loadstart']);

      const [readyStateChange, progress, loadStart] = received;
      assert.ok(!(readyStateChange instanceof XhrProgressEvent));
      assert.ok(progress instanceof XhrProgressEvent);
      assert.strictEqual(progress.loaded, 3);
      assert.strictEqual(progress.total, 8);
      assert.ok(loadStart instanceof XhrProgressEvent);
      assert.strictEqual(loadStart.loaded, 0);
      assert.strictEqual(loadStart.lengthComputable, false);
    });

    it('should read the snapshot for each event', () => {
      const { dispatcher, received, target, setState } = setup();
      target.addEventListener('load', () => {
        setState({ readyState: 1, status: 0, async: true });
      });
      setState({ readyState: 4, status: 200, async: true });
      dispatcher.fireTransition({ kind: 'done', outcome: 'load' });

      assert.deepEqual(
        received.map((event) => `${event.type}(${event.snapshot.readyState})`),
        ['readystatechange(4)', 'load(4)', 'loadend(1)']
      );
    });

    it('should stop once the cycle is no longer current', () => {
      const { dispatcher, received, target } = setup();
      let current = true;
      target.addEventListener('readystatechange', () => { current = false; });
      dispatcher.fireTransition({ kind: 'loading', loaded: 0, total: 0 }, () => current);

      assert.deepEqual(received.map((event) => event.type), ['readystatechange']);
    });

    it('should pass listener errors to the reporter', () => {
      const { dispatcher, errors, target, received } = setup();
      target.addEventListener('readystatechange', () => { throw new Error('boom'); });
      dispatcher.fireTransition({ kind: 'open' });

      assert.deepEqual(errors, ['readystatechange']);
      assert.strictEqual(received.length, 1);
    });

    it('should place the keyword handler as the profile says', () => {
      const calls: string[] = [];
      const profile = defineQuirkProfile({ name: 'late', eventHandlerOrder: 'after-listeners' });
      const { dispatcher, target } = setup(profile);
      target.onload = () => { calls.push('keyword'); };
      target.addEventListener('load', () => { calls.push('listener'); });

      dispatcher.fireEvents(['load']);

      assert.deepEqual(calls, ['listener', 'keyword']);
      assert.strictEqual(dispatcher.profile, profile);
    });
  });
});
