import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { flush, nextLoadEnd, recordEvents, silentLogger } from './TestUtils.ts';
import { newTransportStub } from '../src/Factories.ts';
import SimXhr from '../src/SimXhr.ts';

import type { TBuiltinQuirkProfileNames } from '../src/QuirkProfile.ts';

// Full send() cycles through the transport stub, for each transport outcome, mode and profile.
// Logged markers: 'open-done', 'send-done' and 'abort-done' after the calls return,
// 'ExceptionThrown' when one of them throws.
describe('Lifecycle', () => {
  type Execution = 'only-send' | 'send-abort' | 'network-error' | 'error-500' | 'timeout';

  const URLS: Record<Execution, string> = {
    'only-send': '/success',
    'send-abort': '/success',
    'network-error': '/network-error',
    'error-500': '/error500',
    timeout: '/timeout',
  };

  async function run(
    profile: TBuiltinQuirkProfileNames,
    async: boolean,
    useKeyword: boolean,
    execution: Execution
  ) {
    const { stub, SimXhr: LocalSimXhr } = newTransportStub();
    stub.get('/success', { status: 200, progressTicks: 2 })
      .get('/error500', { status: 500, progressTicks: 2 })
      .get('/network-error', 'error')
      // The legacy engine reports the response headers before the deadline passes
      .get('/timeout', profile === 'legacy-ie' ? (control) => { control.progress(); } : 'stall');

    const xhr = new LocalSimXhr({ quirkProfile: profile, logger: silentLogger });
    const events = recordEvents(xhr, useKeyword);
    const loadEnd = nextLoadEnd(xhr);

    xhr.open('GET', URLS[execution], async);
    events.push('open-done');
    let thrown = false;
    try {
      if (execution === 'timeout') {
        xhr.timeout = 10;
      }
      xhr.send();
      events.push('send-done');
      if (execution === 'send-abort') {
        xhr.abort();
        events.push('abort-done');
      }
    } catch {
      thrown = true;
      events.push('ExceptionThrown');
    }

    if (!thrown && xhr.readyState !== SimXhr.DONE) {
      await loadEnd;
    }
    await flush();
    return { xhr, events, stub };
  }

  const syncExpectations: Record<Execution, string[]> = {
    'only-send': [
      'readystatechange(1,0)', 'open-done', 'readystatechange(4,200)', 'load(4,200)',
      'loadend(4,200)', 'send-done',
    ],
    'send-abort': [
      'readystatechange(1,0)', 'open-done', 'readystatechange(4,200)', 'load(4,200)',
      'loadend(4,200)', 'send-done', 'abort-done',
    ],
    'network-error': [
      'readystatechange(1,0)', 'open-done', 'readystatechange(4,0)', 'error(4,0)', 'loadend(4,0)',
      'send-done',
    ],
    'error-500': [
      'readystatechange(1,0)', 'open-done', 'readystatechange(4,500)', 'load(4,500)',
      'loadend(4,500)', 'send-done',
    ],
    timeout: ['readystatechange(1,0)', 'open-done', 'ExceptionThrown'],
  };

  const asyncExpectations: Record<TBuiltinQuirkProfileNames, Record<Execution, string[]>> = {
    default: {
      'only-send': [
        'readystatechange(1,0)', 'open-done', 'loadstart(1,0)', 'send-done',
        'readystatechange(2,0)', 'readystatechange(3,0)', 'progress(3,0)',
        'readystatechange(4,200)', 'load(4,200)', 'loadend(4,200)',
      ],
      'send-abort': [
        'readystatechange(1,0)', 'open-done', 'loadstart(1,0)', 'send-done',
        'readystatechange(4,0)', 'abort(4,0)', 'loadend(4,0)', 'abort-done',
      ],
      'network-error': [
        'readystatechange(1,0)', 'open-done', 'loadstart(1,0)', 'send-done',
        'readystatechange(4,0)', 'error(4,0)', 'loadend(4,0)',
      ],
      'error-500': [
        'readystatechange(1,0)', 'open-done', 'loadstart(1,0)', 'send-done',
        'readystatechange(2,0)', 'readystatechange(3,0)', 'progress(3,0)',
        'readystatechange(4,500)', 'load(4,500)', 'loadend(4,500)',
      ],
      timeout: [
        'readystatechange(1,0)', 'open-done', 'loadstart(1,0)', 'send-done',
        'readystatechange(4,0)', 'timeout(4,0)', 'loadend(4,0)',
      ],
    },
    'legacy-ie': {
      'only-send': [
        'readystatechange(1,0)', 'open-done', 'readystatechange(1,0)', 'send-done',
        'loadstart(1,0)', 'readystatechange(2,0)', 'readystatechange(3,0)', 'progress(3,0)',
        'readystatechange(4,200)', 'load(4,200)', 'loadend(4,200)',
      ],
      'send-abort': [
        'readystatechange(1,0)', 'open-done', 'readystatechange(1,0)', 'send-done',
        'readystatechange(4,0)', 'abort(4,0)', 'loadend(4,0)', 'abort-done',
      ],
      'network-error': [
        'readystatechange(1,0)', 'open-done', 'readystatechange(1,0)', 'send-done',
        'loadstart(1,0)', 'readystatechange(4,0)', 'error(4,0)', 'loadend(4,0)',
      ],
      'error-500': [
        'readystatechange(1,0)', 'open-done', 'readystatechange(1,0)', 'send-done',
        'loadstart(1,0)', 'readystatechange(2,0)', 'readystatechange(3,0)', 'progress(3,0)',
        'readystatechange(4,500)', 'load(4,500)', 'loadend(4,500)',
      ],
      timeout: [
        'readystatechange(1,0)', 'open-done', 'readystatechange(1,0)', 'send-done',
        'loadstart(1,0)', 'readystatechange(2,0)', 'readystatechange(4,0)', 'timeout(4,0)',
        'loadend(4,0)',
      ],
    },
  };

  const executions: Execution[] = [
    'only-send', 'send-abort', 'network-error', 'error-500', 'timeout',
  ];
  const profiles: TBuiltinQuirkProfileNames[] = ['default', 'legacy-ie'];
  const registrations = [
    { useKeyword: false, label: 'addEventListener' },
    { useKeyword: true, label: 'on-keyword' },
  ];

  profiles.forEach((profile) => {
    registrations.forEach(({ useKeyword, label }) => {
      describe(`${profile} profile, ${label}`, () => {
        executions.forEach((execution) => {
          it(`sync ${execution}`, async () => {
            const { events } = await run(profile, false, useKeyword, execution);
            assert.deepEqual(events, syncExpectations[execution]);
          });

          it(`async ${execution}`, async () => {
            const { events } = await run(profile, true, useKeyword, execution);
            assert.deepEqual(events, asyncExpectations[profile][execution]);
          });
        });
      });
    });
  });

  describe('final state', () => {
    it('should keep the HTTP status of a completed transfer, error statuses included', async () => {
      assert.strictEqual((await run('default', true, false, 'only-send')).xhr.status, 200);
      assert.strictEqual((await run('default', true, false, 'error-500')).xhr.status, 500);
      assert.strictEqual((await run('default', false, false, 'error-500')).xhr.status, 500);
    });

    it('should have status 0 after a failure, a timeout or an abort', async () => {
      assert.strictEqual((await run('default', true, false, 'network-error')).xhr.status, 0);
      assert.strictEqual((await run('default', true, false, 'timeout')).xhr.status, 0);
      assert.strictEqual((await run('default', true, false, 'send-abort')).xhr.status, 0);
      assert.strictEqual((await run('legacy-ie', true, false, 'send-abort')).xhr.status, 0);
    });

    it('should not begin a legacy transfer aborted right after send()', async () => {
      const { stub, xhr } = await run('legacy-ie', true, false, 'send-abort');
      assert.strictEqual(stub.getTransferLog().length, 0);
      assert.strictEqual(xhr.readyState, SimXhr.DONE);
    });

    it('should leave no pending transfer behind', async () => {
      for (const execution of executions) {
        const { stub } = await run('default', true, false, execution);
        assert.strictEqual(stub.pendingCount, 0, execution);
      }
    });

    it('should not reach the transport when a sync request has a timeout', async () => {
      const { stub, xhr } = await run('default', false, false, 'timeout');
      assert.strictEqual(stub.getTransferLog().length, 0);
      assert.strictEqual(xhr.readyState, SimXhr.OPENED);
    });
  });
});
