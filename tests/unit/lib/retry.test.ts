/**
 * Unit tests for bounded polling
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { formatAttempts, pollUntil, type Sleep } from '../../../src/lib/retry.js';

function recordingSleep(): { sleep: Sleep; calls: number[] } {
  const calls: number[] = [];
  return {
    calls,
    sleep: async (ms) => {
      calls.push(ms);
    },
  };
}

describe('pollUntil', () => {
  it('should stop at the first success', async () => {
    const { sleep, calls } = recordingSleep();
    let n = 0;

    const result = await pollUntil(
      async () => {
        n++;
        return { ok: n === 2, output: `try ${n}` };
      },
      { attempts: 5, intervalMs: 100 },
      sleep
    );

    assert.strictEqual(result.ok, true);
    assert.deepStrictEqual(result.attempts, [
      { attempt: 1, ok: false, output: 'try 1' },
      { attempt: 2, ok: true, output: 'try 2' },
    ]);
    assert.deepStrictEqual(calls, [100]);
  });

  it('should make exactly the allowed attempts and not sleep after the last', async () => {
    const { sleep, calls } = recordingSleep();

    const result = await pollUntil(
      async (attempt) => ({ ok: false, output: `no ${attempt}` }),
      { attempts: 3, intervalMs: 50 },
      sleep
    );

    assert.strictEqual(result.ok, false);
    assert.strictEqual(result.attempts.length, 3);
    assert.deepStrictEqual(calls, [50, 50]);
  });

  it('should count a thrown error as a failed attempt', async () => {
    const { sleep } = recordingSleep();

    const result = await pollUntil(
      async () => {
        throw new Error('connection refused');
      },
      { attempts: 2, intervalMs: 0 },
      sleep
    );

    assert.deepStrictEqual(result.attempts, [
      { attempt: 1, ok: false, output: 'connection refused' },
      { attempt: 2, ok: false, output: 'connection refused' },
    ]);
  });

  it('should make at least one attempt', async () => {
    const { sleep } = recordingSleep();

    const result = await pollUntil(async () => ({ ok: false, output: '' }), { attempts: 0, intervalMs: 0 }, sleep);

    assert.strictEqual(result.attempts.length, 1);
  });
});

describe('formatAttempts', () => {
  it('should render one line per attempt', () => {
    const text = formatAttempts(
      [
        { attempt: 1, ok: false, output: 'HTTP 503 (expected 200)\n' },
        { attempt: 2, ok: false, output: '   ' },
      ],
      3
    );

    assert.strictEqual(text, 'attempt 1/3: HTTP 503 (expected 200)\nattempt 2/3: (no output)');
  });
});
