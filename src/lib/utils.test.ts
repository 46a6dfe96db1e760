import { describe, expect, it } from 'vitest';
import { MissingFieldError, OutputWriteError, TransportError } from './errors';
import { clamp, escapeXml, formatError, runWithConcurrency } from './utils';

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('runWithConcurrency', () => {
  it('caps the number of calls in flight and keeps order', async () => {
    let inFlight = 0;
    let peak = 0;
    const results = await runWithConcurrency([40, 10, 30, 0, 20], 2, async (ms, i) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await sleep(ms);
      inFlight -= 1;
      return `${i}:${ms}`;
    });

    expect(peak).toBe(2);
    expect(results).toEqual(['0:40', '1:10', '2:30', '3:0', '4:20']);
  });

  it('runs one worker for a non-positive concurrency', async () => {
    const order: number[] = [];
    await runWithConcurrency([1, 2, 3], 0, async (n) => {
      order.push(n);
      await sleep(1);
      return n;
    });
    expect(order).toEqual([1, 2, 3]);
  });

  it.each([Number('abc'), Infinity, 1.5])('runs every item for a concurrency of %s', async (concurrency) => {
    const calls: number[] = [];
    const results = await runWithConcurrency([1, 2, 3], concurrency, async (n) => {
      calls.push(n);
      return n * 10;
    });
    expect(calls).toEqual([1, 2, 3]);
    expect(results).toEqual([10, 20, 30]);
  });

  it('returns an empty list for no items', async () => {
    await expect(runWithConcurrency([], 4, async (n: number) => n)).resolves.toEqual([]);
  });

  it('rejects with the first failure', async () => {
    await expect(
      runWithConcurrency([1, 2], 2, async (n) => {
        if (n === 2) throw new Error('boom');
        return n;
      })
    ).rejects.toThrow('boom');
  });
});

describe('formatError', () => {
  it('includes transport context', () => {
    expect(formatError(new TransportError('https://idr.test/a', { status: 500 }))).toBe(
      'TransportError: GET https://idr.test/a: HTTP 500 | status=500 | url=https://idr.test/a'
    );
  });

  it('includes the missing field', () => {
    expect(formatError(new MissingFieldError('Publication Title'))).toBe(
      'MissingFieldError: Missing field "Publication Title" in project description | field=Publication Title'
    );
  });

  it('follows the cause chain', () => {
    expect(formatError(new OutputWriteError('/tmp/x.png', new Error('EACCES')))).toBe(
      'OutputWriteError: Failed to write /tmp/x.png: EACCES | path=/tmp/x.png | cause=Error: EACCES'
    );
  });

  it('stringifies non-errors', () => {
    expect(formatError({ reason: 'x' })).toBe('{"reason":"x"}');
    expect(formatError('plain')).toBe('"plain"');
  });
});

describe('helpers', () => {
  it('clamps', () => {
    expect(clamp(-1, 0, 255)).toBe(0);
    expect(clamp(300, 0, 255)).toBe(255);
    expect(clamp(12, 0, 255)).toBe(12);
  });

  it('escapes XML', () => {
    expect(escapeXml(`a<b & "c" 'd'>`)).toBe('a&lt;b &amp; &quot;c&quot; &apos;d&apos;&gt;');
  });
});
