import { describe, it, expect, vi, afterEach } from 'vitest';
import { CompletionError, withTimeout, type CompletionOptions, type CompletionService } from '../openaiService.js';

const options = { temperature: 0, maxTokens: 10 };

afterEach(() => {
  vi.useRealTimers();
});

describe('withTimeout', () => {
  it('passes through a result that arrives in time', async () => {
    const inner: CompletionService = { complete: async () => 'ok' };
    await expect(withTimeout(inner, 1000).complete('p', options)).resolves.toBe('ok');
  });

  it('rejects with CompletionError when the call hangs', async () => {
    vi.useFakeTimers();
    const inner: CompletionService = { complete: () => new Promise<string>(() => undefined) };

    const pending = withTimeout(inner, 500).complete('p', options);
    const assertion = expect(pending).rejects.toThrow('Completion timed out after 500ms');
    await vi.advanceTimersByTimeAsync(500);
    await assertion;
  });

  it('wraps other failures in CompletionError', async () => {
    const inner: CompletionService = { complete: () => Promise.reject(new Error('socket hang up')) };

    const err = await withTimeout(inner, 1000).complete('p', options).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(CompletionError);
    expect(err).toHaveProperty('message', 'socket hang up');
  });

  it('aborts the request it gave up on', async () => {
    vi.useFakeTimers();
    const seen: CompletionOptions[] = [];
    const inner: CompletionService = {
      complete: (_prompt, opts) => {
        seen.push(opts);
        return new Promise<string>(() => undefined);
      },
    };

    const pending = withTimeout(inner, 500).complete('p', options);
    const assertion = expect(pending).rejects.toThrow(CompletionError);
    expect(seen[0]?.signal?.aborted).toBe(false);
    await vi.advanceTimersByTimeAsync(500);
    await assertion;

    expect(seen[0]?.signal?.aborted).toBe(true);
    expect(seen[0]?.temperature).toBe(0);
  });

  it('rejects instead of throwing when the inner service throws synchronously', async () => {
    vi.useFakeTimers();
    const inner: CompletionService = {
      complete: () => {
        throw new Error('bad options');
      },
    };

    const err = await withTimeout(inner, 500).complete('p', options).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(CompletionError);
    expect(err).toHaveProperty('message', 'bad options');
    expect(vi.getTimerCount()).toBe(0);
  });
});
