import { describe, it, expect, vi } from 'vitest';
import { isTransientError, withTransientRetry } from './llm-client.js';
import type { LlmClient } from './llm-client.js';
import { LlmError } from '@graphgate/shared/src/utils/errors.js';

const request = { systemPrompt: 'You are a verdict agent.', userMessage: 'Question' };

function httpError(status: number): Error {
  return Object.assign(new Error('request failed'), { status });
}

describe('isTransientError', () => {
  it('should treat rate limits and server errors as transient', () => {
    expect(isTransientError(httpError(429))).toBe(true);
    expect(isTransientError(httpError(503))).toBe(true);
    expect(isTransientError(new Error('socket hang up'))).toBe(true);
  });

  it('should treat client errors as permanent', () => {
    expect(isTransientError(httpError(400))).toBe(false);
    expect(isTransientError(new Error('invalid api key'))).toBe(false);
    expect(isTransientError('not an error')).toBe(false);
  });

  it('should respect the retryable flag of LlmError', () => {
    expect(isTransientError(new LlmError('overloaded', true))).toBe(true);
    expect(isTransientError(new LlmError('bad request 500 chars', false))).toBe(false);
  });
});

describe('withTransientRetry', () => {
  it('should retry transient failures and return the first success', async () => {
    const invoke = vi
      .fn()
      .mockRejectedValueOnce(httpError(503))
      .mockResolvedValueOnce({ content: '{"answer":"YES"}' });
    const sleep = vi.fn().mockResolvedValue(undefined);
    const client = withTransientRetry({ invoke }, { sleep, baseDelayMs: 10 });

    await expect(client.invoke(request)).resolves.toEqual({ content: '{"answer":"YES"}' });
    expect(invoke).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it('should wrap permanent failures without retrying', async () => {
    const invoke = vi.fn().mockRejectedValue(httpError(401));
    const client: LlmClient = withTransientRetry({ invoke }, { sleep: vi.fn() });

    await expect(client.invoke(request)).rejects.toMatchObject({
      name: 'LlmError',
      retryable: false,
    });
    expect(invoke).toHaveBeenCalledTimes(1);
  });

  it('should give up after the configured attempts', async () => {
    const invoke = vi.fn().mockRejectedValue(new Error('rate limit exceeded'));
    const sleep = vi.fn().mockResolvedValue(undefined);
    const client = withTransientRetry({ invoke }, { maxAttempts: 2, sleep });

    await expect(client.invoke(request)).rejects.toThrow(
      'LLM invocation failed after 2 attempts: rate limit exceeded',
    );
    expect(invoke).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledTimes(1);
  });
});
