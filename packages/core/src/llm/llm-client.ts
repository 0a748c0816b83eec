import { createChildLogger } from '@graphgate/shared/src/logger.js';
import { LlmError, toError } from '@graphgate/shared/src/utils/errors.js';

const log = createChildLogger('llm:client');

const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_BASE_DELAY_MS = 1000;

export interface LlmRequest {
  readonly systemPrompt: string;
  readonly userMessage: string;
  readonly jsonSchema?: Record<string, unknown>;
}

export interface LlmResponse {
  readonly content: string;
  readonly tokenUsage?: {
    readonly input: number;
    readonly output: number;
  };
}

/** Provider-agnostic chat completion. Wiring a concrete provider is left to the caller. */
export interface LlmClient {
  invoke(request: LlmRequest): Promise<LlmResponse>;
}

export interface TransientRetryOptions {
  readonly maxAttempts?: number;
  readonly baseDelayMs?: number;
  readonly sleep?: (ms: number) => Promise<void>;
}

const TRANSIENT_PATTERNS = [
  '429', 'rate limit', 'too many requests',
  '500', '502', '503', 'internal server error', 'bad gateway', 'service unavailable',
  'econnreset', 'etimedout', 'timeout', 'network',
  'socket hang up', 'econnrefused',
];

function statusCodeOf(error: Error): number | undefined {
  for (const key of ['status', 'statusCode'] as const) {
    const value: unknown = Reflect.get(error, key);
    if (typeof value === 'number') return value;
  }
  return undefined;
}

export function isTransientError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  if (error instanceof LlmError) {
    return error.retryable;
  }

  const statusCode = statusCodeOf(error);
  if (statusCode !== undefined && (statusCode === 429 || statusCode >= 500)) {
    return true;
  }

  const message = error.message.toLowerCase();
  return TRANSIENT_PATTERNS.some((pattern) => message.includes(pattern));
}

async function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Retries rate limits, 5xx responses and network failures with exponential backoff. */
export function withTransientRetry(client: LlmClient, options: TransientRetryOptions = {}): LlmClient {
  const {
    maxAttempts = DEFAULT_MAX_ATTEMPTS,
    baseDelayMs = DEFAULT_BASE_DELAY_MS,
    sleep = defaultSleep,
  } = options;

  return {
    async invoke(request: LlmRequest): Promise<LlmResponse> {
      let lastError: Error | undefined;

      for (let attempt = 0; attempt < maxAttempts; attempt++) {
        try {
          return await client.invoke(request);
        } catch (error) {
          lastError = toError(error);

          if (!isTransientError(error)) {
            if (error instanceof LlmError) throw error;
            throw new LlmError(`LLM invocation failed: ${lastError.message}`, false, lastError);
          }

          log.warn(
            { attempt: attempt + 1, maxAttempts, error: lastError.message },
            'Transient LLM error, retrying',
          );

          if (attempt < maxAttempts - 1) {
            await sleep(baseDelayMs * Math.pow(2, attempt) + Math.random() * baseDelayMs);
          }
        }
      }

      throw new LlmError(
        `LLM invocation failed after ${String(maxAttempts)} attempts: ${lastError?.message ?? 'unknown error'}`,
        true,
        lastError,
      );
    },
  };
}
