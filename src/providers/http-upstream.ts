/**
 * Chat completion calls against OpenAI-compatible HTTP APIs.
 */

import { z } from 'zod';
import {
  PermanentUpstreamError,
  RateLimitExceededError,
  TransientUpstreamError,
  classifyUpstreamError,
  isGovernorError,
} from '../errors/index.js';
import type { GovernorError } from '../errors/index.js';
import type { UpstreamCall } from '../governor/governor.js';
import type { UpstreamTarget } from '../types/index.js';
import { getProvider, resolveApiKey } from './catalog.js';
import type { Environment } from './catalog.js';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatCompletionCallOptions {
  messages: readonly ChatMessage[];
  /** Model name, fixed or per target. Defaults to the catalog default model */
  model?: string | ((target: UpstreamTarget) => string);
  maxTokens?: number;
  temperature?: number;
  /** Per-invocation timeout in milliseconds */
  timeoutMs?: number;
  /** Extra request headers */
  headers?: Record<string, string>;
  /** Credential source */
  env?: Environment;
  fetchImpl?: typeof fetch;
}

export const DEFAULT_COMPLETION_TIMEOUT_MS = 60_000;

/** Wait assumed when a 429 carries no usable Retry-After header */
export const DEFAULT_UPSTREAM_RETRY_AFTER_SECONDS = 60;

/** Statuses that indicate a temporary upstream condition */
export const TRANSIENT_HTTP_STATUSES: ReadonlySet<number> = new Set([408, 500, 502, 503, 504, 529]);

const ChatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
      })
    )
    .min(1),
  usage: z
    .object({
      total_tokens: z.number().nonnegative(),
    })
    .optional(),
});

const ErrorBodySchema = z.object({
  error: z.union([z.string(), z.object({ message: z.string() })]),
});

/**
 * Seconds from a Retry-After header, which is either delta-seconds or an
 * HTTP date.
 */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | undefined {
  if (header === null || header.trim() === '') {
    return undefined;
  }
  const seconds = Number(header);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds);
  }
  const date = Date.parse(header);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(0, (date - now) / 1000);
}

function describeErrorBody(body: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return body.slice(0, 200);
  }
  const result = ErrorBodySchema.safeParse(parsed);
  if (!result.success) {
    return body.slice(0, 200);
  }
  return typeof result.data.error === 'string' ? result.data.error : result.data.error.message;
}

/**
 * Maps a non-2xx completion response into the governor error taxonomy.
 */
export function errorForStatus(
  identity: string,
  status: number,
  body: string,
  retryAfterHeader: string | null = null
): GovernorError {
  if (status === 429) {
    const retryAfter = parseRetryAfter(retryAfterHeader) ?? DEFAULT_UPSTREAM_RETRY_AFTER_SECONDS;
    return new RateLimitExceededError(identity, 'requests', retryAfter, 'upstream');
  }

  const detail = describeErrorBody(body);
  const message = detail ? `${identity} returned HTTP ${status}: ${detail}` : `${identity} returned HTTP ${status}`;

  if (TRANSIENT_HTTP_STATUSES.has(status)) {
    return new TransientUpstreamError(message, { details: { identity, status } });
  }
  return new PermanentUpstreamError(message, { details: { identity, status } });
}

function resolveModel(option: ChatCompletionCallOptions['model'], target: UpstreamTarget): string | undefined {
  if (typeof option === 'function') {
    return option(target);
  }
  return option ?? getProvider(target.identity)?.defaultModel;
}

/**
 * Builds an upstream call that POSTs `/chat/completions` to the target's
 * endpoint and returns the first choice's text along with the reported
 * total token usage.
 */
export function createChatCompletionCall(options: ChatCompletionCallOptions): UpstreamCall<string> {
  const fetchImpl = options.fetchImpl ?? globalThis.fetch;
  const timeoutMs = options.timeoutMs ?? DEFAULT_COMPLETION_TIMEOUT_MS;

  return async (target, context) => {
    const model = resolveModel(options.model, target);
    if (!model) {
      throw new PermanentUpstreamError(`No model configured for ${target.identity}`, {
        details: { identity: target.identity },
      });
    }

    const apiKey = resolveApiKey(target.identity, options.env);
    const timeout = AbortSignal.timeout(timeoutMs);
    const signal = context.signal ? AbortSignal.any([context.signal, timeout]) : timeout;

    try {
      const response = await fetchImpl(`${target.endpoint.replace(/\/+$/, '')}/chat/completions`, {
        method: 'POST',
        headers: {
          'content-type': 'application/json',
          ...(apiKey ? { authorization: `Bearer ${apiKey}` } : {}),
          ...options.headers,
        },
        body: JSON.stringify({
          model,
          messages: options.messages,
          ...(options.maxTokens !== undefined ? { max_tokens: options.maxTokens } : {}),
          ...(options.temperature !== undefined ? { temperature: options.temperature } : {}),
        }),
        signal,
      });

      if (!response.ok) {
        throw errorForStatus(
          target.identity,
          response.status,
          await response.text(),
          response.headers.get('retry-after')
        );
      }

      const parsed = ChatCompletionResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new PermanentUpstreamError(`${target.identity} returned an unexpected response body`, {
          details: { identity: target.identity, issues: parsed.error.issues.map(i => i.message) },
        });
      }

      const [choice] = parsed.data.choices;
      return {
        content: choice?.message.content ?? '',
        actualUnits: parsed.data.usage?.total_tokens,
      };
    } catch (error) {
      if (isGovernorError(error)) {
        throw error;
      }
      if (error instanceof SyntaxError) {
        throw new PermanentUpstreamError(`${target.identity} returned malformed JSON`, { cause: error });
      }
      throw classifyUpstreamError(error);
    }
  };
}
