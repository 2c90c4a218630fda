import type Anthropic from '@anthropic-ai/sdk';
import { AsyncLocalStorage } from 'node:async_hooks';
import { z } from 'zod';
import { getAnthropicClient } from './anthropic.js';

// ─── Shared interfaces ───────────────────────────────────────────────

export interface ChatParams {
  model: string;
  system: string;
  messages: ChatMessage[];
  max_tokens: number;
  /** Ask the provider for a bare JSON object when it supports a JSON mode */
  json_mode?: boolean;
  signal?: AbortSignal;
  session_id?: string;
}

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface ChatResponse {
  text: string;
  usage: { input_tokens: number; output_tokens: number };
}

/** Error raised for non-2xx provider responses; `status` feeds retry classification */
export class ProviderHttpError extends Error {
  readonly status: number;

  constructor(provider: string, status: number, body: string) {
    super(`${provider} API error ${status}: ${body.slice(0, 500)}`);
    this.name = 'ProviderHttpError';
    this.status = status;
  }
}

// ─── Per-session usage tracking ─────────────────────────────────────

export interface UsageAccumulator {
  input_tokens: number;
  output_tokens: number;
}

/**
 * Per-session usage accumulators. The session controller registers one before
 * its first turn and reads it when assembling the report. Every chat() call made
 * inside that session's async context is attributed to it.
 */
const sessionUsageAccumulators = new Map<string, UsageAccumulator>();
const usageContext = new AsyncLocalStorage<string>();

export function startUsageTracking(sessionId: string): UsageAccumulator {
  const acc: UsageAccumulator = { input_tokens: 0, output_tokens: 0 };
  sessionUsageAccumulators.set(sessionId, acc);
  return acc;
}

/** Run `fn` with downstream LLM usage attributed to `sessionId`. */
export function withUsageContext<T>(sessionId: string, fn: () => Promise<T>): Promise<T> {
  return usageContext.run(sessionId, fn);
}

export function stopUsageTracking(sessionId: string): UsageAccumulator {
  const acc = sessionUsageAccumulators.get(sessionId) ?? { input_tokens: 0, output_tokens: 0 };
  sessionUsageAccumulators.delete(sessionId);
  return acc;
}

export function recordUsage(usage: { input_tokens: number; output_tokens: number }, sessionId?: string): void {
  const sid = sessionId ?? usageContext.getStore();
  if (!sid) return;
  const acc = sessionUsageAccumulators.get(sid);
  if (acc) {
    acc.input_tokens += usage.input_tokens;
    acc.output_tokens += usage.output_tokens;
  }
}

/**
 * Combine a caller's AbortSignal with a timeout. `cleanup` must be called once
 * the guarded work settles so the timer and listeners do not leak.
 */
export function createCombinedAbortSignal(
  callerSignal: AbortSignal | undefined,
  timeoutMs: number,
): { signal: AbortSignal; cleanup: () => void } {
  const timeoutController = new AbortController();
  const combinedController = new AbortController();
  const timeout = setTimeout(() => {
    timeoutController.abort(new Error(`Timed out after ${timeoutMs}ms`));
  }, timeoutMs);
  timeout.unref?.();

  const abortCombined = (reason?: unknown) => {
    if (combinedController.signal.aborted) return;
    combinedController.abort(reason);
  };

  const onCallerAbort = () => abortCombined(callerSignal?.reason);
  const onTimeoutAbort = () => abortCombined(timeoutController.signal.reason);

  if (callerSignal) {
    if (callerSignal.aborted) {
      onCallerAbort();
    } else {
      callerSignal.addEventListener('abort', onCallerAbort, { once: true });
    }
  }
  timeoutController.signal.addEventListener('abort', onTimeoutAbort, { once: true });

  const cleanup = () => {
    clearTimeout(timeout);
    if (callerSignal) {
      callerSignal.removeEventListener('abort', onCallerAbort);
    }
    timeoutController.signal.removeEventListener('abort', onTimeoutAbort);
  };

  return { signal: combinedController.signal, cleanup };
}

// ─── Provider interface ──────────────────────────────────────────────

export interface LLMProvider {
  readonly name: string;
  chat(params: ChatParams): Promise<ChatResponse>;
}

// ─── Anthropic provider ──────────────────────────────────────────────

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic';

  async chat(params: ChatParams): Promise<ChatResponse> {
    const anthropic = getAnthropicClient();
    const messages: Anthropic.MessageParam[] = params.messages.map((m) => ({
      role: m.role,
      content: m.content,
    }));
    const response = await anthropic.messages.create(
      {
        model: params.model,
        max_tokens: params.max_tokens,
        system: params.system,
        messages,
      },
      { signal: params.signal },
    );

    let text = '';
    for (const block of response.content) {
      if (block.type === 'text') {
        text += block.text;
      }
    }

    const usage = {
      input_tokens: response.usage?.input_tokens ?? 0,
      output_tokens: response.usage?.output_tokens ?? 0,
    };
    recordUsage(usage, params.session_id);

    return { text, usage };
  }
}

// ─── OpenAI-compatible provider ──────────────────────────────────────

interface OpenAICompatibleConfig {
  name?: string;
  apiKey: string;
  baseUrl: string;
}

export class OpenAICompatibleProvider implements LLMProvider {
  readonly name: string;
  private apiKey: string;
  private baseUrl: string;

  constructor(config: OpenAICompatibleConfig) {
    this.name = config.name ?? 'openai-compatible';
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
  }

  async chat(params: ChatParams): Promise<ChatResponse> {
    const body: Record<string, unknown> = {
      model: params.model,
      max_tokens: params.max_tokens,
      messages: [{ role: 'system', content: params.system }, ...params.messages],
      stream: false,
    };
    if (params.json_mode) {
      body.response_format = { type: 'json_object' };
    }

    const response = await fetch(`${this.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify(body),
      signal: params.signal,
    });

    if (!response.ok) {
      const errText = await response.text().catch(() => '');
      throw new ProviderHttpError(this.name, response.status, errText);
    }

    const parsed = OpenAIChatResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`${this.name} returned an unexpected response shape`);
    }
    const data = parsed.data;
    const usage = {
      input_tokens: data.usage?.prompt_tokens ?? 0,
      output_tokens: data.usage?.completion_tokens ?? 0,
    };
    recordUsage(usage, params.session_id);

    return { text: data.choices?.[0]?.message?.content ?? '', usage };
  }
}

// ─── OpenAI-compatible response shape (internal) ─────────────────────

const OpenAIChatResponseSchema = z.object({
  choices: z.array(z.object({
    message: z.object({
      content: z.string().nullable().optional(),
    }).optional(),
  })).optional(),
  usage: z.object({
    prompt_tokens: z.number().optional(),
    completion_tokens: z.number().optional(),
  }).optional(),
});
