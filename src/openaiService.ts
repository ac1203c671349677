import OpenAI from 'openai';
import { getErrorMessage } from './utils/error-utils.js';

export interface CompletionOptions {
  temperature: number;
  maxTokens: number;
  /** Ask the model for a JSON object response. */
  json?: boolean;
  /** Aborts the underlying request. */
  signal?: AbortSignal;
}

export interface CompletionService {
  complete(prompt: string, options: CompletionOptions): Promise<string>;
}

export class CompletionError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'CompletionError';
  }
}

let _openai: OpenAI | null = null;
function getOpenAI(apiKey: string | undefined) {
  if (_openai) return _openai;
  if (!apiKey) throw new CompletionError('Missing OPENAI_API_KEY. Add it to your .env and restart.');
  _openai = new OpenAI({ apiKey, maxRetries: 1 });
  return _openai;
}

export function createOpenAICompletionService(opts: { apiKey: string | undefined; model: string }): CompletionService {
  return {
    async complete(prompt, { temperature, maxTokens, json, signal }) {
      const openai = getOpenAI(opts.apiKey);
      try {
        const resp = await openai.chat.completions.create({
          model: opts.model,
          messages: [{ role: 'user', content: prompt }],
          temperature,
          max_tokens: maxTokens,
          ...(json ? { response_format: { type: 'json_object' as const } } : {}),
        }, { signal });
        const text = resp.choices[0]?.message?.content ?? '';
        console.log(`[OpenAI] ${opts.model} t=${temperature} -> ${text.length} chars`);
        return text.trim();
      } catch (err) {
        console.error('[OpenAI] completion failed:', getErrorMessage(err));
        throw new CompletionError(`Completion request failed: ${getErrorMessage(err)}`, err);
      }
    },
  };
}

/**
 * Bounds every call of `inner` by `timeoutMs`. A call that has not settled in time
 * rejects with CompletionError and its request is aborted through `signal`.
 */
export function withTimeout(inner: CompletionService, timeoutMs: number): CompletionService {
  return {
    complete(prompt, options) {
      return new Promise<string>((resolve, reject) => {
        const controller = new AbortController();
        const fail = (err: unknown) => {
          clearTimeout(timer);
          reject(err instanceof CompletionError ? err : new CompletionError(getErrorMessage(err), err));
        };
        const timer = setTimeout(() => {
          controller.abort();
          reject(new CompletionError(`Completion timed out after ${timeoutMs}ms`));
        }, timeoutMs);
        try {
          inner.complete(prompt, { ...options, signal: controller.signal }).then(
            (text) => { clearTimeout(timer); resolve(text); },
            fail
          );
        } catch (err) {
          fail(err);
        }
      });
    },
  };
}
