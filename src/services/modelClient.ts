import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { AppConfig } from '../config.js';
import { ConfigurationError, ProviderError } from '../errors.js';
import { logger } from '../logger.js';
import type { RelevancePolicy } from '../types.js';
import { MockModelClient } from './mockModel.js';

export interface CompletionOptions {
  maxTokens: number;
  temperature: number;
  signal?: AbortSignal;
}

/**
 * Sends one compiled prompt to a text-generation model and returns its raw text.
 * Implementations raise ProviderError on any failure.
 */
export interface ModelInvoker {
  complete(prompt: string, options: CompletionOptions): Promise<string>;
}

export interface ChatCompletionsClientOptions {
  apiKey: string;
  baseUrl: string;
  model: string;
  timeoutMs: number;
  adapter?: AxiosAdapter;
}

const ChatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string(),
        }),
      }),
    )
    .min(1),
});

/**
 * Client for OpenAI-compatible chat completion endpoints (Groq by default).
 * Create one per process and pass it to every classifier.
 */
export class ChatCompletionsClient implements ModelInvoker {
  private http: AxiosInstance;
  readonly model: string;

  constructor(opts: ChatCompletionsClientOptions) {
    if (!opts.apiKey) {
      throw new ConfigurationError('A provider API key is required to initialize ChatCompletionsClient');
    }
    this.model = opts.model;
    this.http = axios.create({
      baseURL: opts.baseUrl,
      timeout: opts.timeoutMs,
      headers: {
        Authorization: `Bearer ${opts.apiKey}`,
        'Content-Type': 'application/json',
      },
      adapter: opts.adapter,
    });
  }

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    const body = {
      model: this.model,
      messages: [{ role: 'user', content: prompt }],
      temperature: options.temperature,
      max_tokens: options.maxTokens,
    };

    logger.debug(
      { model: this.model, promptChars: prompt.length, temperature: options.temperature, maxTokens: options.maxTokens },
      'POST chat/completions',
    );

    let data: unknown;
    try {
      const response = await this.http.post<unknown>('chat/completions', body, { signal: options.signal });
      data = response.data;
    } catch (err) {
      throw toProviderError(err);
    }

    const parsed = ChatCompletionResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ProviderError('malformed_response', 'Provider response has no choices[0].message.content text');
    }
    return parsed.data.choices[0].message.content.trim();
  }
}

export function toProviderError(err: unknown): ProviderError {
  if (err instanceof ProviderError) return err;
  if (!axios.isAxiosError(err)) {
    const message = err instanceof Error ? err.message : String(err);
    return new ProviderError('network', message, { cause: err });
  }

  const status = err.response?.status;
  if (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT' || err.code === 'ERR_CANCELED') {
    return new ProviderError('timeout', `Provider did not respond in time (${err.code})`, { cause: err });
  }
  if (status === 401 || status === 403) {
    return new ProviderError('auth', `Provider rejected the credential (HTTP ${status})`, { status, cause: err });
  }
  if (status === 429) {
    return new ProviderError('quota', 'Provider quota or rate limit exceeded (HTTP 429)', { status, cause: err });
  }
  if (status != null) {
    return new ProviderError('http', `Provider returned HTTP ${status}`, { status, cause: err });
  }
  return new ProviderError('network', `Provider unreachable: ${err.message}`, { cause: err });
}

export function createModelInvoker(cfg: AppConfig, policy: RelevancePolicy): ModelInvoker {
  if (cfg.model.provider === 'mock') {
    return new MockModelClient(policy);
  }
  return new ChatCompletionsClient({
    apiKey: cfg.model.apiKey,
    baseUrl: cfg.model.baseUrl,
    model: cfg.model.name,
    timeoutMs: cfg.model.timeoutMs,
  });
}
