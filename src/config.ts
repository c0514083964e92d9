/**
 * Centralized configuration loader for the profile relevance server.
 * Reads environment variables, parses types, and exposes a typed config object.
 *
 * Environment variables (see .env.example):
 * - MODEL_PROVIDER=groq|mock (default: groq)
 * - GROQ_API_KEY (required unless MODEL_PROVIDER=mock)
 * - MODEL_BASE_URL (default: https://api.groq.com/openai/v1/)
 * - MODEL (default: llama-3.1-8b-instant)
 * - MODEL_TEMPERATURE (default: 0.3)
 * - MODEL_MAX_TOKENS (default: 1500)
 * - MODEL_TIMEOUT_MS (default: 30000)
 * - POLICY_ID (default: wifi-infra-v2)
 * - POLICY_FILE (optional JSON policy, overrides POLICY_ID)
 * - BATCH_CONCURRENCY (default: 1)
 * - TRANSPORT=stdio|http (default: stdio)
 * - PORT (default: 3000 for http transport)
 */

import { config } from 'dotenv';
import { ConfigurationError } from './errors.js';

// Load environment variables from .env file
config();

export type Transport = 'stdio' | 'http';

export type ModelProvider = 'groq' | 'mock';

export interface AppConfig {
  transport: Transport;
  port: number;
  httpHost: string;
  allowedHosts: string[];
  allowedOrigins: string[];
  logLevel: string;
  model: {
    provider: ModelProvider;
    apiKey: string;
    baseUrl: string;
    name: string;
    temperature: number;
    maxTokens: number;
    timeoutMs: number;
  };
  policy: {
    id: string;
    file?: string;
  };
  batch: {
    concurrency: number;
  };
}

export const DEFAULT_POLICY_ID = 'wifi-infra-v2';

// Largest delay setTimeout honours; longer ones fire after 1 ms.
export const MAX_TIMEOUT_MS = 2_147_483_647;

function parseNumber(value: string | undefined): number | undefined {
  if (!value || value.trim() === '') return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

function parseList(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((v) => v.trim())
    .filter(Boolean);
}

export function getConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const transport: Transport = env.TRANSPORT === 'http' ? 'http' : 'stdio';
  const provider: ModelProvider = env.MODEL_PROVIDER?.trim().toLowerCase() === 'mock' ? 'mock' : 'groq';

  return {
    transport,
    port: parseNumber(env.PORT) ?? 3000,
    httpHost: env.HOST?.trim() || '0.0.0.0',
    allowedHosts: parseList(env.ALLOWED_HOSTS),
    allowedOrigins: parseList(env.ALLOWED_ORIGINS),
    logLevel: env.LOG_LEVEL?.trim() || 'info',
    model: {
      provider,
      apiKey: env.GROQ_API_KEY?.trim() ?? '',
      baseUrl: env.MODEL_BASE_URL?.trim() || 'https://api.groq.com/openai/v1/',
      name: env.MODEL?.trim() || 'llama-3.1-8b-instant',
      temperature: parseNumber(env.MODEL_TEMPERATURE) ?? 0.3,
      maxTokens: parseNumber(env.MODEL_MAX_TOKENS) ?? 1500,
      timeoutMs: parseNumber(env.MODEL_TIMEOUT_MS) ?? 30000,
    },
    policy: {
      id: env.POLICY_ID?.trim() || DEFAULT_POLICY_ID,
      file: env.POLICY_FILE?.trim() || undefined,
    },
    batch: {
      concurrency: parseNumber(env.BATCH_CONCURRENCY) ?? 1,
    },
  };
}

/**
 * Assert everything the engine needs before any profile is processed.
 * Called once at start-up by both entry points.
 */
export function assertRequiredConfig(cfg: AppConfig): void {
  const { model, batch } = cfg;
  if (model.provider !== 'mock' && !model.apiKey) {
    throw new ConfigurationError('GROQ_API_KEY environment variable is required');
  }
  if (model.temperature < 0 || model.temperature > 2) {
    throw new ConfigurationError(`MODEL_TEMPERATURE must be between 0 and 2, got ${model.temperature}`);
  }
  if (!Number.isInteger(model.maxTokens) || model.maxTokens <= 0) {
    throw new ConfigurationError(`MODEL_MAX_TOKENS must be a positive integer, got ${model.maxTokens}`);
  }
  if (model.timeoutMs <= 0 || model.timeoutMs > MAX_TIMEOUT_MS) {
    throw new ConfigurationError(`MODEL_TIMEOUT_MS must be between 1 and ${MAX_TIMEOUT_MS}, got ${model.timeoutMs}`);
  }
  if (!Number.isInteger(batch.concurrency) || batch.concurrency < 1) {
    throw new ConfigurationError(`BATCH_CONCURRENCY must be a positive integer, got ${batch.concurrency}`);
  }
}
