import { z } from 'zod';
import {
  PermanentServiceError,
  ServiceError,
  TransientServiceError,
  errorMessage,
  serviceErrorFromResponse,
} from '../errors.js';
import type { GenerateOptions, TextGenerator } from '../types/index.js';

export type LLMProvider = 'gemini' | 'openai' | 'anthropic';

export interface LLMConfig {
  provider: LLMProvider;
  model: string;
  apiKey: string;
  timeout?: number;  // Timeout in milliseconds (default: 60000)
  maxOutputTokens?: number;  // Max output tokens (default: 8192)
  temperature?: number;  // Temperature for sampling (default: 0.7)
}

export const DEFAULT_MODELS: Record<LLMProvider, string> = {
  gemini: 'gemini-2.0-flash',
  openai: 'gpt-4o-mini',
  anthropic: 'claude-3-5-haiku-latest',
};

const GeminiResponseSchema = z.object({
  candidates: z.array(z.object({
    content: z.object({ parts: z.array(z.object({ text: z.string().optional() })).optional() }).optional(),
  })).optional(),
});

const OpenAIResponseSchema = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullable().optional() }),
  })).optional(),
});

const AnthropicResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })).optional(),
});

interface ProviderRequest {
  url: string;
  headers: Record<string, string>;
  body: unknown;
}

function buildRequest(prompt: string, config: LLMConfig, maxOutputTokens: number, temperature: number): ProviderRequest {
  switch (config.provider) {
    case 'gemini':
      return {
        url: `https://generativelanguage.googleapis.com/v1beta/models/${config.model}:generateContent?key=${config.apiKey}`,
        headers: { 'Content-Type': 'application/json' },
        body: {
          contents: [{ parts: [{ text: prompt }] }],
          generationConfig: { temperature, maxOutputTokens },
        },
      };
    case 'openai':
      return {
        url: 'https://api.openai.com/v1/chat/completions',
        headers: { Authorization: `Bearer ${config.apiKey}`, 'Content-Type': 'application/json' },
        body: {
          model: config.model,
          messages: [{ role: 'user', content: prompt }],
          max_completion_tokens: maxOutputTokens,
          temperature,
        },
      };
    case 'anthropic':
      return {
        url: 'https://api.anthropic.com/v1/messages',
        headers: {
          'x-api-key': config.apiKey,
          'anthropic-version': '2023-06-01',
          'Content-Type': 'application/json',
        },
        body: {
          model: config.model,
          messages: [{ role: 'user', content: prompt }],
          max_tokens: maxOutputTokens,
          temperature,
        },
      };
  }
}

function extractText(provider: LLMProvider, data: unknown): string {
  switch (provider) {
    case 'gemini': {
      const parsed = GeminiResponseSchema.safeParse(data);
      if (!parsed.success) return '';
      return (parsed.data.candidates?.[0]?.content?.parts ?? []).map(part => part.text ?? '').join('');
    }
    case 'openai': {
      const parsed = OpenAIResponseSchema.safeParse(data);
      return parsed.success ? parsed.data.choices?.[0]?.message.content ?? '' : '';
    }
    case 'anthropic': {
      const parsed = AnthropicResponseSchema.safeParse(data);
      if (!parsed.success) return '';
      return (parsed.data.content ?? []).filter(block => block.type === 'text').map(block => block.text ?? '').join('');
    }
  }
}

/**
 * Call a single LLM using native fetch.
 * Throws TransientServiceError for timeouts, network failures, 429 and 5xx;
 * PermanentServiceError for everything else.
 */
export async function callLLM(prompt: string, config: LLMConfig, options: GenerateOptions = {}): Promise<string> {
  const timeout = config.timeout ?? 60000;
  const maxOutputTokens = options.maxOutputTokens ?? config.maxOutputTokens ?? 8192;
  const temperature = options.temperature ?? config.temperature ?? 0.7;
  const service = `llm:${config.provider}`;
  const request = buildRequest(prompt, config, maxOutputTokens, temperature);

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);

  try {
    const response = await fetch(request.url, {
      method: 'POST',
      headers: request.headers,
      body: JSON.stringify(request.body),
      signal: controller.signal,
    });

    if (!response.ok) {
      throw serviceErrorFromResponse(service, response.status, await response.text());
    }

    const content = extractText(config.provider, await response.json());
    if (!content) {
      throw new TransientServiceError(`${config.model} returned empty content`, service, response.status);
    }
    return content;
  } catch (error) {
    if (error instanceof ServiceError) {
      console.error(`[LLM] ${config.model} failed: ${error.message}`);
      throw error;
    }
    if (error instanceof SyntaxError) {
      throw new PermanentServiceError(`${config.model} returned a non-JSON body`, service, undefined, { cause: error });
    }
    // AbortError on timeout, TypeError on dropped connections
    console.error(`[LLM] ${config.model} request failed: ${errorMessage(error)}`);
    throw new TransientServiceError(`${config.model} request failed: ${errorMessage(error)}`, service, undefined, { cause: error });
  } finally {
    clearTimeout(timeoutId);
  }
}

export function createTextGenerator(config: LLMConfig): TextGenerator {
  return {
    name: `${config.provider}:${config.model}`,
    generate: (prompt: string, options?: GenerateOptions) => callLLM(prompt, config, options),
  };
}
