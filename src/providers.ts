/**
 * Multi-provider LLM chat used for archetype selection and comment generation
 *
 * Supports:
 * - Anthropic Claude (Messages API)
 * - OpenAI chat completions
 * - Google Gemini generateContent
 * - xAI Grok (OpenAI-compatible)
 */

import { getActiveProvider, getProviderApiKey, loadConfig, type AIProvider } from './config.js';
import { GenerationError } from './errors.js';
import { logger } from './logger.js';

export interface ChatOptions {
  systemPrompt?: string;
  maxTokens?: number;
  temperature?: number;
  timeout?: number;       // Request timeout in ms
  provider?: AIProvider;  // Defaults to the configured provider
  retryBaseMs?: number;   // Backoff unit for 429/529 retries
}

export interface ChatResponse {
  content: string;
  provider: AIProvider;
  model: string;
  inputTokens?: number;
  outputTokens?: number;
}

export type ChatFn = (prompt: string, options?: ChatOptions) => Promise<ChatResponse>;

// Provider-specific API configurations
const PROVIDER_CONFIGS = {
  anthropic: {
    url: 'https://api.anthropic.com/v1/messages',
    model: 'claude-sonnet-4-20250514',
    maxTokens: 1024,
  },
  openai: {
    url: 'https://api.openai.com/v1/chat/completions',
    model: 'gpt-4o',
    maxTokens: 1024,
  },
  google: {
    // Gemini uses a header-based key on a model-specific path
    urlTemplate: 'https://generativelanguage.googleapis.com/v1beta/models/{model}:generateContent',
    model: 'gemini-2.0-flash',
    maxTokens: 1024,
  },
  xai: {
    // xAI uses OpenAI-compatible format
    url: 'https://api.x.ai/v1/chat/completions',
    model: 'grok-2',
    maxTokens: 1024,
  },
} as const;

/** Non-2xx answer from a provider */
class ProviderHttpError extends GenerationError {
  readonly httpStatus: number;

  constructor(provider: AIProvider, httpStatus: number, body: string) {
    super(`${provider} API error (${httpStatus}): ${body.slice(0, 200)}`);
    this.httpStatus = httpStatus;
  }
}

function isRetryable(error: unknown): boolean {
  return error instanceof ProviderHttpError && (error.httpStatus === 429 || error.httpStatus === 529);
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function getModel(provider: AIProvider): string {
  return loadConfig().model ?? PROVIDER_CONFIGS[provider].model;
}

/**
 * Main chat function - routes to appropriate provider
 * Retries rate limiting (429) and overload (529) with exponential backoff
 */
export async function chat(prompt: string, options: ChatOptions = {}): Promise<ChatResponse> {
  const provider = options.provider ?? getActiveProvider();
  const apiKey = getProviderApiKey(provider);

  if (!apiKey) {
    throw new GenerationError(`No API key configured for ${provider}. Run 'replicant config key ${provider} <key>' or set the env var.`, {
      retryable: false,
    });
  }

  const timeout = options.timeout ?? 60000;
  const retryBaseMs = options.retryBaseMs ?? 1000;
  const maxRetries = 3;

  for (let attempt = 0; ; attempt++) {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    try {
      switch (provider) {
        case 'anthropic':
          return await chatAnthropic(apiKey, prompt, options, controller.signal);
        case 'openai':
        case 'xai':
          return await chatOpenAICompatible(provider, apiKey, prompt, options, controller.signal);
        case 'google':
          return await chatGoogle(apiKey, prompt, options, controller.signal);
      }
    } catch (error) {
      if (isRetryable(error) && attempt < maxRetries - 1) {
        // Exponential backoff: 2, 4 units
        const backoffMs = Math.pow(2, attempt + 1) * retryBaseMs;
        logger.info(`Rate limited, retrying in ${backoffMs}ms (attempt ${attempt + 1}/${maxRetries})`);
        await sleep(backoffMs);
        continue;
      }
      if (error instanceof GenerationError) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw new GenerationError(`${provider} request timed out after ${timeout}ms`, { cause: error });
      }
      throw new GenerationError(`${provider} request failed`, { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

async function chatAnthropic(
  apiKey: string,
  prompt: string,
  options: ChatOptions,
  signal: AbortSignal
): Promise<ChatResponse> {
  const model = getModel('anthropic');
  const body: Record<string, unknown> = {
    model,
    max_tokens: options.maxTokens ?? PROVIDER_CONFIGS.anthropic.maxTokens,
    temperature: options.temperature ?? 0.8,
    messages: [{ role: 'user', content: prompt }],
  };

  if (options.systemPrompt) {
    body.system = options.systemPrompt;
  }

  const response = await fetch(PROVIDER_CONFIGS.anthropic.url, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
      'x-api-key': apiKey,
      'anthropic-version': '2023-06-01',
    },
    body: JSON.stringify(body),
    signal,
  });

  if (!response.ok) {
    throw new ProviderHttpError('anthropic', response.status, await response.text());
  }

  const data = await response.json() as {
    content: Array<{ type: string; text?: string }>;
    usage?: { input_tokens: number; output_tokens: number };
  };

  // Extract text blocks only
  const content = data.content
    .filter(block => block.type === 'text')
    .map(block => block.text ?? '')
    .join('');

  return {
    content,
    provider: 'anthropic',
    model,
    inputTokens: data.usage?.input_tokens ?? 0,
    outputTokens: data.usage?.output_tokens ?? 0,
  };
}

/**
 * OpenAI and xAI share the chat completions format
 */
async function chatOpenAICompatible(
  provider: 'openai' | 'xai',
  apiKey: string,
  prompt: string,
  options: ChatOptions,
  signal: AbortSignal
): Promise<ChatResponse> {
  const config = PROVIDER_CONFIGS[provider];
  const model = getModel(provider);

  const messages: Array<{ role: string; content: string }> = [];
  if (options.systemPrompt) {
    messages.push({ role: 'system', content: options.systemPrompt });
  }
  messages.push({ role: 'user', content: prompt });

  const response = await fetch(config.url, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
      Authorization: `Bearer ${apiKey}`,
    },
    body: JSON.stringify({
      model,
      messages,
      max_tokens: options.maxTokens ?? config.maxTokens,
      temperature: options.temperature ?? 0.8,
    }),
    signal,
  });

  if (!response.ok) {
    throw new ProviderHttpError(provider, response.status, await response.text());
  }

  const data = await response.json() as {
    choices: Array<{ message: { content: string | null } }>;
    usage?: { prompt_tokens: number; completion_tokens: number };
  };

  return {
    content: data.choices[0]?.message?.content ?? '',
    provider,
    model,
    inputTokens: data.usage?.prompt_tokens ?? 0,
    outputTokens: data.usage?.completion_tokens ?? 0,
  };
}

async function chatGoogle(
  apiKey: string,
  prompt: string,
  options: ChatOptions,
  signal: AbortSignal
): Promise<ChatResponse> {
  const config = PROVIDER_CONFIGS.google;
  const model = getModel('google');
  const url = config.urlTemplate.replace('{model}', model);

  const body: Record<string, unknown> = {
    contents: [{ role: 'user', parts: [{ text: prompt }] }],
    generationConfig: {
      maxOutputTokens: options.maxTokens ?? config.maxTokens,
      temperature: options.temperature ?? 0.8,
    },
  };
  if (options.systemPrompt) {
    body.systemInstruction = { parts: [{ text: options.systemPrompt }] };
  }

  const response = await fetch(url, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
      'x-goog-api-key': apiKey,
    },
    body: JSON.stringify(body),
    signal,
  });

  if (!response.ok) {
    throw new ProviderHttpError('google', response.status, await response.text());
  }

  const data = await response.json() as {
    candidates?: Array<{ content?: { parts?: Array<{ text?: string }> } }>;
    usageMetadata?: { promptTokenCount: number; candidatesTokenCount: number };
  };

  return {
    content: data.candidates?.[0]?.content?.parts?.[0]?.text ?? '',
    provider: 'google',
    model,
    inputTokens: data.usageMetadata?.promptTokenCount ?? 0,
    outputTokens: data.usageMetadata?.candidatesTokenCount ?? 0,
  };
}
