import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import { logger } from '../utils/logger.ts';
import { OpenRouterAPIError } from '../utils/errors.ts';
import type { ChatCompletionRequest, ChatMessage, LlmCollaborator } from '../core/llm.ts';

// --- OpenRouter API types ----------------------------------------------------

type MessageContent = string | Array<{ type: string; text?: string }> | null;

interface ChatCompletionResponse {
  choices?: Array<{
    message?: { role?: string; content?: MessageContent };
    finish_reason?: string;
  }>;
}

/** Request body for POST /chat/completions. */
interface ChatCompletionBody {
  model: string;
  messages: ChatMessage[];
  temperature: number;
}

export interface OpenRouterClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  /** Replaces the HTTP transport, e.g. with an in-process stand-in. */
  adapter?: AxiosAdapter;
}

// --- Helpers ------------------------------------------------------------------

function extractAnswer(data: ChatCompletionResponse): string {
  const content = data.choices?.[0]?.message?.content;

  if (typeof content === 'string') {
    return content;
  }
  if (Array.isArray(content)) {
    const text = content
      .filter((part) => part.type === 'text' && typeof part.text === 'string')
      .map((part) => part.text)
      .join('');
    if (text) return text;
  }

  throw new OpenRouterAPIError('No answer text in OpenRouter response.');
}

function parseAxiosError(error: unknown): { message: string; status?: number } {
  if (!axios.isAxiosError(error)) {
    return { message: error instanceof Error ? error.message : String(error) };
  }

  const data: unknown = error.response?.data;
  let message = error.message;

  if (typeof data === 'object' && data !== null && 'error' in data) {
    const inner = data.error;
    if (typeof inner === 'string') {
      message = inner;
    } else if (typeof inner === 'object' && inner !== null && 'message' in inner && typeof inner.message === 'string') {
      message = inner.message;
    }
  } else if (typeof data === 'string' && data.trim()) {
    message = data;
  }

  return { message, status: error.response?.status };
}

// --- Client -------------------------------------------------------------------

/**
 * Chat-completion client for OpenRouter or any OpenAI-compatible endpoint.
 */
export class OpenRouterChatClient implements LlmCollaborator {
  private readonly client: AxiosInstance;
  private readonly baseUrl: string;

  constructor(apiKey: string, options: OpenRouterClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? 'https://openrouter.ai/api/v1').replace(/\/$/, '');
    this.client = axios.create({
      baseURL: this.baseUrl,
      headers: {
        Authorization: `Bearer ${apiKey}`,
        'Content-Type': 'application/json',
      },
      timeout: options.timeoutMs ?? 120_000,
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  async invoke(request: ChatCompletionRequest): Promise<string> {
    const { model, temperature, signal } = request;
    const body: ChatCompletionBody = {
      model,
      temperature,
      messages: request.messages.map(({ role, content }) => ({ role, content })),
    };

    logger.debug({ model, temperature, messageCount: body.messages.length }, 'Requesting chat completion');

    try {
      const response = await this.client.post<ChatCompletionResponse>('/chat/completions', body, { signal });
      const answer = extractAnswer(response.data);
      logger.debug({ model, answerLength: answer.length }, 'Chat completion received');
      return answer;
    } catch (error) {
      if (error instanceof OpenRouterAPIError) {
        logger.error({ error: error.message, model }, 'Unusable chat completion');
        throw error;
      }
      const { message, status } = parseAxiosError(error);
      logger.error({ error: message, status, model }, 'Error requesting chat completion');
      throw new OpenRouterAPIError(`OpenRouter API error: ${message}`, status);
    }
  }
}
