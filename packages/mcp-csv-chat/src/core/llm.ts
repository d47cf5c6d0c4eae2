export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ChatCompletionRequest {
  messages: readonly ChatMessage[];
  model: string;
  temperature: number;
  /** Aborted when the caller gives up on the request. */
  signal?: AbortSignal;
}

/**
 * The remote chat model, seen as one request/response call that yields
 * exactly one assistant text or rejects.
 */
export interface LlmCollaborator {
  invoke(request: ChatCompletionRequest): Promise<string>;
}
