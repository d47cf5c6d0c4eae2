export class CsvChatError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly isError: boolean = true,
  ) {
    super(message);
    this.name = 'CsvChatError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Unreadable or malformed CSV, or no dataset loaded yet. */
export class DataLoadError extends CsvChatError {
  constructor(message: string) {
    super(message, 'DATA_LOAD_ERROR', true);
    this.name = 'DataLoadError';
  }
}

/** Missing credential or invalid deployment setting. */
export class ConfigurationError extends CsvChatError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR', true);
    this.name = 'ConfigurationError';
  }
}

export class ValidationError extends CsvChatError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR', true);
    this.name = 'ValidationError';
  }
}

export const LLM_RETRY_HINT = 'Try rephrasing your question or check your API key.';

/** The LLM collaborator failed or timed out. History is left as it was. */
export class LLMInvocationError extends CsvChatError {
  constructor(message: string, public readonly originalError?: unknown) {
    super(`${message.replace(/[.\s]+$/, '')}. ${LLM_RETRY_HINT}`, 'LLM_INVOCATION_ERROR', true);
    this.name = 'LLMInvocationError';
  }
}

export class OpenRouterAPIError extends CsvChatError {
  constructor(message: string, public readonly statusCode?: number) {
    super(message, 'OPENROUTER_API_ERROR', true);
    this.name = 'OpenRouterAPIError';
  }
}
