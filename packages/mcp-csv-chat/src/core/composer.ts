/**
 * Context composer
 *
 * Builds the message sequence for one question: instruction prompt, dataset
 * profile, then either the replayed history or just the new question. Calls the
 * model under a timeout and records the exchange only when an answer arrives.
 */

import type { ReplayPolicy } from '../config.ts';
import { ConfigurationError, LLMInvocationError, ValidationError } from '../utils/errors.ts';
import { logger } from '../utils/logger.ts';
import type { Exchange } from './history.ts';
import type { ChatCompletionRequest, ChatMessage, LlmCollaborator } from './llm.ts';
import type { ChatSession } from './session.ts';

export const PROFILE_LABEL = 'Here is the data description:';

export interface ComposeInput {
  instructions: string;
  profileText: string;
  history: readonly Exchange[];
  question: string;
  replay: ReplayPolicy;
}

export interface AskOptions {
  instructions: string;
  replay: ReplayPolicy;
  model: string;
  temperature: number;
  timeoutMs: number;
  /** Undefined when no API key is configured. */
  llm: LlmCollaborator | undefined;
}

/**
 * @throws ValidationError for an empty or whitespace-only question
 */
export function validateQuestion(question: string): void {
  if (!question.trim()) {
    throw new ValidationError('Please enter a valid question.');
  }
}

export function composeMessages(input: ComposeInput): ChatMessage[] {
  validateQuestion(input.question);

  const messages: ChatMessage[] = [
    { role: 'system', content: input.instructions },
    { role: 'system', content: `${PROFILE_LABEL}\n${input.profileText}` },
  ];

  if (input.replay === 'full') {
    for (const exchange of input.history) {
      messages.push({ role: 'user', content: exchange.question });
      messages.push({ role: 'assistant', content: exchange.answer });
    }
  }

  messages.push({ role: 'user', content: input.question });
  return messages;
}

async function invokeWithTimeout(
  llm: LlmCollaborator,
  request: Omit<ChatCompletionRequest, 'signal'>,
  timeoutMs: number,
): Promise<string> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const expiry = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      // Settle first so the race reports the timeout, not the abort it causes
      reject(new LLMInvocationError(`The model did not answer within ${timeoutMs} ms.`));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([llm.invoke({ ...request, signal: controller.signal }), expiry]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Answers one question against the session's dataset and records the exchange.
 * On any failure the history is left exactly as it was; nothing is retried.
 *
 * @throws ValidationError, DataLoadError, ConfigurationError or LLMInvocationError
 */
export function askQuestion(session: ChatSession, question: string, options: AskOptions): Promise<string> {
  return session.exclusive(async () => {
    validateQuestion(question);
    const dataset = session.requireDataset();

    const { llm } = options;
    if (!llm) {
      throw new ConfigurationError(
        'No API key configured. Set OPENROUTER_API_KEY (or OPENAI_API_KEY) and restart the server.',
      );
    }

    const messages = composeMessages({
      instructions: options.instructions,
      profileText: dataset.profileText,
      history: session.history.snapshot(),
      question,
      replay: options.replay,
    });

    logger.info(
      {
        replay: options.replay,
        model: options.model,
        messageCount: messages.length,
        historySize: session.history.size,
        questionLength: question.length,
      },
      'Sending question to model',
    );

    let answer: string;
    try {
      answer = await invokeWithTimeout(
        llm,
        { messages, model: options.model, temperature: options.temperature },
        options.timeoutMs,
      );
    } catch (error) {
      if (error instanceof LLMInvocationError) throw error;
      throw new LLMInvocationError(
        `The model request failed: ${error instanceof Error ? error.message : String(error)}`,
        error,
      );
    }

    session.history.append({ question, answer, askedAt: new Date().toISOString() });
    logger.info({ answerLength: answer.length, historySize: session.history.size }, 'Answer recorded');
    return answer;
  });
}
